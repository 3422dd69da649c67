import { DevinfoError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { DevinfoErrorOptions } from "../types.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs or broken invariants.
 * HTTP 500. The `.code` field discriminates the specific error.
 */
export class InternalError<C extends InternalCode = "INTERNAL_ERROR"> extends DevinfoError<C> {
  readonly _tag = "InternalError" as const;

  constructor(options: DevinfoErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | DevinfoErrorOptions<C>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super(
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_ERROR" as C, message: messageOrOptions, metadata, traceId }
        : messageOrOptions,
    );
  }
}

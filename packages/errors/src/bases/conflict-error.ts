import { DevinfoError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { DevinfoErrorOptions } from "../types.js";

type ConflictCode = CodesForBase<"ConflictError">;

/**
 * Errors when an operation conflicts with the current resource state.
 * HTTP 409. The `.code` field discriminates the specific error.
 */
export class ConflictError<C extends ConflictCode = "RESOURCE_CONFLICT"> extends DevinfoError<C> {
  readonly _tag = "ConflictError" as const;

  constructor(options: DevinfoErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | DevinfoErrorOptions<C>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super(
      typeof messageOrOptions === "string"
        ? { code: "RESOURCE_CONFLICT" as C, message: messageOrOptions, metadata, traceId }
        : messageOrOptions,
    );
  }
}

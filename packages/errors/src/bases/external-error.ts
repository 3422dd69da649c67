import { DevinfoError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { DevinfoErrorOptions } from "../types.js";

type ExternalCode = CodesForBase<"ExternalError">;

/**
 * Errors caused by a failing collaborator (host filesystem, memory tracker).
 * HTTP 502/503. The `.code` field discriminates the specific error.
 */
export class ExternalError<C extends ExternalCode = "INTERNAL_UNAVAILABLE"> extends DevinfoError<C> {
  readonly _tag = "ExternalError" as const;

  constructor(options: DevinfoErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | DevinfoErrorOptions<C>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super(
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_UNAVAILABLE" as C, message: messageOrOptions, metadata, traceId }
        : messageOrOptions,
    );
  }
}

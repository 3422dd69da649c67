import { DevinfoError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { DevinfoErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

/**
 * Errors caused by invalid input, configuration, or request data.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError<
  C extends ValidationCode = "VALIDATION_FAILED",
> extends DevinfoError<C> {
  readonly _tag = "ValidationError" as const;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(options: DevinfoErrorOptions<C> & { issues?: readonly ValidationIssue[] });
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions: string | (DevinfoErrorOptions<C> & { issues?: readonly ValidationIssue[] }),
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    if (typeof messageOrOptions === "string") {
      super({ code: "VALIDATION_FAILED" as C, message: messageOrOptions, metadata, traceId });
      this.issues = issues ?? [];
    } else {
      super(messageOrOptions);
      this.issues = messageOrOptions.issues ?? [];
    }
  }
}

import { DevinfoError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { DevinfoErrorOptions } from "../types.js";

type NotFoundCode = CodesForBase<"NotFoundError">;

/**
 * Errors when a requested resource does not exist.
 * HTTP 404. The `.code` field discriminates the specific error.
 */
export class NotFoundError<C extends NotFoundCode = "RESOURCE_NOT_FOUND"> extends DevinfoError<C> {
  readonly _tag = "NotFoundError" as const;

  constructor(options: DevinfoErrorOptions<C>);
  constructor(
    resourceType: string,
    resourceId: string,
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    resourceTypeOrOptions: string | DevinfoErrorOptions<C>,
    resourceId?: string,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super(
      typeof resourceTypeOrOptions === "string"
        ? {
            code: "RESOURCE_NOT_FOUND" as C,
            message: `${resourceTypeOrOptions} with ID '${resourceId}' not found`,
            metadata,
            traceId,
          }
        : resourceTypeOrOptions,
    );
  }
}

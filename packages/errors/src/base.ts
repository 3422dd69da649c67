import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";
import type { DevinfoErrorOptions } from "./types.js";

/**
 * Plain-object form of a {@link DevinfoError}, as produced by `toJSON()`.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly isExpected: boolean;
  readonly metadata?: Record<string, string>;
  readonly traceId?: string;
  readonly timestamp: string;
  readonly stack?: string;
}

/**
 * Root of the devinfo error hierarchy.
 *
 * The catalog entry for `code` fills in httpStatus, grpcCode, domain and
 * isExpected. Subclasses only pin the behavioral `_tag`.
 */
export abstract class DevinfoError<C extends ErrorCode = ErrorCode> extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: C;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(options: DevinfoErrorOptions<C>) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    const entry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.metadata = options.metadata;
    this.traceId = options.traceId;
    this.timestamp = new Date();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
      timestamp: this.timestamp.toISOString(),
      ...(this.stack ? { stack: this.stack } : {}),
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/**
 * Check if a value is a DevinfoError
 */
export function isDevinfoError(error: unknown): error is DevinfoError {
  return error instanceof DevinfoError;
}

/**
 * Check if a value is any Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

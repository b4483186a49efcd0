import type { ErrorCode, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "./catalog.js";

/**
 * Plain-object form of an error, safe to log or send over the wire
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  domain: ErrorDomain;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  cause?: string | undefined;
}

/**
 * Root of the error hierarchy. Concrete base types fill in the catalog
 * fields from their `.code`.
 */
export abstract class RichTextError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      traceId: this.traceId,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/**
 * Check if a value is an Error instance
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Check if a value belongs to the rich-text error hierarchy
 */
export function isRichTextError(value: unknown): value is RichTextError {
  return value instanceof RichTextError;
}

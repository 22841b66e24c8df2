/**
 * Error taxonomy for graph operations.
 *
 * Every failure that aborts a build, copy or inspect surfaces as a GraphError
 * subclass carrying the offending media type and digest where known.
 * Cancellation is its own class so callers can exit without reporting a failure.
 */

export type GraphErrorCode =
  | "BUILD"
  | "DECODE"
  | "STORE"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "CANCELLED"
  | "COPY";

export interface GraphErrorOptions {
  mediaType?: string;
  digest?: string;
  cause?: unknown;
}

export class GraphError extends Error {
  readonly code: GraphErrorCode;
  readonly mediaType?: string;
  readonly digest?: string;

  constructor(code: GraphErrorCode, message: string, options: GraphErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.mediaType = options.mediaType;
    this.digest = options.digest;
  }
}

/**
 * Local construction failure: a blob source could not be opened or read,
 * or a push made while building a node failed.
 */
export class ArtifactBuildError extends GraphError {
  constructor(message: string, options: GraphErrorOptions = {}) {
    super("BUILD", message, options);
  }
}

/**
 * Bytes fetched for a descriptor do not parse as its claimed media type.
 */
export class ContentDecodeError extends GraphError {
  constructor(message: string, options: GraphErrorOptions = {}) {
    super("DECODE", message, options);
  }
}

/**
 * exists/fetch/push/tag failed against a store.
 */
export class StoreError extends GraphError {
  readonly status?: number;

  constructor(message: string, options: GraphErrorOptions & { status?: number } = {}) {
    super("STORE", message, options);
    this.status = options.status;
  }
}

export class UnsupportedMediaTypeError extends GraphError {
  constructor(mediaType: string, digest?: string) {
    super("UNSUPPORTED_MEDIA_TYPE", `unsupported media type ${JSON.stringify(mediaType)}`, {
      mediaType,
      digest,
    });
  }
}

export class OperationCancelledError extends GraphError {
  constructor(reason?: unknown) {
    const detail = reason instanceof Error ? `: ${reason.message}` : "";
    super("CANCELLED", `operation cancelled${detail}`, { cause: reason });
  }
}

/**
 * A copy failed part-way. Objects already written stay at the destination;
 * rerunning the copy resumes from them.
 */
export class CopyError extends GraphError {
  readonly bytesTransferred: number;

  constructor(cause: unknown, bytesTransferred: number) {
    const inner = cause instanceof GraphError ? cause : undefined;
    super("COPY", `copy failed after ${bytesTransferred} bytes: ${errorMessage(cause)}`, {
      mediaType: inner?.mediaType,
      digest: inner?.digest,
      cause,
    });
    this.bytesTransferred = bytesTransferred;
  }
}

/**
 * True for a caller-initiated abort, including one wrapped by CopyError.
 */
export function isCancellation(err: unknown): boolean {
  if (err instanceof OperationCancelledError) return true;
  if (err instanceof CopyError) return isCancellation(err.cause);
  return false;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Throw OperationCancelledError if the signal has fired.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(signal.reason);
  }
}

export type SyncErrorType =
  | 'SEARCH_FAILED'
  | 'AUTH_FAILED'
  | 'DOWNLOAD_FAILED'
  | 'CAPACITY_EXCEEDED'
  | 'CANCELLED';

/**
 * Base class for every failure the sync pipeline reports, tagged so callers can branch on `type`.
 */
export class SyncError extends Error {
  readonly type: SyncErrorType;

  constructor(type: SyncErrorType, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.type = type;
  }
}

/**
 * Transient search failure (network, rate limit). The resolver turns it into a not-found result.
 */
export class SearchFailure extends SyncError {
  readonly query: string;

  constructor(query: string, cause?: unknown) {
    super('SEARCH_FAILED', `Search failed for "${query}": ${describeError(cause)}`, cause);
    this.query = query;
  }
}

/**
 * Library fetch rejected by the streaming service. Fatal to the current sync run.
 */
export class AuthFailure extends SyncError {
  readonly service: string;

  constructor(service: string, detail: string, cause?: unknown) {
    super('AUTH_FAILED', `${service}: ${detail}`, cause);
    this.service = service;
  }
}

export class DownloadFailure extends SyncError {
  readonly itemId: string;

  constructor(itemId: string, cause?: unknown) {
    super('DOWNLOAD_FAILED', describeError(cause), cause);
    this.itemId = itemId;
  }
}

export class CapacityExceededError extends SyncError {
  readonly limit: number;

  constructor(limit: number) {
    super('CAPACITY_EXCEEDED', `Queue is full (${limit} unfinished items)`);
    this.limit = limit;
  }
}

/**
 * Thrown from a job checkpoint once the item has been cancelled.
 */
export class DownloadCancelledError extends SyncError {
  readonly itemId: string;

  constructor(itemId: string) {
    super('CANCELLED', `Download ${itemId} was cancelled`);
    this.itemId = itemId;
  }
}

export const describeError = (error: unknown): string => {
  if (error === undefined) {
    return 'unknown error';
  }
  return error instanceof Error ? error.message : String(error);
};

// Error types: the sync job turns these into failure outcomes, the router into status codes


/** Whole-document failure: network, HTTP status or unparseable feed */
export class FeedFetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "FeedFetchError";
    this.url = url;
    this.status = options.status;
  }
}


export class SyncCancelledError extends Error {
  constructor(message = "sync cancelled") {
    super(message);
    this.name = "SyncCancelledError";
  }
}


export class NotFoundError extends Error {
  constructor(message = "not found") {
    super(message);
    this.name = "NotFoundError";
  }
}


/** Error message without serializing the whole object */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}


/** Rejected request input; the router answers 400 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Raised by a request intermediary that could not complete a request at all
 * (connection refused, solver failure). Always retryable.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * The upstream answered, but not with the JSON shape we expected.
 * Never retried: the next poll cycle gets a fresh chance.
 */
export class UpstreamFormatError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamFormatError";
  }
}

/**
 * The dedup store rejected a read or write, including primary-key collisions.
 */
export class PersistenceError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

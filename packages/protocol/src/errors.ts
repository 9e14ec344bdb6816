/**
 * Error Classes
 */

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class InvalidFrameError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidFrameError";
  }
}

/**
 * Socket-level failure. Fatal to the current session.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class NotConnectedError extends Error {
  constructor(state: string) {
    super(`Transport is not connected (state: ${state})`);
    this.name = "NotConnectedError";
  }
}

export class InvalidQuotaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQuotaError";
  }
}

/**
 * The server refused a results subscription. Not retried: the caller has
 * to create a new measurement first.
 */
export class SubscriptionRejectedError extends Error {
  constructor(
    public readonly measurementId: string,
    public readonly status: string
  ) {
    super(
      `Subscription to measurement ${measurementId} rejected with status ${status}`
    );
    this.name = "SubscriptionRejectedError";
  }
}

export class ApiError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly status: number,
    public readonly code: string | undefined
  ) {
    super(`${endpoint} failed with HTTP ${status}${code ? ` (${code})` : ""}`);
    this.name = "ApiError";
  }
}

export class AuthenticationError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = "AuthenticationError";
  }
}

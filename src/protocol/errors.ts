/**
 * graphlink exception hierarchy.
 *
 * All library errors inherit from GraphLinkError.
 */

/** Base error for all graphlink errors. */
export class GraphLinkError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "GraphLinkError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Error details as the service reports them (`{"type": ..., "message": ...}`). */
export interface APIErrorDetails {
  type?: string;
  message?: string;
}

/**
 * Raised when an API call fails.
 *
 * `message` reads "<type>: <message>", matching the shape the service
 * uses in its own error objects.
 */
export class APIError extends GraphLinkError {
  readonly type: string;
  readonly detail: string;

  constructor(details: APIErrorDetails = {}) {
    const type = details.type ?? "";
    const detail = details.message ?? "";
    super(`${type}: ${detail}`);
    this.name = "APIError";
    this.type = type;
    this.detail = detail;
  }
}

/** Raised when the server answers with a status of 500 or above. */
export class TransportError extends APIError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super({ type: `HTTP ${status}`, message: `Response body: ${body}` });
    this.name = "TransportError";
    this.status = status;
    this.body = body;
  }
}

/** Raised for a structured error object returned by the service. */
export class UpstreamAPIError extends APIError {
  constructor(details: APIErrorDetails = {}) {
    super(details);
    this.name = "UpstreamAPIError";
  }
}

/** Raised when the session-key exchange answers with an empty body. */
export class EmptyResponseError extends APIError {
  constructor(message: string) {
    super({ type: "EmptyResponse", message });
    this.name = "EmptyResponseError";
  }
}

export type SignatureFailure =
  | "malformed"
  | "unsupported_algorithm"
  | "too_old"
  | "invalid_signature"
  | "decryption_failed";

/** Raised when a signed request cannot be verified or opened. */
export class SignatureError extends GraphLinkError {
  readonly reason: SignatureFailure;

  constructor(reason: SignatureFailure, message: string) {
    super(message);
    this.name = "SignatureError";
    this.reason = reason;
  }
}

/** Raised for missing or malformed caller-supplied arguments. */
export class ArgumentError extends GraphLinkError {
  constructor(message?: string) {
    super(message);
    this.name = "ArgumentError";
  }
}

/**
 * Standardized error handling utilities
 * Typed failures carry the HTTP status the request boundary should answer with.
 */

/** Safely convert unknown caught value to an Error instance */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(String(err));
}

/** Extract error message string from unknown caught value */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Base class for failures that map onto an HTTP response */
export class ProxyError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Unknown style, unknown source, or no stored upstream URL */
export class NotFoundError extends ProxyError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** Malformed coordinates, extension or key segment in the inbound request */
export class InvalidRequestError extends ProxyError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Provider answered with a non-200 status */
export class UpstreamError extends ProxyError {
  readonly upstreamStatus: number;

  constructor(upstreamStatus: number, message: string = `Upstream returned ${upstreamStatus}`) {
    super(message, upstreamStatusToClientStatus(upstreamStatus));
    this.upstreamStatus = upstreamStatus;
  }
}

/** Network failure, timeout or refused connection reaching the provider */
export class TransportError extends ProxyError {
  readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean = false) {
    super(message, 502);
    this.timedOut = timedOut;
  }
}

/** A style document exists but its proxy metadata does not validate */
export class StyleDescriptorError extends ProxyError {
  readonly styleName: string;

  constructor(styleName: string, detail: string) {
    super(`Invalid style descriptor for ${styleName}: ${detail}`, 500);
    this.styleName = styleName;
  }
}

/**
 * Error statuses pass through; anything else (1xx, 2xx other than 200, 3xx
 * left after redirects) becomes a bad gateway.
 */
export function upstreamStatusToClientStatus(status: number): number {
  if (status >= 400 && status <= 599) return status;
  return 502;
}

/** Status code for any thrown value reaching the request boundary */
export function statusCodeFor(err: unknown): number {
  if (err instanceof ProxyError) return err.statusCode;
  return 500;
}

/**
 * Error types raised by the ItemLookup client.
 */

/**
 * Base class for every error this package raises on purpose.
 */
export class LookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LookupError';
  }
}

/**
 * Credentials or settings are missing or invalid. Raised before any network activity.
 */
export class ConfigurationError extends LookupError {
  /** Names of the settings that were missing or rejected */
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

/**
 * The service answered, but reported the request as invalid (`IsValid` = False).
 */
export class UpstreamError extends LookupError {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'UpstreamError';
    this.code = code;
  }
}

/**
 * Non-200 HTTP response. Only raised when the client runs with `onHttpError: 'throw'`.
 */
export class TransportError extends LookupError {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'TransportError';
    this.statusCode = statusCode;
  }
}

/**
 * The response body could not be read as an ItemLookup XML document at all.
 */
export class ResponseParseError extends LookupError {
  readonly detail?: string;

  constructor(message: string, detail?: string) {
    super(message);
    this.name = 'ResponseParseError';
    this.detail = detail;
  }
}

/**
 * A request parameter cannot be encoded as UTF-8 (a lone surrogate in the item id).
 */
export class RequestEncodingError extends LookupError {
  readonly value: string;

  constructor(message: string, value: string) {
    super(message);
    this.name = 'RequestEncodingError';
    this.value = value;
  }
}

/**
 * Structured errors for the UP API client.
 * Every failure path surfaces one of these; nothing is turned into a default record.
 */

export type UpErrorCode =
  | "CONFIGURATION_ERROR"
  | "AUTH_FAILED"
  | "MALFORMED_RESPONSE"
  | "TRANSPORT_ERROR"
  | "TIMEOUT"
  | "MAPPING_ERROR"
  | "VALIDATION_ERROR";

export interface UpErrorDetails {
  code: UpErrorCode;
  message: string;
  /** HTTP status when applicable */
  httpStatus?: number;
  url?: string;
  /** Response body text of a failed call */
  body?: string;
  /** Record shape and field path of a mapping failure */
  shape?: string;
  field?: string;
  /** Underlying cause for logging (e.g. original Error) */
  cause?: unknown;
}

export class UpApiError extends Error {
  readonly details: UpErrorDetails;

  constructor(details: UpErrorDetails) {
    super(details.message);
    this.name = "UpApiError";
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get code(): UpErrorCode {
    return this.details.code;
  }

  get httpStatus(): number | undefined {
    return this.details.httpStatus;
  }

  /** Serialize for logging */
  toJSON(): UpErrorDetails {
    return { ...this.details, cause: undefined };
  }
}

/** Credentials missing or invalid at resolution time */
export class ConfigurationError extends UpApiError {
  constructor(details: UpErrorDetails) {
    super(details);
    this.name = "ConfigurationError";
  }
}

/** Token exchange rejected by the OAuth endpoint */
export class AuthenticationError extends UpApiError {
  constructor(details: UpErrorDetails) {
    super(details);
    this.name = "AuthenticationError";
  }
}

/** Success status, but the body is not what the API promises */
export class ProtocolError extends UpApiError {
  constructor(details: UpErrorDetails) {
    super(details);
    this.name = "ProtocolError";
  }
}

/** Non-2xx resource response, or the request never completed */
export class TransportError extends UpApiError {
  constructor(details: UpErrorDetails) {
    super(details);
    this.name = "TransportError";
  }
}

export class MappingError extends UpApiError {
  constructor(details: UpErrorDetails) {
    super(details);
    this.name = "MappingError";
  }
}

/** Caller input rejected before any request was made */
export class ValidationError extends UpApiError {
  constructor(details: UpErrorDetails) {
    super(details);
    this.name = "ValidationError";
  }
}

export function configurationError(message: string, cause?: unknown): ConfigurationError {
  return new ConfigurationError({ code: "CONFIGURATION_ERROR", message, cause });
}

export function authenticationError(
  message: string,
  httpStatus?: number,
  body?: string
): AuthenticationError {
  return new AuthenticationError({ code: "AUTH_FAILED", message, httpStatus, body });
}

export function protocolError(message: string, cause?: unknown): ProtocolError {
  return new ProtocolError({ code: "MALFORMED_RESPONSE", message, cause });
}

/** Build the error for a resource call that came back with a non-2xx status */
export function transportError(url: string, httpStatus: number, body: string): TransportError {
  return new TransportError({
    code: "TRANSPORT_ERROR",
    message:
      `Received unexpected response from UP API ${url}; ` +
      `Status Code: ${httpStatus}; Response: ${body}`,
    httpStatus,
    url,
    body,
  });
}

export function networkError(url: string, cause?: unknown): TransportError {
  const reason = cause instanceof Error ? cause.message : "unknown network failure";
  return new TransportError({
    code: "TRANSPORT_ERROR",
    message: `Request to UP API ${url} failed: ${reason}`,
    url,
    cause,
  });
}

export function timeoutError(operation: string, url?: string): TransportError {
  return new TransportError({
    code: "TIMEOUT",
    message: `Request timed out: ${operation}`,
    url,
  });
}

export function mappingError(shape: string, field: string, message: string, cause?: unknown): MappingError {
  return new MappingError({
    code: "MAPPING_ERROR",
    message: `Cannot map ${shape}: ${message}`,
    shape,
    field,
    cause,
  });
}

export function validationError(message: string, cause?: unknown): ValidationError {
  return new ValidationError({ code: "VALIDATION_ERROR", message, cause });
}

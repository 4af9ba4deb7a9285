/**
 * Proxmox API Error Handling Module
 *
 * Typed errors for cluster API calls and a converter from HTTP statuses and
 * socket errors to those types.
 */

/**
 * Base error class for all Proxmox API errors
 */
export class ProxmoxError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode?: number,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ProxmoxError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details || {};

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ProxmoxError.prototype);
  }
}

/**
 * Error thrown when the ticket request is rejected or the ticket has expired
 */
export class AuthenticationError extends ProxmoxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_ERROR', 401, details || {});
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Error thrown when the user lacks a privilege on the requested path
 */
export class AuthorizationError extends ProxmoxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHORIZATION_ERROR', 403, details || {});
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

/**
 * Error thrown when the API rejects parameters or returns an unexpected body
 */
export class ValidationError extends ProxmoxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details || {});
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ServerUnavailableError extends ProxmoxError {
  constructor(message: string, statusCode = 503, details?: Record<string, unknown>) {
    super(message, 'SERVER_UNAVAILABLE', statusCode, details || {});
    this.name = 'ServerUnavailableError';
    Object.setPrototypeOf(this, ServerUnavailableError.prototype);
  }
}

export class TimeoutError extends ProxmoxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', 408, details || {});
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error thrown for connection-level failures (refused, DNS, TLS)
 */
export class NetworkError extends ProxmoxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', undefined, details || {});
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

const NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

const TLS_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'CERT_HAS_EXPIRED',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

/**
 * Convert an HTTP failure or socket error to a typed error.
 *
 * Accepts either `{ statusCode, message }` from a completed response or any
 * thrown value from the transport.
 */
export function convertApiError(error: unknown): ProxmoxError {
  if (error instanceof ProxmoxError) {
    return error;
  }

  const statusCode = readNumber(error, 'statusCode');
  const message = readString(error, 'message') || 'Unknown error';

  if (statusCode !== undefined) {
    const details = { statusCode };
    switch (statusCode) {
      case 401:
        return new AuthenticationError(message, details);
      case 403:
        return new AuthorizationError(message, details);
      case 400:
      case 422:
        return new ValidationError(message, details);
      case 408:
        return new TimeoutError(message, details);
      default:
        if (statusCode >= 500) {
          return new ServerUnavailableError(message, statusCode, details);
        }
        return new ProxmoxError(message, 'API_ERROR', statusCode, details);
    }
  }

  const code = readString(error, 'code');
  if (code && NETWORK_CODES.has(code)) {
    return new NetworkError(message, { code });
  }
  if (code && TLS_CODES.has(code)) {
    return new NetworkError(`${message} (use --insecure to skip certificate verification)`, {
      code,
    });
  }
  if (code === 'ETIMEDOUT' || message.toLowerCase().includes('timeout')) {
    return new TimeoutError(message, code ? { code } : undefined);
  }

  return new ProxmoxError(message, 'UNKNOWN_ERROR', undefined, {
    originalError: String(error),
  });
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

function readNumber(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

/**
 * Base error class for all client errors
 * Provides structured error information with context and retry guidance
 */
export class ElectrumError extends Error {
  /**
   * Unique error code for categorization
   * Format: CATEGORY_SPECIFIC_ERROR (e.g., TRANSPORT_REFUSED, RPC_ERROR)
   */
  readonly code: string;

  /**
   * Indicates if this error is transient and is handled by failing over
   */
  readonly retriable: boolean;

  /**
   * Additional context for debugging and logging
   * Should include relevant data without exposing sensitive information
   */
  readonly context: Record<string, unknown>;

  /**
   * Original error that caused this error (if applicable)
   */
  readonly cause?: Error;

  /**
   * Timestamp when the error occurred
   */
  readonly timestamp: Date;

  /**
   * Creates a new ElectrumError
   * @param message - Human-readable error message
   * @param code - Unique error code
   * @param retriable - Whether failover may recover from this error
   * @param context - Additional context information
   * @param cause - Original error (optional)
   */
  constructor(
    message: string,
    code: string,
    retriable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.retriable = retriable;
    this.context = context || {};
    this.cause = cause;
    this.timestamp = new Date();

    // Preserve stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Converts error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retriable: this.retriable,
      context: ErrorUtils.sanitizeContext(this.context),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }
}

export type TransportFailure = 'REFUSED' | 'RESET' | 'CLOSED' | 'TLS' | 'TIMEOUT' | 'UNKNOWN';

/**
 * Transport-level errors (refused, reset, closed, TLS, timeouts)
 * Always retriable: the failover controller recovers from these locally
 */
export class TransportError extends ElectrumError {
  /**
   * host:port the error occurred on
   */
  readonly endpoint: string;

  readonly failure: TransportFailure;

  constructor(
    message: string,
    code: string,
    endpoint: string,
    failure: TransportFailure,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, true, context, cause);
    this.endpoint = endpoint;
    this.failure = failure;
  }

  static refused(endpoint: string, cause?: Error): TransportError {
    return new TransportError('Connection refused', 'TRANSPORT_REFUSED', endpoint, 'REFUSED', {}, cause);
  }

  static reset(endpoint: string, cause?: Error): TransportError {
    return new TransportError('Connection reset by peer', 'TRANSPORT_RESET', endpoint, 'RESET', {}, cause);
  }

  static closed(endpoint: string, cause?: Error): TransportError {
    return new TransportError('Connection closed', 'TRANSPORT_CLOSED', endpoint, 'CLOSED', {}, cause);
  }

  static tls(endpoint: string, cause?: Error): TransportError {
    return new TransportError('TLS handshake failed', 'TRANSPORT_TLS', endpoint, 'TLS', {}, cause);
  }

  static connectTimeout(endpoint: string, timeoutMs: number): TransportError {
    return new TransportError(
      `Connection timeout after ${timeoutMs}ms`,
      'TRANSPORT_CONNECT_TIMEOUT',
      endpoint,
      'TIMEOUT',
      { timeoutMs }
    );
  }
}

/**
 * No response within the request deadline
 * Handled exactly like a transport failure
 */
export class TimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(endpoint: string, timeoutMs: number, operation: string) {
    super(
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      'REQUEST_TIMEOUT',
      endpoint,
      'TIMEOUT',
      { timeoutMs, operation }
    );
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error payload returned by the server for a direct call
 */
export interface RpcErrorPayload {
  code?: number;
  message: string;
  [key: string]: unknown;
}

/**
 * The server answered a call with an error. The server is reachable,
 * so this never triggers failover.
 */
export class RpcError extends ElectrumError {
  readonly payload: RpcErrorPayload;
  readonly method: string;

  constructor(method: string, payload: RpcErrorPayload) {
    super(`${method} failed: ${payload.message}`, 'RPC_ERROR', false, {
      method,
      rpcCode: payload.code,
    });
    this.method = method;
    this.payload = payload;
  }
}

/**
 * Every distinct host allowed for one failover sequence has failed
 */
export class FailoverExhaustedError extends ElectrumError {
  readonly failedHosts: string[];

  constructor(failedHosts: string[], cause?: Error) {
    super(
      `Attempted to connect to ${failedHosts.length} servers but failed`,
      'FAILOVER_EXHAUSTED',
      false,
      { failedHosts },
      cause
    );
    this.failedHosts = failedHosts;
  }
}

/**
 * The catalog has no usable entry left for the requested transport mode
 */
export class NoServersAvailableError extends ElectrumError {
  constructor(useTls: boolean, excluded: number) {
    super(
      `No ${useTls ? 'TLS' : 'plain TCP'} servers available (${excluded} excluded)`,
      'NO_SERVERS_AVAILABLE',
      false,
      { useTls, excluded }
    );
  }
}

/**
 * A server push (or subscription response) carried an error field
 */
export class PushProtocolViolationError extends ElectrumError {
  readonly method: string;

  constructor(method: string, error: unknown) {
    super(`Push for ${method} carried an error`, 'PUSH_PROTOCOL_VIOLATION', false, {
      method,
      error,
    });
    this.method = method;
  }
}

/**
 * A request id was used in a way the pending table does not allow
 */
export class RequestStateError extends ElectrumError {
  readonly requestId: number;

  constructor(message: string, requestId: number) {
    super(message, 'REQUEST_STATE_INVALID', false, { requestId });
    this.requestId = requestId;
  }

  static unknown(requestId: number): RequestStateError {
    return new RequestStateError(`No pending request with id ${requestId}`, requestId);
  }

  static alreadyAwaited(requestId: number): RequestStateError {
    return new RequestStateError(`Request ${requestId} already has a waiter`, requestId);
  }
}

/**
 * Input validation error
 * Not retriable - indicates client-side error
 */
export class ValidationError extends ElectrumError {
  /**
   * Field or parameter that failed validation
   */
  readonly field: string;

  /**
   * Expected format or constraint
   */
  readonly expected: string;

  /**
   * Actual value received (sanitized)
   */
  readonly received: string;

  constructor(
    message: string,
    field: string,
    expected: string,
    received: string,
    context?: Record<string, unknown>
  ) {
    super(message, `VALIDATION_${field.toUpperCase()}_INVALID`, false, context);
    this.field = field;
    this.expected = expected;
    this.received = received;
  }

  static invalidParameter(paramName: string, expected: string, received: unknown): ValidationError {
    return new ValidationError(`Invalid parameter ${paramName}`, paramName, expected, String(received));
  }
}

export type DataKind = 'BALANCE' | 'UTXO' | 'HISTORY' | 'MEMPOOL' | 'MERKLE' | 'HEADER' | 'CATALOG' | 'FRAME';

/**
 * Data format error from the server or a catalog file
 */
export class DataError extends ElectrumError {
  readonly dataType: DataKind;
  readonly reason: string;

  constructor(
    message: string,
    dataType: DataKind,
    reason: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, `DATA_${dataType}_INVALID`, false, context, cause);
    this.dataType = dataType;
    this.reason = reason;
  }

  static schemaViolation(dataType: DataKind, reason: string, actualData: unknown): DataError {
    return new DataError(`Data does not match expected schema`, dataType, reason, { actualData });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const TRANSPORT_CODES: Record<string, TransportFailure> = {
  ECONNREFUSED: 'REFUSED',
  ECONNRESET: 'RESET',
  EPIPE: 'CLOSED',
  ETIMEDOUT: 'TIMEOUT',
  EHOSTUNREACH: 'UNKNOWN',
  ENETUNREACH: 'UNKNOWN',
  ENOTFOUND: 'UNKNOWN',
  EAI_AGAIN: 'UNKNOWN',
};

/**
 * Utility functions for error handling
 */
export class ErrorUtils {
  private static readonly SENSITIVE_KEYS = ['apiKey', 'secret', 'password', 'token', 'privateKey', 'mnemonic', 'seed'];

  /**
   * Determines if failover may recover from an error
   */
  static isRetriable(error: unknown): boolean {
    if (error instanceof ElectrumError) {
      return error.retriable;
    }
    if (!(error instanceof Error)) {
      return false;
    }

    const code = this.getErrorCode(error);
    if (code in TRANSPORT_CODES) {
      return true;
    }
    const message = error.message.toLowerCase();
    return message.includes('socket') || message.includes('tls') || message.includes('ssl');
  }

  /**
   * Extracts error code from any error type
   */
  static getErrorCode(error: Error): string {
    if (error instanceof ElectrumError) {
      return error.code;
    }
    if ('code' in error && typeof error.code === 'string') {
      return error.code;
    }
    return 'UNKNOWN';
  }

  /**
   * Converts a socket-level error into a TransportError for the given endpoint
   */
  static toTransportError(error: Error, endpoint: string): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    const failure = TRANSPORT_CODES[this.getErrorCode(error)] ?? 'UNKNOWN';
    switch (failure) {
      case 'REFUSED':
        return TransportError.refused(endpoint, error);
      case 'RESET':
        return TransportError.reset(endpoint, error);
      case 'CLOSED':
        return TransportError.closed(endpoint, error);
      default:
        return new TransportError(error.message, 'TRANSPORT_FAILED', endpoint, failure, {}, error);
    }
  }

  /**
   * Safely converts any thrown value to ElectrumError
   */
  static toElectrumError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): ElectrumError {
    if (error instanceof ElectrumError) {
      return error;
    }
    if (!(error instanceof Error)) {
      return new ElectrumError(String(error), defaultCode, false);
    }

    const code = this.getErrorCode(error);
    return new ElectrumError(
      error.message || 'An unknown error occurred',
      code === 'UNKNOWN' ? defaultCode : code,
      this.isRetriable(error),
      {},
      error
    );
  }

  /**
   * Sanitizes error context to remove sensitive data
   */
  static sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(context)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = this.SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive.toLowerCase()));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
        continue;
      }

      if (isRecord(value)) {
        sanitized[key] = this.sanitizeContext(value);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }
}

/**
 * Error types for relaytest
 */

/**
 * Error codes for the different failure classes of a test run
 */
export const ErrorCode = {
  CONFIG_ERROR: 'CONFIG_ERROR',
  ASSERTION_FAILED: 'ASSERTION_FAILED',
  RPC_ERROR: 'RPC_ERROR',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  PROCESS_LIFECYCLE_ERROR: 'PROCESS_LIFECYCLE_ERROR',
  PROCESS_LEAK: 'PROCESS_LEAK',
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION'
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class carrying a stable error code
 */
export class RelaytestError extends Error {
  readonly code: ErrorCodeType;

  constructor(code: ErrorCodeType, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'RelaytestError';
    this.code = code;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/**
 * Bad profile selector or malformed environment; aborts fixture setup
 */
export class ConfigError extends RelaytestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.CONFIG_ERROR, message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Expected-vs-actual mismatch, or an expected error that was not raised
 */
export class AssertionFailure extends RelaytestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.ASSERTION_FAILED, message, options);
    this.name = 'AssertionFailure';
  }
}

/**
 * Error result returned by the remote side of a JSON-RPC call
 */
export class RpcError extends RelaytestError {
  readonly rpcCode: number;
  readonly data: unknown;

  constructor(rpcCode: number, message: string, data?: unknown) {
    super(ErrorCode.RPC_ERROR, message);
    this.name = 'RpcError';
    this.rpcCode = rpcCode;
    this.data = data;
  }
}

/**
 * A call that never produced a JSON-RPC result: refused, reset, timed out
 * or answered with something that is not JSON-RPC
 */
export class TransportError extends RelaytestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.TRANSPORT_ERROR, message, options);
    this.name = 'TransportError';
  }
}

export class ProcessLifecycleError extends RelaytestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.PROCESS_LIFECYCLE_ERROR, message, options);
    this.name = 'ProcessLifecycleError';
  }
}

/**
 * A supervised process did not exit within its stop timeout
 */
export class ProcessLeakError extends RelaytestError {
  readonly pid: number | undefined;

  constructor(message: string, pid?: number) {
    super(ErrorCode.PROCESS_LEAK, message);
    this.name = 'ProcessLeakError';
    this.pid = pid;
  }
}

export class InvariantError extends RelaytestError {
  constructor(message: string) {
    super(ErrorCode.INVARIANT_VIOLATION, message);
    this.name = 'InvariantError';
  }
}

/**
 * Throw an InvariantError unless the condition holds
 */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
 * Errors a load generator expects while the transport is being disrupted
 */
export function isTransportNoise(error: unknown): error is RpcError | TransportError {
  return error instanceof RpcError || error instanceof TransportError;
}

export type ErrorInfo = {
  name: string;
  message: string;
  code?: string;
  stack?: string;
  /** Inner errors of an AggregateError */
  errors?: ErrorInfo[];
};

/**
 * Serialize any thrown value for structured logging
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof RelaytestError) {
    return { name: error.name, message: error.message, code: error.code, stack: error.stack };
  }
  if (error instanceof AggregateError) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      errors: Array.from(error.errors, (inner: unknown) => toErrorInfo(inner))
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

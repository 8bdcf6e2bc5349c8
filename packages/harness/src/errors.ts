/**
 * Error taxonomy for the cluster test kit.
 *
 * Every error raised by the kit is a HarnessError carrying a code from the
 * registry below, so scenario code can branch on `code` instead of on
 * message text.
 */

export const ErrorCodes = {
  // Process errors (PROC_xxx)
  STARTUP_TIMEOUT: 'PROC_001',
  PROCESS_EXITED: 'PROC_002',
  PROCESS_STATE: 'PROC_003',

  // HTTP errors (HTTP_xxx)
  UNEXPECTED_STATUS: 'HTTP_001',
  INVALID_RESPONSE: 'HTTP_002',
  TOO_MANY_REDIRECTS: 'HTTP_003',

  // Cluster errors (CLUSTER_xxx)
  REGISTRATION_TIMEOUT: 'CLUSTER_001',

  // General errors (GEN_xxx)
  UNKNOWN_ERROR: 'GEN_999',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all harness errors.
 */
export class HarnessError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HarnessError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A node never answered its health check before the startup deadline.
 */
export class StartupTimeoutError extends HarnessError {
  constructor(
    public readonly host: string,
    public readonly timeoutMs: number
  ) {
    super(`${host} did not become healthy within ${timeoutMs}ms`, ErrorCodes.STARTUP_TIMEOUT, {
      host,
      timeoutMs,
    });
    this.name = 'StartupTimeoutError';
  }
}

/**
 * The child process went away (or never spawned) before it was healthy.
 */
export class ProcessExitedError extends HarnessError {
  constructor(
    public readonly binaryPath: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    cause?: Error
  ) {
    super(
      cause
        ? `${binaryPath} failed to spawn: ${cause.message}`
        : `${binaryPath} exited before becoming healthy (code=${exitCode}, signal=${signal})`,
      ErrorCodes.PROCESS_EXITED,
      { binaryPath, exitCode, signal }
    );
    this.name = 'ProcessExitedError';
  }
}

/**
 * An operation was attempted in a lifecycle state that does not allow it.
 */
export class ProcessStateError extends HarnessError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.PROCESS_STATE, context);
    this.name = 'ProcessStateError';
  }
}

/**
 * An HTTP response arrived with a status the caller did not expect.
 * The response body is kept for diagnostics.
 */
export class UnexpectedStatusError extends HarnessError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly url: string
  ) {
    super(`unexpected status: ${status}`, ErrorCodes.UNEXPECTED_STATUS, { status, url, body });
    this.name = 'UnexpectedStatusError';
  }
}

/**
 * A response body was not JSON, or not the shape the caller asked for.
 */
export class InvalidResponseError extends HarnessError {
  constructor(
    message: string,
    public readonly body: string,
    public readonly url: string
  ) {
    super(message, ErrorCodes.INVALID_RESPONSE, { url, body });
    this.name = 'InvalidResponseError';
  }
}

/**
 * The coordinator kept redirecting past the hop limit.
 */
export class TooManyRedirectsError extends HarnessError {
  constructor(
    public readonly hops: number,
    public readonly lastUrl: string
  ) {
    super(`gave up after ${hops} redirects (last: ${lastUrl})`, ErrorCodes.TOO_MANY_REDIRECTS, {
      hops,
      lastUrl,
    });
    this.name = 'TooManyRedirectsError';
  }
}

/**
 * A storage node started but never registered with the directory.
 */
export class RegistrationTimeoutError extends HarnessError {
  constructor(
    public readonly nodeName: string,
    public readonly timeoutMs: number
  ) {
    super(
      `storage node ${nodeName} did not register within ${timeoutMs}ms`,
      ErrorCodes.REGISTRATION_TIMEOUT,
      { nodeName, timeoutMs }
    );
    this.name = 'RegistrationTimeoutError';
  }
}

/**
 * Wrap an unknown throwable into a HarnessError.
 */
export function wrapError(
  error: unknown,
  context: string,
  code: ErrorCode = ErrorCodes.UNKNOWN_ERROR
): HarnessError {
  if (error instanceof HarnessError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new HarnessError(`[${context}] ${message}`, code, {
    originalError: error instanceof Error ? error.name : typeof error,
  });
}

/**
 * Type guard to check if an error is a HarnessError.
 */
export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

/**
 * Type guard to check if an error is an UnexpectedStatusError.
 */
export function isUnexpectedStatus(error: unknown, status?: number): error is UnexpectedStatusError {
  return error instanceof UnexpectedStatusError && (status === undefined || error.status === status);
}

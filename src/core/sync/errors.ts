/**
 * Sync Errors
 */

/**
 * An API call did not settle within its deadline.
 */
export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * A refresh (full poll or single-device query) exhausted its attempts or hit
 * a non-retryable error. The coordinator keeps serving its last snapshot.
 */
export class UpdateFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpdateFailedError';
  }
}

export class CommandTimeoutError extends Error {
  constructor(
    public readonly deviceId: string,
    public readonly timeoutMs: number
  ) {
    super(`Timeout occurred while setting state of device ${deviceId} (${timeoutMs}ms)`);
    this.name = 'CommandTimeoutError';
  }
}

/**
 * The hub answered a write with a non-zero code.
 */
export class CommandRejectedError extends Error {
  constructor(
    public readonly deviceId: string,
    public readonly code: number,
    public readonly hubMessage: unknown
  ) {
    super(`Hub rejected command for device ${deviceId}: code ${code} (${describe(hubMessage)})`);
    this.name = 'CommandRejectedError';
  }
}

function describe(value: unknown): string {
  if (value === undefined || value === null) {
    return 'Unknown error';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export enum HarnessErrorCode {
  IO_FAILURE = 'IO_FAILURE',
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  LAUNCH_FAILURE = 'LAUNCH_FAILURE',
  COMMAND_FAILED = 'COMMAND_FAILED',
  EXIT_CODE_MISMATCH = 'EXIT_CODE_MISMATCH',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: HarnessErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HarnessError';
    this.code = code;
    this.context = context;
  }
}

// Node's fs and child_process errors carry a string `code` (ENOENT, EACCES, ...).
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

// Reads `message` structurally: errors raised by Node internals under a test VM fail `instanceof Error`.
export function describeError(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

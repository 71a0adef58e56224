export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'CONFIG_MISSING'
  | 'UNKNOWN_TOOL'
  | 'INVALID_ARGUMENTS'
  | 'HOST_EXECUTION_FAILURE'
  | 'IO_FAILURE'
  | 'NETWORK_FAILURE'
  | 'REGISTRY_INVALID'
  | 'REGISTRY_NOT_READY'
  | 'UNKNOWN';

export class ToolboxError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ToolboxError';
    this.code = code;
  }

  static isToolboxError(err: unknown): err is ToolboxError {
    return err instanceof ToolboxError;
  }

  static fromUnknown(err: unknown, fallbackCode: ErrorCode = 'UNKNOWN'): ToolboxError {
    if (err instanceof ToolboxError) return err;
    if (err instanceof Error) {
      return new ToolboxError(err.message, fallbackCode, { cause: err });
    }
    return new ToolboxError(String(err), fallbackCode);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

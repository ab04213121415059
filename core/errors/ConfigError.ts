import { RecscopeError, ErrorSeverity } from './RecscopeError';

export class ConfigError extends RecscopeError {
  constructor(message: string, options: { filePath?: string; cause?: unknown } = {}) {
    super(message, {
      code: 'CONFIG_INVALID',
      severity: ErrorSeverity.Fatal,
      details: options.filePath ? { filePath: options.filePath } : undefined,
      cause: options.cause
    });
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

import { RecscopeError, ErrorSeverity } from './RecscopeError';
import type { SourceLocation } from '@core/types';

export class ScriptNotFoundError extends RecscopeError {
  public readonly filePath: string;

  constructor(filePath: string, options: { sourceLocation?: SourceLocation; cause?: unknown } = {}) {
    super(`File not found: ${filePath}`, {
      code: 'FILE_NOT_FOUND',
      severity: ErrorSeverity.Recoverable,
      details: { filePath },
      sourceLocation: options.sourceLocation,
      cause: options.cause
    });
    this.filePath = filePath;
    Object.setPrototypeOf(this, ScriptNotFoundError.prototype);
  }
}

import { RecscopeError, ErrorSeverity } from './RecscopeError';
import type { LoadContext, SourceLocation } from '@core/types';

/**
 * A startup-script line that cannot be split into words, e.g. one with an
 * unbalanced quote. Fatal to the interpretation of that script.
 */
export class ScriptSyntaxError extends RecscopeError {
  constructor(
    message: string,
    options: { line?: string; sourceLocation?: SourceLocation; context?: readonly LoadContext[] } = {}
  ) {
    super(message, {
      code: 'SCRIPT_SYNTAX',
      severity: ErrorSeverity.Fatal,
      details: options.line !== undefined ? { line: options.line } : undefined,
      sourceLocation: options.sourceLocation,
      context: options.context
    });
    Object.setPrototypeOf(this, ScriptSyntaxError.prototype);
  }
}

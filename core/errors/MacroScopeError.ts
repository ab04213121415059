import { RecscopeError, ErrorSeverity } from './RecscopeError';

/**
 * Misuse of the macro scope stack, such as popping the root frame.
 */
export class MacroScopeError extends RecscopeError {
  constructor(message: string) {
    super(message, {
      code: 'MACRO_SCOPE',
      severity: ErrorSeverity.Fatal
    });
    Object.setPrototypeOf(this, MacroScopeError.prototype);
  }
}

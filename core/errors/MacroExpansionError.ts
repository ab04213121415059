import { RecscopeError, ErrorSeverity } from './RecscopeError';
import type { MacroDiagnosticKind } from '@core/types';

/**
 * Raised (strict mode) or recorded (default) when a macro reference is
 * undefined or its raw value refers back to itself.
 */
export class MacroExpansionError extends RecscopeError {
  public readonly macroName: string;
  public readonly kind: MacroDiagnosticKind;

  constructor(kind: MacroDiagnosticKind, macroName: string, text: string) {
    const message = kind === 'cycle'
      ? `Macro '${macroName}' refers to itself while expanding '${text}'`
      : `Macro '${macroName}' is undefined while expanding '${text}'`;

    super(message, {
      code: kind === 'cycle' ? 'MACRO_CYCLE' : 'MACRO_UNDEFINED',
      severity: ErrorSeverity.Recoverable,
      details: { macroName, text }
    });

    this.macroName = macroName;
    this.kind = kind;
    Object.setPrototypeOf(this, MacroExpansionError.prototype);
  }
}

import { RecscopeError, ErrorSeverity } from '@core/errors';

/**
 * Bad command line: unknown command or option, missing value.
 */
export class CLIUsageError extends RecscopeError {
  constructor(message: string) {
    super(message, {
      code: 'CLI_USAGE',
      severity: ErrorSeverity.Fatal
    });
    Object.setPrototypeOf(this, CLIUsageError.prototype);
  }
}

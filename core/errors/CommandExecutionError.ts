import { RecscopeError, ErrorSeverity } from './RecscopeError';
import type { SourceLocation } from '@core/types';

/**
 * A command handler failed. Recorded on the line; the script continues.
 */
export class CommandExecutionError extends RecscopeError {
  public readonly commandName: string;

  constructor(commandName: string, message: string, options: { sourceLocation?: SourceLocation; cause?: unknown } = {}) {
    super(`${commandName}: ${message}`, {
      code: 'COMMAND_FAILED',
      severity: ErrorSeverity.Recoverable,
      details: { command: commandName },
      sourceLocation: options.sourceLocation,
      cause: options.cause
    });
    this.commandName = commandName;
    Object.setPrototypeOf(this, CommandExecutionError.prototype);
  }
}

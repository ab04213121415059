import chalk from 'chalk';
import { RecscopeError, ErrorSeverity } from '@core/errors';
import { formatLoadContext, formatLocation } from '@core/utils/locationFormatter';
import { cliLogger as logger } from '@core/utils/logger';
import type { CLIOptions } from '../parsers/ArgumentParser';
import type { CommandOutput } from '../utils/output';

/**
 * Reports errors that escape a command and picks the exit code.
 */
export class ErrorHandler {
  constructor(private readonly output: CommandOutput) {}

  handleError(error: unknown, options: CLIOptions): number {
    if (error instanceof RecscopeError) {
      this.handleRecscopeError(error, options);
      return error.severity === ErrorSeverity.Info || error.severity === ErrorSeverity.Warning ? 0 : 1;
    }
    if (error instanceof Error) {
      logger.error('An unexpected error occurred', { error: error.message, stack: error.stack });
      this.output.err(`${chalk.red('Error:')} ${error.message}`);
      if (options.verbose && error.stack) {
        this.output.err(chalk.gray(error.stack));
      }
      return 1;
    }
    logger.error('An unknown error occurred', { error: String(error) });
    this.output.err(chalk.red(`Unknown Error: ${String(error)}`));
    return 1;
  }

  private handleRecscopeError(error: RecscopeError, options: CLIOptions): void {
    this.output.err(`${chalk.red(`${error.name}:`)} ${error.message}`);

    if (error.context && error.context.length > 1) {
      this.output.err(chalk.gray(`  at ${formatLoadContext(error.context)}`));
    } else if (error.sourceLocation) {
      this.output.err(chalk.gray(`  at ${formatLocation(error.sourceLocation).display}`));
    }

    if (options.verbose) {
      if (error.details) {
        this.output.err(chalk.gray(`  details: ${JSON.stringify(error.details)}`));
      }
      const cause = error.cause;
      if (cause instanceof Error) {
        this.output.err(chalk.gray(`  cause: ${cause.message}`));
      }
    }
  }
}

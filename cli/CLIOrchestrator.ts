import { version } from '@core/version';
import type { ResolvedConfig } from '@core/config/types';
import { cliLogger, setLogLevel } from '@core/utils/logger';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { ErrorHandler } from './error/ErrorHandler';
import { HelpSystem } from './interaction/HelpSystem';
import { ArgumentParser, type CLIOptions, type CommandName } from './parsers/ArgumentParser';
import { createCommandContext, type CommandContext } from './utils/command-context';
import { consoleOutput, type CommandOutput } from './utils/output';
import { parseCommand } from './commands/parse';
import { infoCommand } from './commands/info';
import { linksCommand } from './commands/links';
import { searchCommand } from './commands/search';

const COMMAND_HANDLERS: Record<CommandName, (context: CommandContext) => Promise<number>> = {
  parse: parseCommand,
  info: infoCommand,
  links: linksCommand,
  search: searchCommand
};

export interface CLIEnvironment {
  output?: CommandOutput;
  fileSystem?: IFileSystemService;
  /** Use this configuration instead of reading recscope.config.json */
  config?: ResolvedConfig;
}

export class CLIOrchestrator {
  private readonly output: CommandOutput;
  private readonly errorHandler: ErrorHandler;
  private readonly helpSystem = new HelpSystem();
  private readonly argumentParser = new ArgumentParser();

  constructor(private readonly environment: CLIEnvironment = {}) {
    this.output = environment.output ?? consoleOutput;
    this.errorHandler = new ErrorHandler(this.output);
  }

  /** Run one command line; resolves to the exit code. */
  async main(args: readonly string[]): Promise<number> {
    let options: CLIOptions = { scripts: [], macros: {} };

    try {
      options = this.argumentParser.parseArgs(args);

      if (options.debug) {
        setLogLevel('debug');
      } else if (options.verbose) {
        setLogLevel('info');
      }

      if (options.version) {
        this.output.out(`recscope version ${version}`);
        return 0;
      }

      if (options.help || !options.command) {
        this.output.out(this.helpSystem.getHelp(options.command));
        return options.help ? 0 : 1;
      }

      cliLogger.debug(`Running ${options.command}`, { scripts: options.scripts });
      const context = createCommandContext(options, this.output, this.environment);
      return await COMMAND_HANDLERS[options.command](context);
    } catch (error) {
      return this.errorHandler.handleError(error, options);
    }
  }
}

import type {
  FullLoadContext,
  ShellCommand,
  SourceLocation
} from '@core/types';
import type { IMacroContext } from '@services/MacroService/IMacroContext';
import type { IFileSystemService } from '@services/fs/IFileSystemService';

/**
 * Emitted to every observer for each executed command line.
 */
export interface CommandEvent {
  readonly instanceId: string;
  readonly command: ShellCommand;
  readonly location: SourceLocation;
  readonly context: FullLoadContext;
  /** Live macro context; observers may push scopes but must pop them */
  readonly macros: IMacroContext;
  readonly workingDirectory: string;
  /** True once `iocInit` has run */
  readonly initialized: boolean;
  readonly fileSystem: IFileSystemService;
  /** Resolve a path against the working directory and stand-in directories */
  resolvePath(filePath: string): string;
  /** Record a file read on behalf of this line */
  recordLoadedFile(filePath: string): void;
}

/**
 * Receives command events. Commands listed in `commands` are claimed: their
 * lines are reported as forwarded instead of unhandled, and errors thrown
 * while handling them are recorded on the line.
 *
 * Every executed line is reported, including lines whose built-in failed.
 * A bare `< file` line arrives as command `<` with the file as argument.
 */
export interface IShellObserver {
  readonly commands?: readonly string[];
  onCommand(event: CommandEvent): void | Promise<void>;
}

/**
 * State a built-in handler can read and change.
 */
export interface HandlerContext {
  readonly event: CommandEvent;
  readonly variables: Map<string, string>;
  setWorkingDirectory(directory: string): Promise<void>;
  markInitialized(): void;
  /** Interpret another script in a nested scope */
  source(filePath: string, macros?: Readonly<Record<string, string>>): Promise<void>;
  /** Interpret one line as if it appeared at the current location */
  runLine(line: string): Promise<void>;
}

export interface HandlerResult {
  /** Text the command reported */
  output?: string;
  /** The command ran another script */
  sourced?: boolean;
}

export type CommandHandler = (
  args: readonly string[],
  context: HandlerContext
) => Promise<HandlerResult> | HandlerResult;

export interface ShellInterpreterOptions {
  instanceId: string;
  fileSystem: IFileSystemService;
  macros: IMacroContext;
  /** Working directory at startup; defaults to the script's directory */
  workingDirectory?: string;
  /** Absolute path prefix rewrites applied to every resolved path */
  standinDirectories?: Readonly<Record<string, string>>;
  observers?: readonly IShellObserver[];
}

import * as path from 'path';
import {
  createLoadContext,
  createSourceLocation,
  type FullLoadContext,
  type InstanceError,
  type InterpreterState,
  type LineOutcome,
  type LoadedFile,
  type MacroSnapshot,
  type ShellCommand,
  type ShellLineResult,
  type ShellRedirect,
  type SourceLocation,
  type UnhandledCommand
} from '@core/types';
import {
  CommandExecutionError,
  ErrorSeverity,
  RecscopeError,
  ScriptNotFoundError,
  ScriptSyntaxError
} from '@core/errors';
import { shellLogger as logger } from '@core/utils/logger';
import { formatLocation } from '@core/utils/locationFormatter';
import type { IMacroContext } from '@services/MacroService/IMacroContext';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { ScriptStack, type InclusionSite } from '@services/ScriptStackService/ScriptStack';

import { BUILTIN_HANDLERS } from './builtins';
import { resolveScriptPath } from './paths';
import { splitWords } from './tokenizer';
import type {
  CommandEvent,
  CommandHandler,
  HandlerContext,
  HandlerResult,
  IShellObserver,
  ShellInterpreterOptions
} from './types';

/**
 * Everything one run of a startup script produced.
 */
export interface ShellRunResult {
  readonly scriptPath: string;
  readonly workingDirectory: string;
  readonly lines: readonly ShellLineResult[];
  readonly macros: MacroSnapshot;
  readonly variables: Readonly<Record<string, string>>;
  readonly loadedFiles: readonly LoadedFile[];
  readonly unhandled: readonly UnhandledCommand[];
  readonly errors: readonly InstanceError[];
}

interface LineDetails {
  command?: ShellCommand;
  redirects?: readonly ShellRedirect[];
  outcome: LineOutcome;
  output?: string;
  error?: { code: string; message: string };
}

/**
 * Plays back a startup script line by line.
 *
 * Built-in commands manage macros, nested scripts and the working
 * directory; every command line is also reported to the registered
 * observers. The interpreter runs once: `idle → running → finished`, or
 * `failed` when a fatal error (syntax error, cyclic inclusion) ends the run.
 */
export class ShellInterpreter {
  private currentState: InterpreterState = 'idle';
  private readonly instanceId: string;
  private readonly fileSystem: IFileSystemService;
  private readonly macros: IMacroContext;
  private readonly standins: Readonly<Record<string, string>>;
  private readonly observers: IShellObserver[];
  private readonly handlers = new Map<string, CommandHandler>(BUILTIN_HANDLERS);
  private readonly stack = new ScriptStack();
  private readonly lines: ShellLineResult[] = [];
  private readonly unhandled: UnhandledCommand[] = [];
  private readonly errors: InstanceError[] = [];
  private readonly loadedFiles: LoadedFile[] = [];
  private readonly variables = new Map<string, string>();
  private readonly initialDirectory?: string;
  private workingDirectory = '/';
  private initialized = false;

  constructor(options: ShellInterpreterOptions) {
    this.instanceId = options.instanceId;
    this.fileSystem = options.fileSystem;
    this.macros = options.macros;
    this.standins = options.standinDirectories ?? {};
    this.observers = [...(options.observers ?? [])];
    this.initialDirectory = options.workingDirectory;
  }

  get state(): InterpreterState {
    return this.currentState;
  }

  addObserver(observer: IShellObserver): void {
    this.observers.push(observer);
  }

  /** Add or replace a built-in command. */
  registerHandler(name: string, handler: CommandHandler): void {
    this.handlers.set(name, handler);
  }

  async run(scriptPath: string): Promise<ShellRunResult> {
    if (this.currentState !== 'idle') {
      throw new RecscopeError(`Interpreter for '${this.instanceId}' has already run (state: ${this.currentState})`, {
        code: 'INTERPRETER_STATE',
        severity: ErrorSeverity.Fatal
      });
    }
    this.currentState = 'running';

    const resolved = resolveScriptPath(scriptPath, process.cwd(), this.standins);
    this.workingDirectory = this.initialDirectory
      ? resolveScriptPath(this.initialDirectory, process.cwd(), this.standins)
      : path.dirname(resolved);
    logger.info(`Interpreting ${resolved}`, { instance: this.instanceId, workingDirectory: this.workingDirectory });

    try {
      if (!(await this.fileSystem.exists(resolved))) {
        throw new ScriptNotFoundError(resolved);
      }
      await this.interpretFile(resolved, []);
      this.currentState = 'finished';
    } catch (error) {
      this.currentState = 'failed';
      logger.error(`Interpretation of ${resolved} failed`, {
        instance: this.instanceId,
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }

    return {
      scriptPath: resolved,
      workingDirectory: this.workingDirectory,
      lines: [...this.lines],
      macros: this.macros.snapshot(),
      variables: Object.freeze(Object.fromEntries(this.variables)),
      loadedFiles: [...this.loadedFiles],
      unhandled: [...this.unhandled],
      errors: [...this.errors]
    };
  }

  private resolvePath(filePath: string): string {
    return resolveScriptPath(filePath, this.workingDirectory, this.standins);
  }

  private async interpretFile(filePath: string, parentContext: FullLoadContext, site?: InclusionSite): Promise<void> {
    this.stack.enter(filePath, site);
    try {
      this.recordLoadedFile(filePath, site?.sourceLocation);
      const content = await this.fileSystem.readFile(filePath);
      const lines = content.split(/\r?\n/);
      // A trailing newline does not make an extra line
      if (lines.length > 1 && lines[lines.length - 1] === '') {
        lines.pop();
      }
      for (let i = 0; i < lines.length; i++) {
        await this.interpretLine(filePath, i + 1, lines[i], parentContext);
      }
    } finally {
      this.stack.leave(filePath);
    }
  }

  private recordLoadedFile(filePath: string, from?: SourceLocation): void {
    this.loadedFiles.push({
      path: filePath,
      loadedFrom: from ? createLoadContext(from.file, from.line) : undefined
    });
  }

  private async interpretLine(
    file: string,
    lineNumber: number,
    line: string,
    parentContext: FullLoadContext
  ): Promise<void> {
    const context: FullLoadContext = Object.freeze([...parentContext, createLoadContext(file, lineNumber)]);
    const location = createSourceLocation(file, lineNumber, this.macros.snapshot());
    // Reserve the slot so nested script lines follow the line that sourced them
    const index = this.lines.length;
    this.lines.push({ location, context, line, outcome: 'empty' });

    try {
      const details = await this.executeLine(line, location, context);
      this.lines[index] = { location, context, line, ...details };
    } catch (error) {
      const code = error instanceof RecscopeError ? error.code : 'UNKNOWN';
      const message = error instanceof Error ? error.message : String(error);
      this.lines[index] = { location, context, line, outcome: 'failed', error: { code, message } };
      throw error;
    }
  }

  private async executeLine(line: string, location: SourceLocation, context: FullLoadContext): Promise<LineDetails> {
    const trimmed = line.trimStart();
    if (!trimmed) {
      return { outcome: 'empty' };
    }
    if (trimmed.startsWith('#')) {
      return { outcome: 'comment' };
    }

    const split = splitWords(trimmed);
    if (split.error) {
      throw new ScriptSyntaxError(`${split.error} at ${formatLocation(location).display}`, {
        line,
        sourceLocation: location,
        context
      });
    }

    let argv: string[];
    let redirects: ShellRedirect[];
    try {
      argv = split.argv.map(word => this.macros.expand(word));
      redirects = split.redirects.map(redirect => ({ ...redirect, name: this.macros.expand(redirect.name) }));
    } catch (error) {
      return { outcome: 'failed', error: this.recordError(error, location, split.argv[0] ?? '') };
    }

    const input = redirects.find(redirect => redirect.fileno === 0);
    const command: ShellCommand | undefined = argv.length > 0
      ? { name: argv[0], args: argv.slice(1) }
      : undefined;
    const base = {
      command,
      redirects: redirects.length > 0 ? redirects : undefined
    };

    if (input) {
      try {
        await this.notify(this.createEvent(command ?? { name: '<', args: [input.name] }, location, context));
        await this.source(input.name, undefined, location, context);
        return { ...base, outcome: 'sourced' };
      } catch (error) {
        return { ...base, outcome: 'failed', error: this.recordError(error, location, '<') };
      }
    }

    if (!command) {
      return { ...base, outcome: 'empty' };
    }

    return { ...base, ...(await this.dispatch(command, location, context)) };
  }

  private async dispatch(command: ShellCommand, location: SourceLocation, context: FullLoadContext): Promise<LineDetails> {
    const event = this.createEvent(command, location, context);
    const handler = this.handlers.get(command.name);
    logger.debug(`${formatLocation(location).display}: ${command.name}`, { args: command.args });

    try {
      let settled: { result: HandlerResult } | { failure: unknown } = { result: {} };
      if (handler) {
        try {
          settled = { result: await handler(command.args, this.createHandlerContext(event)) };
        } catch (failure) {
          settled = { failure };
        }
      }
      // Observers see the line even when its built-in failed
      const claimed = await this.notify(event);
      if ('failure' in settled) {
        throw settled.failure;
      }
      const { result } = settled;

      if (handler) {
        return { outcome: result.sourced ? 'sourced' : 'handled', output: result.output };
      }
      if (claimed) {
        return { outcome: 'forwarded' };
      }
      this.unhandled.push({ command, location });
      return { outcome: 'unhandled' };
    } catch (error) {
      return { outcome: 'failed', error: this.recordError(error, location, command.name) };
    }
  }

  private async notify(event: CommandEvent): Promise<boolean> {
    let claimed = false;
    for (const observer of this.observers) {
      if (observer.commands?.includes(event.command.name)) {
        claimed = true;
      }
      await observer.onCommand(event);
    }
    return claimed;
  }

  private createEvent(command: ShellCommand, location: SourceLocation, context: FullLoadContext): CommandEvent {
    const workingDirectory = this.workingDirectory;
    return {
      instanceId: this.instanceId,
      command,
      location,
      context,
      macros: this.macros,
      workingDirectory,
      initialized: this.initialized,
      fileSystem: this.fileSystem,
      resolvePath: (filePath: string) => resolveScriptPath(filePath, workingDirectory, this.standins),
      recordLoadedFile: (filePath: string) => this.recordLoadedFile(filePath, location)
    };
  }

  private createHandlerContext(event: CommandEvent): HandlerContext {
    return {
      event,
      variables: this.variables,
      setWorkingDirectory: async (directory: string) => {
        const target = this.resolvePath(directory);
        if (!(await this.fileSystem.isDirectory(target))) {
          throw new CommandExecutionError(event.command.name, `Not a directory: ${target}`, {
            sourceLocation: event.location
          });
        }
        this.workingDirectory = target;
      },
      markInitialized: () => {
        this.initialized = true;
      },
      source: (filePath, macros) => this.source(filePath, macros, event.location, event.context),
      runLine: line => this.interpretLine(event.location.file, event.location.line, line, event.context.slice(0, -1))
    };
  }

  /** Interpret a nested script in its own macro scope. */
  private async source(
    filePath: string,
    macros: Readonly<Record<string, string>> | undefined,
    location: SourceLocation,
    context: FullLoadContext
  ): Promise<void> {
    const target = this.resolvePath(filePath);
    if (!(await this.fileSystem.exists(target))) {
      throw new ScriptNotFoundError(target, { sourceLocation: location });
    }

    this.macros.pushScope();
    try {
      if (macros) {
        this.macros.define(macros);
      }
      await this.interpretFile(target, context, { sourceLocation: location, context });
    } finally {
      this.macros.popScope();
    }
  }

  /**
   * Record a recoverable line failure. Fatal errors end the run.
   */
  private recordError(error: unknown, location: SourceLocation, commandName: string): { code: string; message: string } {
    if (error instanceof RecscopeError && error.severity === ErrorSeverity.Fatal) {
      throw error;
    }

    const failure = error instanceof RecscopeError
      ? error
      : new CommandExecutionError(commandName, error instanceof Error ? error.message : String(error), {
          sourceLocation: location,
          cause: error
        });

    logger.warn(`${formatLocation(location).display}: ${failure.message}`, { code: failure.code });

    this.errors.push({
      code: failure.code,
      message: failure.message,
      location: failure.sourceLocation ?? location
    });
    return { code: failure.code, message: failure.message };
  }
}

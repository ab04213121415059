import type { LoadContext, MacroSnapshot, SourceLocation } from './location';
import type { LintMessage, RecordInstance, RecordTypeDefinition } from './record';
import type { ShellCommand, ShellLineResult } from './shell';

/**
 * How to find and start one controller instance.
 */
export interface InstanceDescriptor {
  /** Unique identifier of the instance within a fleet */
  id: string;
  /** Path to the startup script */
  script: string;
  /** Working directory at startup; defaults to the script's directory */
  startupDirectory?: string;
  /** Macros defined before the first line runs */
  macros?: Readonly<Record<string, string>>;
  /** Absolute path prefix rewrites, e.g. `{ "/cds/group/": "/mnt/group/" }` */
  standinDirectories?: Readonly<Record<string, string>>;
}

export interface UnhandledCommand {
  readonly command: ShellCommand;
  readonly location: SourceLocation;
}

/** A non-fatal problem recorded while interpreting an instance. */
export interface InstanceError {
  readonly code: string;
  readonly message: string;
  readonly location?: SourceLocation;
}

export interface LoadedFile {
  readonly path: string;
  /** The line that caused the load */
  readonly loadedFrom?: LoadContext;
}

/**
 * One interpreted startup script run. Immutable after completion.
 */
export interface LoadedInstance {
  readonly id: string;
  readonly scriptPath: string;
  readonly workingDirectory: string;
  /** Every executed line in order, including those of nested scripts */
  readonly lines: readonly ShellLineResult[];
  /** Root-scope macro state when the run finished */
  readonly macros: MacroSnapshot;
  readonly variables: Readonly<Record<string, string>>;
  readonly records: ReadonlyMap<string, RecordInstance>;
  readonly recordTypes: ReadonlyMap<string, RecordTypeDefinition>;
  /** PVA groups assembled from `info(Q:group, ...)` tags */
  readonly pvaGroups: ReadonlyMap<string, RecordInstance>;
  readonly lint: readonly LintMessage[];
  readonly loadedFiles: readonly LoadedFile[];
  readonly unhandled: readonly UnhandledCommand[];
  readonly errors: readonly InstanceError[];
}

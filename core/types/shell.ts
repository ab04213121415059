import type { FullLoadContext, SourceLocation } from './location';

/**
 * A parsed, macro-expanded, not-yet-executed script line.
 */
export interface ShellCommand {
  readonly name: string;
  readonly args: readonly string[];
}

/** `r` for `<file`, `w` for `>file`, `a` for `>>file` */
export type RedirectMode = 'r' | 'w' | 'a';

export interface ShellRedirect {
  readonly fileno: number;
  readonly name: string;
  readonly mode: RedirectMode;
}

/** Result of splitting one line into words. */
export interface SplitLine {
  argv: string[];
  redirects: ShellRedirect[];
  /** Set when the line cannot be split, e.g. an unbalanced quote */
  error?: string;
}

export type LineOutcome =
  | 'comment'
  | 'empty'
  | 'handled'
  | 'forwarded'
  | 'sourced'
  | 'unhandled'
  | 'failed';

/**
 * One interpreted line of a startup script, stamped with provenance.
 */
export interface ShellLineResult {
  readonly location: SourceLocation;
  /** Load-context chain from the top-level script down to this line */
  readonly context: FullLoadContext;
  /** The line exactly as read */
  readonly line: string;
  readonly command?: ShellCommand;
  readonly redirects?: readonly ShellRedirect[];
  readonly outcome: LineOutcome;
  /** Text a handler reported, e.g. "Defined: 'P'='IOC:A'" */
  readonly output?: string;
  /** Error code and message when the line failed */
  readonly error?: { readonly code: string; readonly message: string };
}

export type InterpreterState = 'idle' | 'running' | 'finished' | 'failed';

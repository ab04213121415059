/**
 * A single macro definition within one scope frame.
 */
export interface MacroEntry {
  /** Value as written, before any substitution */
  raw: string;
  /** Cached expansion of `raw`; undefined until first use or after invalidation */
  expanded?: string;
  /** Depth of the frame that defined the entry (0 = root) */
  depth: number;
  /** Set while the entry is being expanded; a re-entry means a cycle */
  visited: boolean;
  /** Set when the last expansion of `raw` hit an undefined name or a cycle */
  error: boolean;
}

export type MacroFrame = Map<string, MacroEntry>;

export type MacroDefinitions = Readonly<Record<string, string>>;

export type MacroDiagnosticKind = 'undefined' | 'cycle';

/**
 * Recorded problem from an expansion that fell back to literal text.
 */
export interface MacroDiagnostic {
  kind: MacroDiagnosticKind;
  name: string;
  /** The text being expanded when the problem occurred */
  text: string;
}

export interface MacroContextOptions {
  /** Throw MacroExpansionError instead of passing unresolved references through */
  strict?: boolean;
  /** Log a warning for each undefined reference */
  warnUndefined?: boolean;
  /** Recognize the bare `$NAME` form in addition to `$(NAME)` and `${NAME}` */
  bareNames?: boolean;
  /** Seed the root frame from the process environment */
  useEnvironment?: boolean;
  /** Environment variables to skip when seeding; `*` wildcards allowed */
  environmentSkipPatterns?: readonly string[];
  /** Environment values longer than this are skipped when seeding */
  maxValueLength?: number;
  /** Environment to seed from; defaults to process.env */
  environment?: Readonly<Record<string, string | undefined>>;
}

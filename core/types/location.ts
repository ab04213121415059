/**
 * Provenance primitives shared by every fact the interpreter produces.
 */

/** Resolved macro name to expanded value, frozen at the moment of capture. */
export type MacroSnapshot = Readonly<Record<string, string>>;

/**
 * One frame of the load-context chain: a file and a 1-based line in it.
 */
export interface LoadContext {
  readonly file: string;
  readonly line: number;
}

/**
 * Where a fact came from: file, 1-based line, and the macro state active
 * on that line. Immutable once created.
 */
export interface SourceLocation extends LoadContext {
  readonly macros: MacroSnapshot;
}

/**
 * Full chain of load contexts, outermost script first
 * (e.g. `st.cmd:12` then `common.cmd:4` then `motor.db:31`).
 */
export type FullLoadContext = readonly LoadContext[];

export function createSourceLocation(file: string, line: number, macros: MacroSnapshot): SourceLocation {
  return Object.freeze({ file, line, macros: Object.freeze({ ...macros }) });
}

export function createLoadContext(file: string, line: number): LoadContext {
  return Object.freeze({ file, line });
}

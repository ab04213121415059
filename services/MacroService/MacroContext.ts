import { minimatch } from 'minimatch';
import type {
  MacroContextOptions,
  MacroDefinitions,
  MacroDiagnostic,
  MacroDiagnosticKind,
  MacroEntry,
  MacroFrame,
  MacroSnapshot
} from '@core/types';
import { MacroExpansionError, MacroScopeError } from '@core/errors';
import { macroLogger as logger } from '@core/utils/logger';
import type { IMacroContext } from './IMacroContext';

const NAME_START = /[A-Za-z_]/;
const NAME_CHAR = /[A-Za-z0-9_]/;

/** Outcome of looking up one name during a substitution pass. */
type Lookup =
  | { kind: 'value'; value: string }
  | { kind: 'undefined' }
  | { kind: 'cycle' };

/**
 * Scoped macro store.
 *
 * Frames form a stack; the innermost definition of a name wins for the
 * lifetime of its frame. A macro's raw value is expanded the first time the
 * macro is used and cached until any definition changes or a frame is
 * popped. Unresolved references are passed through literally unless the
 * context is strict.
 */
export class MacroContext implements IMacroContext {
  private readonly frames: MacroFrame[] = [new Map()];
  private readonly options: Required<Omit<MacroContextOptions, 'environment'>>;
  private readonly recorded: MacroDiagnostic[] = [];
  private dirty = false;
  // Count of references that fell back to literal text, quiet or not
  private misses = 0;
  // Suppresses diagnostics and strictness while taking snapshots
  private quiet = false;

  constructor(options: MacroContextOptions = {}) {
    this.options = {
      strict: options.strict ?? false,
      warnUndefined: options.warnUndefined ?? true,
      bareNames: options.bareNames ?? true,
      useEnvironment: options.useEnvironment ?? false,
      environmentSkipPatterns: options.environmentSkipPatterns ?? [],
      maxValueLength: options.maxValueLength ?? 1024
    };

    if (this.options.useEnvironment) {
      this.seedFromEnvironment(options.environment ?? process.env);
    }
  }

  get depth(): number {
    return this.frames.length - 1;
  }

  get diagnostics(): readonly MacroDiagnostic[] {
    return this.recorded;
  }

  define(pairs: MacroDefinitions): void {
    const frame = this.innermost();
    for (const [name, raw] of Object.entries(pairs)) {
      frame.set(name, {
        raw,
        depth: this.depth,
        visited: false,
        error: false
      });
    }
    this.dirty = true;
    logger.debug('Defined macros', { names: Object.keys(pairs), depth: this.depth });
  }

  undefine(name: string): boolean {
    const removed = this.innermost().delete(name);
    if (removed) {
      this.dirty = true;
    }
    return removed;
  }

  pushScope(): void {
    this.frames.push(new Map());
  }

  popScope(): void {
    if (this.frames.length === 1) {
      throw new MacroScopeError('Cannot pop the root macro scope');
    }
    this.frames.pop();
    this.dirty = true;
  }

  withScope<T>(pairs: MacroDefinitions, fn: () => T): T {
    this.pushScope();
    try {
      this.define(pairs);
      return fn();
    } finally {
      this.popScope();
    }
  }

  async withScopeAsync<T>(pairs: MacroDefinitions, fn: () => Promise<T>): Promise<T> {
    this.pushScope();
    try {
      this.define(pairs);
      return await fn();
    } finally {
      this.popScope();
    }
  }

  expand(text: string): string {
    this.invalidateIfDirty();
    return this.substitute(text, text);
  }

  snapshot(): MacroSnapshot {
    this.invalidateIfDirty();
    const result: Record<string, string> = {};
    const wasQuiet = this.quiet;
    this.quiet = true;
    try {
      for (const name of this.visibleNames()) {
        const lookup = this.lookup(name, name);
        result[name] = lookup.kind === 'value' ? lookup.value : this.getRaw(name) ?? '';
      }
    } finally {
      this.quiet = wasQuiet;
    }
    return Object.freeze(result);
  }

  isDefined(name: string): boolean {
    return this.find(name) !== undefined;
  }

  getRaw(name: string): string | undefined {
    return this.find(name)?.raw;
  }

  clearDiagnostics(): void {
    this.recorded.length = 0;
  }

  private innermost(): MacroFrame {
    return this.frames[this.frames.length - 1];
  }

  private find(name: string): MacroEntry | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const entry = this.frames[i].get(name);
      if (entry) {
        return entry;
      }
    }
    return undefined;
  }

  /** Names visible from the innermost frame, outermost definitions first. */
  private visibleNames(): string[] {
    const names = new Set<string>();
    for (const frame of this.frames) {
      for (const name of frame.keys()) {
        names.add(name);
      }
    }
    return [...names];
  }

  private invalidateIfDirty(): void {
    if (!this.dirty) {
      return;
    }
    for (const frame of this.frames) {
      for (const entry of frame.values()) {
        entry.expanded = undefined;
        entry.error = false;
      }
    }
    this.dirty = false;
  }

  /**
   * One left-to-right pass over `text`. Text produced by a substitution is
   * not scanned again; references inside a macro's raw value are resolved
   * when that macro is looked up.
   */
  private substitute(text: string, original: string): string {
    let out = '';
    let i = 0;

    while (i < text.length) {
      const c = text[i];

      if (c === '\\' && text[i + 1] === '$') {
        out += '$';
        i += 2;
        continue;
      }

      if (c !== '$') {
        out += c;
        i++;
        continue;
      }

      const next = text[i + 1];
      if (next === '(' || next === '{') {
        const end = findClosing(text, i + 2, next, next === '(' ? ')' : '}');
        if (end === -1) {
          // Unterminated reference: keep the rest as written
          out += text.slice(i);
          break;
        }
        const body = text.slice(i + 2, end);
        const eq = findDefault(body);
        const name = this.substitute(eq === -1 ? body : body.slice(0, eq), original);
        const fallback = eq === -1 ? undefined : body.slice(eq + 1);
        out += this.resolveReference(name, fallback, text.slice(i, end + 1), original);
        i = end + 1;
        continue;
      }

      if (this.options.bareNames && next !== undefined && NAME_START.test(next)) {
        let end = i + 2;
        while (end < text.length && NAME_CHAR.test(text[end])) {
          end++;
        }
        const name = text.slice(i + 1, end);
        out += this.resolveReference(name, undefined, text.slice(i, end), original);
        i = end;
        continue;
      }

      out += c;
      i++;
    }

    return out;
  }

  /** `fallback` is the raw default text, expanded only when `name` is undefined. */
  private resolveReference(name: string, fallback: string | undefined, literal: string, original: string): string {
    const lookup = this.lookup(name, original);
    if (lookup.kind === 'value') {
      return lookup.value;
    }
    if (lookup.kind === 'undefined' && fallback !== undefined) {
      return this.substitute(fallback, original);
    }
    this.misses++;
    this.report(lookup.kind, name, original);
    return literal;
  }

  private lookup(name: string, original: string): Lookup {
    const entry = this.find(name);
    if (!entry) {
      return { kind: 'undefined' };
    }
    if (entry.expanded !== undefined) {
      return { kind: 'value', value: entry.expanded };
    }
    if (entry.visited) {
      entry.error = true;
      return { kind: 'cycle' };
    }

    const before = this.misses;
    entry.visited = true;
    let value: string;
    try {
      value = this.substitute(entry.raw, original);
    } finally {
      entry.visited = false;
    }

    // A value that hit an undefined name or a cycle is recomputed on every
    // use so the diagnostic is reported each time
    if (!entry.error && this.misses === before) {
      entry.expanded = value;
    }
    return { kind: 'value', value };
  }

  private report(kind: MacroDiagnosticKind, name: string, text: string): void {
    if (this.quiet) {
      return;
    }
    if (this.options.strict) {
      throw new MacroExpansionError(kind, name, text);
    }

    this.recorded.push({ kind, name, text });
    if (kind === 'cycle') {
      logger.warn(`Macro cycle through '${name}'`, { text });
    } else if (this.options.warnUndefined) {
      logger.warn(`Undefined macro '${name}'`, { text });
    }
  }

  private seedFromEnvironment(environment: Readonly<Record<string, string | undefined>>): void {
    const root = this.frames[0];
    const skip = this.options.environmentSkipPatterns;

    for (const [name, value] of Object.entries(environment)) {
      if (value === undefined || value.length > this.options.maxValueLength) {
        continue;
      }
      if (skip.some(pattern => minimatch(name, pattern))) {
        continue;
      }
      root.set(name, { raw: value, depth: 0, visited: false, error: false });
    }
  }
}

/** Index of the first `=` of a reference body outside nested references; -1 when none. */
function findDefault(body: string): number {
  for (let i = 0; i < body.length; i++) {
    const c = body[i];
    if (c === '=') {
      return i;
    }
    const next = body[i + 1];
    if (c === '$' && (next === '(' || next === '{')) {
      const end = findClosing(body, i + 2, next, next === '(' ? ')' : '}');
      if (end === -1) {
        return -1;
      }
      i = end;
    }
  }
  return -1;
}

/**
 * Index of the bracket closing a reference opened just before `start`,
 * counting nested brackets of the same kind; -1 when unterminated.
 */
function findClosing(text: string, start: number, open: string, close: string): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (c === open) {
      depth++;
    } else if (c === close) {
      if (depth === 0) {
        return i;
      }
      depth--;
    }
  }
  return -1;
}

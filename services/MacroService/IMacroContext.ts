import type {
  MacroDefinitions,
  MacroDiagnostic,
  MacroSnapshot
} from '@core/types';

/**
 * Scoped macro store with substitution.
 */
export interface IMacroContext {
  /** Number of frames above the root (0 when only the root frame exists) */
  readonly depth: number;

  /** Problems recorded by expansions that fell back to literal text */
  readonly diagnostics: readonly MacroDiagnostic[];

  /**
   * Install name/raw-value pairs into the innermost frame. Redefining a name
   * is allowed and invalidates cached expansions.
   */
  define(pairs: MacroDefinitions): void;

  /**
   * Remove a name from the innermost frame.
   * @returns Whether the name was defined there
   */
  undefine(name: string): boolean;

  /** Enter a nested scope. */
  pushScope(): void;

  /**
   * Leave the innermost scope.
   * @throws {MacroScopeError} When only the root frame is left
   */
  popScope(): void;

  /** Push a scope, define `pairs`, run `fn`, and pop, even if `fn` throws. */
  withScope<T>(pairs: MacroDefinitions, fn: () => T): T;

  /** Async variant of withScope; the scope is popped once the promise settles. */
  withScopeAsync<T>(pairs: MacroDefinitions, fn: () => Promise<T>): Promise<T>;

  /**
   * Substitute every macro reference in `text`.
   * @throws {MacroExpansionError} In strict mode, on an undefined name or a cycle
   */
  expand(text: string): string;

  /** Frozen name to expanded-value mapping over the whole scope chain. */
  snapshot(): MacroSnapshot;

  isDefined(name: string): boolean;

  /** Raw value of the innermost definition of `name` */
  getRaw(name: string): string | undefined;

  clearDiagnostics(): void;
}

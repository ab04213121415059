import { RecscopeError, ErrorSeverity } from './RecscopeError';
import type { LoadContext, SourceLocation } from '@core/types';

/**
 * A script that sources itself, directly or through other scripts.
 */
export class CyclicInclusionError extends RecscopeError {
  public readonly inclusionChain: readonly string[];

  constructor(
    filePath: string,
    inclusionChain: readonly string[],
    options: { sourceLocation?: SourceLocation; context?: readonly LoadContext[] } = {}
  ) {
    super(`Cyclic script inclusion of ${filePath} (chain: ${inclusionChain.join(' → ')})`, {
      code: 'CYCLIC_INCLUSION',
      severity: ErrorSeverity.Fatal,
      details: { filePath, inclusionChain: [...inclusionChain] },
      sourceLocation: options.sourceLocation,
      context: options.context
    });
    this.inclusionChain = inclusionChain;
    Object.setPrototypeOf(this, CyclicInclusionError.prototype);
  }
}

import type { LoadContext, SourceLocation } from '@core/types';
import { CyclicInclusionError } from '@core/errors';

/** Where an inclusion was requested from; stamped onto cycle errors. */
export interface InclusionSite {
  sourceLocation?: SourceLocation;
  context?: readonly LoadContext[];
}

/**
 * The chain of startup scripts currently being interpreted, outermost first.
 */
export class ScriptStack {
  private readonly stack: string[] = [];

  /** @throws {CyclicInclusionError} If the script is already being interpreted */
  enter(filePath: string, site: InclusionSite = {}): void {
    if (this.stack.includes(filePath)) {
      throw new CyclicInclusionError(filePath, [...this.stack, filePath], site);
    }
    this.stack.push(filePath);
  }

  leave(filePath: string): void {
    const index = this.stack.lastIndexOf(filePath);
    if (index !== -1) {
      this.stack.splice(index, 1);
    }
  }
}

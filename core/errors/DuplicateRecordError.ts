import { RecscopeError, ErrorSeverity } from './RecscopeError';
import type { SourceLocation } from '@core/types';
import { formatLocationForError } from '@core/utils/locationFormatter';

export interface RecordCollision {
  readonly name: string;
  readonly first: SourceLocation;
  readonly duplicate: SourceLocation;
}

/**
 * Raised once an instance is fully assembled when two loads produced the
 * same record name. Lists every collision, not just the first.
 */
export class DuplicateRecordError extends RecscopeError {
  public readonly instanceId: string;
  public readonly collisions: readonly RecordCollision[];

  constructor(instanceId: string, collisions: readonly RecordCollision[]) {
    const listing = collisions
      .map(c => `${c.name} (${formatLocationForError(c.first)} and ${formatLocationForError(c.duplicate)})`)
      .join('; ');

    super(`Duplicate record names in instance ${instanceId}: ${listing}`, {
      code: 'DUPLICATE_RECORD',
      severity: ErrorSeverity.Fatal,
      details: { instanceId, names: collisions.map(c => c.name) },
      sourceLocation: collisions[0]?.duplicate
    });

    this.instanceId = instanceId;
    this.collisions = collisions;
    Object.setPrototypeOf(this, DuplicateRecordError.prototype);
  }
}

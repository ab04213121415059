import { minimatch } from 'minimatch';
import type { LoadedInstance, RecordInstance } from '@core/types';
import { GraphError } from '@core/errors';
import { graphLogger as logger } from '@core/utils/logger';
import { formatLoadContext, formatProvenance } from '@core/utils/locationFormatter';
import type {
  AmbiguousLinkWarning,
  ICrossReferenceGraph,
  LinkResolutionSummary,
  LinkSource,
  LinkWarning,
  RecordDescription,
  RecordLinks,
  ResolvedLink,
  SearchOptions,
  TraversalStep,
  TraverseDirection,
  TraverseOptions,
  UnresolvedLinkWarning
} from './types';

const GLOB_CHARACTERS = /[*?[\]{}]/;

function recordKey(instanceId: string, name: string): string {
  return `${instanceId}\u0000${name}`;
}

function linkKey(source: LinkSource): string {
  return `${source.instanceId}\u0000${source.record}\u0000${source.field}`;
}

function addToSet(index: Map<string, Set<string>>, key: string, value: string): void {
  let set = index.get(key);
  if (!set) {
    set = new Set();
    index.set(key, set);
  }
  set.add(value);
}

function describeSource(source: LinkSource): string {
  return `${source.record}.${source.field} (${source.instanceId})`;
}

/**
 * Records of many instances in one index, with their links resolved across
 * instance boundaries.
 *
 * Link targets are looked up by record name or alias in every instance.
 * When several instances define the target, the lowest instance id wins and
 * the choice is reported as a warning. Links without a target stay in the
 * graph as unresolved and are retried whenever a later instance defines
 * the name they point at.
 */
export class CrossReferenceGraph implements ICrossReferenceGraph {
  private readonly instances = new Map<string, LoadedInstance>();
  // record name or alias -> instance id -> record
  private readonly names = new Map<string, Map<string, RecordInstance>>();
  private readonly links = new Map<string, ResolvedLink>();
  // target name as written in the link -> link keys
  private readonly linksByTarget = new Map<string, Set<string>>();
  private readonly outbound = new Map<string, string[]>();
  private readonly inbound = new Map<string, Set<string>>();
  private readonly ambiguities = new Map<string, AmbiguousLinkWarning>();
  private readonly pending = new Set<string>();

  get instanceIds(): readonly string[] {
    return [...this.instances.keys()].sort();
  }

  get recordCount(): number {
    let count = 0;
    for (const instance of this.instances.values()) {
      count += instance.records.size;
    }
    return count;
  }

  addInstance(instance: LoadedInstance): void {
    if (this.instances.has(instance.id)) {
      throw new GraphError(`Instance '${instance.id}' is already in the graph`, { instanceId: instance.id });
    }
    this.instances.set(instance.id, instance);

    let linkCount = 0;
    for (const record of instance.records.values()) {
      this.indexName(record.name, record);
      for (const alias of record.aliases) {
        this.indexName(alias, record);
      }

      const keys: string[] = [];
      for (const field of Object.values(record.fields)) {
        if (!field.link) {
          continue;
        }
        const source: LinkSource = { instanceId: instance.id, record: record.name, field: field.name };
        const key = linkKey(source);
        this.links.set(key, { source, target: field.link, status: 'unresolved', candidates: [] });
        addToSet(this.linksByTarget, field.link.targetRecord, key);
        this.pending.add(key);
        keys.push(key);
      }
      this.outbound.set(recordKey(instance.id, record.name), keys);
      linkCount += keys.length;
    }

    logger.info(`Added instance ${instance.id}`, { records: instance.records.size, links: linkCount });
  }

  getInstance(id: string): LoadedInstance | undefined {
    return this.instances.get(id);
  }

  /**
   * Resolve the links of instances added since the last call, links that
   * were unresolved, and links whose target name was defined again.
   */
  resolveLinks(): LinkResolutionSummary {
    const examined = this.pending.size;
    let resolved = 0;
    let unresolved = 0;
    let ambiguous = 0;

    for (const key of this.pending) {
      const link = this.links.get(key);
      if (!link) {
        continue;
      }
      this.detachInbound(key, link);
      this.ambiguities.delete(key);

      const owners = this.names.get(link.target.targetRecord);
      const candidates = owners ? [...owners.keys()].sort() : [];
      const chosenId = candidates[0];
      const target = chosenId === undefined ? undefined : owners?.get(chosenId);
      if (chosenId === undefined || !target) {
        this.links.set(key, { source: link.source, target: link.target, status: 'unresolved', candidates: [] });
        unresolved++;
        continue;
      }

      const next: ResolvedLink = {
        source: link.source,
        target: link.target,
        status: 'resolved',
        targetInstanceId: chosenId,
        targetName: target.name,
        candidates
      };
      this.links.set(key, next);
      addToSet(this.inbound, recordKey(chosenId, target.name), key);
      resolved++;

      if (candidates.length > 1) {
        ambiguous++;
        this.ambiguities.set(key, {
          kind: 'ambiguous',
          link: next,
          chosenInstanceId: chosenId,
          candidates,
          message: `${describeSource(link.source)}: '${link.target.targetRecord}' is defined by ${candidates.join(', ')}; using ${chosenId}`
        });
      }
    }
    this.pending.clear();

    logger.info('Resolved links', { examined, resolved, unresolved, ambiguous });
    return { examined, resolved, unresolved, ambiguous };
  }

  get warnings(): readonly LinkWarning[] {
    const unresolved: UnresolvedLinkWarning[] = [];
    for (const [key, link] of this.links) {
      if (link.status === 'unresolved' && !this.pending.has(key)) {
        unresolved.push({
          kind: 'unresolved',
          link,
          message: `${describeSource(link.source)}: no record named '${link.target.targetRecord}'`
        });
      }
    }
    return [...this.ambiguities.values(), ...unresolved];
  }

  /** Every record with this name or alias, ordered by instance id. */
  getRecord(name: string): RecordInstance[] {
    const owners = this.names.get(name);
    if (!owners) {
      return [];
    }
    return [...owners.keys()].sort().flatMap(id => {
      const record = owners.get(id);
      return record ? [record] : [];
    });
  }

  getRecordInInstance(instanceId: string, name: string): RecordInstance | undefined {
    return this.names.get(name)?.get(instanceId);
  }

  /**
   * Records whose name or alias matches a glob pattern, or starts with the
   * pattern when it has no glob characters. Ordered by name.
   */
  search(pattern: string, options: SearchOptions = {}): RecordInstance[] {
    const { limit } = options;
    if (limit !== undefined && limit <= 0) {
      return [];
    }

    const isGlob = GLOB_CHARACTERS.test(pattern);
    const seen = new Set<string>();
    const matches: RecordInstance[] = [];
    for (const name of [...this.names.keys()].sort()) {
      const matched = isGlob ? minimatch(name, pattern) : name.startsWith(pattern);
      if (!matched) {
        continue;
      }
      for (const record of this.getRecord(name)) {
        const key = recordKey(record.instanceId, record.name);
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
        matches.push(record);
        if (limit !== undefined && matches.length >= limit) {
          return matches;
        }
      }
    }
    return matches;
  }

  getLinks(name: string): RecordLinks {
    const outbound: ResolvedLink[] = [];
    const inbound: ResolvedLink[] = [];
    for (const record of this.getRecord(name)) {
      const key = recordKey(record.instanceId, record.name);
      outbound.push(...this.linksFor(this.outbound.get(key) ?? []));
      inbound.push(...this.linksFor(this.inbound.get(key) ?? []));
    }
    return { outbound, inbound };
  }

  /**
   * Breadth-first walk over resolved links, starting from every record with
   * this name. Each record is reported once, at the depth it was first seen.
   */
  traverse(name: string, options: TraverseOptions = {}): TraversalStep[] {
    const direction = options.direction ?? 'outbound';
    const depth = options.depth ?? 1;
    let frontier = this.getRecord(name);
    const visited = new Set(frontier.map(record => recordKey(record.instanceId, record.name)));
    const steps: TraversalStep[] = [];

    for (let level = 1; level <= depth && frontier.length > 0; level++) {
      const next: RecordInstance[] = [];
      for (const record of frontier) {
        for (const { link, neighbor } of this.neighbors(record, direction)) {
          const key = recordKey(neighbor.instanceId, neighbor.name);
          if (visited.has(key)) {
            continue;
          }
          visited.add(key);
          steps.push({ record: neighbor, depth: level, via: link });
          next.push(neighbor);
        }
      }
      frontier = next;
    }

    logger.debug(`Traversed ${name}`, { direction, depth, found: steps.length });
    return steps;
  }

  describe(name: string): RecordDescription[] {
    return this.getRecord(name).map(record => ({
      record,
      provenance: formatProvenance(record.location),
      context: formatLoadContext(record.context)
    }));
  }

  private indexName(name: string, record: RecordInstance): void {
    let owners = this.names.get(name);
    if (!owners) {
      owners = new Map();
      this.names.set(name, owners);
    }
    owners.set(record.instanceId, record);

    // A new definition can satisfy an unresolved link or change a tie-break
    for (const key of this.linksByTarget.get(name) ?? []) {
      this.pending.add(key);
    }
  }

  private detachInbound(key: string, link: ResolvedLink): void {
    if (link.status === 'resolved' && link.targetInstanceId !== undefined && link.targetName !== undefined) {
      this.inbound.get(recordKey(link.targetInstanceId, link.targetName))?.delete(key);
    }
  }

  private linksFor(keys: Iterable<string>): ResolvedLink[] {
    const result: ResolvedLink[] = [];
    for (const key of keys) {
      const link = this.links.get(key);
      if (link) {
        result.push(link);
      }
    }
    return result;
  }

  private neighbors(
    record: RecordInstance,
    direction: TraverseDirection
  ): Array<{ link: ResolvedLink; neighbor: RecordInstance }> {
    const key = recordKey(record.instanceId, record.name);
    const result: Array<{ link: ResolvedLink; neighbor: RecordInstance }> = [];

    if (direction !== 'inbound') {
      for (const link of this.linksFor(this.outbound.get(key) ?? [])) {
        if (link.status !== 'resolved' || link.targetInstanceId === undefined || link.targetName === undefined) {
          continue;
        }
        const neighbor = this.getRecordInInstance(link.targetInstanceId, link.targetName);
        if (neighbor) {
          result.push({ link, neighbor });
        }
      }
    }

    if (direction !== 'outbound') {
      for (const link of this.linksFor(this.inbound.get(key) ?? [])) {
        const neighbor = this.instances.get(link.source.instanceId)?.records.get(link.source.record);
        if (neighbor) {
          result.push({ link, neighbor });
        }
      }
    }

    return result;
  }
}

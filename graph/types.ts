import type { FieldLink, LoadedInstance, RecordInstance } from '@core/types';

/** The field a link is read from. */
export interface LinkSource {
  readonly instanceId: string;
  readonly record: string;
  readonly field: string;
}

export type LinkStatus = 'resolved' | 'unresolved';

/**
 * A link field and where it points across the whole graph. Unresolved links
 * are kept so that instances added later can satisfy them.
 */
export interface ResolvedLink {
  readonly source: LinkSource;
  readonly target: FieldLink;
  readonly status: LinkStatus;
  readonly targetInstanceId?: string;
  /** Record name of the target; differs from `target.targetRecord` when the link names an alias */
  readonly targetName?: string;
  /** Instance ids defining the target name, sorted */
  readonly candidates: readonly string[];
}

export interface AmbiguousLinkWarning {
  readonly kind: 'ambiguous';
  readonly link: ResolvedLink;
  readonly chosenInstanceId: string;
  readonly candidates: readonly string[];
  readonly message: string;
}

export interface UnresolvedLinkWarning {
  readonly kind: 'unresolved';
  readonly link: ResolvedLink;
  readonly message: string;
}

export type LinkWarning = AmbiguousLinkWarning | UnresolvedLinkWarning;

export interface LinkResolutionSummary {
  /** Links looked at in this pass */
  readonly examined: number;
  readonly resolved: number;
  readonly unresolved: number;
  readonly ambiguous: number;
}

export interface SearchOptions {
  /** Stop after this many matches */
  limit?: number;
}

export type TraverseDirection = 'outbound' | 'inbound' | 'both';

export interface TraverseOptions {
  direction?: TraverseDirection;
  /** Maximum number of link hops; defaults to 1 */
  depth?: number;
}

export interface TraversalStep {
  readonly record: RecordInstance;
  readonly depth: number;
  /** The link followed to reach the record */
  readonly via: ResolvedLink;
}

export interface RecordLinks {
  readonly outbound: readonly ResolvedLink[];
  readonly inbound: readonly ResolvedLink[];
}

/** One match of `describe()`, with its provenance rendered for display. */
export interface RecordDescription {
  readonly record: RecordInstance;
  /** `file:line with macro state {A=1, B=2}` */
  readonly provenance: string;
  /** `st.cmd:3 -> motor.db:12` */
  readonly context: string;
}

export interface ICrossReferenceGraph {
  readonly instanceIds: readonly string[];
  readonly recordCount: number;
  addInstance(instance: LoadedInstance): void;
  getInstance(id: string): LoadedInstance | undefined;
  resolveLinks(): LinkResolutionSummary;
  getRecord(name: string): RecordInstance[];
  getRecordInInstance(instanceId: string, name: string): RecordInstance | undefined;
  search(pattern: string, options?: SearchOptions): RecordInstance[];
  getLinks(name: string): RecordLinks;
  traverse(name: string, options?: TraverseOptions): TraversalStep[];
  describe(name: string): RecordDescription[];
  readonly warnings: readonly LinkWarning[];
}

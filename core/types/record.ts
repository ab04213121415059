import type { FullLoadContext, LoadContext, SourceLocation } from './location';

/** Field types of record-type definitions that hold links. */
export const LINK_FIELD_TYPES: readonly string[] = ['DBF_INLINK', 'DBF_OUTLINK', 'DBF_FWDLINK'];

/** Link modifiers recognized after the target in a link value. */
export const LINK_MODIFIERS: readonly string[] = ['PP', 'NPP', 'CA', 'CP', 'CPP', 'MS', 'NMS', 'MSS', 'MSI'];

/**
 * Parsed target of a link-typed field. The owning instance of the target is
 * not known at this layer; the cross-reference graph resolves it.
 */
export interface FieldLink {
  readonly targetRecord: string;
  readonly targetField: string;
  readonly modifiers: readonly string[];
}

export interface RecordField {
  readonly name: string;
  /** Value as written in the database, before macro substitution */
  readonly rawValue: string;
  readonly value: string;
  /** Location of the load command that instantiated the field */
  readonly location: SourceLocation;
  /** File and line of the field inside the database document */
  readonly definedAt: LoadContext;
  /** DBF_* type, when the record type came from a loaded definition */
  readonly type?: string;
  readonly link?: FieldLink;
}

/**
 * A named control point belonging to one loaded instance. PVA groups built
 * from `info(Q:group, ...)` tags use the same shape with record type `PVA`.
 */
export interface RecordInstance {
  readonly instanceId: string;
  readonly name: string;
  /** Record name before macro substitution */
  readonly rawName: string;
  readonly recordType: string;
  readonly fields: Readonly<Record<string, RecordField>>;
  readonly aliases: readonly string[];
  readonly info: Readonly<Record<string, string>>;
  /** Location of the load command that created the record */
  readonly location: SourceLocation;
  /** Chain from the startup script down to the record block in the database */
  readonly context: FullLoadContext;
}

export interface RecordTypeField {
  readonly name: string;
  /** DBF_* type */
  readonly type: string;
  readonly attributes: Readonly<Record<string, string>>;
}

/**
 * A record type from a loaded definition file.
 */
export interface RecordTypeDefinition {
  readonly name: string;
  readonly fields: Readonly<Record<string, RecordTypeField>>;
  readonly definedAt: LoadContext;
}

export type LintSeverity = 'warning' | 'error';

/**
 * A problem found in a database that does not stop it from loading, such
 * as an unquoted field value or a field the record type does not define.
 */
export interface LintMessage {
  readonly severity: LintSeverity;
  /** Stable identifier, e.g. `unquoted_field` */
  readonly name: string;
  readonly message: string;
  /** Chain from the startup script down to the offending line */
  readonly context: FullLoadContext;
}

import defaultLinkFields from '@core/config/link-fields.json';
import { LINK_FIELD_TYPES, LINK_MODIFIERS, type FieldLink, type RecordTypeDefinition } from '@core/types';

/** Field names treated as links when no definition of the record type is loaded. */
export const DEFAULT_LINK_FIELDS: ReadonlySet<string> = new Set(defaultLinkFields);

/**
 * Whether `fieldName` holds a link in a record of the given type. A loaded
 * record type decides by field type; otherwise the default field table and
 * any configured extra names apply.
 */
export function isLinkField(
  fieldName: string,
  recordType: RecordTypeDefinition | undefined,
  extraLinkFields: ReadonlySet<string> = new Set()
): boolean {
  const definition = recordType?.fields[fieldName];
  if (definition) {
    return LINK_FIELD_TYPES.includes(definition.type);
  }
  return DEFAULT_LINK_FIELDS.has(fieldName) || extraLinkFields.has(fieldName);
}

/**
 * Parse the expanded value of a link field into its target.
 *
 * Returns undefined for values that are not record links: empty values,
 * numeric constants, hardware addresses (`@...`, `#...`) and JSON links.
 * `REC.FLD PP MS` targets field FLD of REC; without a field the target is
 * PROC for forward links and VAL otherwise.
 */
export function parseLink(fieldName: string, value: string): FieldLink | undefined {
  const trimmed = value.trim();
  if (!trimmed || trimmed.startsWith('{') || trimmed.startsWith('[')) {
    return undefined;
  }

  const [target, ...extra] = trimmed.split(/\s+/);
  if (target.startsWith('@') || target.startsWith('#')) {
    return undefined;
  }
  if (Number.isFinite(Number(target))) {
    return undefined;
  }

  const dot = target.indexOf('.');
  const targetRecord = dot === -1 ? target : target.slice(0, dot);
  if (!targetRecord) {
    return undefined;
  }
  const targetField = dot === -1 || dot === target.length - 1
    ? (fieldName === 'FLNK' ? 'PROC' : 'VAL')
    : target.slice(dot + 1);

  return {
    targetRecord,
    targetField,
    modifiers: extra.filter(modifier => LINK_MODIFIERS.includes(modifier))
  };
}

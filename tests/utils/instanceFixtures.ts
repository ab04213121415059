import {
  createLoadContext,
  createSourceLocation,
  type LoadedInstance,
  type MacroSnapshot,
  type RecordField,
  type RecordInstance
} from '@core/types';
import { parseLink } from '@interpreter/records/links';

export interface RecordFixture {
  name: string;
  recordType?: string;
  /** Link field name -> link value, e.g. `{ INP: 'BAR:baz CP' }` */
  links?: Record<string, string>;
  aliases?: string[];
  line?: number;
  macros?: MacroSnapshot;
}

/**
 * Build an assembled instance without interpreting a script. Records are
 * placed at `/iocs/<id>/st.cmd`, one load line each unless given.
 */
export function createInstanceFixture(id: string, records: RecordFixture[]): LoadedInstance {
  const scriptPath = `/iocs/${id}/st.cmd`;
  const database = `/iocs/${id}/db/test.db`;
  const byName = new Map<string, RecordInstance>();

  records.forEach((fixture, index) => {
    const location = createSourceLocation(scriptPath, fixture.line ?? index + 1, fixture.macros ?? {});
    const fields: Record<string, RecordField> = {};
    for (const [fieldName, value] of Object.entries(fixture.links ?? {})) {
      fields[fieldName] = {
        name: fieldName,
        rawValue: value,
        value,
        location,
        definedAt: createLoadContext(database, 2),
        link: parseLink(fieldName, value)
      };
    }
    byName.set(fixture.name, {
      instanceId: id,
      name: fixture.name,
      rawName: fixture.name,
      recordType: fixture.recordType ?? 'ai',
      fields,
      aliases: fixture.aliases ?? [],
      info: {},
      location,
      context: [createLoadContext(scriptPath, location.line), createLoadContext(database, 1)]
    });
  });

  return {
    id,
    scriptPath,
    workingDirectory: `/iocs/${id}`,
    lines: [],
    macros: {},
    variables: {},
    records: byName,
    recordTypes: new Map(),
    pvaGroups: new Map(),
    lint: [],
    loadedFiles: [{ path: scriptPath }],
    unhandled: [],
    errors: []
  };
}

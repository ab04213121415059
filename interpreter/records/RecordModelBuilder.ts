import * as path from 'path';
import {
  createLoadContext,
  createSourceLocation,
  type FullLoadContext,
  type LoadContext,
  type LintMessage,
  type LintSeverity,
  type MacroDefinitions,
  type RecordField,
  type RecordInstance,
  type RecordTypeDefinition,
  type RecordTypeField,
  type SourceLocation
} from '@core/types';
import {
  CommandExecutionError,
  DocumentParseError,
  DuplicateRecordError,
  ScriptNotFoundError,
  type RecordCollision
} from '@core/errors';
import { builderLogger as logger } from '@core/utils/logger';
import { formatLocation } from '@core/utils/locationFormatter';
import {
  parseDatabase,
  parseJsonValue,
  parseSubstitution,
  type DatabaseItem,
  type JsonValue,
  type SubstitutionDefinition
} from '@grammar/index';
import { parseMacroDefinitions } from '@services/MacroService/parseMacroDefinitions';
import type { CommandEvent, IShellObserver } from '@interpreter/shell/types';
import { isLinkField, parseLink } from './links';

export const LOAD_COMMANDS = ['dbLoadDatabase', 'dbLoadRecords', 'dbLoadTemplate'] as const;

/** Record type given to PVA groups */
export const PVA_GROUP_TYPE = 'PVA';

export interface RecordModelBuilderOptions {
  instanceId: string;
  /** Field names treated as links in addition to the default table */
  extraLinkFields?: readonly string[];
  /** Fail record loads that come before any dbLoadDatabase */
  requireDefinitions?: boolean;
}

/** Records and record types of one instance, ready for the graph. */
export interface RecordModel {
  readonly records: ReadonlyMap<string, RecordInstance>;
  readonly recordTypes: ReadonlyMap<string, RecordTypeDefinition>;
  readonly pvaGroups: ReadonlyMap<string, RecordInstance>;
  readonly lint: readonly LintMessage[];
}

type Statement = Extract<DatabaseItem, { kind: 'statement' }>;

interface RecordDraft {
  name: string;
  rawName: string;
  recordType: string;
  fields: Map<string, RecordField>;
  aliases: string[];
  info: Record<string, string>;
  location: SourceLocation;
  context: FullLoadContext;
}

/**
 * What one load command adds. Merged into the model when the command
 * completes; dropped with the command when it fails.
 */
class LoadDraft {
  readonly records = new Map<string, RecordDraft>();
  readonly aliases = new Map<string, string>();
  readonly recordTypes = new Map<string, RecordTypeDefinition>();
  readonly pvaGroups = new Map<string, RecordDraft>();
  readonly collisions: RecordCollision[] = [];
  readonly lint: LintMessage[] = [];
}

/** Everything needed to instantiate one database document. */
interface LoadScope {
  event: CommandEvent;
  draft: LoadDraft;
  /** The load command's location, macro state taken inside the load scope */
  location: SourceLocation;
  /** Chain leading to the document being read */
  context: FullLoadContext;
  /** Directories searched for relative includes, besides the including file's */
  searchPath: readonly string[];
  /** Files currently being read, to stop include cycles */
  including: readonly string[];
}

/**
 * Observer of the load commands of a startup script.
 *
 * Each load instantiates records in its own macro scope; every field keeps
 * its raw and expanded value, the load command's location and the line of
 * the database it came from. A load command either adds everything it
 * read or, when it fails, nothing. Name collisions are collected and
 * reported together by `finish()`.
 */
export class RecordModelBuilder implements IShellObserver {
  readonly commands: readonly string[] = LOAD_COMMANDS;
  private readonly instanceId: string;
  private readonly extraLinkFields: ReadonlySet<string>;
  private readonly requireDefinitions: boolean;
  private readonly records = new Map<string, RecordDraft>();
  // alias name -> record name
  private readonly aliases = new Map<string, string>();
  private readonly recordTypes = new Map<string, RecordTypeDefinition>();
  private readonly pvaGroups = new Map<string, RecordDraft>();
  private readonly collisions: RecordCollision[] = [];
  private readonly lint: LintMessage[] = [];
  private definitionsLoaded = false;

  constructor(options: RecordModelBuilderOptions) {
    this.instanceId = options.instanceId;
    this.extraLinkFields = new Set(options.extraLinkFields ?? []);
    this.requireDefinitions = options.requireDefinitions ?? false;
  }

  async onCommand(event: CommandEvent): Promise<void> {
    const name = event.command.name;
    if (!this.commands.includes(name)) {
      return;
    }
    if (event.initialized) {
      throw new CommandExecutionError(name, `${name} cannot be used after iocInit`, {
        sourceLocation: event.location
      });
    }

    if (name !== 'dbLoadDatabase' && this.requireDefinitions && !this.definitionsLoaded) {
      throw new CommandExecutionError(name, 'database definition (dbd) not yet loaded', {
        sourceLocation: event.location
      });
    }

    const draft = new LoadDraft();
    switch (name) {
      case 'dbLoadDatabase':
        await this.loadDatabase(event, draft);
        this.definitionsLoaded = true;
        break;
      case 'dbLoadRecords':
        await this.loadRecords(event, draft);
        break;
      case 'dbLoadTemplate':
        await this.loadTemplate(event, draft);
        break;
    }
    this.commit(draft);
  }

  /**
   * Freeze the collected records.
   * @throws {DuplicateRecordError} Listing every name collision seen
   */
  finish(): RecordModel {
    if (this.collisions.length > 0) {
      throw new DuplicateRecordError(this.instanceId, this.collisions);
    }

    const records = this.freezeAll(this.records);
    const pvaGroups = this.freezeAll(this.pvaGroups);

    logger.info(`Instance ${this.instanceId}: ${records.size} records, ${this.recordTypes.size} record types`, {
      pvaGroups: pvaGroups.size,
      lint: this.lint.length
    });
    return {
      records,
      recordTypes: new Map(this.recordTypes),
      pvaGroups,
      lint: Object.freeze([...this.lint])
    };
  }

  private freezeAll(drafts: ReadonlyMap<string, RecordDraft>): Map<string, RecordInstance> {
    const frozen = new Map<string, RecordInstance>();
    for (const draft of drafts.values()) {
      frozen.set(draft.name, Object.freeze({
        instanceId: this.instanceId,
        name: draft.name,
        rawName: draft.rawName,
        recordType: draft.recordType,
        fields: Object.freeze(Object.fromEntries(draft.fields)),
        aliases: Object.freeze([...draft.aliases]),
        info: Object.freeze({ ...draft.info }),
        location: draft.location,
        context: draft.context
      }));
    }
    return frozen;
  }

  private commit(draft: LoadDraft): void {
    for (const [name, record] of draft.records) {
      this.records.set(name, record);
    }
    for (const [alias, owner] of draft.aliases) {
      this.aliases.set(alias, owner);
    }
    for (const [name, recordType] of draft.recordTypes) {
      this.recordTypes.set(name, recordType);
    }
    for (const [name, group] of draft.pvaGroups) {
      this.pvaGroups.set(name, group);
    }
    this.collisions.push(...draft.collisions);
    this.lint.push(...draft.lint);
  }

  /** dbLoadDatabase(file, [path], [macros]) */
  private async loadDatabase(event: CommandEvent, draft: LoadDraft): Promise<void> {
    const [file, searchPath, macros] = event.command.args;
    if (!file) {
      throw new Error('Usage: dbLoadDatabase file [path] [macros]');
    }
    const directories = searchPath
      ? searchPath.split(':').filter(Boolean).map(dir => event.resolvePath(dir))
      : [];
    await this.withLoadScope(event, macros ? parseMacroDefinitions(macros) : {}, async location => {
      const target = await this.findFile(event, file, directories);
      await this.loadDocument(target, {
        event,
        draft,
        location,
        context: event.context,
        searchPath: directories,
        including: []
      });
    });
  }

  /** dbLoadRecords(file, [macros]) */
  private async loadRecords(event: CommandEvent, draft: LoadDraft): Promise<void> {
    const [file, macros] = event.command.args;
    if (!file) {
      throw new Error('Usage: dbLoadRecords file [macros]');
    }
    await this.withLoadScope(event, macros ? parseMacroDefinitions(macros) : {}, async location => {
      await this.loadDocument(event.resolvePath(file), {
        event,
        draft,
        location,
        context: event.context,
        searchPath: [],
        including: []
      });
    });
  }

  /**
   * dbLoadTemplate(file, [macros])
   *
   * Macros given on the command win over row values, which win over
   * `global` values.
   */
  private async loadTemplate(event: CommandEvent, draft: LoadDraft): Promise<void> {
    const [file, macros] = event.command.args;
    if (!file) {
      throw new Error('Usage: dbLoadTemplate file [macros]');
    }
    const templatePath = event.resolvePath(file);
    const items = parseSubstitution(await this.readFile(event, templatePath), templatePath);
    const commandMacros = macros ? parseMacroDefinitions(macros) : {};
    let globals: MacroDefinitions = {};

    for (const item of items) {
      if (item.kind === 'global') {
        globals = { ...globals, ...toDefinitions(item.definitions) };
        continue;
      }

      let blockGlobals = globals;
      let pattern: readonly string[] = [];
      for (const entry of item.entries) {
        if (entry.kind === 'global') {
          blockGlobals = { ...blockGlobals, ...toDefinitions(entry.definitions) };
          continue;
        }
        if (entry.kind === 'pattern') {
          pattern = entry.names;
          continue;
        }
        const row = entry.kind === 'definitions'
          ? toDefinitions(entry.definitions)
          : zipPattern(pattern, entry.values);

        const rowContext: FullLoadContext = [...event.context, createLoadContext(templatePath, entry.line)];
        await this.withLoadScope(event, firstDefinitionWins(commandMacros, row, blockGlobals), async location => {
          const database = event.resolvePath(event.macros.expand(item.file));
          await this.loadDocument(database, {
            event,
            draft,
            location,
            context: rowContext,
            searchPath: [],
            including: []
          });
        });
      }
    }
  }

  private async withLoadScope(
    event: CommandEvent,
    definitions: MacroDefinitions,
    body: (location: SourceLocation) => Promise<void>
  ): Promise<void> {
    await event.macros.withScopeAsync(definitions, async () => {
      const location = createSourceLocation(event.location.file, event.location.line, event.macros.snapshot());
      await body(location);
    });
  }

  private async findFile(event: CommandEvent, file: string, directories: readonly string[]): Promise<string> {
    if (!path.isAbsolute(file)) {
      for (const directory of directories) {
        const candidate = event.resolvePath(path.join(directory, file));
        if (await event.fileSystem.exists(candidate)) {
          return candidate;
        }
      }
    }
    return event.resolvePath(file);
  }

  private async readFile(event: CommandEvent, filePath: string): Promise<string> {
    if (!(await event.fileSystem.exists(filePath))) {
      throw new ScriptNotFoundError(filePath, { sourceLocation: event.location });
    }
    event.recordLoadedFile(filePath);
    return event.fileSystem.readFile(filePath);
  }

  private async loadDocument(filePath: string, scope: LoadScope): Promise<void> {
    if (scope.including.includes(filePath)) {
      throw new DocumentParseError(`Cyclic include of ${filePath}`, { file: filePath, dialect: 'database' });
    }
    const items = parseDatabase(await this.readFile(scope.event, filePath), filePath);
    logger.debug(`Loading ${filePath} for ${formatLocation(scope.location).display}`, { items: items.length });
    await this.processItems(items, filePath, { ...scope, including: [...scope.including, filePath] });
  }

  private async processItems(items: readonly DatabaseItem[], file: string, scope: LoadScope): Promise<void> {
    const macros = scope.event.macros;

    for (const item of items) {
      if (item.kind === 'include') {
        const target = await this.resolveInclude(macros.expand(item.file), file, scope);
        await this.loadDocument(target, {
          ...scope,
          context: [...scope.context, createLoadContext(file, item.line)]
        });
        continue;
      }
      if (item.kind !== 'statement') {
        continue;
      }

      switch (item.keyword) {
        case 'record':
        case 'grecord':
          this.addRecord(item, file, scope);
          break;
        case 'alias':
          this.addStandaloneAlias(item, file, scope);
          break;
        case 'recordtype':
          this.addRecordType(item, file, scope.draft);
          break;
      }
    }
  }

  private async resolveInclude(include: string, fromFile: string, scope: LoadScope): Promise<string> {
    if (path.isAbsolute(include)) {
      return scope.event.resolvePath(include);
    }
    const directories = [path.dirname(fromFile), ...scope.searchPath];
    for (const directory of directories) {
      const candidate = path.join(directory, include);
      if (await scope.event.fileSystem.exists(candidate)) {
        return candidate;
      }
    }
    return path.join(path.dirname(fromFile), include);
  }

  private addRecord(item: Statement, file: string, scope: LoadScope): void {
    const [rawType, rawName] = item.args;
    if (!rawType || rawName === undefined) {
      throw new DocumentParseError(`${item.keyword} requires a type and a name`, {
        file,
        line: item.line,
        dialect: 'database'
      });
    }

    const { draft: staged, event: { macros } } = scope;
    const name = macros.expand(rawName);
    const recordType = macros.expand(rawType);
    const existing = this.findRecord(name, staged);

    let draft: RecordDraft;
    if (recordType === '*') {
      // record(*, NAME) adds to a record loaded earlier
      if (!existing) {
        throw new DocumentParseError(`Record '${name}' not found`, { file, line: item.line, dialect: 'database' });
      }
      draft = this.editable(existing, staged.records);
    } else if (existing) {
      staged.collisions.push({ name, first: existing.location, duplicate: scope.location });
      logger.warn(`Duplicate record ${name} at ${formatLocation(createLoadContext(file, item.line)).display}`);
      return;
    } else {
      draft = {
        name,
        rawName,
        recordType,
        fields: new Map(),
        aliases: [],
        info: {},
        location: scope.location,
        context: Object.freeze([...scope.context, createLoadContext(file, item.line)])
      };
      staged.records.set(name, draft);
    }

    const definition = this.findRecordType(draft.recordType, staged);
    if (!definition && this.hasDefinitions(staged)) {
      this.addLint(scope, 'error', 'unknown_record_type', `Unknown record type '${draft.recordType}' of '${name}'`, file, item.line);
    }

    for (const entry of item.body) {
      if (entry.kind !== 'statement') {
        continue;
      }
      const [first, second] = entry.args;
      switch (entry.keyword) {
        case 'field': {
          if (!first) {
            break;
          }
          const rawValue = second ?? '';
          const value = macros.expand(rawValue);
          const fieldType = definition && first in definition.fields ? definition.fields[first].type : undefined;
          if (definition && !fieldType) {
            this.addLint(scope, 'error', 'unknown_field', `Record type '${definition.name}' has no field '${first}'`, file, entry.line);
          }
          if (second !== undefined && entry.unquoted.includes(1)) {
            this.addLint(scope, 'warning', 'unquoted_field', `Unquoted field value '${first}'`, file, entry.line);
          }
          const link = isLinkField(first, definition, this.extraLinkFields) ? parseLink(first, value) : undefined;
          draft.fields.set(first, Object.freeze({
            name: first,
            rawValue,
            value,
            location: scope.location,
            definedAt: createLoadContext(file, entry.line),
            ...(fieldType ? { type: fieldType } : {}),
            ...(link ? { link: Object.freeze(link) } : {})
          }));
          break;
        }
        case 'info':
          if (first) {
            const value = macros.expand(second ?? '');
            draft.info[first] = value;
            if (first === 'Q:group') {
              this.addPvaGroups(draft, value, file, entry.line, scope);
            }
          }
          break;
        case 'alias':
          if (first) {
            this.addAlias(draft, macros.expand(first), scope);
          }
          break;
      }
    }
  }

  private addStandaloneAlias(item: Statement, file: string, scope: LoadScope): void {
    const [rawTarget, rawAlias] = item.args;
    if (!rawTarget || !rawAlias) {
      return;
    }
    const macros = scope.event.macros;
    const target = this.findRecord(macros.expand(rawTarget), scope.draft);
    if (!target) {
      logger.warn(`Alias target '${macros.expand(rawTarget)}' not found at ${file}:${item.line}`);
      return;
    }
    this.addAlias(this.editable(target, scope.draft.records), macros.expand(rawAlias), scope);
  }

  private addAlias(record: RecordDraft, alias: string, scope: LoadScope): void {
    const existing = this.findRecord(alias, scope.draft);
    if (existing) {
      scope.draft.collisions.push({ name: alias, first: existing.location, duplicate: scope.location });
      return;
    }
    scope.draft.aliases.set(alias, record.name);
    record.aliases.push(alias);
  }

  /**
   * `info(Q:group, {...})` contributes fields of this record to PVA groups.
   * Each member with a `+channel` becomes a field linking to that field of
   * the record; `+` keys are kept as info.
   */
  private addPvaGroups(record: RecordDraft, text: string, file: string, line: number, scope: LoadScope): void {
    let groups: JsonValue;
    try {
      groups = parseJsonValue(text, file);
    } catch (error) {
      if (!(error instanceof DocumentParseError)) {
        throw error;
      }
      this.addLint(scope, 'error', 'invalid_q_group', `Malformed Q:group of '${record.name}': ${error.message}`, file, line);
      return;
    }
    if (!isJsonObject(groups)) {
      this.addLint(scope, 'error', 'invalid_q_group', `Q:group of '${record.name}' is not an object`, file, line);
      return;
    }

    const definedAt = createLoadContext(file, line);
    for (const [groupName, members] of Object.entries(groups)) {
      if (!isJsonObject(members)) {
        continue;
      }
      const group = this.pvaGroupDraft(groupName, definedAt, scope);
      for (const [member, settings] of Object.entries(members)) {
        if (member.startsWith('+')) {
          group.info[member] = jsonText(settings);
          continue;
        }
        if (!isJsonObject(settings)) {
          continue;
        }
        const channel = '+channel' in settings ? jsonText(settings['+channel']) : undefined;
        group.fields.set(member, Object.freeze({
          name: member,
          rawValue: channel ?? '',
          value: channel ? `${record.name}.${channel}` : '',
          location: scope.location,
          definedAt,
          ...(channel
            ? { link: Object.freeze({ targetRecord: record.name, targetField: channel, modifiers: Object.freeze([]) }) }
            : {})
        }));
        for (const [key, setting] of Object.entries(settings)) {
          if (key.startsWith('+') && key !== '+channel') {
            group.info[`${member}.${key}`] = jsonText(setting);
          }
        }
      }
    }
  }

  private pvaGroupDraft(name: string, definedAt: LoadContext, scope: LoadScope): RecordDraft {
    const existing = scope.draft.pvaGroups.get(name) ?? this.pvaGroups.get(name);
    if (existing) {
      return this.editable(existing, scope.draft.pvaGroups);
    }
    const group: RecordDraft = {
      name,
      rawName: name,
      recordType: PVA_GROUP_TYPE,
      fields: new Map(),
      aliases: [],
      info: {},
      location: scope.location,
      context: Object.freeze([...scope.context, definedAt])
    };
    scope.draft.pvaGroups.set(name, group);
    return group;
  }

  /** The staged copy of a record, made on first change within a load. */
  private editable(record: RecordDraft, staged: Map<string, RecordDraft>): RecordDraft {
    const current = staged.get(record.name);
    if (current) {
      return current;
    }
    const copy: RecordDraft = {
      ...record,
      fields: new Map(record.fields),
      aliases: [...record.aliases],
      info: { ...record.info }
    };
    staged.set(record.name, copy);
    return copy;
  }

  private findRecord(name: string, staged: LoadDraft): RecordDraft | undefined {
    const owner = staged.aliases.get(name) ?? this.aliases.get(name) ?? name;
    return staged.records.get(owner) ?? this.records.get(owner);
  }

  private findRecordType(name: string, staged: LoadDraft): RecordTypeDefinition | undefined {
    return staged.recordTypes.get(name) ?? this.recordTypes.get(name);
  }

  private hasDefinitions(staged: LoadDraft): boolean {
    return this.recordTypes.size > 0 || staged.recordTypes.size > 0;
  }

  private addLint(scope: LoadScope, severity: LintSeverity, name: string, message: string, file: string, line: number): void {
    logger.debug(`${severity} ${name}: ${message}`, { file, line });
    scope.draft.lint.push(Object.freeze({
      severity,
      name,
      message,
      context: Object.freeze([...scope.context, createLoadContext(file, line)])
    }));
  }

  private addRecordType(item: Statement, file: string, staged: LoadDraft): void {
    const [name] = item.args;
    if (!name) {
      return;
    }
    const fields: Record<string, RecordTypeField> = {};
    for (const entry of item.body) {
      if (entry.kind !== 'statement' || entry.keyword !== 'field') {
        continue;
      }
      const [fieldName, type] = entry.args;
      if (!fieldName || !type) {
        continue;
      }
      const attributes: Record<string, string> = {};
      for (const attribute of entry.body) {
        if (attribute.kind === 'statement') {
          attributes[attribute.keyword] = attribute.args[0] ?? '';
        }
      }
      fields[fieldName] = Object.freeze({ name: fieldName, type, attributes: Object.freeze(attributes) });
    }

    staged.recordTypes.set(name, Object.freeze({
      name,
      fields: Object.freeze(fields),
      definedAt: createLoadContext(file, item.line)
    }));
  }
}

function toDefinitions(definitions: readonly SubstitutionDefinition[]): MacroDefinitions {
  const result: Record<string, string> = {};
  for (const { name, value } of definitions) {
    result[name] = value;
  }
  return result;
}

function zipPattern(names: readonly string[], values: readonly string[]): MacroDefinitions {
  const result: Record<string, string> = {};
  names.forEach((name, index) => {
    if (index < values.length) {
      result[name] = values[index];
    }
  });
  return result;
}

/** Merge definition sets; a name keeps the value of the first set defining it. */
export function firstDefinitionWins(...sets: readonly MacroDefinitions[]): MacroDefinitions {
  const result: Record<string, string> = {};
  for (const set of sets) {
    for (const [name, value] of Object.entries(set)) {
      if (!(name in result)) {
        result[name] = value;
      }
    }
  }
  return result;
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function jsonText(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

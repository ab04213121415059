import * as fs from 'fs';
import { fileURLToPath } from 'url';
import * as peggy from 'peggy';
import { z } from 'zod';
import { DocumentParseError } from '@core/errors';
import { parserLogger as logger } from '@core/utils/logger';

/**
 * One construct of a database or definition file. Keywords are not
 * interpreted here: `record(ai, "X") { field(VAL, 1) }` is a statement
 * with a body of statements.
 */
export type DatabaseItem =
  | { kind: 'include'; file: string; line: number }
  | { kind: 'cdef'; text: string; line: number }
  | { kind: 'statement'; keyword: string; args: string[]; unquoted: number[]; body: DatabaseItem[]; line: number }
  | { kind: 'value'; value: string; line: number };

export interface SubstitutionDefinition {
  name: string;
  value: string;
}

export type SubstitutionEntry =
  | { kind: 'global'; definitions: SubstitutionDefinition[]; line: number }
  | { kind: 'pattern'; names: string[]; line: number }
  | { kind: 'definitions'; definitions: SubstitutionDefinition[]; line: number }
  | { kind: 'values'; values: string[]; line: number };

export type SubstitutionItem =
  | { kind: 'global'; definitions: SubstitutionDefinition[]; line: number }
  | { kind: 'file'; file: string; entries: SubstitutionEntry[]; line: number };

const DatabaseItemSchema: z.ZodType<DatabaseItem> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('include'), file: z.string(), line: z.number() }),
    z.object({ kind: z.literal('cdef'), text: z.string(), line: z.number() }),
    z.object({
      kind: z.literal('statement'),
      keyword: z.string(),
      args: z.array(z.string()),
      unquoted: z.array(z.number()),
      body: z.array(DatabaseItemSchema),
      line: z.number()
    }),
    z.object({ kind: z.literal('value'), value: z.string(), line: z.number() })
  ])
);

/** A value of the relaxed JSON accepted in database files. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

const DefinitionSchema = z.object({ name: z.string(), value: z.string() });

const GlobalSchema = z.object({
  kind: z.literal('global'),
  definitions: z.array(DefinitionSchema),
  line: z.number()
});

const SubstitutionEntrySchema = z.discriminatedUnion('kind', [
  GlobalSchema,
  z.object({ kind: z.literal('pattern'), names: z.array(z.string()), line: z.number() }),
  z.object({ kind: z.literal('definitions'), definitions: z.array(DefinitionSchema), line: z.number() }),
  z.object({ kind: z.literal('values'), values: z.array(z.string()), line: z.number() })
]);

const SubstitutionItemSchema = z.discriminatedUnion('kind', [
  GlobalSchema,
  z.object({
    kind: z.literal('file'),
    file: z.string(),
    entries: z.array(SubstitutionEntrySchema),
    line: z.number()
  })
]);

// Shape of the syntax errors generated parsers throw
const PeggySyntaxErrorSchema = z.object({
  message: z.string(),
  location: z.object({
    start: z.object({ line: z.number(), column: z.number() })
  })
});

const parsers = new Map<string, peggy.Parser>();

function readGrammar(name: string): string {
  // Beside this module in the source tree, or in the package's grammar
  // directory when running from the bundle in dist/
  const candidates = [new URL(`./${name}`, import.meta.url), new URL(`../grammar/${name}`, import.meta.url)];
  for (const candidate of candidates) {
    const filePath = fileURLToPath(candidate);
    if (fs.existsSync(filePath)) {
      return fs.readFileSync(filePath, 'utf-8');
    }
  }
  throw new Error(`Grammar not found: ${name}`);
}

function getParser(name: string): peggy.Parser {
  let parser = parsers.get(name);
  if (!parser) {
    logger.debug(`Compiling grammar ${name}`);
    parser = peggy.generate(readGrammar(name), { grammarSource: name });
    parsers.set(name, parser);
  }
  return parser;
}

function runParser<T>(grammar: string, schema: z.ZodType<T>, text: string, file: string, dialect: string): T {
  let output: unknown;
  try {
    output = getParser(grammar).parse(text, { grammarSource: file });
  } catch (error) {
    const syntax = PeggySyntaxErrorSchema.safeParse(error);
    if (!syntax.success) {
      throw error;
    }
    throw new DocumentParseError(syntax.data.message, {
      file,
      line: syntax.data.location.start.line,
      column: syntax.data.location.start.column,
      dialect,
      cause: error
    });
  }

  const result = schema.safeParse(output);
  if (!result.success) {
    throw new DocumentParseError(`Unexpected parser output: ${result.error.message}`, { file, dialect });
  }
  return result.data;
}

/** Parse a record database (.db, .template) or definition (.dbd) file. */
export function parseDatabase(text: string, file: string): DatabaseItem[] {
  return runParser('database.peggy', z.array(DatabaseItemSchema), text, file, 'database');
}

/** Parse a substitution file. */
export function parseSubstitution(text: string, file: string): SubstitutionItem[] {
  return runParser('substitution.peggy', z.array(SubstitutionItemSchema), text, file, 'substitution');
}

/**
 * Parse the relaxed JSON of info tags and JSON links, where keys and
 * simple values may be left unquoted (`{pva:{pv:"X", +channel:VAL}}`).
 */
export function parseJsonValue(text: string, file: string): JsonValue {
  return runParser('json.peggy', JsonValueSchema, text, file, 'json');
}

import { describe, it, expect } from 'vitest';
import { parseDatabase, parseJsonValue } from '@grammar/index';
import { DocumentParseError } from '@core/errors';

describe('Database grammar', () => {
  describe('Records', () => {
    it('should parse a record with fields, info tags and aliases', () => {
      const text = [
        '# Temperature readback',
        'record(ai, "$(P):TEMP") {',
        '  field(DESC, "Temperature")',
        '  field(INP, "$(P):RAW CP MS")',
        '  info(autosaveFields, "VAL")',
        '  alias("$(P):T")',
        '}'
      ].join('\n');

      expect(parseDatabase(text, 'temp.db')).toEqual([
        {
          kind: 'statement',
          keyword: 'record',
          args: ['ai', '$(P):TEMP'],
          unquoted: [0],
          line: 2,
          body: [
            { kind: 'statement', keyword: 'field', args: ['DESC', 'Temperature'], unquoted: [0], body: [], line: 3 },
            { kind: 'statement', keyword: 'field', args: ['INP', '$(P):RAW CP MS'], unquoted: [0], body: [], line: 4 },
            { kind: 'statement', keyword: 'info', args: ['autosaveFields', 'VAL'], unquoted: [0], body: [], line: 5 },
            { kind: 'statement', keyword: 'alias', args: ['$(P):T'], unquoted: [], body: [], line: 6 }
          ]
        }
      ]);
    });

    it('should accept unquoted values containing macros', () => {
      const [record] = parseDatabase('record(calc, $(P)$(R)Sum) { field(INP, $(A_$(B))) }', 'calc.db');

      expect(record).toMatchObject({ args: ['calc', '$(P)$(R)Sum'], unquoted: [0, 1] });
      if (record.kind === 'statement') {
        expect(record.body[0]).toMatchObject({ args: ['INP', '$(A_$(B))'], unquoted: [0, 1] });
      }
    });

    it('should keep JSON link values as raw text', () => {
      const [record] = parseDatabase('record(ai, "X") {\n  field(INP, {pva:{pv:"Y", proc:true}})\n}', 'json.db');

      if (record.kind === 'statement') {
        expect(record.body[0]).toMatchObject({ args: ['INP', '{pva:{pv:"Y", proc:true}}'], unquoted: [0] });
      }
      expect(record.kind).toBe('statement');
    });

    it('should parse includes, standalone aliases and empty records', () => {
      const text = 'include "common.db"\nrecord(bo, "A") {}\nalias("A", "B")\n';

      expect(parseDatabase(text, 'x.db')).toEqual([
        { kind: 'include', file: 'common.db', line: 1 },
        { kind: 'statement', keyword: 'record', args: ['bo', 'A'], unquoted: [0], body: [], line: 2 },
        { kind: 'statement', keyword: 'alias', args: ['A', 'B'], unquoted: [], body: [], line: 3 }
      ]);
    });

    it('should return no items for an empty document', () => {
      expect(parseDatabase('\n# only a comment\n', 'empty.db')).toEqual([]);
    });
  });

  describe('Definitions', () => {
    it('should parse record types with nested field attributes', () => {
      const text = [
        'menu(menuScan) {',
        '  choice(menuScanPassive, "Passive")',
        '}',
        'recordtype(ai) {',
        '  include "dbCommon.dbd"',
        '  %#include "epicsTypes.h"',
        '  field(INP, DBF_INLINK) {',
        '    prompt("Input Specification")',
        '    interest(1)',
        '  }',
        '}',
        'device(ai, CONSTANT, devAiSoft, "Soft Channel")'
      ].join('\n');

      const items = parseDatabase(text, 'base.dbd');

      expect(items.map(item => item.kind === 'statement' ? item.keyword : item.kind)).toEqual([
        'menu',
        'recordtype',
        'device'
      ]);
      const recordType = items[1];
      expect(recordType.kind === 'statement' && recordType.body).toEqual([
        { kind: 'include', file: 'dbCommon.dbd', line: 5 },
        { kind: 'cdef', text: '#include "epicsTypes.h"', line: 6 },
        {
          kind: 'statement',
          keyword: 'field',
          args: ['INP', 'DBF_INLINK'],
          unquoted: [0, 1],
          line: 7,
          body: [
            { kind: 'statement', keyword: 'prompt', args: ['Input Specification'], unquoted: [], body: [], line: 8 },
            { kind: 'statement', keyword: 'interest', args: ['1'], unquoted: [0], body: [], line: 9 }
          ]
        }
      ]);
      expect(items[2]).toMatchObject({ args: ['ai', 'CONSTANT', 'devAiSoft', 'Soft Channel'] });
    });

    it('should parse loose values in breakpoint tables', () => {
      const [table] = parseDatabase('breaktable(typeKdegF) {\n  0.0 0.0\n  299.2 1.5\n}', 'bpt.dbd');

      expect(table.kind === 'statement' && table.body.map(item => item.kind === 'value' ? item.value : '')).toEqual([
        '0.0',
        '0.0',
        '299.2',
        '1.5'
      ]);
    });
  });

  describe('Errors', () => {
    it('should report an unterminated record with its position', () => {
      try {
        parseDatabase('record(ai, "X") {\n  field(VAL, 1)\n', 'broken.db');
        expect.unreachable('parse should have failed');
      } catch (error) {
        expect(error).toBeInstanceOf(DocumentParseError);
        if (error instanceof DocumentParseError) {
          expect(error.documentLocation).toEqual({ file: 'broken.db', line: 3, column: 1 });
          expect(error.code).toBe('DOCUMENT_PARSE');
        }
      }
    });

    it('should reject an unterminated string', () => {
      expect(() => parseDatabase('record(ai, "X) {}', 'quote.db')).toThrow(DocumentParseError);
    });
  });

  describe('Relaxed JSON', () => {
    it('should accept bare keys and values', () => {
      const text = '{ "grp": { +id: "epics:nt/NTScalar:1.0", value: { +channel: VAL, +putorder: 0, +atomic: true }, } }';

      expect(parseJsonValue(text, 'x.db')).toEqual({
        grp: {
          '+id': 'epics:nt/NTScalar:1.0',
          value: { '+channel': 'VAL', '+putorder': 0, '+atomic': true }
        }
      });
    });

    it('should parse arrays, null and escaped quotes', () => {
      expect(parseJsonValue('[1, -2.5, null, "a \\"b\\""]', 'x.db')).toEqual([1, -2.5, null, 'a "b"']);
    });

    it('should report malformed values', () => {
      expect(() => parseJsonValue('{ a: ', 'x.db')).toThrow(DocumentParseError);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { parseSubstitution } from '@grammar/index';
import { DocumentParseError } from '@core/errors';

describe('Substitution grammar', () => {
  it('should parse pattern rows, definition rows and globals', () => {
    const text = [
      'global { P=IOC: }',
      'file "db/motor.db" {',
      '  pattern { M, DESC }',
      '  { m1, "First axis" }',
      '  { m2, "" }',
      '}',
      'file motor.db {',
      '  { M=m3, DESC="Third" }',
      '  global { Q = 1 }',
      '}'
    ].join('\n');

    expect(parseSubstitution(text, 'motors.substitutions')).toEqual([
      { kind: 'global', definitions: [{ name: 'P', value: 'IOC:' }], line: 1 },
      {
        kind: 'file',
        file: 'db/motor.db',
        line: 2,
        entries: [
          { kind: 'pattern', names: ['M', 'DESC'], line: 3 },
          { kind: 'values', values: ['m1', 'First axis'], line: 4 },
          { kind: 'values', values: ['m2', ''], line: 5 }
        ]
      },
      {
        kind: 'file',
        file: 'motor.db',
        line: 7,
        entries: [
          { kind: 'definitions', definitions: [{ name: 'M', value: 'm3' }, { name: 'DESC', value: 'Third' }], line: 8 },
          { kind: 'global', definitions: [{ name: 'Q', value: '1' }], line: 9 }
        ]
      }
    ]);
  });

  it('should accept whitespace separated values and empty definitions', () => {
    const [file] = parseSubstitution('file x.db {\n  pattern {A B}\n  {1 2}\n  {A=, B=$(X=1)}\n}', 'x.substitutions');

    expect(file.kind === 'file' && file.entries).toEqual([
      { kind: 'pattern', names: ['A', 'B'], line: 2 },
      { kind: 'values', values: ['1', '2'], line: 3 },
      { kind: 'definitions', definitions: [{ name: 'A', value: '' }, { name: 'B', value: '$(X=1)' }], line: 4 }
    ]);
  });

  it('should reject a file block without a body', () => {
    expect(() => parseSubstitution('file "x.db"\n', 'bad.substitutions')).toThrow(DocumentParseError);
  });
});

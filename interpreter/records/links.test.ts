import { describe, it, expect } from 'vitest';
import { isLinkField, parseLink } from './links';
import type { RecordTypeDefinition } from '@core/types';

describe('parseLink', () => {
  it('should split record, field and modifiers', () => {
    expect(parseLink('INP', 'IOC:A:RAW.RVAL CP MS')).toEqual({
      targetRecord: 'IOC:A:RAW',
      targetField: 'RVAL',
      modifiers: ['CP', 'MS']
    });
  });

  it('should default the target field', () => {
    expect(parseLink('INP', 'IOC:A:RAW')).toEqual({ targetRecord: 'IOC:A:RAW', targetField: 'VAL', modifiers: [] });
    expect(parseLink('FLNK', 'IOC:A:NEXT')).toEqual({ targetRecord: 'IOC:A:NEXT', targetField: 'PROC', modifiers: [] });
  });

  it('should drop unknown modifiers', () => {
    expect(parseLink('OUT', 'X.VAL PP LOUD')?.modifiers).toEqual(['PP']);
  });

  it('should reject values that are not record links', () => {
    for (const value of ['', '   ', '0', '1.5', '-3', '1e3', '@asyn(PORT,0)TEMP', '#C0 S1', '{const: 3}', '["a"]']) {
      expect(parseLink('INP', value)).toBeUndefined();
    }
  });
});

describe('isLinkField', () => {
  const ai: RecordTypeDefinition = {
    name: 'ai',
    definedAt: { file: 'ai.dbd', line: 1 },
    fields: {
      INP: { name: 'INP', type: 'DBF_INLINK', attributes: {} },
      DESC: { name: 'DESC', type: 'DBF_STRING', attributes: {} },
      OUT: { name: 'OUT', type: 'DBF_STRING', attributes: {} }
    }
  };

  it('should use field types from a loaded record type', () => {
    expect(isLinkField('INP', ai)).toBe(true);
    expect(isLinkField('OUT', ai)).toBe(false);
  });

  it('should fall back to the default table', () => {
    expect(isLinkField('FLNK', ai)).toBe(true);
    expect(isLinkField('INPL', undefined)).toBe(true);
    expect(isLinkField('DESC', undefined)).toBe(false);
  });

  it('should honor extra link fields', () => {
    expect(isLinkField('MYLINK', undefined, new Set(['MYLINK']))).toBe(true);
  });
});

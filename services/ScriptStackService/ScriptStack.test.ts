import { describe, it, expect, beforeEach } from 'vitest';
import { ScriptStack } from './ScriptStack';
import { CyclicInclusionError } from '@core/errors';
import { createLoadContext, createSourceLocation } from '@core/types';

describe('ScriptStack', () => {
  let stack: ScriptStack;

  beforeEach(() => {
    stack = new ScriptStack();
  });

  it('should detect a script sourcing itself', () => {
    stack.enter('a.cmd');

    expect(() => stack.enter('a.cmd')).toThrow(CyclicInclusionError);
  });

  it('should include the inclusion chain and the requesting line', () => {
    const site = {
      sourceLocation: createSourceLocation('b.cmd', 3, { P: 'X' }),
      context: [createLoadContext('a.cmd', 1), createLoadContext('b.cmd', 3)]
    };
    stack.enter('a.cmd');
    stack.enter('b.cmd');

    try {
      stack.enter('a.cmd', site);
      expect.unreachable('enter should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(CyclicInclusionError);
      if (error instanceof CyclicInclusionError) {
        expect(error.inclusionChain).toEqual(['a.cmd', 'b.cmd', 'a.cmd']);
        expect(error.code).toBe('CYCLIC_INCLUSION');
        expect(error.sourceLocation).toEqual({ file: 'b.cmd', line: 3, macros: { P: 'X' } });
        expect(error.context).toHaveLength(2);
      }
    }
  });

  it('should allow sourcing a script again after it finished', () => {
    stack.enter('a.cmd');
    stack.enter('b.cmd');
    stack.leave('b.cmd');

    expect(() => stack.enter('b.cmd')).not.toThrow();
  });

  it('should leave the chain unchanged after a cycle is rejected', () => {
    stack.enter('a.cmd');
    expect(() => stack.enter('a.cmd')).toThrow(CyclicInclusionError);
    stack.enter('b.cmd');

    try {
      stack.enter('b.cmd');
      expect.unreachable('enter should have thrown');
    } catch (error) {
      expect(error instanceof CyclicInclusionError && error.inclusionChain).toEqual(['a.cmd', 'b.cmd', 'b.cmd']);
    }
  });

  it('should ignore leaving a script that is not active', () => {
    stack.enter('a.cmd');
    stack.leave('z.cmd');

    expect(() => stack.enter('a.cmd')).toThrow(CyclicInclusionError);
  });
});

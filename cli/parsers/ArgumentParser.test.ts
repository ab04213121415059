import { describe, expect, it } from 'vitest';
import { ArgumentParser } from './ArgumentParser';
import { CLIUsageError } from '../error/CLIUsageError';

describe('ArgumentParser', () => {
  const parser = new ArgumentParser();

  it('parses a query command with scripts and traversal options', () => {
    const options = parser.parseArgs(['links', 'FOO', 'a/st.cmd', 'b/st.cmd', '--depth', '2', '--direction', 'in']);

    expect(options.command).toBe('links');
    expect(options.query).toBe('FOO');
    expect(options.scripts).toEqual(['a/st.cmd', 'b/st.cmd']);
    expect(options.depth).toBe(2);
    expect(options.direction).toBe('inbound');
  });

  it('merges repeated macro options, later values winning', () => {
    const options = parser.parseArgs(['parse', 'st.cmd', '-m', 'P=IOC:A:,R=M1', '--macros', 'R=M2']);

    expect(options.scripts).toEqual(['st.cmd']);
    expect(options.macros).toEqual({ P: 'IOC:A:', R: 'M2' });
  });

  it('accepts flags before the command', () => {
    const options = parser.parseArgs(['--json', '--config', '/work', 'search', 'IOC:*', '--limit', '5']);

    expect(options).toMatchObject({ command: 'search', query: 'IOC:*', json: true, projectPath: '/work', limit: 5 });
  });

  it('allows --help without a command', () => {
    expect(parser.parseArgs(['--help'])).toEqual({ scripts: [], macros: {}, help: true });
  });

  it('rejects unknown commands and options', () => {
    expect(() => parser.parseArgs(['frob'])).toThrow('Unknown command: frob');
    expect(() => parser.parseArgs(['parse', '--frob'])).toThrow(CLIUsageError);
  });

  it('rejects a query command without a query', () => {
    expect(() => parser.parseArgs(['search'])).toThrow('search requires a pattern');
    expect(() => parser.parseArgs(['info'])).toThrow('info requires a record name');
  });

  it('rejects bad option values', () => {
    expect(() => parser.parseArgs(['links', 'FOO', '--depth', 'x'])).toThrow('--depth must be a non-negative integer');
    expect(() => parser.parseArgs(['links', 'FOO', '--depth'])).toThrow('--depth requires a value');
    expect(() => parser.parseArgs(['links', 'FOO', '--direction', 'up'])).toThrow(
      "--direction must be one of outbound, inbound, both (got 'up')"
    );
  });
});

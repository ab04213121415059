import { describe, it, expect } from 'vitest';
import { main, type CommandOutput } from './index';
import { DEFAULT_CONFIG, type ResolvedConfig } from '@core/config/types';
import { MemoryFileSystem } from '@tests/utils/MemoryFileSystem';

const config: ResolvedConfig = {
  ...DEFAULT_CONFIG,
  macros: { ...DEFAULT_CONFIG.macros, warnUndefined: false }
};

const files = {
  '/iocs/a/st.cmd': [
    'epicsEnvSet("P","IOC:A:")',
    'dbLoadRecords("db/motor.db", "M=M1")',
    'asynSetOption("L0", 0, "baud", "9600")'
  ].join('\n'),
  '/iocs/a/db/motor.db': [
    'record(motor, "$(P)$(M)") {',
    '  field(DESC, "Axis $(M)")',
    '  field(FLNK, "IOC:B:DONE")',
    '  field(OUT, "IOC:A:NOWHERE")',
    '}'
  ].join('\n'),
  '/iocs/b/st.cmd': 'dbLoadRecords("done.db")\n',
  '/iocs/b/done.db': 'record(calc, "IOC:B:DONE") {}\n',
  '/iocs/c/st.cmd': 'dbLoadRecords("c.db")\n',
  '/iocs/c/c.db': 'record(ai, "IOC:C:X") {\n  field(VAL, 1)\n}\n',
  '/work/fleet.json': JSON.stringify([{ id: 'a', script: '../iocs/a/st.cmd' }])
};

async function run(args: string[]): Promise<{ code: number; out: string[]; err: string[] }> {
  const out: string[] = [];
  const err: string[] = [];
  const output: CommandOutput = {
    out: text => out.push(text),
    err: text => err.push(text)
  };
  const code = await main(args, { output, fileSystem: new MemoryFileSystem(files), config });
  return { code, out, err };
}

describe('recscope CLI', () => {
  it('should summarize parsed instances', async () => {
    const result = await run(['parse', '/iocs/a/st.cmd']);

    expect(result.code).toBe(0);
    expect(result.out).toEqual([
      '/iocs/a/st.cmd: /iocs/a/st.cmd',
      '  3 lines, 1 record, 1 unhandled command, 0 errors'
    ]);
  });

  it('should list lint messages under the summary', async () => {
    const result = await run(['parse', '/iocs/c/st.cmd']);

    expect(result.out).toEqual([
      '/iocs/c/st.cmd: /iocs/c/st.cmd',
      '  1 line, 1 record, 0 unhandled commands, 0 errors',
      "  warning unquoted_field /iocs/c/st.cmd:1 -> /iocs/c/c.db:2: Unquoted field value 'VAL'"
    ]);
  });

  it('should include lint in JSON output', async () => {
    const result = await run(['parse', '/iocs/c/st.cmd', '--json']);

    expect(JSON.parse(result.out.join('\n')).instances[0].lint).toEqual([
      {
        severity: 'warning',
        name: 'unquoted_field',
        message: "Unquoted field value 'VAL'",
        location: '/iocs/c/st.cmd:1 -> /iocs/c/c.db:2'
      }
    ]);
  });

  it('should report instances that fail to load', async () => {
    const result = await run(['parse', '/iocs/missing/st.cmd']);

    expect(result.code).toBe(1);
    expect(result.err).toEqual(['Failed /iocs/missing/st.cmd: File not found: /iocs/missing/st.cmd']);
  });

  it('should describe where a record came from', async () => {
    const result = await run(['info', 'IOC:A:M1', '/iocs/a/st.cmd']);

    expect(result.code).toBe(0);
    expect(result.out).toEqual([
      'IOC:A:M1 (motor) in /iocs/a/st.cmd',
      '  defined at /iocs/a/st.cmd:2 with macro state {P=IOC:A:, M=M1}',
      '  loaded via /iocs/a/st.cmd:2 -> /iocs/a/db/motor.db:1',
      '  field(DESC, "Axis M1") from "Axis $(M)"',
      '  field(FLNK, "IOC:B:DONE")',
      '  field(OUT, "IOC:A:NOWHERE")'
    ]);
  });

  it('should fail for an unknown record', async () => {
    const result = await run(['info', 'NOPE', '/iocs/a/st.cmd']);

    expect(result.code).toBe(1);
    expect(result.err).toEqual(['No record named NOPE']);
  });

  it('should follow links across instances', async () => {
    const result = await run(['links', 'IOC:A:M1', '/iocs/a/st.cmd', '/iocs/b/st.cmd']);

    expect(result.code).toBe(0);
    expect(result.out).toEqual([
      'IOC:A:M1',
      '  IOC:B:DONE (calc, /iocs/b/st.cmd) via IOC:A:M1.FLNK',
      '  IOC:A:M1.OUT -> IOC:A:NOWHERE.VAL (unresolved)'
    ]);
  });

  it('should search by prefix', async () => {
    const result = await run(['search', 'IOC:', '/iocs/a/st.cmd', '/iocs/b/st.cmd']);

    expect(result.out).toEqual([
      'IOC:A:M1 (motor, /iocs/a/st.cmd)',
      'IOC:B:DONE (calc, /iocs/b/st.cmd)'
    ]);
  });

  it('should print search results as JSON', async () => {
    const result = await run(['search', '*:DONE', '/iocs/b/st.cmd', '--json']);

    expect(JSON.parse(result.out.join('\n'))).toEqual([
      { instanceId: '/iocs/b/st.cmd', name: 'IOC:B:DONE', recordType: 'calc' }
    ]);
  });

  it('should read instances from a file', async () => {
    const result = await run(['search', 'IOC:A:', '--instances', '/work/fleet.json']);

    expect(result.out).toEqual(['IOC:A:M1 (motor, a)']);
  });

  it('should report usage errors', async () => {
    const result = await run(['frob']);

    expect(result.code).toBe(1);
    expect(result.err).toEqual(['CLIUsageError: Unknown command: frob']);
  });

  it('should print the version', async () => {
    const result = await run(['--version']);

    expect(result.code).toBe(0);
    expect(result.out).toEqual(['recscope version 0.1.0']);
  });

  it('should print help without a command', async () => {
    const result = await run([]);

    expect(result.code).toBe(1);
    expect(result.out[0]).toContain('Usage: recscope <command> [arguments] [options]');
  });
});

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  DuplicateRecordError,
  ScriptNotFoundError,
  loadInstance,
  loadStartupScripts,
  type ResolvedConfig
} from '@api/index';
import { MemoryFileSystem } from '@tests/utils/MemoryFileSystem';

const config: ResolvedConfig = {
  ...DEFAULT_CONFIG,
  macros: { ...DEFAULT_CONFIG.macros, warnUndefined: false }
};

const fleet = {
  '/iocs/x/st.cmd': 'epicsEnvSet("P","X:")\ndbLoadRecords("db/foo.db", "NAME=FOO")\n',
  '/iocs/x/db/foo.db': 'record(ai, "$(P)$(NAME)") {\n  field(INP, "BAR:baz CP")\n}\n',
  '/iocs/y/st.cmd': 'dbLoadRecords("bar.db")\nasynSetOption("L0", 0, "baud", "9600")\n',
  '/iocs/y/bar.db': 'record(ao, "BAR:baz") {}\n',
  '/iocs/d/st.cmd': 'dbLoadRecords("a.db")\ndbLoadRecords("a.db")\n',
  '/iocs/d/a.db': 'record(ai, "DUP") {}\n'
};

describe('recscope API', () => {
  describe('loadInstance', () => {
    it('should assemble records, unhandled commands and loaded files', async () => {
      const instance = await loadInstance({ id: 'y', script: '/iocs/y/st.cmd' }, {
        fileSystem: new MemoryFileSystem(fleet),
        config
      });

      expect(instance.scriptPath).toBe('/iocs/y/st.cmd');
      expect(instance.workingDirectory).toBe('/iocs/y');
      expect([...instance.records.keys()]).toEqual(['BAR:baz']);
      expect(instance.unhandled.map(entry => entry.command.name)).toEqual(['asynSetOption']);
      expect(instance.loadedFiles.map(file => file.path)).toEqual(['/iocs/y/st.cmd', '/iocs/y/bar.db']);
      expect(Object.isFrozen(instance)).toBe(true);
    });

    it('should define descriptor macros before the first line', async () => {
      const instance = await loadInstance({
        id: 'm',
        script: '/iocs/m/st.cmd',
        macros: { P: 'M:' }
      }, {
        fileSystem: new MemoryFileSystem({
          '/iocs/m/st.cmd': 'dbLoadRecords("m.db")\n',
          '/iocs/m/m.db': 'record(bo, "$(P)ENABLE") {}\n'
        }),
        config
      });

      expect(instance.records.get('M:ENABLE')?.location.macros).toEqual({ P: 'M:' });
    });

    it('should start in the given directory', async () => {
      const instance = await loadInstance({
        id: 's',
        script: '/iocs/s/boot/st.cmd',
        startupDirectory: '/iocs/s'
      }, {
        fileSystem: new MemoryFileSystem({
          '/iocs/s/boot/st.cmd': 'dbLoadRecords("db/s.db")\n',
          '/iocs/s/db/s.db': 'record(ai, "S") {}\n'
        }),
        config
      });

      expect(instance.workingDirectory).toBe('/iocs/s');
      expect(instance.records.has('S')).toBe(true);
    });

    it('should fail on duplicate record names', async () => {
      await expect(
        loadInstance({ id: 'd', script: '/iocs/d/st.cmd' }, { fileSystem: new MemoryFileSystem(fleet), config })
      ).rejects.toBeInstanceOf(DuplicateRecordError);
    });
  });

  describe('loadStartupScripts', () => {
    it('should resolve links between instances', async () => {
      const result = await loadStartupScripts([
        { id: 'x', script: '/iocs/x/st.cmd' },
        { id: 'y', script: '/iocs/y/st.cmd' }
      ], { fileSystem: new MemoryFileSystem(fleet), config });

      expect(result.instances.map(instance => instance.id)).toEqual(['x', 'y']);
      expect(result.failures).toEqual([]);
      expect(result.resolution).toEqual({ examined: 1, resolved: 1, unresolved: 0, ambiguous: 0 });

      const steps = result.graph.traverse('X:FOO', { depth: 1 });
      expect(steps.map(step => [step.record.instanceId, step.record.name])).toEqual([['y', 'BAR:baz']]);
      expect(steps[0].via.target.modifiers).toEqual(['CP']);
    });

    it('should report failed instances and load the rest', async () => {
      const result = await loadStartupScripts([
        { id: 'd', script: '/iocs/d/st.cmd' },
        { id: 'z', script: '/iocs/z/st.cmd' },
        { id: 'y', script: '/iocs/y/st.cmd' }
      ], { fileSystem: new MemoryFileSystem(fleet), config, concurrency: 1 });

      expect(result.instances.map(instance => instance.id)).toEqual(['y']);
      expect(result.failures.map(failure => failure.id)).toEqual(['d', 'z']);
      expect(result.failures[0].error).toBeInstanceOf(DuplicateRecordError);
      expect(result.failures[1].error).toBeInstanceOf(ScriptNotFoundError);
      expect(result.graph.instanceIds).toEqual(['y']);
    });

    it('should report an instance id loaded twice as a failure', async () => {
      const result = await loadStartupScripts([
        { id: 'y', script: '/iocs/y/st.cmd' },
        { id: 'y', script: '/iocs/y/st.cmd' }
      ], { fileSystem: new MemoryFileSystem(fleet), config, concurrency: 1 });

      expect(result.instances).toHaveLength(1);
      expect(result.failures[0].error.message).toBe("Instance 'y' is already in the graph");
    });

    it('should not start instances once aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await loadStartupScripts([
        { id: 'x', script: '/iocs/x/st.cmd' },
        { id: 'y', script: '/iocs/y/st.cmd' }
      ], { fileSystem: new MemoryFileSystem(fleet), config, signal: controller.signal });

      expect(result.instances).toEqual([]);
      expect(result.skipped).toEqual(['x', 'y']);
    });
  });
});

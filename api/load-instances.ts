/**
 * Interpret startup scripts and collect their records into one graph.
 */
import type { InstanceDescriptor, LoadedInstance } from '@core/types';
import { DEFAULT_CONFIG, type ResolvedConfig } from '@core/config/types';
import { loaderLogger as logger } from '@core/utils/logger';
import { MacroContext } from '@services/MacroService/MacroContext';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { ShellInterpreter } from '@interpreter/shell/ShellInterpreter';
import type { IShellObserver } from '@interpreter/shell/types';
import { RecordModelBuilder } from '@interpreter/records/RecordModelBuilder';
import { runWithConcurrency } from '@interpreter/utils/parallel';
import { CrossReferenceGraph } from '@graph/CrossReferenceGraph';
import type { LinkResolutionSummary } from '@graph/types';

export interface LoadInstanceOptions {
  /** Defaults to the real file system */
  fileSystem?: IFileSystemService;
  /** Defaults to DEFAULT_CONFIG */
  config?: ResolvedConfig;
  /** Observers notified of every command besides the record builder */
  observers?: readonly IShellObserver[];
}

export interface LoadStartupScriptsOptions extends LoadInstanceOptions {
  /** Instances interpreted at once; defaults to `config.loader.concurrency` */
  concurrency?: number;
  /** Stops starting new instances; scripts already running finish */
  signal?: AbortSignal;
  /** Add to an existing graph instead of a new one */
  graph?: CrossReferenceGraph;
}

export interface InstanceFailure {
  readonly id: string;
  readonly script: string;
  readonly error: Error;
}

export interface FleetLoadResult {
  readonly graph: CrossReferenceGraph;
  readonly instances: readonly LoadedInstance[];
  readonly failures: readonly InstanceFailure[];
  /** Ids of instances not started because the signal was aborted */
  readonly skipped: readonly string[];
  readonly resolution: LinkResolutionSummary;
}

/**
 * Interpret one startup script and assemble its records.
 *
 * @throws {ScriptSyntaxError | CyclicInclusionError} When the script cannot be interpreted to the end
 * @throws {DuplicateRecordError} When two loads produced the same record name
 */
export async function loadInstance(
  descriptor: InstanceDescriptor,
  options: LoadInstanceOptions = {}
): Promise<LoadedInstance> {
  const config = options.config ?? DEFAULT_CONFIG;
  const macros = new MacroContext(config.macros);
  if (descriptor.macros) {
    macros.define(descriptor.macros);
  }

  const builder = new RecordModelBuilder({
    instanceId: descriptor.id,
    extraLinkFields: config.links.extraLinkFields,
    requireDefinitions: config.loader.requireDefinitions
  });
  const interpreter = new ShellInterpreter({
    instanceId: descriptor.id,
    fileSystem: options.fileSystem ?? new NodeFileSystem(),
    macros,
    workingDirectory: descriptor.startupDirectory,
    standinDirectories: { ...config.shell.standinDirectories, ...descriptor.standinDirectories },
    observers: [builder, ...(options.observers ?? [])]
  });

  const run = await interpreter.run(descriptor.script);
  const model = builder.finish();

  return Object.freeze({
    id: descriptor.id,
    scriptPath: run.scriptPath,
    workingDirectory: run.workingDirectory,
    lines: run.lines,
    macros: run.macros,
    variables: run.variables,
    records: model.records,
    recordTypes: model.recordTypes,
    pvaGroups: model.pvaGroups,
    lint: model.lint,
    loadedFiles: run.loadedFiles,
    unhandled: run.unhandled,
    errors: run.errors
  });
}

type InstanceOutcome =
  | { kind: 'loaded'; instance: LoadedInstance }
  | { kind: 'failed'; failure: InstanceFailure };

/**
 * Interpret many startup scripts concurrently. Each instance is added to the
 * graph as soon as it is assembled; links are resolved once at the end. A
 * failing instance is reported in `failures` and does not stop the others.
 */
export async function loadStartupScripts(
  descriptors: readonly InstanceDescriptor[],
  options: LoadStartupScriptsOptions = {}
): Promise<FleetLoadResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const graph = options.graph ?? new CrossReferenceGraph();
  const concurrency = options.concurrency ?? config.loader.concurrency;
  logger.info(`Loading ${descriptors.length} instances`, { concurrency });

  const outcomes = await runWithConcurrency(
    descriptors,
    concurrency,
    async (descriptor): Promise<InstanceOutcome> => {
      try {
        const instance = await loadInstance(descriptor, options);
        graph.addInstance(instance);
        logger.info(`Loaded ${descriptor.id}`, {
          records: instance.records.size,
          errors: instance.errors.length
        });
        return { kind: 'loaded', instance };
      } catch (error) {
        const failure: InstanceFailure = {
          id: descriptor.id,
          script: descriptor.script,
          error: error instanceof Error ? error : new Error(String(error))
        };
        logger.error(`Failed to load ${descriptor.id}: ${failure.error.message}`);
        return { kind: 'failed', failure };
      }
    },
    { signal: options.signal }
  );

  const instances: LoadedInstance[] = [];
  const failures: InstanceFailure[] = [];
  const skipped: string[] = [];
  outcomes.forEach((outcome, index) => {
    if (!outcome) {
      skipped.push(descriptors[index].id);
    } else if (outcome.kind === 'loaded') {
      instances.push(outcome.instance);
    } else {
      failures.push(outcome.failure);
    }
  });

  const resolution = graph.resolveLinks();
  return { graph, instances, failures, skipped, resolution };
}

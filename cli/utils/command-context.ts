/**
 * Shared setup for the commands: configuration, instance descriptors and
 * the loaded fleet.
 */
import * as path from 'path';
import { z } from 'zod';
import type { InstanceDescriptor } from '@core/types';
import type { ResolvedConfig } from '@core/config/types';
import { ConfigLoader } from '@core/config/loader';
import { ConfigError } from '@core/errors';
import { cliLogger as logger } from '@core/utils/logger';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { loadStartupScripts, type FleetLoadResult } from '@api/load-instances';
import type { CLIOptions } from '../parsers/ArgumentParser';
import { CLIUsageError } from '../error/CLIUsageError';
import { OutputFormatter, type CommandOutput } from './output';

export interface CommandContext {
  options: CLIOptions;
  output: CommandOutput;
  fileSystem: IFileSystemService;
  /** Skips reading configuration files when given */
  config?: ResolvedConfig;
}

const InstancesFileSchema = z.array(z.object({
  id: z.string().min(1),
  script: z.string().min(1),
  startupDirectory: z.string().optional(),
  macros: z.record(z.string()).optional(),
  standinDirectories: z.record(z.string()).optional()
}));

export function resolveConfig(context: CommandContext): ResolvedConfig {
  const config = context.config ?? new ConfigLoader(context.options.projectPath).resolve();
  if (!context.options.strict) {
    return config;
  }
  return { ...config, macros: { ...config.macros, strict: true } };
}

/**
 * Descriptors from `--instances` followed by one per script argument. A
 * script argument is its own instance id.
 */
export async function collectDescriptors(context: CommandContext): Promise<InstanceDescriptor[]> {
  const { options } = context;
  const descriptors: InstanceDescriptor[] = [];

  if (options.instancesFile) {
    const file = path.resolve(options.instancesFile);
    let content: unknown;
    try {
      content = JSON.parse(await context.fileSystem.readFile(file));
    } catch (error) {
      throw new ConfigError(`Failed to read instances from ${file}`, { filePath: file, cause: error });
    }
    const parsed = InstancesFileSchema.safeParse(content);
    if (!parsed.success) {
      throw new ConfigError(`Invalid instances file ${file}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`, {
        filePath: file
      });
    }
    const base = path.dirname(file);
    for (const entry of parsed.data) {
      descriptors.push({
        ...entry,
        script: path.resolve(base, entry.script),
        startupDirectory: entry.startupDirectory ? path.resolve(base, entry.startupDirectory) : undefined
      });
    }
  }

  for (const script of options.scripts) {
    descriptors.push({
      id: script,
      script,
      startupDirectory: options.startupDirectory,
      macros: options.macros
    });
  }

  if (descriptors.length === 0) {
    throw new CLIUsageError('No startup scripts given');
  }
  return descriptors;
}

/**
 * Load every instance named on the command line. Failed instances are
 * reported on stderr; the rest are returned in the graph.
 */
export async function loadFleet(context: CommandContext): Promise<FleetLoadResult> {
  const config = resolveConfig(context);
  const descriptors = await collectDescriptors(context);
  logger.debug('Loading fleet', { instances: descriptors.map(descriptor => descriptor.id) });

  const result = await loadStartupScripts(descriptors, { config, fileSystem: context.fileSystem });
  for (const failure of result.failures) {
    context.output.err(OutputFormatter.formatFailure(failure));
  }
  return result;
}

export function createCommandContext(
  options: CLIOptions,
  output: CommandOutput,
  overrides: { fileSystem?: IFileSystemService; config?: ResolvedConfig } = {}
): CommandContext {
  return {
    options,
    output,
    fileSystem: overrides.fileSystem ?? new NodeFileSystem(),
    config: overrides.config
  };
}

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '@core/errors';
import { configLogger as logger } from '@core/utils/logger';
import { DEFAULT_CONFIG, RecscopeConfigSchema } from './types';
import type { RecscopeConfig, ResolvedConfig } from './types';

export const PROJECT_CONFIG_FILE = 'recscope.config.json';

export interface ConfigLoaderOptions {
  /** Override of ~/.config/recscope.json, mainly for tests */
  globalConfigPath?: string;
  /** Environment used for RECSCOPE_PARALLEL_LIMIT; defaults to process.env */
  environment?: Readonly<Record<string, string | undefined>>;
}

/**
 * Load recscope configuration from both global and project locations
 */
export class ConfigLoader {
  private readonly globalConfigPath: string;
  private readonly projectConfigPath: string;
  private readonly environment: Readonly<Record<string, string | undefined>>;
  private cachedConfig?: RecscopeConfig;

  constructor(projectPath?: string, options: ConfigLoaderOptions = {}) {
    // Global config location: ~/.config/recscope.json
    this.globalConfigPath = options.globalConfigPath
      ?? path.join(os.homedir(), '.config', 'recscope.json');

    // Project config location: <project>/recscope.config.json
    this.projectConfigPath = path.join(projectPath ?? process.cwd(), PROJECT_CONFIG_FILE);
    this.environment = options.environment ?? process.env;
  }

  /**
   * Load and merge configurations
   */
  load(): RecscopeConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Merge configs (project overrides global)
    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  /**
   * Load, merge and fill in defaults
   */
  resolve(): ResolvedConfig {
    return this.resolveConfig(this.load());
  }

  /**
   * Load a single config file; a missing file is an empty config
   */
  private loadConfigFile(filePath: string): RecscopeConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let content: unknown;
    try {
      content = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Failed to read config from ${filePath}`, { filePath, cause: error });
    }

    const parsed = RecscopeConfigSchema.safeParse(content);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config in ${filePath}: ${issues}`, { filePath });
    }

    logger.debug('Loaded config file', { filePath });
    return parsed.data;
  }

  /**
   * Merge two config objects: scalars from the project win, lists are
   * concatenated, directory maps are merged key by key.
   */
  mergeConfigs(global: RecscopeConfig, project: RecscopeConfig): RecscopeConfig {
    const merged: RecscopeConfig = {};

    if (global.macros || project.macros) {
      const skip = [
        ...(global.macros?.environmentSkipPatterns ?? []),
        ...(project.macros?.environmentSkipPatterns ?? [])
      ];
      merged.macros = {
        ...global.macros,
        ...project.macros,
        ...(skip.length > 0 ? { environmentSkipPatterns: skip } : {})
      };
    }

    if (global.shell || project.shell) {
      merged.shell = {
        standinDirectories: {
          ...(global.shell?.standinDirectories ?? {}),
          ...(project.shell?.standinDirectories ?? {})
        }
      };
    }

    if (global.loader || project.loader) {
      merged.loader = { ...global.loader, ...project.loader };
    }

    if (global.links || project.links) {
      merged.links = {
        extraLinkFields: [
          ...(global.links?.extraLinkFields ?? []),
          ...(project.links?.extraLinkFields ?? [])
        ]
      };
    }

    return merged;
  }

  /**
   * Resolve configuration to runtime values
   */
  resolveConfig(config: RecscopeConfig): ResolvedConfig {
    const defaults = DEFAULT_CONFIG;
    return {
      macros: {
        strict: config.macros?.strict ?? defaults.macros.strict,
        warnUndefined: config.macros?.warnUndefined ?? defaults.macros.warnUndefined,
        bareNames: config.macros?.bareNames ?? defaults.macros.bareNames,
        useEnvironment: config.macros?.useEnvironment ?? defaults.macros.useEnvironment,
        environmentSkipPatterns: [
          ...defaults.macros.environmentSkipPatterns,
          ...(config.macros?.environmentSkipPatterns ?? [])
        ],
        maxValueLength: config.macros?.maxValueLength ?? defaults.macros.maxValueLength
      },
      shell: {
        standinDirectories: { ...(config.shell?.standinDirectories ?? {}) }
      },
      loader: {
        concurrency: this.parallelLimitOverride() ?? config.loader?.concurrency ?? defaults.loader.concurrency,
        requireDefinitions: config.loader?.requireDefinitions ?? defaults.loader.requireDefinitions
      },
      links: {
        extraLinkFields: [...(config.links?.extraLinkFields ?? [])]
      }
    };
  }

  private parallelLimitOverride(): number | undefined {
    const raw = this.environment.RECSCOPE_PARALLEL_LIMIT;
    const n = raw !== undefined ? parseInt(raw, 10) : NaN;
    return Number.isFinite(n) && n >= 1 ? n : undefined;
  }
}

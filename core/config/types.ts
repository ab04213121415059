import { z } from 'zod';

/**
 * Configuration schema for recscope.
 *
 * Read from `~/.config/recscope.json` and `<project>/recscope.config.json`;
 * every key is optional and falls back to DEFAULT_CONFIG.
 */
export const MacroConfigSchema = z.object({
  /** Throw on undefined macro references instead of passing them through */
  strict: z.boolean().optional(),
  /** Log a warning per undefined reference */
  warnUndefined: z.boolean().optional(),
  /** Recognize the bare `$NAME` form */
  bareNames: z.boolean().optional(),
  /** Seed the root scope from the process environment */
  useEnvironment: z.boolean().optional(),
  environmentSkipPatterns: z.array(z.string()).optional(),
  maxValueLength: z.number().int().min(1).optional()
});

export const ShellConfigSchema = z.object({
  /** Absolute path prefix rewrites applied to every file a script names */
  standinDirectories: z.record(z.string()).optional()
});

export const LoaderConfigSchema = z.object({
  /** Number of instances interpreted at once */
  concurrency: z.number().int().min(1).optional(),
  /** Refuse record loads until a definition (dbd) file has been loaded */
  requireDefinitions: z.boolean().optional()
});

export const LinksConfigSchema = z.object({
  /** Field names treated as links when no definition file was loaded */
  extraLinkFields: z.array(z.string()).optional()
});

export const RecscopeConfigSchema = z.object({
  macros: MacroConfigSchema.optional(),
  shell: ShellConfigSchema.optional(),
  loader: LoaderConfigSchema.optional(),
  links: LinksConfigSchema.optional()
});

export type RecscopeConfig = z.infer<typeof RecscopeConfigSchema>;

// Runtime configuration after parsing and merging
export interface ResolvedConfig {
  macros: {
    strict: boolean;
    warnUndefined: boolean;
    bareNames: boolean;
    useEnvironment: boolean;
    environmentSkipPatterns: string[];
    maxValueLength: number;
  };
  shell: {
    standinDirectories: Record<string, string>;
  };
  loader: {
    concurrency: number;
    requireDefinitions: boolean;
  };
  links: {
    extraLinkFields: string[];
  };
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  macros: {
    strict: false,
    warnUndefined: true,
    bareNames: true,
    useEnvironment: false,
    environmentSkipPatterns: ['*TOKEN*', '*SECRET*', '*PASSWORD*'],
    maxValueLength: 1024
  },
  shell: {
    standinDirectories: {}
  },
  loader: {
    concurrency: 4,
    requireDefinitions: false
  },
  links: {
    extraLinkFields: []
  }
};

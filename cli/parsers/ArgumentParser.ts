import type { TraverseDirection } from '@graph/types';
import { parseMacroDefinitions } from '@services/MacroService/parseMacroDefinitions';
import { CLIUsageError } from '../error/CLIUsageError';

export const COMMANDS = ['parse', 'info', 'links', 'search'] as const;
export type CommandName = (typeof COMMANDS)[number];

// Commands whose first positional argument is a record name or pattern
const QUERY_COMMANDS: ReadonlySet<CommandName> = new Set(['info', 'links', 'search']);

const DIRECTIONS: ReadonlyMap<string, TraverseDirection> = new Map<string, TraverseDirection>([
  ['out', 'outbound'],
  ['outbound', 'outbound'],
  ['in', 'inbound'],
  ['inbound', 'inbound'],
  ['both', 'both']
]);

export interface CLIOptions {
  command?: CommandName;
  /** Record name (info, links) or search pattern */
  query?: string;
  scripts: string[];
  /** JSON list of instance descriptors */
  instancesFile?: string;
  /** Macros defined before each script runs */
  macros: Record<string, string>;
  startupDirectory?: string;
  /** Directory holding recscope.config.json */
  projectPath?: string;
  json?: boolean;
  depth?: number;
  direction?: TraverseDirection;
  limit?: number;
  strict?: boolean;
  verbose?: boolean;
  debug?: boolean;
  help?: boolean;
  version?: boolean;
}

function isCommand(value: string): value is CommandName {
  return COMMANDS.some(command => command === value);
}

export class ArgumentParser {
  parseArgs(args: readonly string[]): CLIOptions {
    const options: CLIOptions = { scripts: [], macros: {} };
    const positionals: string[] = [];

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      const value = (): string => {
        const next = args[i + 1];
        if (next === undefined) {
          throw new CLIUsageError(`${arg} requires a value`);
        }
        i++;
        return next;
      };

      switch (arg) {
        case '--help':
        case '-h':
          options.help = true;
          break;
        case '--version':
        case '-V':
          options.version = true;
          break;
        case '--verbose':
        case '-v':
          options.verbose = true;
          break;
        case '--debug':
        case '-d':
          options.debug = true;
          break;
        case '--json':
          options.json = true;
          break;
        case '--strict':
          options.strict = true;
          break;
        case '--macros':
        case '-m':
          options.macros = { ...options.macros, ...parseMacroDefinitions(value()) };
          break;
        case '--cd':
          options.startupDirectory = value();
          break;
        case '--instances':
          options.instancesFile = value();
          break;
        case '--config':
          options.projectPath = value();
          break;
        case '--depth':
          options.depth = this.parseCount(arg, value());
          break;
        case '--limit':
          options.limit = this.parseCount(arg, value());
          break;
        case '--direction': {
          const raw = value();
          const direction = DIRECTIONS.get(raw);
          if (!direction) {
            throw new CLIUsageError(`--direction must be one of outbound, inbound, both (got '${raw}')`);
          }
          options.direction = direction;
          break;
        }
        default:
          if (arg.startsWith('-') && arg !== '-') {
            throw new CLIUsageError(`Unknown option: ${arg}`);
          }
          positionals.push(arg);
      }
    }

    const [command, ...rest] = positionals;
    if (command === undefined) {
      return options;
    }
    if (!isCommand(command)) {
      throw new CLIUsageError(`Unknown command: ${command}`);
    }
    options.command = command;

    if (QUERY_COMMANDS.has(command)) {
      const [query, ...scripts] = rest;
      if (query === undefined && !options.help) {
        throw new CLIUsageError(`${command} requires a ${command === 'search' ? 'pattern' : 'record name'}`);
      }
      options.query = query;
      options.scripts = scripts;
    } else {
      options.scripts = rest;
    }

    return options;
  }

  private parseCount(flag: string, raw: string): number {
    const n = Number(raw);
    if (!Number.isInteger(n) || n < 0) {
      throw new CLIUsageError(`${flag} must be a non-negative integer`);
    }
    return n;
  }
}

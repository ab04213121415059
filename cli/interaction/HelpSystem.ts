import chalk from 'chalk';
import type { CommandName } from '../parsers/ArgumentParser';

const COMMAND_HELP: Record<CommandName, string> = {
  parse: `Usage: recscope parse <st.cmd...> [options]

Interpret startup scripts and summarize each instance: lines run, records
loaded, commands the interpreter did not handle, and errors.`,
  info: `Usage: recscope info <record> <st.cmd...> [options]

Show where a record was defined: the load command, the macro state at that
line, the chain of files leading to it, and its fields.`,
  links: `Usage: recscope links <record> <st.cmd...> [options]

Follow the links of a record across every instance.

Options:
  --depth <n>          Link hops to follow (default 1)
  --direction <dir>    outbound, inbound or both (default outbound)`,
  search: `Usage: recscope search <pattern> <st.cmd...> [options]

List records whose name or alias matches a glob, or starts with the
pattern when it has no glob characters.

Options:
  --limit <n>          Stop after n matches`
};

const COMMON_OPTIONS = `Options:
  -m, --macros <A=1,B=2>   Macros defined before each script runs
  --cd <dir>               Startup directory (default: the script's directory)
  --instances <file>       JSON list of { id, script, startupDirectory?, macros? }
  --config <dir>           Directory holding recscope.config.json
  --strict                 Fail on undefined macros
  --json                   Print JSON
  -v, --verbose            More detail, including link warnings
  -d, --debug              Debug logging
  -V, --version            Print the version
  -h, --help               Show help`;

export class HelpSystem {
  getHelp(command?: CommandName): string {
    if (command) {
      return `${COMMAND_HELP[command]}\n\n${COMMON_OPTIONS}`;
    }

    return `${chalk.bold('recscope')} - record provenance for control-system startup scripts

Usage: recscope <command> [arguments] [options]

Commands:
  parse <st.cmd...>              Interpret scripts and summarize instances
  info <record> <st.cmd...>      Where a record was defined
  links <record> <st.cmd...>     Follow a record's links
  search <pattern> <st.cmd...>   Find records by glob or prefix

${COMMON_OPTIONS}`;
  }
}

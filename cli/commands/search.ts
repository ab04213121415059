import chalk from 'chalk';
import { loadFleet, type CommandContext } from '../utils/command-context';
import { OutputFormatter } from '../utils/output';

/**
 * recscope search <pattern> <st.cmd...> [--limit N]
 *
 * A pattern with glob characters is matched as a glob, anything else as a
 * name prefix.
 */
export async function searchCommand(context: CommandContext): Promise<number> {
  const { options, output } = context;
  const { graph } = await loadFleet(context);
  const matches = graph.search(options.query ?? '', { limit: options.limit });

  if (options.json) {
    output.out(JSON.stringify(matches.map(record => ({
      instanceId: record.instanceId,
      name: record.name,
      recordType: record.recordType
    })), null, 2));
    return 0;
  }

  if (matches.length === 0) {
    output.out(chalk.gray('No matching records'));
    return 0;
  }
  for (const record of matches) {
    output.out(OutputFormatter.formatRecordLine(record));
  }
  return 0;
}

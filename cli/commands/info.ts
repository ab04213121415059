import chalk from 'chalk';
import { loadFleet, type CommandContext } from '../utils/command-context';
import { OutputFormatter } from '../utils/output';

/**
 * recscope info <record> <st.cmd...>
 *
 * Where a record came from: every instance defining it, the load line and
 * macro state, and its fields.
 */
export async function infoCommand(context: CommandContext): Promise<number> {
  const { options, output } = context;
  const name = options.query ?? '';
  const { graph } = await loadFleet(context);
  const descriptions = graph.describe(name);

  if (descriptions.length === 0) {
    output.err(chalk.yellow(`No record named ${name}`));
    return 1;
  }

  if (options.json) {
    output.out(JSON.stringify(descriptions, null, 2));
    return 0;
  }

  descriptions.forEach((description, index) => {
    if (index > 0) {
      output.out('');
    }
    OutputFormatter.formatDescription(description).forEach(line => output.out(line));
  });
  return 0;
}

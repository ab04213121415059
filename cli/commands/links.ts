import chalk from 'chalk';
import { loadFleet, type CommandContext } from '../utils/command-context';
import { OutputFormatter } from '../utils/output';

/**
 * recscope links <record> <st.cmd...> [--depth N] [--direction outbound|inbound|both]
 *
 * Records reachable over resolved links, one per line, indented by depth.
 * Links of the record itself that point nowhere are listed after them.
 */
export async function linksCommand(context: CommandContext): Promise<number> {
  const { options, output } = context;
  const name = options.query ?? '';
  const { graph } = await loadFleet(context);

  if (graph.getRecord(name).length === 0) {
    output.err(chalk.yellow(`No record named ${name}`));
    return 1;
  }

  const direction = options.direction ?? 'outbound';
  const steps = graph.traverse(name, { direction, depth: options.depth ?? 1 });
  const unresolved = direction === 'inbound'
    ? []
    : graph.getLinks(name).outbound.filter(link => link.status === 'unresolved');

  if (options.json) {
    output.out(JSON.stringify({
      record: name,
      steps: steps.map(step => ({
        depth: step.depth,
        instanceId: step.record.instanceId,
        record: step.record.name,
        via: step.via.source
      })),
      unresolved: unresolved.map(link => ({ field: link.source.field, target: link.target }))
    }, null, 2));
    return 0;
  }

  output.out(chalk.bold(name));
  for (const step of steps) {
    output.out(OutputFormatter.formatTraversalStep(step));
  }
  for (const link of unresolved) {
    output.out(`  ${OutputFormatter.formatLink(link)}`);
  }
  return 0;
}

import type { LoadedInstance } from '@core/types';
import { formatLoadContext, formatLocation } from '@core/utils/locationFormatter';
import { loadFleet, type CommandContext } from '../utils/command-context';
import { OutputFormatter } from '../utils/output';

function toJSON(instance: LoadedInstance) {
  return {
    id: instance.id,
    scriptPath: instance.scriptPath,
    workingDirectory: instance.workingDirectory,
    macros: instance.macros,
    records: [...instance.records.keys()],
    pvaGroups: [...instance.pvaGroups.keys()],
    loadedFiles: instance.loadedFiles.map(file => file.path),
    unhandled: instance.unhandled.map(entry => ({
      command: entry.command.name,
      args: entry.command.args,
      location: formatLocation(entry.location).display
    })),
    errors: instance.errors.map(error => ({
      code: error.code,
      message: error.message,
      location: formatLocation(error.location).display
    })),
    lint: instance.lint.map(message => ({
      severity: message.severity,
      name: message.name,
      message: message.message,
      location: formatLoadContext(message.context)
    }))
  };
}

/**
 * recscope parse <st.cmd...>
 *
 * Interpret startup scripts and summarize each instance.
 */
export async function parseCommand(context: CommandContext): Promise<number> {
  const { graph, instances, failures } = await loadFleet(context);
  const { output, options } = context;

  if (options.json) {
    output.out(JSON.stringify({
      instances: instances.map(toJSON),
      failures: failures.map(failure => ({ id: failure.id, script: failure.script, message: failure.error.message })),
      warnings: graph.warnings.map(warning => warning.message)
    }, null, 2));
  } else {
    for (const instance of instances) {
      OutputFormatter.formatInstanceSummary(instance).forEach(line => output.out(line));
    }
    if (options.verbose) {
      for (const warning of graph.warnings) {
        output.err(warning.message);
      }
    }
  }

  return failures.length > 0 ? 1 : 0;
}

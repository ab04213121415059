import { CLIOrchestrator, type CLIEnvironment } from './CLIOrchestrator';

export type { CLIOptions, CommandName } from './parsers/ArgumentParser';
export type { CLIEnvironment } from './CLIOrchestrator';
export type { CommandOutput } from './utils/output';

/**
 * Central entry point for the CLI. Resolves to the process exit code; the
 * file system, output and configuration can be injected for tests.
 */
export async function main(customArgs?: readonly string[], environment: CLIEnvironment = {}): Promise<number> {
  const orchestrator = new CLIOrchestrator(environment);
  return orchestrator.main(customArgs ?? process.argv.slice(2));
}

import chalk from 'chalk';
import type { InstanceError, LintMessage, LoadedInstance, RecordInstance } from '@core/types';
import { formatLoadContext, formatLocation } from '@core/utils/locationFormatter';
import type { RecordDescription, ResolvedLink, TraversalStep } from '@graph/types';
import type { InstanceFailure } from '@api/load-instances';

/** Where commands write; the console unless a test captures it. */
export interface CommandOutput {
  out(text: string): void;
  err(text: string): void;
}

export const consoleOutput: CommandOutput = {
  out: text => console.log(text),
  err: text => console.error(text)
};

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export class OutputFormatter {
  static formatRecordLine(record: RecordInstance): string {
    return `${chalk.bold(record.name)} ${chalk.gray(`(${record.recordType}, ${record.instanceId})`)}`;
  }

  static formatDescription(description: RecordDescription): string[] {
    const { record } = description;
    const lines = [
      `${chalk.bold(record.name)} (${record.recordType}) in ${chalk.cyan(record.instanceId)}`,
      `  defined at ${description.provenance}`,
      `  loaded via ${description.context}`
    ];

    if (record.aliases.length > 0) {
      lines.push(`  aliases: ${record.aliases.join(', ')}`);
    }
    for (const field of Object.values(record.fields)) {
      let line = `  field(${field.name}, "${field.value}")`;
      if (field.rawValue !== field.value) {
        line += chalk.gray(` from "${field.rawValue}"`);
      }
      lines.push(line);
    }
    for (const [name, value] of Object.entries(record.info)) {
      lines.push(`  info(${name}, "${value}")`);
    }
    return lines;
  }

  static formatLink(link: ResolvedLink): string {
    const { source, target } = link;
    const text = `${source.record}.${source.field} -> ${target.targetRecord}.${target.targetField}`;
    if (link.status === 'unresolved') {
      return `${text} ${chalk.yellow('(unresolved)')}`;
    }
    return `${text} ${chalk.gray(`(${link.targetInstanceId})`)}`;
  }

  static formatTraversalStep(step: TraversalStep): string {
    const { via } = step;
    const indent = '  '.repeat(step.depth);
    return `${indent}${OutputFormatter.formatRecordLine(step.record)} via ${via.source.record}.${via.source.field}`;
  }

  static formatInstanceSummary(instance: LoadedInstance): string[] {
    const lines = [
      `${chalk.bold(instance.id)}: ${instance.scriptPath}`,
      `  ${[
        plural(instance.lines.length, 'line'),
        plural(instance.records.size, 'record'),
        plural(instance.unhandled.length, 'unhandled command'),
        plural(instance.errors.length, 'error')
      ].join(', ')}`
    ];
    for (const error of instance.errors) {
      lines.push(`  ${OutputFormatter.formatInstanceError(error)}`);
    }
    for (const message of instance.lint) {
      lines.push(`  ${OutputFormatter.formatLint(message)}`);
    }
    return lines;
  }

  static formatLint(message: LintMessage): string {
    const severity = message.severity === 'error' ? chalk.red(message.severity) : chalk.yellow(message.severity);
    return `${severity} ${message.name} ${formatLoadContext(message.context)}: ${message.message}`;
  }

  static formatInstanceError(error: InstanceError): string {
    return `${chalk.red(error.code)} ${formatLocation(error.location).display}: ${error.message}`;
  }

  static formatFailure(failure: InstanceFailure): string {
    return `${chalk.red('Failed')} ${failure.id}: ${failure.error.message}`;
  }
}

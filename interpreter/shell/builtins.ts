import { parseMacroDefinitions } from '@services/MacroService/parseMacroDefinitions';
import type { CommandHandler, HandlerContext } from './types';

function usage(text: string): Error {
  return new Error(`Usage: ${text}`);
}

const epicsEnvSet: CommandHandler = (args, { event }) => {
  const [name, value] = args;
  if (!name || value === undefined) {
    throw usage('epicsEnvSet name value');
  }
  event.macros.define({ [name]: value });
  return {};
};

const epicsEnvUnset: CommandHandler = (args, { event }) => {
  const [name] = args;
  if (!name) {
    throw usage('epicsEnvUnset name');
  }
  event.macros.undefine(name);
  return {};
};

const epicsEnvShow: CommandHandler = (args, { event }) => {
  const snapshot = event.macros.snapshot();
  const [name] = args;
  if (name) {
    const value = snapshot[name];
    return { output: value === undefined ? `${name} is not an environment variable.` : `${name}=${value}` };
  }
  return {
    output: Object.entries(snapshot)
      .map(([key, value]) => `${key}=${value}`)
      .join('\n')
  };
};

const iocshRegisterVariable: CommandHandler = (args, { variables }) => {
  const [name, value] = args;
  if (!name || value === undefined) {
    throw usage('iocshRegisterVariable name value');
  }
  variables.set(name, value);
  return {};
};

const iocshLoad: CommandHandler = async (args, context: HandlerContext) => {
  const [file, macros] = args;
  if (!file) {
    throw usage('iocshLoad file [macros]');
  }
  await context.source(file, macros ? parseMacroDefinitions(macros) : undefined);
  return { sourced: true };
};

const iocshCmd: CommandHandler = async (args, context) => {
  const [line] = args;
  if (line === undefined) {
    throw usage('iocshCmd command');
  }
  await context.runLine(line);
  return {};
};

const changeDirectory: CommandHandler = async (args, context) => {
  const [directory] = args;
  if (!directory) {
    throw usage('cd directory');
  }
  await context.setWorkingDirectory(directory);
  return {};
};

const iocInit: CommandHandler = (_args, context) => {
  context.markInitialized();
  return {};
};

/**
 * Commands the interpreter executes itself. Everything else is forwarded
 * to observers.
 */
export const BUILTIN_HANDLERS: ReadonlyMap<string, CommandHandler> = new Map([
  ['epicsEnvSet', epicsEnvSet],
  ['epicsEnvUnset', epicsEnvUnset],
  ['epicsEnvShow', epicsEnvShow],
  ['iocshRegisterVariable', iocshRegisterVariable],
  ['iocshLoad', iocshLoad],
  ['iocshCmd', iocshCmd],
  ['cd', changeDirectory],
  ['chdir', changeDirectory],
  ['iocInit', iocInit]
]);

/**
 * recscope API entry point
 *
 * Interpret controller startup scripts and query where every record, field
 * and link came from.
 *
 * @example
 * ```typescript
 * const { graph, failures } = await loadStartupScripts([
 *   { id: 'ioc-motion', script: '/iocs/motion/st.cmd' },
 *   { id: 'ioc-vacuum', script: '/iocs/vacuum/st.cmd' }
 * ]);
 *
 * for (const { provenance } of graph.describe('MOTION:M1')) {
 *   console.log(provenance); // /iocs/motion/st.cmd:12 with macro state {P=MOTION:}
 * }
 * ```
 */
export {
  loadInstance,
  loadStartupScripts,
  type FleetLoadResult,
  type InstanceFailure,
  type LoadInstanceOptions,
  type LoadStartupScriptsOptions
} from './load-instances';

export { CrossReferenceGraph } from '@graph/CrossReferenceGraph';
export type * from '@graph/types';

export { MacroContext } from '@services/MacroService/MacroContext';
export type { IMacroContext } from '@services/MacroService/IMacroContext';
export { parseMacroDefinitions } from '@services/MacroService/parseMacroDefinitions';
export { ShellInterpreter, type ShellRunResult } from '@interpreter/shell/ShellInterpreter';
export type { CommandEvent, CommandHandler, IShellObserver } from '@interpreter/shell/types';
export { RecordModelBuilder, type RecordModel } from '@interpreter/records/RecordModelBuilder';
export { parseLink, isLinkField } from '@interpreter/records/links';
export type { IFileSystemService } from '@services/fs/IFileSystemService';
export { NodeFileSystem } from '@services/fs/NodeFileSystem';

export { ConfigLoader } from '@core/config/loader';
export { DEFAULT_CONFIG, type RecscopeConfig, type ResolvedConfig } from '@core/config/types';
export * from '@core/errors';
export type * from '@core/types';
export { createLoadContext, createSourceLocation } from '@core/types';

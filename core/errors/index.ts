/**
 * Central export point for recscope error types.
 */
export { RecscopeError, ErrorSeverity } from './RecscopeError';
export type { BaseErrorDetails, RecscopeErrorOptions } from './RecscopeError';
export { MacroExpansionError } from './MacroExpansionError';
export { MacroScopeError } from './MacroScopeError';
export { ScriptSyntaxError } from './ScriptSyntaxError';
export { CyclicInclusionError } from './CyclicInclusionError';
export { DocumentParseError } from './DocumentParseError';
export { DuplicateRecordError } from './DuplicateRecordError';
export type { RecordCollision } from './DuplicateRecordError';
export { CommandExecutionError } from './CommandExecutionError';
export { ScriptNotFoundError } from './ScriptNotFoundError';
export { ConfigError } from './ConfigError';
export { GraphError } from './GraphError';

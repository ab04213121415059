import { RecscopeError, ErrorSeverity } from './RecscopeError';
import type { LoadContext } from '@core/types';

/**
 * A document parser could not turn a file into a typed document.
 * Fatal to the load command that requested it only.
 */
export class DocumentParseError extends RecscopeError {
  /** Location inside the document being parsed */
  public readonly documentLocation?: LoadContext & { column?: number };

  constructor(
    message: string,
    options: { file: string; line?: number; column?: number; dialect?: string; cause?: unknown }
  ) {
    const where = options.line !== undefined
      ? `${options.file}:${options.line}${options.column !== undefined ? `:${options.column}` : ''}`
      : options.file;

    super(`Failed to parse ${where}: ${message}`, {
      code: 'DOCUMENT_PARSE',
      severity: ErrorSeverity.Recoverable,
      details: { file: options.file, line: options.line, column: options.column, dialect: options.dialect },
      cause: options.cause
    });

    if (options.line !== undefined) {
      this.documentLocation = { file: options.file, line: options.line, column: options.column };
    }
    Object.setPrototypeOf(this, DocumentParseError.prototype);
  }
}

import { RecscopeError, ErrorSeverity } from './RecscopeError';

/**
 * Misuse of the cross-reference graph, such as adding an instance twice.
 */
export class GraphError extends RecscopeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, {
      code: 'GRAPH',
      severity: ErrorSeverity.Fatal,
      details
    });
    Object.setPrototypeOf(this, GraphError.prototype);
  }
}

/**
 * Compiler Observability Types
 *
 * Callbacks the host registers to follow a batch. The library itself never
 * writes to the console.
 */

/** Identifies one (application, environment) pair */
export interface CompositionEvent {
  readonly app: string;
  readonly env: string;
}

/** Emitted when an application has no overlay for an environment */
export interface CompositionSkipEvent extends CompositionEvent {
  readonly reason: string;
}

/** Emitted when a script calls vars(name) */
export interface ImportEvent {
  readonly name: string;
  readonly file: string;
}

/** Emitted after a document has been written */
export interface DocumentEvent extends CompositionEvent {
  readonly file: string;
}

/** Observability callbacks for monitoring a batch */
export interface CompileCallbacks {
  /** Called before a pair is composed */
  onCompositionStart?: (event: CompositionEvent) => void;
  /** Called when a pair is skipped */
  onCompositionSkip?: (event: CompositionSkipEvent) => void;
  /** Called when a fragment is imported */
  onImport?: (event: ImportEvent) => void;
  /** Called after a document is written */
  onDocumentWritten?: (event: DocumentEvent) => void;
}

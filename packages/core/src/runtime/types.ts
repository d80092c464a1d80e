/**
 * Script Runtime Boundary
 *
 * The narrow, stack-based view of the embedded interpreter that scopes,
 * the loader, the import resolver and the value converter work against.
 * Indices follow interpreter conventions: positive from the bottom of the
 * current frame, negative from the top.
 */

/** Dynamic type of a value on the stack */
export type ScriptType =
  | 'none'
  | 'nil'
  | 'boolean'
  | 'number'
  | 'string'
  | 'table'
  | 'function'
  | 'userdata'
  | 'thread';

/** Outcome of loading or calling a chunk */
export type CallStatus = 'ok' | 'syntax' | 'runtime';

/**
 * Host-implemented callable.
 * Receives the stack of the calling thread with its arguments at 1..top(),
 * pushes its results and returns how many it pushed.
 */
export type HostFunction = (stack: ScriptStack) => number;

export interface ScriptStack {
  /** Number of values in the current frame */
  top(): number;
  typeAt(index: number): ScriptType;
  /** Text of a string or number; invalid UTF-8 becomes U+FFFD. For diagnostics. */
  toText(index: number): string;
  /** Text of a string or number, or undefined when its bytes are not valid UTF-8 */
  toUtf8(index: number): string | undefined;
  toNumber(index: number): number;
  toBoolean(index: number): boolean;
  /** Opaque identity of the table at index; equal for the same table */
  tableIdentity(index: number): unknown;
  /**
   * Pop a key and push the next key/value pair of the table at tableIndex.
   * Returns false (pushing nothing) once the table is exhausted.
   */
  next(tableIndex: number): boolean;
  pop(count?: number): void;

  pushNil(): void;
  pushValue(index: number): void;
  pushString(value: string): void;
  pushFunction(fn: HostFunction): void;
  /** Pop a value and store it as table[name] at tableIndex */
  setField(tableIndex: number, name: string): void;
  /**
   * Push a fresh, empty binding table followed by its host table.
   * Names missing from the binding table are looked up in the host table,
   * which holds the standard library and binds _G to the binding table.
   */
  newScopeTable(): void;

  /**
   * Compile source and push the resulting chunk, or the error message
   * when the status is not 'ok'. Bytes are passed to the interpreter as is.
   */
  load(source: string | Uint8Array, chunkName: string): CallStatus;
  /** Pop the table at the top and make it the global table of the chunk at fnIndex */
  setEnvironment(fnIndex: number): void;
  /**
   * Call the function below nargs arguments. Errors never escape: a failed
   * call leaves its error message on the stack.
   */
  protectedCall(nargs: number, nresults: number): CallStatus;
  /** Describe the error value at index for diagnostics */
  errorMessage(index: number): string;

  /** Pop the top value into the registry and return its reference */
  ref(): number;
  pushRef(ref: number): void;
  unref(ref: number): void;

  /** Raise a script error with message; does not return */
  raise(message: string): never;
  /**
   * Raise a host error into the running script. The error is remembered so
   * that an uncaught failure can be surfaced with its original type.
   */
  raiseHostError(err: Error): never;
  /** Position to pass to takeHostErrors once a protected call returns */
  hostErrorMark(): number;
  /**
   * Forget every host error remembered since mark and return the latest one
   * raised with message, if any.
   */
  takeHostErrors(mark: number, message?: string): Error | undefined;
}

/**
 * Scopes and Binding Tables
 *
 * A Scope is an isolated execution context. Scripts run with the scope's
 * binding table as their global table, so the table ends up holding exactly
 * the names the script assigned. Lookups of anything else fall through to
 * the scope's own host table: the standard library, `_G`, and whatever the
 * host defines or binds. Scripts never see the bindings of any other scope.
 * Composition happens only by binding one scope's captured table into
 * another scope under a name.
 */

import { LoadError, RuntimeError } from './error-classes.js';
import type { HostFunction, ScriptStack } from './runtime/types.js';

/**
 * Host handle to a binding table, anchored in the interpreter registry so it
 * outlives the scope that produced it. Release it exactly once.
 */
export class BindingTable {
  private released = false;

  constructor(
    private readonly stack: ScriptStack,
    private readonly reference: number
  ) {}

  /** Push the table onto stack (the owning stack by default) */
  push(stack: ScriptStack = this.stack): void {
    this.assertLive();
    stack.pushRef(this.reference);
  }

  /** Set table[name] to a string */
  setString(name: string, value: string): void {
    this.push();
    this.stack.pushString(value);
    this.stack.setField(-2, name);
    this.stack.pop();
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.stack.unref(this.reference);
  }

  private assertLive(): void {
    if (this.released) {
      throw new Error('Binding table has been released');
    }
  }
}

export class Scope {
  private finished = false;

  private constructor(
    private readonly stack: ScriptStack,
    private readonly reference: number,
    private readonly hostReference: number
  ) {}

  /** Create a scope with an empty binding table and the standard library in reach */
  static open(stack: ScriptStack): Scope {
    stack.newScopeTable();
    const hostReference = stack.ref();
    return new Scope(stack, stack.ref(), hostReference);
  }

  /** Register a host callable visible to scripts as name */
  define(name: string, fn: HostFunction): void {
    this.withHostTable(() => {
      this.stack.pushFunction(fn);
      this.stack.setField(-2, name);
    });
  }

  /** Bind another scope's table as a single variable */
  bind(name: string, table: BindingTable): void {
    this.withHostTable(() => {
      table.push(this.stack);
      this.stack.setField(-2, name);
    });
  }

  /**
   * Compile and run source against this scope.
   *
   * @throws LoadError if the source does not compile
   * @throws RuntimeError if the script raises, or the host error a nested
   *   import raised when the script did not catch it
   */
  run(source: string | Uint8Array, file: string): void {
    this.assertOpen();
    const stack = this.stack;

    if (stack.load(source, `@${file}`) !== 'ok') {
      const detail = stack.errorMessage(-1);
      stack.pop();
      throw new LoadError('CONF-L001', { file, detail });
    }

    stack.pushRef(this.reference);
    stack.setEnvironment(-2);

    // Host errors the script caught itself are dropped once the call returns
    const mark = stack.hostErrorMark();
    if (stack.protectedCall(0, 0) !== 'ok') {
      const detail = stack.errorMessage(-1);
      stack.pop();
      const hostError = stack.takeHostErrors(mark, detail);
      if (hostError) {
        throw hostError;
      }
      throw new RuntimeError('CONF-R001', { file, detail });
    }
    stack.takeHostErrors(mark);
  }

  /** Hand the binding table over to the caller; the scope is done afterwards */
  capture(): BindingTable {
    this.assertOpen();
    this.finished = true;
    // The binding table keeps its host table alive through its metatable
    this.stack.unref(this.hostReference);
    return new BindingTable(this.stack, this.reference);
  }

  /** Drop the scope and its tables without capturing them */
  discard(): void {
    if (this.finished) return;
    this.finished = true;
    this.stack.unref(this.hostReference);
    this.stack.unref(this.reference);
  }

  private withHostTable(body: () => void): void {
    this.assertOpen();
    this.stack.pushRef(this.hostReference);
    body();
    this.stack.pop();
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error('Scope has already been captured or discarded');
    }
  }
}

/* Teardown scheduling
 *
 * Binds cleanup callbacks to scope instances and runs them when the host
 * signals that an instance finished.
 *
 *  - Every scope instance (a session, a module run, a single test) gets an
 *    opaque id from `open()`.
 *  - The instances a piece of code runs under are carried by
 *    AsyncLocalStorage, so a producer can register a teardown without being
 *    handed the scheduler, and async work started by the producer still sees
 *    the same instances.
 *  - `runScope(id)` runs the instance's callbacks once, in registration order,
 *    awaiting each one. The list is detached first, so a failing callback
 *    never leaves it behind and a second call is a no-op.
 *  - Test teardowns are only recorded. The host picks the moment to run them
 *    with `runScope(testId)`.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

import {
  AggregateTeardownError,
  NoActiveScopeError,
  TeardownError,
} from '../errors/errors.js';
import type { FixtureScopeType, Teardown } from '../types/types.js';

/**
 * Branded id of a live scope instance, e.g. `module_3`.
 */
export type ScopeInstanceId = string & { __brand: 'ScopeInstanceId' };

/**
 * Scope instances bound to an execution context, by scope.
 */
export type ScopeBindings = Partial<Record<FixtureScopeType, ScopeInstanceId>>;

interface ScopeFrame {
  readonly scheduler: TeardownScheduler;
  readonly bindings: ScopeBindings;
}

const activeFrame = new AsyncLocalStorage<ScopeFrame>();

/**
 * Global counter for scope instance ids, shared by all schedulers so ids stay
 * unique across engines.
 */
let _scopeCounter = 0;

export class TeardownScheduler {
  /** Callbacks per open scope instance, in registration order */
  private readonly callbacks = new Map<ScopeInstanceId, Teardown[]>();

  /**
   * Allocate a new scope instance.
   */
  open(scope: FixtureScopeType): ScopeInstanceId {
    const id = `${scope}_${++_scopeCounter}` as ScopeInstanceId;
    this.callbacks.set(id, []);
    return id;
  }

  /**
   * Check whether an instance is open (allocated and not yet run).
   */
  isOpen(id: ScopeInstanceId): boolean {
    return this.callbacks.has(id);
  }

  /**
   * Number of callbacks waiting on an instance.
   */
  pendingCount(id: ScopeInstanceId): number {
    return this.callbacks.get(id)?.length ?? 0;
  }

  /**
   * Run `fn` with the given instances bound to the current execution context.
   *
   * Bindings of an enclosing `run()` on the same scheduler are inherited
   * unless overridden.
   *
   * @example
   * ```typescript
   * const moduleId = teardown.open('module');
   * await teardown.run({ module: moduleId }, async () => {
   *   registerTeardown('module', () => db.close());
   * });
   * await teardown.runScope(moduleId);
   * ```
   */
  run<T>(bindings: ScopeBindings, fn: () => T): T {
    const parent = activeFrame.getStore();
    const inherited = parent?.scheduler === this ? parent.bindings : {};
    return activeFrame.run({ scheduler: this, bindings: { ...inherited, ...bindings } }, fn);
  }

  /**
   * Instance of `scope` bound to the current execution context, if any.
   */
  current(scope: FixtureScopeType): ScopeInstanceId | undefined {
    const frame = activeFrame.getStore();
    if (!frame || frame.scheduler !== this) return undefined;
    return frame.bindings[scope];
  }

  /**
   * Register a callback on the active instance of `scope`.
   *
   * @throws {NoActiveScopeError} when no open instance of `scope` is bound
   */
  register(scope: FixtureScopeType, callback: Teardown): void {
    const id = this.current(scope);
    const list = id !== undefined ? this.callbacks.get(id) : undefined;
    if (!list) throw new NoActiveScopeError(scope);
    list.push(callback);
  }

  /**
   * Run and discard the callbacks of one instance.
   *
   * Every callback runs even when an earlier one fails.
   *
   * @throws {TeardownError} when one callback failed
   * @throws {AggregateTeardownError} when several failed
   */
  async runScope(id: ScopeInstanceId): Promise<void> {
    const list = this.callbacks.get(id);
    if (!list) return;
    this.callbacks.delete(id);

    const errors: Error[] = [];
    for (const callback of list) {
      try {
        await callback();
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }

    if (errors.length === 1) throw new TeardownError(id, errors[0]);
    if (errors.length > 1) throw new AggregateTeardownError(id, errors);
  }
}

/**
 * Register a teardown on the active instance of `scope`, using the scheduler
 * bound to the current execution context.
 *
 * This is what producers call:
 *
 * ```typescript
 * defineFixture({
 *   name: 'db',
 *   scope: 'module',
 *   produce: async () => {
 *     const db = await connect();
 *     registerTeardown('module', () => db.close());
 *     return db;
 *   },
 * });
 * ```
 *
 * @throws {NoActiveScopeError} outside of any scheduler context, or when no
 *         instance of `scope` is bound
 */
export function registerTeardown(scope: FixtureScopeType, callback: Teardown): void {
  const frame = activeFrame.getStore();
  if (!frame) throw new NoActiveScopeError(scope);
  frame.scheduler.register(scope, callback);
}

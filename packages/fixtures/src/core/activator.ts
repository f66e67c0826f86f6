/* Activator
 *
 * Invokes a fixture's producer and turns the outcome into either a value or a
 * FixtureConstructionError naming the fixture.
 *
 *  - Sync and async producers are handled alike; the result is awaited.
 *  - The optional `onProduce` hook receives the qualified name and the
 *    duration of every call, failed calls included.
 *  - With `autoDispose`, a value exposing `dispose()` or `close()` gets a
 *    teardown on the instance of its own scope. The producer runs inside the
 *    scheduler context set up by the instantiation engine, which is what the
 *    registration relies on. With no live instance the value is disposed
 *    right away and the call fails like a producer error.
 */

import { FixtureConstructionError } from '../errors/errors.js';
import type { EngineConfig, FixtureDefinition, Teardown } from '../types/types.js';
import type { QualifiedName } from './qualified-name.js';
import { registerTeardown } from './teardown.js';

export type ActivatorOptions = Pick<EngineConfig, 'autoDispose' | 'onProduce'>;

/**
 * Teardown calling `dispose()` (or else `close()`) on `value`, if it has one.
 */
export function disposerOf(value: unknown): Teardown | undefined {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) {
    return undefined;
  }

  const method =
    'dispose' in value && typeof value.dispose === 'function'
      ? value.dispose
      : 'close' in value && typeof value.close === 'function'
        ? value.close
        : undefined;
  if (!method) return undefined;

  return async () => {
    await Reflect.apply(method, value, []);
  };
}

export class Activator {
  constructor(private readonly options: ActivatorOptions = {}) {}

  /**
   * Call the producer of `def` with its dependency values.
   *
   * @throws {FixtureConstructionError} wrapping whatever the producer threw
   */
  async produce(def: FixtureDefinition, args: readonly unknown[]): Promise<unknown> {
    let value: unknown;
    try {
      value = await this.instrument(def.qualifiedName, () => def.produce(...args));
    } catch (e) {
      throw new FixtureConstructionError(def.name, def.qualifiedName, e);
    }

    if (this.options.autoDispose) {
      const disposer = disposerOf(value);
      if (disposer) await this.bindDisposer(def, disposer);
    }

    return value;
  }

  /**
   * Register `disposer` on the live instance of the fixture's scope. Without
   * one the value is released at once and the fixture fails.
   */
  private async bindDisposer(def: FixtureDefinition, disposer: Teardown): Promise<void> {
    try {
      registerTeardown(def.scope, disposer);
    } catch (e) {
      let cause = e;
      try {
        await disposer();
      } catch (disposeError) {
        cause = new AggregateError([e, disposeError], `Could not release '${def.qualifiedName}'.`);
      }
      throw new FixtureConstructionError(def.name, def.qualifiedName, cause);
    }
  }

  private async instrument<T>(qualified: QualifiedName, execute: () => T | Promise<T>): Promise<T> {
    const hook = this.options.onProduce;
    if (!hook) return await execute();

    const start = performance.now();
    try {
      return await execute();
    } finally {
      hook(qualified, performance.now() - start);
    }
  }
}

/* Instantiation
 *
 * Produces the fixture values one test asked for.
 *
 * Flow
 *  1. Effective request = requested names plus every visible autouse name.
 *  2. Resolve into dependency order (graph.ts).
 *  3. Split by scope, keeping the relative order: session, module, test.
 *  4. Session fixtures go through the session store; their producers read
 *     dependency values from the store snapshot.
 *  5. Module fixtures go through the module store; their producers read from
 *     the session results plus the module store snapshot.
 *  6. Test fixtures are produced directly into a per-test working map seeded
 *     with the session and module results. They are never cached.
 *  7. Only the names of the effective request are returned, each mapped to
 *     its visible definition's value.
 *
 * Failure aborts the request at the failing producer. Store entries that were
 * committed before stay valid; the failing store entry is left uncommitted.
 * Teardowns registered by producers that already succeeded stay registered,
 * since they live in the scheduler rather than in this call.
 */

import { FixtureNotFoundError } from '../errors/errors.js';
import type { FixtureRegistry } from '../registry/fixture-registry.js';
import { CONTEXT, FixtureScope, type FixtureDefinition } from '../types/types.js';
import { Activator } from './activator.js';
import type { FixtureStore } from './fixture-store.js';
import { resolve } from './graph.js';
import type { QualifiedName } from './qualified-name.js';
import type { ScopeBindings, TeardownScheduler } from './teardown.js';

export interface FixtureStores {
  readonly session: FixtureStore;
  readonly module: FixtureStore;
}

export interface FixtureRequest {
  /** Local fixture names the test asked for */
  readonly requested: Iterable<string>;
  readonly registry: FixtureRegistry;
  readonly stores: FixtureStores;
  /** Ambient test context, injected through the `context` dependency */
  readonly context?: unknown;
  /**
   * Scheduler whose scope instances producers register teardowns on. Without
   * one, producers run in whatever scheduler context the caller is in.
   */
  readonly teardown?: TeardownScheduler;
  /** Scope instances the producers run under */
  readonly scopes?: ScopeBindings;
  readonly activator?: Activator;
}

const DEFAULT_ACTIVATOR = new Activator();

/**
 * Requested names followed by autouse names, without repeats.
 */
export function effectiveRequest(requested: Iterable<string>, registry: FixtureRegistry): string[] {
  const names = new Set(requested);
  for (const name of registry.autouseNames()) names.add(name);
  return [...names];
}

/**
 * Dependency values for `def`, in declaration order.
 */
function dependencyValues(
  def: FixtureDefinition,
  values: ReadonlyMap<QualifiedName, unknown>,
  context: unknown
): unknown[] {
  return def.qualifiedDependencies.map((dep, i) => {
    if (dep === undefined) return context;
    if (!values.has(dep)) throw new FixtureNotFoundError(def.dependencies[i], undefined, def.name);
    return values.get(dep);
  });
}

function partition(ordered: readonly FixtureDefinition[]) {
  const session: FixtureDefinition[] = [];
  const module: FixtureDefinition[] = [];
  const test: FixtureDefinition[] = [];
  for (const def of ordered) {
    if (def.scope === FixtureScope.Session) session.push(def);
    else if (def.scope === FixtureScope.Module) module.push(def);
    else test.push(def);
  }
  return { session, module, test };
}

/**
 * Create the fixtures one test needs.
 *
 * @returns local name -> value for every name in the effective request
 *
 * @throws {FixtureNotFoundError} when a requested name can't be resolved
 * @throws {FixtureConstructionError} when a producer fails
 * @throws {ScopeDisposedError} when a store was already disposed
 */
export async function createFixtures(request: FixtureRequest): Promise<ReadonlyMap<string, unknown>> {
  const { registry, stores, context, teardown, scopes = {} } = request;
  const activator = request.activator ?? DEFAULT_ACTIVATOR;

  const effective = effectiveRequest(request.requested, registry);
  const ordered = partition(resolve(effective, registry));

  const build = async (): Promise<ReadonlyMap<string, unknown>> => {
    const working = new Map<QualifiedName, unknown>();

    for (const def of ordered.session) {
      const value = await stores.session.getOrCreate(def.qualifiedName, (snapshot) =>
        activator.produce(def, dependencyValues(def, snapshot, context))
      );
      working.set(def.qualifiedName, value);
    }

    for (const def of ordered.module) {
      const value = await stores.module.getOrCreate(def.qualifiedName, (snapshot) =>
        activator.produce(def, dependencyValues(def, new Map([...working, ...snapshot]), context))
      );
      working.set(def.qualifiedName, value);
    }

    for (const def of ordered.test) {
      const value = await activator.produce(def, dependencyValues(def, working, context));
      working.set(def.qualifiedName, value);
    }

    const result = new Map<string, unknown>();
    for (const name of effective) {
      result.set(name, name === CONTEXT ? context : working.get(registry.resolveName(name)));
    }
    return result;
  };

  return teardown ? teardown.run(scopes, build) : build();
}

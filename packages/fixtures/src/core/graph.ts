/* Dependency graph resolution
 *
 * Expands a fixture request into its transitive closure and orders it so
 * every dependency comes before its dependents.
 *
 *  - Expansion follows qualified edges only, so overrides reach the
 *    definition they forward to even though it is hidden by name.
 *  - The context sentinel has no definition and is never a node.
 *  - Ordering uses Kahn's algorithm over edges dependency → dependent. Ready
 *    nodes are taken in discovery order, which keeps the output stable for a
 *    given request.
 *  - Nodes left over by Kahn's algorithm sit on or behind a cycle; a DFS over
 *    them recovers one full cycle for the error.
 */

import { CyclicDependencyError, FixtureNotFoundError } from '../errors/errors.js';
import type { FixtureRegistry } from '../registry/fixture-registry.js';
import { CONTEXT, type FixtureDefinition } from '../types/types.js';
import type { QualifiedName } from './qualified-name.js';
import { closestName } from './similarity.js';

/**
 * Qualified dependencies of a definition, without the context sentinel and
 * without repeats.
 */
export function dependencyEdges(def: FixtureDefinition): QualifiedName[] {
  const out: QualifiedName[] = [];
  for (const dep of def.qualifiedDependencies) {
    if (dep !== undefined && !out.includes(dep)) out.push(dep);
  }
  return out;
}

/**
 * Find one cycle reachable from `roots`, following `edges`.
 *
 * @returns the cycle as a closed path (first element repeated at the end),
 *          or undefined when the reachable graph is acyclic
 */
export function findCycle(
  roots: Iterable<QualifiedName>,
  edges: (node: QualifiedName) => readonly QualifiedName[]
): QualifiedName[] | undefined {
  const state = new Map<QualifiedName, 'visiting' | 'done'>();
  const path: QualifiedName[] = [];

  const visit = (node: QualifiedName): QualifiedName[] | undefined => {
    const seen = state.get(node);
    if (seen === 'done') return undefined;
    if (seen === 'visiting') return [...path.slice(path.indexOf(node)), node];

    state.set(node, 'visiting');
    path.push(node);
    for (const next of edges(node)) {
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    path.pop();
    state.set(node, 'done');
    return undefined;
  };

  for (const root of roots) {
    const cycle = visit(root);
    if (cycle) return cycle;
  }
  return undefined;
}

/**
 * Collect the transitive closure of `requested`, in discovery order.
 *
 * @throws {FixtureNotFoundError} when a requested name or a qualified
 *         dependency has no definition
 */
function expand(
  requested: Iterable<string>,
  registry: FixtureRegistry
): Map<QualifiedName, FixtureDefinition> {
  const included = new Map<QualifiedName, FixtureDefinition>();

  const visit = (qualified: QualifiedName, requiredBy?: QualifiedName): void => {
    if (included.has(qualified)) return;

    const def = registry.get(qualified);
    if (!def) {
      throw new FixtureNotFoundError(
        qualified,
        closestName(qualified, registry.qualifiedNames()),
        requiredBy
      );
    }

    included.set(qualified, def);
    for (const dep of dependencyEdges(def)) visit(dep, qualified);
  };

  for (const name of requested) {
    if (name === CONTEXT) continue;
    visit(registry.resolveName(name));
  }

  return included;
}

/**
 * Sort definitions so that each one follows all of its dependencies.
 *
 * Dependencies outside of `defs` are ignored.
 *
 * @throws {CyclicDependencyError} when the definitions contain a cycle
 */
export function topologicalSort(defs: ReadonlyMap<QualifiedName, FixtureDefinition>): FixtureDefinition[] {
  const indegree = new Map<QualifiedName, number>();
  const dependents = new Map<QualifiedName, QualifiedName[]>();

  for (const [qualified, def] of defs) {
    let count = 0;
    for (const dep of dependencyEdges(def)) {
      if (!defs.has(dep)) continue;
      count++;
      const list = dependents.get(dep);
      if (list) list.push(qualified);
      else dependents.set(dep, [qualified]);
    }
    indegree.set(qualified, count);
  }

  const queue: QualifiedName[] = [];
  for (const [qualified, count] of indegree) {
    if (count === 0) queue.push(qualified);
  }

  const sorted: FixtureDefinition[] = [];
  for (let head = 0; head < queue.length; head++) {
    const qualified = queue[head];
    const def = defs.get(qualified);
    if (def) sorted.push(def);

    for (const dependent of dependents.get(qualified) ?? []) {
      const remaining = (indegree.get(dependent) ?? 0) - 1;
      indegree.set(dependent, remaining);
      if (remaining === 0) queue.push(dependent);
    }
  }

  if (sorted.length < defs.size) {
    const leftover = [...defs.keys()].filter((q) => (indegree.get(q) ?? 0) > 0);
    const cycle = findCycle(leftover, (q) => {
      const def = defs.get(q);
      return def ? dependencyEdges(def).filter((d) => defs.has(d)) : [];
    });
    throw new CyclicDependencyError(cycle ?? leftover);
  }

  return sorted;
}

/**
 * Resolve a request into an ordered list of definitions.
 *
 * Every dependency of every included definition is present exactly once
 * and precedes its dependents.
 *
 * @param requested - Local fixture names; the context sentinel is skipped
 * @param registry - Registry to resolve names against
 *
 * @throws {FixtureNotFoundError} when a name can't be resolved
 * @throws {CyclicDependencyError} when the closure contains a cycle
 */
export function resolve(requested: Iterable<string>, registry: FixtureRegistry): FixtureDefinition[] {
  return topologicalSort(expand(requested, registry));
}

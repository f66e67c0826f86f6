export { defineFixture } from './registry/define.js';
export { FixtureRegistry } from './registry/fixture-registry.js';

export { CONTEXT, FixtureScope } from './types/types.js';
export type {
  EngineConfig,
  FixtureDefinition,
  FixtureOptions,
  FixtureScopeType,
  FixtureSpec,
  Producer,
  RegistryOptions,
  ShadowPolicy,
  Teardown,
} from './types/types.js';

export type { QualifiedName } from './core/qualified-name.js';

export { dependencyEdges, resolve, topologicalSort } from './core/graph.js';
export { FixtureStore } from './core/fixture-store.js';
export type { StoreFactory, StoreSnapshot } from './core/fixture-store.js';
export { Activator } from './core/activator.js';
export { createFixtures, effectiveRequest } from './core/instantiation.js';
export type { FixtureRequest, FixtureStores } from './core/instantiation.js';
export { registerTeardown, TeardownScheduler } from './core/teardown.js';
export type { ScopeBindings, ScopeInstanceId } from './core/teardown.js';
export { FixtureEngine, ScopeHandle } from './core/engine.js';
export type { TestRequestOptions } from './core/engine.js';
export { closestName, levenshteinDistance } from './core/similarity.js';

// Errors
export {
  AggregateTeardownError,
  AmbiguousFixtureNameError,
  CyclicDependencyError,
  DuplicateFixtureNameError,
  FixtureConstructionError,
  FixtureNotFoundError,
  InvalidEngineConfigError,
  InvalidFixtureDefinitionError,
  NoActiveScopeError,
  ScopeDisposedError,
  ScopeMismatchError,
  TeardownError,
} from './errors/errors.js';

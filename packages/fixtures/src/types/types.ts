import type { QualifiedName } from '../core/qualified-name.js';

/**
 * Supported fixture scopes, ordered by increasing cache lifetime.
 *
 * The scope decides how long a produced value is reused:
 *   - **Test**: produced for every test that needs it, never cached
 *   - **Module**: produced once per module run, shared by its tests
 *   - **Session**: produced once per engine session, shared by every module
 *
 * @example
 * ```typescript
 * const db = defineFixture({
 *   name: 'db',
 *   scope: FixtureScope.Module,
 *   produce: () => openDatabase(),
 * });
 * ```
 */
export const FixtureScope = {
  /** Fresh value for every test (default) */
  Test: 'test',
  /** One value per module run */
  Module: 'module',
  /** One value per session */
  Session: 'session',
} as const;

export type FixtureScopeType = (typeof FixtureScope)[keyof typeof FixtureScope];
export type FixtureScope = FixtureScopeType;

/**
 * Reserved dependency name that injects the ambient test context.
 *
 * It is never a graph node and can't be used as a fixture name.
 */
export const CONTEXT = 'context';

/**
 * Lifetime rank of a scope. A definition may only depend on definitions
 * whose rank is greater than or equal to its own.
 */
export function scopeRank(scope: FixtureScopeType): number {
  switch (scope) {
    case 'test':
      return 0;
    case 'module':
      return 1;
    case 'session':
      return 2;
  }
}

export function isFixtureScope(value: unknown): value is FixtureScopeType {
  return value === 'test' || value === 'module' || value === 'session';
}

/**
 * Producer signature. Receives dependency values in declaration order.
 */
export type Producer<T = unknown> = (...deps: unknown[]) => T | Promise<T>;

/**
 * Options accepted by `defineFixture()`.
 */
export interface FixtureOptions<T = unknown> {
  name: string;
  produce: Producer<T>;
  /** Local dependency names, in the order `produce` takes them. May include {@link CONTEXT}. */
  dependencies?: readonly string[];
  /** @default 'test' */
  scope?: FixtureScopeType;
  /** Include in every test's request. @default false */
  autouse?: boolean;
}

/**
 * Unqualified declaration produced by `defineFixture()`.
 *
 * Specs are frozen and carry no owner; a registry qualifies them.
 */
export interface FixtureSpec<T = unknown> {
  readonly name: string;
  readonly produce: Producer<T>;
  readonly dependencies: readonly string[];
  readonly scope: FixtureScopeType;
  readonly autouse: boolean;
}

/**
 * A preprocessed fixture definition held by a registry.
 *
 * `qualifiedDependencies` lines up with `dependencies`; the context
 * sentinel stays as `undefined` in it since it has no definition.
 */
export interface FixtureDefinition<T = unknown> extends FixtureSpec<T> {
  readonly qualifiedName: QualifiedName;
  readonly owner: string;
  readonly qualifiedDependencies: readonly (QualifiedName | undefined)[];
  readonly hidden: boolean;
}

/**
 * Policy for two imported registries exposing different fixtures under the
 * same name.
 * - 'error': fail with AmbiguousFixtureNameError
 * - 'warn': log through console.warn, last import wins
 * - 'allow': last import wins silently
 */
export type ShadowPolicy = 'error' | 'allow' | 'warn';

export interface RegistryOptions {
  /** @default 'warn' */
  shadowPolicy?: ShadowPolicy;
}

/**
 * Configuration passed to the FixtureEngine constructor.
 */
export interface EngineConfig {
  /**
   * Optional name used in log lines.
   */
  name?: string;

  /**
   * Policy applied by `engine.registry()` to conflicting imports.
   *
   * @default 'warn'
   */
  shadowPolicy?: ShadowPolicy;

  /**
   * Register a teardown for every produced value exposing `dispose()` or
   * `close()`, bound to the scope instance the value lives in.
   *
   * @default false
   */
  autoDispose?: boolean;

  /**
   * Optional hook invoked after every producer call, successful or not.
   *
   * Receives the qualified fixture name and the duration in milliseconds.
   */
  onProduce?: (qualifiedName: QualifiedName, durationMs: number) => void;
}

/**
 * Teardown callback. May be async; the scheduler awaits it.
 */
export type Teardown = () => void | Promise<void>;

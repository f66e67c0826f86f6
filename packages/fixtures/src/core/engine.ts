/*
 * FixtureEngine: the surface a host test runner talks to.
 *
 * It owns one session (store + scope instance), one teardown scheduler and
 * the activator settings, and turns the host's lifecycle signals into scope
 * instances:
 *
 *   session starting  -> `engine.session` (lazy, created once)
 *   module starting   -> `engine.startModule()`
 *   test starting     -> `engine.startTest()`
 *   test body         -> `engine.createFixtures(names, registry, { module, test, context })`
 *   test finished     -> `engine.finishTest(test)`
 *   module finished   -> `engine.finishModule(module)`
 *   session ending    -> `engine.endSession()` (at most once)
 *
 * Nothing here is process-global; a host creates one engine per run and
 * tests create as many as they like.
 */

import { InvalidEngineConfigError, ScopeDisposedError } from '../errors/errors.js';
import { FixtureRegistry } from '../registry/fixture-registry.js';
import type {
  EngineConfig,
  FixtureScopeType,
  FixtureSpec,
  ShadowPolicy,
} from '../types/types.js';
import { Activator } from './activator.js';
import { FixtureStore } from './fixture-store.js';
import { createFixtures } from './instantiation.js';
import { TeardownScheduler, type ScopeInstanceId } from './teardown.js';

const SHADOW_POLICIES: readonly ShadowPolicy[] = ['error', 'allow', 'warn'];

/**
 * One live scope instance: a session, a module run or a single test.
 *
 * Session and module instances cache fixture values in `store`, allocated on
 * first access.
 */
export class ScopeHandle {
  private _store?: FixtureStore;
  private finished = false;

  constructor(
    readonly id: ScopeInstanceId,
    readonly scope: FixtureScopeType
  ) {}

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * @throws {ScopeDisposedError} once the instance has finished
   */
  get store(): FixtureStore {
    if (this.finished) throw new ScopeDisposedError(this.id);
    return (this._store ??= new FixtureStore(this.id));
  }

  /** @internal Called by the engine after the instance's teardowns ran */
  finish(): void {
    this.finished = true;
    this._store?.dispose();
  }
}

export interface TestRequestOptions {
  /** Module run the test belongs to */
  module: ScopeHandle;
  /** Test instance; needed for producers that register test teardowns */
  test?: ScopeHandle;
  /** Ambient test context, injected through the `context` dependency */
  context?: unknown;
}

export class FixtureEngine {
  /** Scheduler carrying every teardown registered through this engine */
  readonly teardown = new TeardownScheduler();

  private readonly name: string;
  private readonly shadowPolicy: ShadowPolicy;
  private readonly activator: Activator;

  private _session?: ScopeHandle;
  private sessionEnded = false;

  constructor(config: EngineConfig = {}) {
    const cfg = validateConfig(config);
    this.name = cfg.name ?? 'FixtureEngine';
    this.shadowPolicy = cfg.shadowPolicy ?? 'warn';
    this.activator = new Activator({ autoDispose: cfg.autoDispose, onProduce: cfg.onProduce });
  }

  getName(): string {
    return this.name;
  }

  /**
   * Build a registry with this engine's shadow policy.
   *
   * @see FixtureRegistry.merge
   */
  registry(
    owner: string,
    locals: readonly FixtureSpec[],
    imported: readonly FixtureRegistry[] = []
  ): FixtureRegistry {
    return FixtureRegistry.merge(owner, locals, imported, { shadowPolicy: this.shadowPolicy });
  }

  /**
   * The session instance, started on first access.
   *
   * @throws {ScopeDisposedError} after endSession()
   */
  get session(): ScopeHandle {
    if (this.sessionEnded) throw new ScopeDisposedError('session');
    return (this._session ??= new ScopeHandle(this.teardown.open('session'), 'session'));
  }

  get isSessionEnded(): boolean {
    return this.sessionEnded;
  }

  /**
   * Start a module run with its own store and teardown list.
   */
  startModule(): ScopeHandle {
    return new ScopeHandle(this.teardown.open('module'), 'module');
  }

  /**
   * Start a test instance. Its teardowns are run by `finishTest()`.
   */
  startTest(): ScopeHandle {
    return new ScopeHandle(this.teardown.open('test'), 'test');
  }

  /**
   * Create the fixtures one test asked for.
   *
   * @see createFixtures
   */
  async createFixtures(
    requested: Iterable<string>,
    registry: FixtureRegistry,
    { module, test, context }: TestRequestOptions
  ): Promise<ReadonlyMap<string, unknown>> {
    const session = this.session;
    return createFixtures({
      requested,
      registry,
      stores: { session: session.store, module: module.store },
      context,
      teardown: this.teardown,
      scopes: { session: session.id, module: module.id, test: test?.id },
      activator: this.activator,
    });
  }

  /**
   * Run a test's teardowns.
   */
  async finishTest(test: ScopeHandle): Promise<void> {
    await this.finishScope(test);
  }

  /**
   * Run a module's teardowns in registration order, then discard its store.
   *
   * The store is discarded even when a teardown fails; the failure is
   * rethrown afterwards.
   */
  async finishModule(module: ScopeHandle): Promise<void> {
    await this.finishScope(module);
  }

  /**
   * Run the session's teardowns and discard its store. Only the first call
   * does anything.
   */
  async endSession(): Promise<void> {
    if (this.sessionEnded) return;
    this.sessionEnded = true;
    if (this._session) await this.finishScope(this._session);
  }

  private async finishScope(handle: ScopeHandle): Promise<void> {
    try {
      await this.teardown.runScope(handle.id);
    } finally {
      handle.finish();
    }
  }
}

function validateConfig(config: EngineConfig): EngineConfig {
  if (typeof config !== 'object' || config === null) {
    throw new InvalidEngineConfigError('config must be an object.');
  }
  const { name, shadowPolicy, autoDispose, onProduce } = config;

  if (name !== undefined && typeof name !== 'string') {
    throw new InvalidEngineConfigError(`'name' must be a string.`);
  }
  if (shadowPolicy !== undefined && !SHADOW_POLICIES.includes(shadowPolicy)) {
    throw new InvalidEngineConfigError(
      `'shadowPolicy' must be one of ${SHADOW_POLICIES.join(', ')}, got ${String(shadowPolicy)}.`
    );
  }
  if (autoDispose !== undefined && typeof autoDispose !== 'boolean') {
    throw new InvalidEngineConfigError(`'autoDispose' must be a boolean.`);
  }
  if (onProduce !== undefined && typeof onProduce !== 'function') {
    throw new InvalidEngineConfigError(`'onProduce' must be a function.`);
  }

  return Object.freeze({ ...config });
}

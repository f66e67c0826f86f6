import { describe, expect, it, vi } from 'vitest';

import { FixtureEngine } from '../src/core/engine.js';
import { registerTeardown } from '../src/core/teardown.js';
import {
  AmbiguousFixtureNameError,
  FixtureConstructionError,
  InvalidEngineConfigError,
  NoActiveScopeError,
  ScopeDisposedError,
  TeardownError,
} from '../src/errors/errors.js';
import { defineFixture } from '../src/registry/define.js';
import { FixtureRegistry } from '../src/registry/fixture-registry.js';

describe('FixtureEngine', () => {
  it('shares a module fixture across the tests of a module', async () => {
    const engine = new FixtureEngine();
    const db = vi.fn(() => ({ rows: [] }));
    const model = vi.fn((conn: unknown) => ({ conn }));
    const registry = engine.registry('UserTests', [
      defineFixture({ name: 'db', scope: 'module', produce: db }),
      defineFixture({ name: 'model', dependencies: ['db'], produce: model }),
    ]);

    const module = engine.startModule();
    for (let i = 0; i < 5; i++) {
      const test = engine.startTest();
      const fixtures = await engine.createFixtures(['model'], registry, { module, test });
      expect(fixtures.get('model')).toEqual({ conn: { rows: [] } });
      await engine.finishTest(test);
    }
    await engine.finishModule(module);

    expect(db).toHaveBeenCalledTimes(1);
    expect(model).toHaveBeenCalledTimes(5);
  });

  it('creates a module fixture once for concurrent tests', async () => {
    const engine = new FixtureEngine();
    const db = vi.fn(async () => ({ id: 'db' }));
    const registry = engine.registry('Suite', [defineFixture({ name: 'db', scope: 'module', produce: db })]);
    const module = engine.startModule();

    const results = await Promise.all([
      engine.createFixtures(['db'], registry, { module }),
      engine.createFixtures(['db'], registry, { module }),
      engine.createFixtures(['db'], registry, { module }),
    ]);

    expect(db).toHaveBeenCalledTimes(1);
    expect(results[1].get('db')).toBe(results[0].get('db'));
    expect(results[2].get('db')).toBe(results[0].get('db'));
  });

  it('tears a module down once and starts the next one fresh', async () => {
    const engine = new FixtureEngine();
    const events: string[] = [];
    let opened = 0;
    const registry = engine.registry('Suite', [
      defineFixture({
        name: 'db',
        scope: 'module',
        produce: () => {
          const id = ++opened;
          events.push(`open ${id}`);
          registerTeardown('module', () => void events.push(`close ${id}`));
          return id;
        },
      }),
    ]);

    const first = engine.startModule();
    await engine.createFixtures(['db'], registry, { module: first });
    await engine.createFixtures(['db'], registry, { module: first });
    await engine.finishModule(first);
    await engine.finishModule(first);

    const second = engine.startModule();
    const fixtures = await engine.createFixtures(['db'], registry, { module: second });
    await engine.finishModule(second);

    expect(fixtures.get('db')).toBe(2);
    expect(events).toEqual(['open 1', 'close 1', 'open 2', 'close 2']);
  });

  it('rejects requests against a finished module', async () => {
    const engine = new FixtureEngine();
    const registry = engine.registry('Suite', [defineFixture({ name: 'db', scope: 'module', produce: () => 1 })]);
    const module = engine.startModule();
    await engine.finishModule(module);

    expect(module.isFinished).toBe(true);
    expect(() => module.store).toThrow(ScopeDisposedError);
    await expect(engine.createFixtures(['db'], registry, { module })).rejects.toThrow(ScopeDisposedError);
  });

  it('runs test teardowns when the test finishes', async () => {
    const engine = new FixtureEngine();
    const removed: string[] = [];
    const registry = engine.registry('Suite', [
      defineFixture({
        name: 'tmpdir',
        produce: () => {
          registerTeardown('test', () => void removed.push('/tmp/a'));
          return '/tmp/a';
        },
      }),
    ]);
    const module = engine.startModule();
    const test = engine.startTest();

    await engine.createFixtures(['tmpdir'], registry, { module, test });
    expect(removed).toEqual([]);

    await engine.finishTest(test);
    expect(removed).toEqual(['/tmp/a']);
  });

  it('needs a test instance for test teardowns', async () => {
    const engine = new FixtureEngine();
    const registry = engine.registry('Suite', [
      defineFixture({
        name: 'tmpdir',
        produce: () => {
          registerTeardown('test', () => {});
          return '/tmp/a';
        },
      }),
    ]);

    const error = await engine
      .createFixtures(['tmpdir'], registry, { module: engine.startModule() })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FixtureConstructionError);
    expect(error).toMatchObject({ cause: expect.any(NoActiveScopeError) });
  });

  it('keeps earlier module results and teardowns when a test fixture fails', async () => {
    const engine = new FixtureEngine();
    const closed: string[] = [];
    const db = vi.fn(() => {
      registerTeardown('module', () => void closed.push('db'));
      return { rows: [] };
    });
    const registry = engine.registry('Suite', [
      defineFixture({ name: 'db', scope: 'module', produce: db }),
      defineFixture({
        name: 'model',
        dependencies: ['db'],
        produce: () => {
          throw new Error('bad schema');
        },
      }),
    ]);
    const module = engine.startModule();

    await expect(engine.createFixtures(['model'], registry, { module })).rejects.toMatchObject({
      fixtureName: 'model',
    });
    const fixtures = await engine.createFixtures(['db'], registry, { module });
    expect(fixtures.get('db')).toEqual({ rows: [] });
    expect(db).toHaveBeenCalledTimes(1);
    expect(closed).toEqual([]);

    await engine.finishModule(module);
    expect(closed).toEqual(['db']);
  });

  it('finishes the module even when a teardown fails', async () => {
    const engine = new FixtureEngine();
    const registry = engine.registry('Suite', [
      defineFixture({
        name: 'db',
        scope: 'module',
        produce: () => {
          registerTeardown('module', () => {
            throw new Error('close failed');
          });
          return 'db';
        },
      }),
    ]);
    const module = engine.startModule();
    await engine.createFixtures(['db'], registry, { module });

    await expect(engine.finishModule(module)).rejects.toThrow(TeardownError);
    expect(module.isFinished).toBe(true);
  });

  describe('session', () => {
    it('shares session fixtures across modules and ends once', async () => {
      const engine = new FixtureEngine();
      const stopped = vi.fn();
      const server = vi.fn(() => {
        registerTeardown('session', stopped);
        return { port: 4000 };
      });
      const registry = engine.registry('Suite', [
        defineFixture({ name: 'server', scope: 'session', produce: server }),
      ]);

      for (let i = 0; i < 2; i++) {
        const module = engine.startModule();
        await engine.createFixtures(['server'], registry, { module });
        await engine.finishModule(module);
      }
      expect(stopped).not.toHaveBeenCalled();

      await engine.endSession();
      await engine.endSession();

      expect(server).toHaveBeenCalledTimes(1);
      expect(stopped).toHaveBeenCalledTimes(1);
      expect(engine.isSessionEnded).toBe(true);
      expect(() => engine.session).toThrow(ScopeDisposedError);
    });

    it('ends cleanly when it never started', async () => {
      const engine = new FixtureEngine();

      await expect(engine.endSession()).resolves.toBeUndefined();
      expect(engine.isSessionEnded).toBe(true);
    });
  });

  describe('configuration', () => {
    it('has a default name', () => {
      expect(new FixtureEngine().getName()).toBe('FixtureEngine');
      expect(new FixtureEngine({ name: 'api' }).getName()).toBe('api');
    });

    it('rejects invalid settings', () => {
      expect(() => new FixtureEngine(null as never)).toThrow(InvalidEngineConfigError);
      expect(() => new FixtureEngine({ name: 5 as never })).toThrow("'name' must be a string.");
      expect(() => new FixtureEngine({ shadowPolicy: 'loud' as never })).toThrow(
        "'shadowPolicy' must be one of error, allow, warn, got loud."
      );
      expect(() => new FixtureEngine({ autoDispose: 'yes' as never })).toThrow(
        "'autoDispose' must be a boolean."
      );
      expect(() => new FixtureEngine({ onProduce: 1 as never })).toThrow(
        "'onProduce' must be a function."
      );
    });

    it('applies its shadow policy to registries', () => {
      const engine = new FixtureEngine({ shadowPolicy: 'error' });
      const a = FixtureRegistry.merge('A', [defineFixture({ name: 'db', produce: () => 'a' })]);
      const b = FixtureRegistry.merge('B', [defineFixture({ name: 'db', produce: () => 'b' })]);

      expect(() => engine.registry('Suite', [], [a, b])).toThrow(AmbiguousFixtureNameError);
    });

    it('disposes values when autoDispose is on', async () => {
      const engine = new FixtureEngine({ autoDispose: true });
      const close = vi.fn();
      const registry = engine.registry('Suite', [
        defineFixture({ name: 'conn', scope: 'module', produce: () => ({ close }) }),
      ]);
      const module = engine.startModule();

      await engine.createFixtures(['conn'], registry, { module });
      expect(close).not.toHaveBeenCalled();

      await engine.finishModule(module);
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('closes a disposable test value that has no test instance to live in', async () => {
      const engine = new FixtureEngine({ autoDispose: true });
      const close = vi.fn();
      const registry = engine.registry('Suite', [
        defineFixture({ name: 'conn', produce: () => ({ close }) }),
      ]);

      const error = await engine
        .createFixtures(['conn'], registry, { module: engine.startModule() })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FixtureConstructionError);
      expect(error).toMatchObject({ fixtureName: 'conn', cause: expect.any(NoActiveScopeError) });
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('reports producer timings', async () => {
      const onProduce = vi.fn();
      const engine = new FixtureEngine({ onProduce });
      const registry = engine.registry('Suite', [defineFixture({ name: 'db', produce: () => 1 })]);

      await engine.createFixtures(['db'], registry, { module: engine.startModule() });

      expect(onProduce).toHaveBeenCalledWith('Suite.db', expect.any(Number));
    });
  });
});

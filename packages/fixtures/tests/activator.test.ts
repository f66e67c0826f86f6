import { describe, expect, it, vi } from 'vitest';

import { Activator, disposerOf } from '../src/core/activator.js';
import { TeardownScheduler } from '../src/core/teardown.js';
import { FixtureConstructionError, NoActiveScopeError } from '../src/errors/errors.js';
import { defineFixture } from '../src/registry/define.js';
import { FixtureRegistry } from '../src/registry/fixture-registry.js';
import type { FixtureScopeType, Producer } from '../src/types/types.js';
import { definitionOf } from './helpers.js';

const fixture = (produce: Producer, scope: FixtureScopeType = 'test') =>
  definitionOf(FixtureRegistry.merge('S', [defineFixture({ name: 'db', scope, produce })]), 'db');

describe('Activator', () => {
  it('passes dependency values in order', async () => {
    const activator = new Activator();

    await expect(activator.produce(fixture((a, b) => [a, b]), [1, 2])).resolves.toEqual([1, 2]);
  });

  it('awaits async producers', async () => {
    const activator = new Activator();

    await expect(activator.produce(fixture(async () => 'ready'), [])).resolves.toBe('ready');
  });

  it('wraps producer failures', async () => {
    const cause = new Error('connection refused');
    const activator = new Activator();

    const error = await activator
      .produce(
        fixture(() => {
          throw cause;
        }),
        []
      )
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FixtureConstructionError);
    expect(error).toMatchObject({ fixtureName: 'db', qualifiedName: 'S.db', cause });
  });

  it('reports every call to onProduce', async () => {
    const onProduce = vi.fn();
    const activator = new Activator({ onProduce });

    await activator.produce(fixture(() => 1), []);
    await activator
      .produce(
        fixture(async () => {
          throw new Error('boom');
        }),
        []
      )
      .catch(() => undefined);

    expect(onProduce).toHaveBeenCalledTimes(2);
    expect(onProduce).toHaveBeenNthCalledWith(1, 'S.db', expect.any(Number));
    expect(onProduce).toHaveBeenNthCalledWith(2, 'S.db', expect.any(Number));
  });

  describe('autoDispose', () => {
    it('registers dispose() on the scope of the fixture', async () => {
      const scheduler = new TeardownScheduler();
      const module = scheduler.open('module');
      const dispose = vi.fn();
      const activator = new Activator({ autoDispose: true });

      await scheduler.run({ module }, () => activator.produce(fixture(() => ({ dispose }), 'module'), []));
      expect(scheduler.pendingCount(module)).toBe(1);
      expect(dispose).not.toHaveBeenCalled();

      await scheduler.runScope(module);
      expect(dispose).toHaveBeenCalledTimes(1);
    });

    it('falls back to close()', async () => {
      const scheduler = new TeardownScheduler();
      const test = scheduler.open('test');
      const close = vi.fn();
      const activator = new Activator({ autoDispose: true });

      await scheduler.run({ test }, () => activator.produce(fixture(() => ({ close })), []));
      await scheduler.runScope(test);

      expect(close).toHaveBeenCalledTimes(1);
    });

    it('leaves plain values alone', async () => {
      const activator = new Activator({ autoDispose: true });

      await expect(activator.produce(fixture(() => 42), [])).resolves.toBe(42);
    });

    it('is off by default', async () => {
      const scheduler = new TeardownScheduler();
      const test = scheduler.open('test');
      const activator = new Activator();

      await scheduler.run({ test }, () => activator.produce(fixture(() => ({ dispose: vi.fn() })), []));

      expect(scheduler.pendingCount(test)).toBe(0);
    });

    it('releases the value when its scope has no live instance', async () => {
      const dispose = vi.fn();
      const activator = new Activator({ autoDispose: true });

      const error = await activator
        .produce(fixture(() => ({ dispose })), [])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FixtureConstructionError);
      expect(error).toMatchObject({ fixtureName: 'db', cause: expect.any(NoActiveScopeError) });
      expect(dispose).toHaveBeenCalledTimes(1);
    });

    it('reports a failing release alongside the missing scope', async () => {
      const activator = new Activator({ autoDispose: true });
      const close = () => {
        throw new Error('close failed');
      };

      const error = await activator.produce(fixture(() => ({ close })), []).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FixtureConstructionError);
      if (!(error instanceof FixtureConstructionError)) return;
      expect(error.cause).toBeInstanceOf(AggregateError);
      if (!(error.cause instanceof AggregateError)) return;
      expect(error.cause.errors.map((e: unknown) => (e instanceof Error ? e.message : e))).toEqual([
        expect.stringContaining('No active'),
        'close failed',
      ]);
    });
  });
});

describe('disposerOf', () => {
  it('ignores values without dispose() or close()', () => {
    expect(disposerOf(null)).toBeUndefined();
    expect(disposerOf(7)).toBeUndefined();
    expect(disposerOf({ dispose: 'no' })).toBeUndefined();
  });

  it('prefers dispose() and keeps the receiver', async () => {
    const calls: string[] = [];
    const resource = {
      label: 'pool',
      dispose() {
        calls.push(`dispose ${this.label}`);
      },
      close() {
        calls.push('close');
      },
    };

    await disposerOf(resource)?.();

    expect(calls).toEqual(['dispose pool']);
  });
});

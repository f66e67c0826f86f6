/**
 * Fixture creation benchmark
 *
 * Scenarios:
 * 1. Graph resolution of a deep chain and of a wide fan-in
 * 2. Per-test creation with module fixtures already cached
 * 3. Per-test creation of test-scoped fixtures only
 * 4. Full engine lifecycle: start test, create, finish test
 * 5. Registry merge with overrides over a large import
 *
 * Run:
 *   npm run bench --workspace @rigging/fixtures
 */

import { Bench } from 'tinybench';

import {
  defineFixture,
  FixtureEngine,
  FixtureRegistry,
  resolve,
  type FixtureSpec,
} from '../src/index.js';

// ==================== Setup ====================

const CHAIN_DEPTH = 20;
const FAN_IN = 200;

const chain: FixtureSpec[] = [defineFixture({ name: 'link0', produce: () => 0 })];
for (let i = 1; i < CHAIN_DEPTH; i++) {
  chain.push(
    defineFixture({
      name: `link${i}`,
      dependencies: [`link${i - 1}`],
      produce: (prev) => Number(prev) + 1,
    })
  );
}
const chainRegistry = FixtureRegistry.merge('Chain', chain);
const chainTip = `link${CHAIN_DEPTH - 1}`;

const leaves: FixtureSpec[] = [];
for (let i = 0; i < FAN_IN; i++) {
  leaves.push(defineFixture({ name: `leaf${i}`, scope: 'module', produce: () => i }));
}
const wideRegistry = FixtureRegistry.merge('Wide', [
  ...leaves,
  defineFixture({
    name: 'sum',
    dependencies: leaves.map((l) => l.name),
    produce: (...values) => values.reduce<number>((acc, v) => acc + Number(v), 0),
  }),
]);

const engine = new FixtureEngine({ shadowPolicy: 'allow' });
const appRegistry = engine.registry('App', [
  defineFixture({ name: 'config', scope: 'session', produce: () => ({ url: 'memory://' }) }),
  defineFixture({
    name: 'db',
    scope: 'module',
    dependencies: ['config'],
    produce: (config) => ({ config, rows: new Map<string, unknown>() }),
  }),
  defineFixture({ name: 'model', dependencies: ['db'], produce: (db) => ({ db }) }),
  defineFixture({ name: 'request', dependencies: ['model', 'context'], produce: (m, ctx) => [m, ctx] }),
]);
const warmModule = engine.startModule();

// ==================== Benchmark ====================

const bench = new Bench({
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add(`resolve: chain of ${CHAIN_DEPTH}`, () => {
  if (resolve([chainTip], chainRegistry).length !== CHAIN_DEPTH) throw new Error('Invalid');
});

bench.add(`resolve: fan-in of ${FAN_IN}`, () => {
  if (resolve(['sum'], wideRegistry).length !== FAN_IN + 1) throw new Error('Invalid');
});

bench.add('create: module fixtures cached', async () => {
  const fixtures = await engine.createFixtures(['model'], appRegistry, { module: warmModule });
  if (!fixtures.has('model')) throw new Error('Invalid');
});

bench.add(`create: ${CHAIN_DEPTH} test fixtures`, async () => {
  const fixtures = await engine.createFixtures([chainTip], chainRegistry, { module: warmModule });
  if (fixtures.get(chainTip) !== CHAIN_DEPTH - 1) throw new Error('Invalid');
});

bench.add('lifecycle: start, create, finish test', async () => {
  const test = engine.startTest();
  await engine.createFixtures(['request'], appRegistry, { module: warmModule, test, context: {} });
  await engine.finishTest(test);
});

bench.add('lifecycle: fresh module per test', async () => {
  const module = engine.startModule();
  await engine.createFixtures(['model'], appRegistry, { module });
  await engine.finishModule(module);
});

bench.add(`merge: override ${FAN_IN} imported fixtures`, () => {
  const overrides = leaves.map((leaf) =>
    defineFixture({ name: leaf.name, scope: 'module', dependencies: [leaf.name], produce: (v) => v })
  );
  FixtureRegistry.merge('Override', overrides, [wideRegistry]);
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Fixture Creation Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.hz ? task.result.hz.toFixed(0) : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
  }))
);

await engine.finishModule(warmModule);
await engine.endSession();

const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const suggest = (suggestion?: string): string =>
  suggestion !== undefined ? ` Did you mean '${suggestion}'?` : '';

/**
 * Fixture name could not be resolved, with the closest known name when
 * there is one.
 */
export class FixtureNotFoundError extends Error {
  constructor(
    public fixtureName: string,
    public suggestion?: string,
    public requiredBy?: string
  ) {
    const headline = `Could not find a fixture named '${fixtureName}'.${suggest(suggestion)}`;
    const parts: string[] = [headline, ''];

    if (requiredBy !== undefined) {
      parts.push(`Required by: ${requiredBy}`, '');
    }

    parts.push(
      'To fix this:',
      `  1. Check the spelling of '${fixtureName}'`,
      `  2. Define it with defineFixture({ name: '${fixtureName}', ... })`,
      `  3. Or import the registry that defines it`
    );

    super(format(headline, parts));
    this.name = 'FixtureNotFoundError';
  }
}

export class DuplicateFixtureNameError extends Error {
  constructor(
    public fixtureName: string,
    public owner: string
  ) {
    const dev = [
      'Duplicate fixture name',
      '',
      `There is already a fixture named '${fixtureName}' in '${owner}'.`,
      '',
      'A fixture may override an imported one, but local names must be unique.',
    ];
    super(format(`Duplicate fixture '${fixtureName}' in '${owner}'.`, dev));
    this.name = 'DuplicateFixtureNameError';
  }
}

/**
 * A fixture depends on a fixture that lives for less time than itself.
 *
 * Scope rules:
 * - Session fixtures may depend on session fixtures only
 * - Module fixtures may depend on module and session fixtures
 * - Test fixtures may depend on anything, including the test context
 */
export class ScopeMismatchError extends Error {
  constructor(
    public dependent: string,
    public dependentScope: string,
    public dependency: string,
    public dependencyScope: string
  ) {
    const dev = [
      'Mis-matched scopes:',
      '',
      `  '${dependent}' is scoped to the ${dependentScope}`,
      `  '${dependency}' is scoped to the ${dependencyScope}`,
      `  but '${dependent}' depends on '${dependency}'.`,
      '',
      `A ${dependentScope} fixture would capture the first ${dependencyScope} value it saw.`,
      '',
      'To fix this:',
      `  1. Change '${dependent}' to ${dependencyScope} scope`,
      `  2. Change '${dependency}' to ${dependentScope} scope`,
    ];
    super(
      format(
        `Scope mismatch: ${dependentScope} fixture '${dependent}' depends on ${dependencyScope} fixture '${dependency}'.`,
        dev
      )
    );
    this.name = 'ScopeMismatchError';
  }
}

export class CyclicDependencyError extends Error {
  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const dev = [
      'Circular fixture dependency detected:',
      '',
      `  ${cycleStr}`,
      '',
      `${cycle[0]} depends on itself through other fixtures.`,
    ];
    super(format(`Circular fixture dependency detected: ${cycleStr}`, dev));
    this.name = 'CyclicDependencyError';
  }
}

/**
 * A producer threw or rejected. The original error is kept as `cause`.
 */
export class FixtureConstructionError extends Error {
  constructor(
    public fixtureName: string,
    public qualifiedName: string,
    cause: unknown
  ) {
    const dev = [
      'Fixture construction failed',
      '',
      `Producer for '${fixtureName}' (${qualifiedName}) failed. See 'cause' for details.`,
    ];
    super(format(`Fixture '${fixtureName}' failed during construction.`, dev), { cause });
    this.name = 'FixtureConstructionError';
  }
}

export class NoActiveScopeError extends Error {
  constructor(public scope: string) {
    const dev = [
      'No active scope',
      '',
      `A ${scope} teardown was registered outside of any live ${scope} scope.`,
      '',
      'Register teardowns from inside a producer, or inside teardown.run().',
    ];
    super(format(`No active ${scope} scope to register a teardown with.`, dev));
    this.name = 'NoActiveScopeError';
  }
}

export class InvalidFixtureDefinitionError extends Error {
  constructor(
    public reason: string,
    public fixtureName?: string
  ) {
    const subject = fixtureName !== undefined ? `fixture '${fixtureName}'` : 'fixture';
    const dev = [
      'Invalid fixture definition',
      '',
      `Invalid ${subject}: ${reason}`,
      '',
      'Expected shape:',
      `  defineFixture({ name, produce, dependencies?, scope?, autouse? })`,
    ];
    super(format(`Invalid ${subject}: ${reason}`, dev));
    this.name = 'InvalidFixtureDefinitionError';
  }
}

export class AmbiguousFixtureNameError extends Error {
  constructor(
    public fixtureName: string,
    public candidates: string[]
  ) {
    const dev = [
      `Fixture '${fixtureName}' is exposed by more than one import:`,
      ...candidates.map((c) => `  - ${c}`),
      '',
      'To fix:',
      `  1) Define '${fixtureName}' locally to pick one explicitly.`,
      `  2) Import only one of the registries.`,
      `  3) Or set shadowPolicy: 'allow' to let the last import win.`,
    ];
    super(format(`Ambiguous fixture '${fixtureName}': ${candidates.join(', ')}.`, dev));
    this.name = 'AmbiguousFixtureNameError';
  }
}

export class ScopeDisposedError extends Error {
  constructor(public scopeId?: string) {
    const which = scopeId !== undefined ? `Scope '${scopeId}'` : 'Scope';
    const dev = [
      'Scope disposed',
      '',
      `${which} has been disposed. Do not request fixtures after its teardown ran.`,
    ];
    super(format(`${which} has been disposed.`, dev));
    this.name = 'ScopeDisposedError';
  }
}

/**
 * A single teardown callback failed. The failure is kept as `cause`.
 */
export class TeardownError extends Error {
  constructor(
    public scopeId: string,
    cause: unknown
  ) {
    const dev = [
      'Teardown failed',
      '',
      `A teardown registered on '${scopeId}' failed. See 'cause' for details.`,
    ];
    super(format(`Teardown of '${scopeId}' failed.`, dev), { cause });
    this.name = 'TeardownError';
  }
}

/**
 * Several teardown callbacks of one scope instance failed.
 */
export class AggregateTeardownError extends Error {
  constructor(
    public scopeId: string,
    public errors: Error[]
  ) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n');
    const dev = [
      'Multiple teardown errors occurred',
      '',
      `${errors.length} teardown(s) of '${scopeId}' failed:`,
      errorList,
      '',
      'Check the `errors` property for detailed information about each failure.',
    ];
    super(format(`${errors.length} teardown error(s) occurred in '${scopeId}'.`, dev));
    this.name = 'AggregateTeardownError';
  }
}

export class InvalidEngineConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid engine configuration', '', `Invalid engine configuration: ${reason}`];
    super(format(`Invalid engine configuration: ${reason}`, dev));
    this.name = 'InvalidEngineConfigError';
  }
}

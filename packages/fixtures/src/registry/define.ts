import { isQualifiable, SEPARATOR } from '../core/qualified-name.js';
import { InvalidFixtureDefinitionError } from '../errors/errors.js';
import {
  CONTEXT,
  FixtureScope,
  isFixtureScope,
  type FixtureOptions,
  type FixtureSpec,
} from '../types/types.js';

const EMPTY_DEPS: readonly string[] = Object.freeze([]);

/**
 * Declare a fixture.
 *
 * The returned spec is frozen and unqualified; pass it to
 * `FixtureRegistry.merge()` to give it an owner and resolve its
 * dependencies.
 *
 * @example
 * ```typescript
 * const db = defineFixture({
 *   name: 'db',
 *   scope: 'module',
 *   produce: () => openDatabase(),
 * });
 *
 * const user = defineFixture({
 *   name: 'user',
 *   dependencies: ['db', 'context'],
 *   produce: (db, ctx) => insertUser(db, ctx),
 * });
 * ```
 *
 * @throws {InvalidFixtureDefinitionError} on a malformed declaration
 */
export function defineFixture<T>(options: FixtureOptions<T>): FixtureSpec<T> {
  const { name, produce, dependencies, scope, autouse } = options;

  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidFixtureDefinitionError(`'name' must be a non-empty string.`);
  }
  if (!isQualifiable(name)) {
    throw new InvalidFixtureDefinitionError(`'name' must not contain '${SEPARATOR}'.`, name);
  }
  if (name === CONTEXT) {
    throw new InvalidFixtureDefinitionError(
      `'${CONTEXT}' is reserved for the test context.`,
      name
    );
  }
  if (typeof produce !== 'function') {
    throw new InvalidFixtureDefinitionError(`'produce' must be a function.`, name);
  }
  if (scope !== undefined && !isFixtureScope(scope)) {
    throw new InvalidFixtureDefinitionError(
      `'scope' must be one of 'test', 'module', 'session', got ${String(scope)}.`,
      name
    );
  }
  if (autouse !== undefined && typeof autouse !== 'boolean') {
    throw new InvalidFixtureDefinitionError(`'autouse' must be a boolean.`, name);
  }

  let deps = EMPTY_DEPS;
  if (dependencies !== undefined) {
    if (!Array.isArray(dependencies)) {
      throw new InvalidFixtureDefinitionError(`'dependencies' must be an array.`, name);
    }
    dependencies.forEach((dep: unknown, i) => {
      if (typeof dep !== 'string' || dep.length === 0) {
        throw new InvalidFixtureDefinitionError(
          `dependencies[${i}] must be a non-empty string.`,
          name
        );
      }
    });
    deps = Object.freeze([...dependencies]);
  }

  return Object.freeze({
    name,
    produce,
    dependencies: deps,
    scope: scope ?? FixtureScope.Test,
    autouse: autouse ?? false,
  });
}

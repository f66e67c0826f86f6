import { qualify } from '../src/core/qualified-name.js';
import type { FixtureRegistry } from '../src/registry/fixture-registry.js';
import type { FixtureDefinition } from '../src/types/types.js';

/**
 * Definition `owner.name` from `registry`, failing the test when it is missing.
 */
export function definitionOf(registry: FixtureRegistry, name: string): FixtureDefinition {
  const def = registry.get(qualify(registry.owner, name));
  if (!def) throw new Error(`No definition for ${registry.owner}.${name}`);
  return def;
}

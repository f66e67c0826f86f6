/**
 * Branded type for globally unique fixture identifiers.
 * Prevents accidental use of local names where a qualified one is expected.
 */
export type QualifiedName = string & { __brand: 'QualifiedName' };

/**
 * Separator between the owner and the local name.
 */
export const SEPARATOR = '.';

/**
 * Build the qualified name of a fixture defined by `owner`.
 *
 * @example
 * ```typescript
 * qualify('UserTests', 'db'); // 'UserTests.db'
 * ```
 */
export function qualify(owner: string, name: string): QualifiedName {
  return `${owner}${SEPARATOR}${name}` as QualifiedName;
}

/**
 * Check that `part` can be one side of a qualified name: non-empty and free
 * of the separator, so that distinct owner/name pairs never qualify alike.
 */
export function isQualifiable(part: string): boolean {
  return part.length > 0 && !part.includes(SEPARATOR);
}

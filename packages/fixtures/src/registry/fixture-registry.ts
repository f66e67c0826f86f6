/*
 * FixtureRegistry
 * ---------------
 * Immutable snapshot of the fixtures visible from one defining scope (a test
 * module, a shared fixture file, ...), built by merging local declarations
 * over imported registries.
 *
 * Responsibilities
 *  - qualify local declarations with the owner's name
 *  - hide imported definitions shadowed by a local one of the same name
 *  - resolve dependency names to qualified names, forwarding a self-reference
 *    to the definition it overrides
 *  - reject duplicate local names, scope lifetime violations and cycles before
 *    any test runs
 *
 * Design notes
 *  - `hidden` is a property of a snapshot, not of a definition: the same
 *    imported definition may be visible in one registry and shadowed in the
 *    next. Definitions are copied with the flag set for this snapshot.
 *  - Hidden definitions stay in `definitions` so that qualified edges pointing
 *    at them keep resolving.
 */
import { findCycle } from '../core/graph.js';
import { isQualifiable, qualify, SEPARATOR, type QualifiedName } from '../core/qualified-name.js';
import { closestName } from '../core/similarity.js';
import {
  AmbiguousFixtureNameError,
  CyclicDependencyError,
  DuplicateFixtureNameError,
  FixtureNotFoundError,
  InvalidFixtureDefinitionError,
  ScopeMismatchError,
} from '../errors/errors.js';
import {
  CONTEXT,
  FixtureScope,
  scopeRank,
  type FixtureDefinition,
  type FixtureSpec,
  type RegistryOptions,
} from '../types/types.js';

export class FixtureRegistry {
  private constructor(
    /** Name of the defining scope; prefix of every local qualified name */
    readonly owner: string,
    /** Every definition reachable from this snapshot, hidden ones included */
    private readonly byQualified: ReadonlyMap<QualifiedName, FixtureDefinition>,
    /** Local name -> qualified name, for non-hidden definitions only */
    private readonly visible: ReadonlyMap<string, QualifiedName>
  ) {}

  /**
   * A registry with no fixtures.
   */
  static empty(owner = 'root'): FixtureRegistry {
    return new FixtureRegistry(owner, new Map(), new Map());
  }

  /**
   * Merge local declarations over imported registries.
   *
   * @param owner - Name of the defining scope, used to qualify locals
   * @param locals - Fixtures declared in this scope
   * @param imported - Registries this scope imports from, in import order
   * @param options - Import conflict policy
   *
   * @throws {DuplicateFixtureNameError} when two locals share a name
   * @throws {FixtureNotFoundError} when a dependency can't be resolved
   * @throws {ScopeMismatchError} when a dependency lives shorter than its dependent
   * @throws {CyclicDependencyError} when local definitions depend on each other in a cycle
   * @throws {AmbiguousFixtureNameError} on conflicting imports under shadowPolicy 'error'
   * @throws {InvalidFixtureDefinitionError} when `owner` is empty or contains '.'
   */
  static merge(
    owner: string,
    locals: readonly FixtureSpec[],
    imported: readonly FixtureRegistry[] = [],
    options: RegistryOptions = {}
  ): FixtureRegistry {
    if (!isQualifiable(owner)) {
      throw new InvalidFixtureDefinitionError(
        `owner '${owner}' must be non-empty and must not contain '${SEPARATOR}'.`
      );
    }
    const all = new Map<QualifiedName, FixtureDefinition>();
    const importedVisible = mergeImports(owner, imported, all, options);

    // Local names must be unique; their qualified names must not clash with
    // anything already imported either
    const localByName = new Map<string, FixtureSpec>();
    for (const spec of locals) {
      if (localByName.has(spec.name) || all.has(qualify(owner, spec.name))) {
        throw new DuplicateFixtureNameError(spec.name, owner);
      }
      localByName.set(spec.name, spec);
    }

    const qualifiedLocals = new Map<QualifiedName, FixtureDefinition>();
    for (const spec of localByName.values()) {
      const def = qualifyLocal(owner, spec, localByName, importedVisible, all);
      qualifiedLocals.set(def.qualifiedName, def);
    }

    // Imports are acyclic already and can't point back at locals, so any cycle
    // runs through locals only
    const cycle = findCycle(qualifiedLocals.keys(), (q) =>
      (qualifiedLocals.get(q)?.qualifiedDependencies ?? []).filter(
        (d): d is QualifiedName => d !== undefined && qualifiedLocals.has(d)
      )
    );
    if (cycle) throw new CyclicDependencyError(cycle);

    const visible = new Map<string, QualifiedName>(importedVisible);
    for (const def of qualifiedLocals.values()) visible.set(def.name, def.qualifiedName);

    const byQualified = new Map<QualifiedName, FixtureDefinition>();
    for (const def of all.values()) {
      const hidden = visible.get(def.name) !== def.qualifiedName;
      byQualified.set(
        def.qualifiedName,
        def.hidden === hidden ? def : Object.freeze({ ...def, hidden })
      );
    }
    for (const def of qualifiedLocals.values()) byQualified.set(def.qualifiedName, def);

    return new FixtureRegistry(owner, byQualified, visible);
  }

  /**
   * Number of definitions in this snapshot, hidden ones included.
   */
  get size(): number {
    return this.byQualified.size;
  }

  /**
   * Resolve a local name to the qualified name of its visible definition.
   *
   * @throws {FixtureNotFoundError} with the closest visible name as suggestion
   */
  resolveName(name: string): QualifiedName {
    const qualified = this.visible.get(name);
    if (qualified === undefined) {
      throw new FixtureNotFoundError(name, closestName(name, this.visible.keys()));
    }
    return qualified;
  }

  /**
   * Check whether a local name resolves to a visible definition.
   */
  has(name: string): boolean {
    return this.visible.has(name);
  }

  /**
   * Look up a definition by qualified name, hidden or not.
   */
  get(qualified: QualifiedName): FixtureDefinition | undefined {
    return this.byQualified.get(qualified);
  }

  /**
   * Names that resolve in this registry.
   */
  visibleNames(): string[] {
    return [...this.visible.keys()];
  }

  /**
   * Qualified names of every definition, hidden ones included.
   */
  qualifiedNames(): QualifiedName[] {
    return [...this.byQualified.keys()];
  }

  /**
   * Visible names of fixtures flagged autouse.
   */
  autouseNames(): string[] {
    const names: string[] = [];
    for (const [name, qualified] of this.visible) {
      if (this.byQualified.get(qualified)?.autouse) names.push(name);
    }
    return names;
  }

  /**
   * Every definition in this snapshot, hidden ones included.
   */
  definitions(): FixtureDefinition[] {
    return [...this.byQualified.values()];
  }
}

/**
 * Combine imported registries into `all` and return the name -> qualified
 * map of what they expose.
 */
function mergeImports(
  owner: string,
  imported: readonly FixtureRegistry[],
  all: Map<QualifiedName, FixtureDefinition>,
  { shadowPolicy = 'warn' }: RegistryOptions
): Map<string, QualifiedName> {
  const exposedBy = new Map<string, QualifiedName[]>();
  // Definitions some import already overrides
  const overridden = new Set<QualifiedName>();

  for (const registry of imported) {
    for (const def of registry.definitions()) {
      all.set(def.qualifiedName, def);
      if (def.hidden) overridden.add(def.qualifiedName);
    }
    for (const name of registry.visibleNames()) {
      const qualified = registry.resolveName(name);
      const candidates = exposedBy.get(name);
      if (!candidates) exposedBy.set(name, [qualified]);
      else if (!candidates.includes(qualified)) candidates.push(qualified);
    }
  }

  const visible = new Map<string, QualifiedName>();
  const conflicts: Array<[string, QualifiedName[]]> = [];
  for (const [name, exposed] of exposedBy) {
    const live = exposed.filter((q) => !overridden.has(q));
    const candidates = live.length > 0 ? live : exposed;
    visible.set(name, candidates[candidates.length - 1]);
    if (candidates.length > 1) conflicts.push([name, candidates]);
  }

  if (conflicts.length === 0 || shadowPolicy === 'allow') return visible;

  if (shadowPolicy === 'error') {
    const [name, candidates] = conflicts[0];
    throw new AmbiguousFixtureNameError(name, candidates);
  }

  console.warn(`[rigging] Conflicting fixture imports detected in '${owner}':`);
  for (const [name, candidates] of conflicts) {
    console.warn(
      `  - Fixture '${name}' exposed by: ${candidates.join(', ')} (using ${candidates[candidates.length - 1]})`
    );
  }
  return visible;
}

/**
 * Qualify one local declaration and validate its dependencies.
 */
function qualifyLocal(
  owner: string,
  spec: FixtureSpec,
  locals: ReadonlyMap<string, FixtureSpec>,
  importedVisible: ReadonlyMap<string, QualifiedName>,
  all: ReadonlyMap<QualifiedName, FixtureDefinition>
): FixtureDefinition {
  const qualifiedName = qualify(owner, spec.name);

  const qualifiedDependencies = spec.dependencies.map((dep): QualifiedName | undefined => {
    if (dep === CONTEXT) {
      if (spec.scope !== FixtureScope.Test) {
        throw new ScopeMismatchError(spec.name, spec.scope, CONTEXT, FixtureScope.Test);
      }
      return undefined;
    }

    // A fixture naming itself forwards to the definition it overrides
    if (dep === spec.name) {
      const forwarded = importedVisible.get(dep);
      const target = forwarded !== undefined ? all.get(forwarded) : undefined;
      if (forwarded === undefined || !target) {
        throw new FixtureNotFoundError(dep, closestName(dep, importedVisible.keys()), spec.name);
      }
      assertScopes(spec, target);
      return forwarded;
    }

    const local = locals.get(dep);
    if (local) {
      assertScopes(spec, local);
      return qualify(owner, dep);
    }

    const imported = importedVisible.get(dep);
    const target = imported !== undefined ? all.get(imported) : undefined;
    if (imported === undefined || !target) {
      const candidates = new Set([...locals.keys(), ...importedVisible.keys()]);
      throw new FixtureNotFoundError(dep, closestName(dep, candidates), spec.name);
    }
    assertScopes(spec, target);
    return imported;
  });

  return Object.freeze({
    name: spec.name,
    produce: spec.produce,
    dependencies: spec.dependencies,
    scope: spec.scope,
    autouse: spec.autouse,
    qualifiedName,
    owner,
    qualifiedDependencies: Object.freeze(qualifiedDependencies),
    hidden: false,
  });
}

function assertScopes(dependent: FixtureSpec, dependency: FixtureSpec): void {
  if (scopeRank(dependency.scope) < scopeRank(dependent.scope)) {
    throw new ScopeMismatchError(dependent.name, dependent.scope, dependency.name, dependency.scope);
  }
}

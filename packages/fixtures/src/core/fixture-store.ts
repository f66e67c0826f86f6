/* FixtureStore
 *
 * Get-or-create cache shared by every test running inside one module run
 * (module store) or one engine session (session store).
 *
 * Guarantees
 *  - At most one factory invocation per key while the key is committed or in
 *    flight. Concurrent callers for a key await the same pending promise.
 *  - Creation for one key never waits on another key.
 *  - A factory sees a frozen snapshot of the values committed before it ran.
 *  - `getOrCreate` is the only write path.
 *
 * Failure policy
 *  - A failing factory leaves its key uncommitted and clears the pending
 *    promise. Callers already waiting get the error; the next caller starts a
 *    fresh attempt. A store is never poisoned by a failed construction.
 *
 * Disposal
 *  - `dispose()` drops every value and rejects later requests with
 *    ScopeDisposedError. A creation that settles after disposal is not
 *    committed.
 */

import { ScopeDisposedError } from '../errors/errors.js';
import type { QualifiedName } from './qualified-name.js';

export type StoreSnapshot = ReadonlyMap<QualifiedName, unknown>;

export type StoreFactory = (snapshot: StoreSnapshot) => unknown;

export class FixtureStore {
  /** Committed values, in commit order */
  private readonly values = new Map<QualifiedName, unknown>();

  /** In-flight creations, one per key */
  private readonly pending = new Map<QualifiedName, Promise<unknown>>();

  private disposed = false;

  /**
   * @param id - Scope instance id, used in error messages
   */
  constructor(readonly id?: string) {}

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Number of committed values.
   */
  get size(): number {
    return this.values.size;
  }

  has(key: QualifiedName): boolean {
    return this.values.has(key);
  }

  /**
   * Frozen copy of the committed values.
   */
  snapshot(): StoreSnapshot {
    return Object.freeze(new Map(this.values));
  }

  /**
   * Return the value stored under `key`, creating it with `factory` when it
   * is neither committed nor in flight.
   *
   * @throws {ScopeDisposedError} if the store has been disposed
   * @throws whatever `factory` throws, for every caller waiting on that attempt
   */
  async getOrCreate(key: QualifiedName, factory: StoreFactory): Promise<unknown> {
    if (this.disposed) throw new ScopeDisposedError(this.id);

    // Fast path: already committed
    if (this.values.has(key)) return this.values.get(key);

    let inflight = this.pending.get(key);
    if (!inflight) {
      const attempt: Promise<unknown> = Promise.resolve()
        .then(() => factory(this.snapshot()))
        .then(
          (value) => {
            if (this.pending.get(key) === attempt) this.pending.delete(key);
            if (!this.disposed) this.values.set(key, value);
            return value;
          },
          (err: unknown) => {
            // Uncommitted: the next caller retries from scratch
            if (this.pending.get(key) === attempt) this.pending.delete(key);
            throw err;
          }
        );
      this.pending.set(key, attempt);
      inflight = attempt;
    }

    return inflight;
  }

  /**
   * Drop every committed value. Idempotent.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.values.clear();
    this.pending.clear();
  }
}

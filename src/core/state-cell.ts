export interface StateSnapshot<S extends string> {
  readonly state: S;
  readonly version: number;
}

/**
 * Versioned holder for one entity's current state.
 * Writes go through compareAndSet only, so a writer that read a stale version loses.
 */
export class StateCell<S extends string> {
  private current: StateSnapshot<S>;

  constructor(initial: S) {
    this.current = Object.freeze({ state: initial, version: 0 });
  }

  read(): StateSnapshot<S> {
    return this.current;
  }

  compareAndSet(expectedVersion: number, next: S): boolean {
    if (this.current.version !== expectedVersion) return false;
    this.current = Object.freeze({ state: next, version: expectedVersion + 1 });
    return true;
  }
}

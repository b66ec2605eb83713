import type { EntityKind } from "./entity-kind.js";
import type { LifecycleEngine } from "./lifecycle-engine.js";
import { StateCell } from "./state-cell.js";
import type { TransitionResult } from "./types/transition.js";

let readCell: <S extends string, A extends string, P>(
  entity: LifecycleEntity<S, A, P>,
) => StateCell<S>;

/**
 * An entity whose state is managed by a LifecycleEngine.
 *
 * There is no state setter: the only way to move an entity is a transition
 * request that the engine commits. The state cell is an ES private field,
 * reachable only through `entityCell`, which the package does not export.
 * Create instances with `engine.createEntity(kind, id, initialState)`.
 */
export class LifecycleEntity<S extends string, A extends string, P = unknown> {
  readonly #cell: StateCell<S>;

  static {
    readCell = (entity) => entity.#cell;
  }

  constructor(
    private readonly engine: LifecycleEngine,
    readonly kind: EntityKind<S, A, P>,
    readonly id: string,
    initialState: S,
  ) {
    this.#cell = new StateCell(initialState);
  }

  currentState(): S {
    return this.engine.currentState(this);
  }

  /** Number of commits so far; 0 for a fresh entity. */
  version(): number {
    return this.engine.snapshot(this).version;
  }

  requestTransition(action: A, payload: P): TransitionResult<S, A> {
    return this.engine.requestTransition(this, action, payload);
  }

  availableActions(): A[] {
    return this.engine.availableActions(this);
  }

  isTerminal(): boolean {
    return this.engine.isTerminal(this);
  }
}

/** Engine-side access to an entity's state cell. */
export function entityCell<S extends string, A extends string, P>(
  entity: LifecycleEntity<S, A, P>,
): StateCell<S> {
  return readCell(entity);
}

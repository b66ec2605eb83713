/**
 * LifecycleEngine: gates and commits entity state transitions.
 *
 * A request is checked against the kind's transition table first; a move the
 * table does not contain is rejected before any guard runs. A structurally
 * legal move is then put to the kind-wide chain and the action's chain, and
 * committed only if both approve.
 *
 * The commit is a compare-and-set on the entity's versioned state cell. If a
 * re-entrant request moved the entity while guards were running, this request
 * is re-evaluated against the new state up to `maxConflictRetries` times and
 * otherwise rejected as a concurrency conflict. It never overwrites.
 *
 * Domain rejections are returned as values. Only setup mistakes throw
 * (ConfigurationError), plus GuardEvaluationError when a guard throws.
 *
 * @module Lifecycle
 */

import { ConfigurationError, errorMessage, InvalidStateError, LifecycleError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { type EngineConfig, type ResolvedConfig, resolveConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { ALL_ACTIONS, type AllActions, EntityKind, type EntityKindDefinition } from "./entity-kind.js";
import type { Guard } from "./guard.js";
import { evaluateGuards, type GuardPosition } from "./guard-chain.js";
import { entityCell, LifecycleEntity } from "./lifecycle-entity.js";
import type { StateCell, StateSnapshot } from "./state-cell.js";
import type {
  Rejection,
  TransitionCommittedEvent,
  TransitionContext,
  TransitionResult,
} from "./types/transition.js";

export type CommitHook = (event: TransitionCommittedEvent) => void;

export interface LifecycleEngineOptions {
  config?: EngineConfig;
  logger?: Logger;
}

export class LifecycleEngine {
  readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly kinds = new Map<string, object>();
  private hooks: readonly CommitHook[] = Object.freeze([]);

  constructor(options: LifecycleEngineOptions = {}) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? noopLogger;
  }

  // ─── Configuration ──────────────────────────────────────────────────────────

  defineKind<S extends string, A extends string, P = unknown>(
    definition: EntityKindDefinition<S, A>,
  ): EntityKind<S, A, P> {
    if (this.kinds.has(definition.name)) {
      throw new ConfigurationError(`Entity kind "${definition.name}" is already defined`);
    }
    const kind = new EntityKind<S, A, P>(definition);
    this.kinds.set(kind.name, kind);
    return kind;
  }

  registerTransition<S extends string, A extends string, P>(
    kind: EntityKind<S, A, P>,
    from: S,
    action: A,
    to: S,
  ): this {
    this.assertConfigurable(kind);
    kind.addTransition(from, action, to);
    return this;
  }

  registerGuard<S extends string, A extends string, P>(
    kind: EntityKind<S, A, P>,
    target: A | AllActions,
    guard: Guard<S, A, P>,
    position: GuardPosition = "append",
  ): this {
    this.assertConfigurable(kind);
    kind.chain(target).add(guard, position);
    return this;
  }

  /** Returns false when the chain has no guard by that name. */
  unregisterGuard<S extends string, A extends string, P>(
    kind: EntityKind<S, A, P>,
    target: A | AllActions,
    guardName: string,
  ): boolean {
    this.assertConfigurable(kind);
    if (target === ALL_ACTIONS) {
      const dependents = kind.dependentsOfShared(guardName);
      if (dependents.length > 0) {
        throw new ConfigurationError(
          `Cannot remove "${guardName}": required by ${dependents.map((d) => `"${d}"`).join(", ")}`,
        );
      }
    }
    return kind.chain(target).remove(guardName);
  }

  /** Post-commit hook. Hooks run in registration order; a throwing hook is logged and skipped. */
  onCommitted(hook: CommitHook): () => void {
    this.hooks = Object.freeze([...this.hooks, hook]);
    return () => {
      this.hooks = Object.freeze(this.hooks.filter((h) => h !== hook));
    };
  }

  // ─── Entities ───────────────────────────────────────────────────────────────

  /** Creating the first entity of a kind seals its transition table. */
  createEntity<S extends string, A extends string, P>(
    kind: EntityKind<S, A, P>,
    id: string,
    initialState: S,
  ): LifecycleEntity<S, A, P> {
    this.assertConfigurable(kind);
    if (!kind.hasState(initialState)) {
      throw new InvalidStateError(
        `"${initialState}" is not a state of kind "${kind.name}"`,
        initialState,
      );
    }
    kind.seal();
    return new LifecycleEntity(this, kind, id, initialState);
  }

  currentState<S extends string, A extends string, P>(entity: LifecycleEntity<S, A, P>): S {
    return this.snapshot(entity).state;
  }

  snapshot<S extends string, A extends string, P>(
    entity: LifecycleEntity<S, A, P>,
  ): StateSnapshot<S> {
    return this.cellOf(entity).read();
  }

  availableActions<S extends string, A extends string, P>(entity: LifecycleEntity<S, A, P>): A[] {
    return entity.kind.seal().actionsFrom(this.currentState(entity));
  }

  isTerminal<S extends string, A extends string, P>(entity: LifecycleEntity<S, A, P>): boolean {
    return entity.kind.seal().isTerminal(this.currentState(entity));
  }

  // ─── Requests ───────────────────────────────────────────────────────────────

  requestTransition<S extends string, A extends string, P>(
    entity: LifecycleEntity<S, A, P>,
    action: A,
    payload: P,
  ): TransitionResult<S, A> {
    const kind = entity.kind;
    const cell = this.cellOf(entity);
    const table = kind.seal();

    let read = cell.read();
    let attempts = 0;
    for (;;) {
      const from = read.state;
      const to = table.allowedTransition(from, action);
      if (to === undefined) {
        return this.reject(entity, { kind: "structurally_illegal", from, action });
      }

      const context: TransitionContext<S, A, P> = Object.freeze({
        entity: Object.freeze({ kind: kind.name, id: entity.id }),
        action,
        from,
        to,
        payload,
      });
      const verdict = evaluateGuards(kind.guardsFor(action), context);
      if (verdict.verdict === "denied") {
        return this.reject(entity, {
          kind: "guard_denied",
          from,
          action,
          reason: verdict.reason,
          guardName: verdict.guardName,
        });
      }

      if (cell.compareAndSet(read.version, to)) {
        const version = read.version + 1;
        this.logger.debug?.("transition committed", {
          kind: kind.name,
          entityId: entity.id,
          action,
          from,
          to,
          version,
        });
        this.runHooks({ kind: kind.name, entityId: entity.id, action, from, to, version, payload });
        return { status: "committed", action, from, to, version };
      }

      const observed = cell.read();
      attempts++;
      this.logger.warn("lost commit race", {
        kind: kind.name,
        entityId: entity.id,
        action,
        expected: from,
        observed: observed.state,
        attempts,
      });
      if (attempts > this.config.maxConflictRetries) {
        return this.reject(entity, {
          kind: "concurrency_conflict",
          from,
          action,
          observed: observed.state,
          attempts,
        });
      }
      read = observed;
    }
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private reject<S extends string, A extends string, P>(
    entity: LifecycleEntity<S, A, P>,
    rejection: Rejection<S, A>,
  ): TransitionResult<S, A> {
    this.logger.debug?.("transition rejected", {
      ...rejection,
      rejection: rejection.kind,
      kind: entity.kind.name,
      entityId: entity.id,
    });
    return { status: "rejected", rejection };
  }

  private runHooks(event: TransitionCommittedEvent): void {
    for (const hook of this.hooks) {
      try {
        hook(event);
      } catch (err) {
        this.logger.error("post-commit hook failed", {
          kind: event.kind,
          entityId: event.entityId,
          action: event.action,
          to: event.to,
          error: err instanceof Error ? err : errorMessage(err),
        });
      }
    }
  }

  private cellOf<S extends string, A extends string, P>(
    entity: LifecycleEntity<S, A, P>,
  ): StateCell<S> {
    this.assertOwned(entity.kind);
    return entityCell(entity);
  }

  private assertConfigurable(kind: object & { name: string }): void {
    if (this.kinds.get(kind.name) !== kind) {
      throw new ConfigurationError(`Entity kind "${kind.name}" was not defined by this engine`);
    }
  }

  private assertOwned(kind: object & { name: string }): void {
    if (this.kinds.get(kind.name) !== kind) {
      throw new LifecycleError(
        `Entity kind "${kind.name}" was not defined by this engine`,
        "UNKNOWN_KIND",
      );
    }
  }
}

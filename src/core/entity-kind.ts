/**
 * EntityKind: configuration for one kind of managed entity.
 *
 * Holds the closed state and action sets, the transition table (open for
 * registration until the first entity is created, sealed afterwards), the
 * kind-wide guard chain and one guard chain per action.
 *
 * @module Lifecycle
 */

import { ConfigurationError } from "../errors.js";
import type { Guard } from "./guard.js";
import { GuardChain } from "./guard-chain.js";
import { type TransitionTable, TransitionTableBuilder } from "./transition-table.js";

/** Target for guards that gate every action of a kind. They run before action guards. */
export const ALL_ACTIONS: unique symbol = Symbol("lifecycle.all-actions");
export type AllActions = typeof ALL_ACTIONS;

export interface EntityKindDefinition<S extends string, A extends string> {
  name: string;
  states: readonly S[];
  actions: readonly A[];
}

export class EntityKind<S extends string, A extends string, P = unknown> {
  readonly name: string;
  readonly states: readonly S[];
  readonly actions: readonly A[];

  private readonly builder: TransitionTableBuilder<S, A>;
  private sealedTable: TransitionTable<S, A> | undefined;
  private readonly sharedChain: GuardChain<S, A, P>;
  private readonly actionChains = new Map<A, GuardChain<S, A, P>>();

  constructor(definition: EntityKindDefinition<S, A>) {
    if (!definition.name) {
      throw new ConfigurationError("Entity kind name must not be empty");
    }
    this.name = definition.name;
    this.states = Object.freeze(uniqueMembers(definition.name, "state", definition.states));
    this.actions = Object.freeze(uniqueMembers(definition.name, "action", definition.actions));
    this.builder = new TransitionTableBuilder({ states: this.states, actions: this.actions });
    this.sharedChain = new GuardChain<S, A, P>([], {
      downstream: () => this.actionChains.values(),
    });
  }

  get sealed(): boolean {
    return this.sealedTable !== undefined;
  }

  hasState(value: string): value is S {
    return this.states.some((s) => s === value);
  }

  addTransition(from: S, action: A, to: S): void {
    if (this.sealedTable) {
      throw new ConfigurationError(
        `Transition table for "${this.name}" is sealed; register transitions before creating entities`,
      );
    }
    this.builder.add(from, action, to);
  }

  /** Freezes the table on first call; later calls return the same table. */
  seal(): TransitionTable<S, A> {
    if (!this.sealedTable) {
      this.sealedTable = this.builder.build();
    }
    return this.sealedTable;
  }

  /** Chain for `target`; action chains are created on first use. */
  chain(target: A | AllActions): GuardChain<S, A, P> {
    if (target === ALL_ACTIONS) return this.sharedChain;
    let chain = this.actionChains.get(target);
    if (!chain) {
      if (!this.actions.includes(target)) {
        throw new ConfigurationError(`Unknown action "${target}" for kind "${this.name}"`);
      }
      chain = new GuardChain<S, A, P>([], { upstream: () => this.sharedChain.names() });
      this.actionChains.set(target, chain);
    }
    return chain;
  }

  /** Guards to evaluate for `action`, kind-wide first, as one snapshot taken now. */
  guardsFor(action: A): readonly Guard<S, A, P>[] {
    const own = this.actionChains.get(action);
    const shared = this.sharedChain.snapshot();
    return own ? Object.freeze([...shared, ...own.snapshot()]) : shared;
  }

  /** Action-chain guards that declared a dependency on a kind-wide guard named `name`. */
  dependentsOfShared(name: string): string[] {
    const found: string[] = [];
    for (const chain of this.actionChains.values()) {
      found.push(...chain.dependentsOf(name));
    }
    return found;
  }
}

function uniqueMembers<T extends string>(kind: string, label: string, values: readonly T[]): T[] {
  if (values.length === 0) {
    throw new ConfigurationError(`Entity kind "${kind}" must declare at least one ${label}`);
  }
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      throw new ConfigurationError(`Entity kind "${kind}" declares ${label} "${value}" twice`);
    }
    seen.add(value);
  }
  return [...values];
}

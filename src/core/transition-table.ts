/**
 * Transition Table: the static (state, action) → state partial function.
 *
 * A pair absent from the table is structurally illegal from that state. The
 * table is validated once when constructed and never changes afterwards.
 *
 * @module Lifecycle
 */

import { ConfigurationError } from "../errors.js";
import type { TransitionRule } from "./types/transition.js";

export interface TransitionVocabulary<S extends string, A extends string> {
  readonly states: readonly S[];
  readonly actions: readonly A[];
}

export class TransitionTable<S extends string, A extends string> {
  private readonly index = new Map<S, Map<A, S>>();
  private readonly ordered: readonly TransitionRule<S, A>[];

  constructor(rules: Iterable<TransitionRule<S, A>>, vocabulary?: TransitionVocabulary<S, A>) {
    const ordered: TransitionRule<S, A>[] = [];
    for (const rule of rules) {
      assertInVocabulary(rule, vocabulary);
      let byAction = this.index.get(rule.from);
      if (!byAction) {
        byAction = new Map();
        this.index.set(rule.from, byAction);
      }
      const existing = byAction.get(rule.action);
      if (existing !== undefined) {
        throw duplicateRule(rule, existing);
      }
      byAction.set(rule.action, rule.to);
      ordered.push(Object.freeze({ from: rule.from, action: rule.action, to: rule.to }));
    }
    this.ordered = Object.freeze(ordered);
  }

  get size(): number {
    return this.ordered.length;
  }

  allowedTransition(from: S, action: A): S | undefined {
    return this.index.get(from)?.get(action);
  }

  /** Actions with a rule out of `from`, in registration order. */
  actionsFrom(from: S): A[] {
    return Array.from(this.index.get(from)?.keys() ?? []);
  }

  isTerminal(state: S): boolean {
    return !this.index.has(state);
  }

  rules(): readonly TransitionRule<S, A>[] {
    return this.ordered;
  }
}

/** Accumulates rules at configuration time; rejects a duplicate pair as soon as it is added. */
export class TransitionTableBuilder<S extends string, A extends string> {
  private readonly rules: TransitionRule<S, A>[] = [];
  private readonly seen = new Map<string, TransitionRule<S, A>>();

  constructor(private readonly vocabulary?: TransitionVocabulary<S, A>) {}

  add(from: S, action: A, to: S): this {
    const rule = { from, action, to };
    assertInVocabulary(rule, this.vocabulary);
    const key = ruleKey(from, action);
    const existing = this.seen.get(key);
    if (existing) {
      throw duplicateRule(rule, existing.to);
    }
    this.seen.set(key, rule);
    this.rules.push(rule);
    return this;
  }

  has(from: S, action: A): boolean {
    return this.seen.has(ruleKey(from, action));
  }

  build(): TransitionTable<S, A> {
    return new TransitionTable(this.rules, this.vocabulary);
  }
}

function ruleKey(from: string, action: string): string {
  return JSON.stringify([from, action]);
}

function duplicateRule(rule: TransitionRule<string, string>, existingTo: string): ConfigurationError {
  return new ConfigurationError(
    `Duplicate transition rule (${rule.from}, ${rule.action}): already leads to "${existingTo}"`,
  );
}

function assertInVocabulary<S extends string, A extends string>(
  rule: TransitionRule<S, A>,
  vocabulary: TransitionVocabulary<S, A> | undefined,
): void {
  if (!vocabulary) return;
  for (const state of [rule.from, rule.to]) {
    if (!vocabulary.states.includes(state)) {
      throw new ConfigurationError(`Unknown state "${state}" in transition rule`);
    }
  }
  if (!vocabulary.actions.includes(rule.action)) {
    throw new ConfigurationError(`Unknown action "${rule.action}" in transition rule`);
  }
}

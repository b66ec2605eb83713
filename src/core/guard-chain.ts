/**
 * GuardChain: ordered, short-circuiting sequence of guards.
 *
 * Guards run in order; the first denial stops the walk and later guards are
 * never evaluated. An empty chain approves.
 *
 * Reconfiguration is copy-on-write: every mutation validates a fresh array and
 * swaps it in, so an evaluation already walking the previous array is
 * unaffected.
 *
 * @module Lifecycle
 */

import { ConfigurationError, GuardEvaluationError } from "../errors.js";
import { type Guard, isDenied } from "./guard.js";
import type { ChainVerdict, GuardVerdict, TransitionContext } from "./types/transition.js";

type GuardShape = Pick<Guard, "name" | "after">;

export type GuardPosition = "append" | "prepend" | number;

export interface GuardChainOptions {
  /** Names guaranteed to have run before this chain (the kind-wide chain, for action chains). */
  upstream?: () => readonly string[];
  /** Chains whose upstream is this chain; each must still validate after a mutation here. */
  downstream?: () => Iterable<{ validate(upstream: readonly string[]): void }>;
}

export class GuardChain<S extends string = string, A extends string = string, P = unknown> {
  private guards: readonly Guard<S, A, P>[] = Object.freeze([]);
  private revision = 0;
  private readonly upstream: () => readonly string[];
  private readonly downstream: GuardChainOptions["downstream"];

  constructor(initial: readonly Guard<S, A, P>[] = [], options: GuardChainOptions = {}) {
    this.upstream = options.upstream ?? (() => []);
    this.downstream = options.downstream;
    if (initial.length > 0) this.replace([...initial]);
  }

  get size(): number {
    return this.guards.length;
  }

  /** Bumped on every successful mutation. */
  get version(): number {
    return this.revision;
  }

  names(): string[] {
    return this.guards.map((g) => g.name);
  }

  has(name: string): boolean {
    return this.guards.some((g) => g.name === name);
  }

  snapshot(): readonly Guard<S, A, P>[] {
    return this.guards;
  }

  add(guard: Guard<S, A, P>, position: GuardPosition = "append"): this {
    const next = [...this.guards];
    if (position === "append") {
      next.push(guard);
    } else if (position === "prepend") {
      next.unshift(guard);
    } else {
      if (!Number.isInteger(position) || position < 0 || position > next.length) {
        throw new ConfigurationError(
          `Guard position ${position} is out of range (0..${next.length})`,
        );
      }
      next.splice(position, 0, guard);
    }
    this.replace(next);
    return this;
  }

  /** Returns false when no guard has that name. */
  remove(name: string): boolean {
    const next = this.guards.filter((g) => g.name !== name);
    if (next.length === this.guards.length) return false;
    this.replace(next);
    return true;
  }

  /** `names` must be a permutation of the current guard names. */
  reorder(names: readonly string[]): this {
    const byName = new Map(this.guards.map((g) => [g.name, g]));
    const unique = new Set(names);
    if (unique.size !== names.length || names.length !== byName.size) {
      throw new ConfigurationError(
        `Reorder must list each of [${this.names().join(", ")}] exactly once`,
      );
    }
    const next: Guard<S, A, P>[] = [];
    for (const name of names) {
      const guard = byName.get(name);
      if (!guard) {
        throw new ConfigurationError(`Cannot reorder unknown guard "${name}"`);
      }
      next.push(guard);
    }
    this.replace(next);
    return this;
  }

  clear(): void {
    if (this.guards.length === 0) return;
    this.replace([]);
  }

  /** Re-run ordering checks against `upstream`, by default the current upstream names. */
  validate(upstream: readonly string[] = this.upstream()): void {
    validateOrdering(this.guards, upstream);
  }

  /** Names in this chain whose `after` list includes `name`. */
  dependentsOf(name: string): string[] {
    return this.guards.filter((g) => g.after?.includes(name)).map((g) => g.name);
  }

  evaluate(context: TransitionContext<S, A, P>): ChainVerdict {
    return evaluateGuards(this.guards, context);
  }

  private replace(next: Guard<S, A, P>[]): void {
    validateOrdering(next, this.upstream());
    if (this.downstream) {
      const names = next.map((g) => g.name);
      for (const chain of this.downstream()) chain.validate(names);
    }
    this.guards = Object.freeze(next);
    this.revision++;
  }
}

/**
 * Walk a fixed list of guards, stopping at the first denial.
 * Callers pass frozen snapshots, so changes made by a guard mid-walk apply to later requests only.
 */
export function evaluateGuards<S extends string, A extends string, P>(
  guards: readonly Guard<S, A, P>[],
  context: TransitionContext<S, A, P>,
): ChainVerdict {
  const evaluated: string[] = [];
  for (const guard of guards) {
    evaluated.push(guard.name);
    const verdict = runGuard(guard, context);
    if (isDenied(verdict)) {
      return { verdict: "denied", reason: verdict.reason, guardName: guard.name, evaluated };
    }
  }
  return { verdict: "approved", evaluated };
}

function runGuard<S extends string, A extends string, P>(
  guard: Guard<S, A, P>,
  context: TransitionContext<S, A, P>,
): GuardVerdict {
  try {
    return guard.evaluate(context);
  } catch (err) {
    throw new GuardEvaluationError(guard.name, { cause: err });
  }
}

function validateOrdering(
  guards: readonly GuardShape[],
  upstream: readonly string[],
): void {
  const position = new Map<string, number>();
  guards.forEach((guard, i) => {
    if (position.has(guard.name)) {
      throw new ConfigurationError(`Duplicate guard "${guard.name}" in chain`);
    }
    position.set(guard.name, i);
  });

  const cycle = findCycle(guards);
  if (cycle) {
    throw new ConfigurationError(`Cyclic guard dependency: ${cycle.join(" -> ")}`);
  }

  const before = new Set(upstream);
  for (const [i, guard] of guards.entries()) {
    for (const dependency of guard.after ?? []) {
      if (before.has(dependency)) continue;
      const at = position.get(dependency);
      if (at === undefined) {
        throw new ConfigurationError(
          `Guard "${guard.name}" must run after "${dependency}", which is not registered`,
        );
      }
      if (at > i) {
        throw new ConfigurationError(
          `Guard "${guard.name}" must run after "${dependency}" but is placed before it`,
        );
      }
    }
  }
}

function findCycle(guards: readonly GuardShape[]): string[] | undefined {
  const edges = new Map(guards.map((g) => [g.name, g.after ?? []]));
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (name: string): string[] | undefined => {
    const open = path.indexOf(name);
    if (open !== -1) return [...path.slice(open), name];
    if (done.has(name)) return undefined;
    path.push(name);
    for (const next of edges.get(name) ?? []) {
      if (!edges.has(next)) continue;
      const found = visit(next);
      if (found) return found;
    }
    path.pop();
    done.add(name);
    return undefined;
  };

  for (const guard of guards) {
    const found = visit(guard.name);
    if (found) return found;
  }
  return undefined;
}

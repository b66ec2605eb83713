/**
 * Guard: a named predicate that may veto a transition for business reasons.
 *
 * Guards read the context and answer; they never mutate it. A guard that reads
 * something another guard is expected to have established declares that with
 * `after`, and the chain refuses any arrangement that breaks it.
 *
 * @module Lifecycle
 */

import type { DeniedVerdict, GuardVerdict, TransitionContext } from "./types/transition.js";

export interface Guard<S extends string = string, A extends string = string, P = unknown> {
  readonly name: string;
  /** Names of guards that must run before this one, in the same or the kind-wide chain. */
  readonly after?: readonly string[];
  evaluate(context: TransitionContext<S, A, P>): GuardVerdict;
}

export interface GuardOptions {
  after?: readonly string[];
}

const APPROVED: GuardVerdict = Object.freeze({ verdict: "approved" });

export function approve(): GuardVerdict {
  return APPROVED;
}

export function deny(reason: string): DeniedVerdict {
  return Object.freeze({ verdict: "denied", reason });
}

export function isDenied(verdict: GuardVerdict): verdict is DeniedVerdict {
  return verdict.verdict === "denied";
}

/** Build a guard from a plain function. */
export function defineGuard<S extends string = string, A extends string = string, P = unknown>(
  name: string,
  evaluate: (context: TransitionContext<S, A, P>) => GuardVerdict,
  options: GuardOptions = {},
): Guard<S, A, P> {
  return Object.freeze({
    name,
    after: Object.freeze([...(options.after ?? [])]),
    evaluate,
  });
}

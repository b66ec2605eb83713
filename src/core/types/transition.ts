/**
 * Shared shapes for transition requests, guard verdicts and engine results.
 * @module
 */

export interface TransitionRule<S extends string, A extends string> {
  readonly from: S;
  readonly action: A;
  readonly to: S;
}

/** Read-only bundle a guard sees for one pending transition. */
export interface TransitionContext<S extends string, A extends string, P> {
  readonly entity: { readonly kind: string; readonly id: string };
  readonly action: A;
  readonly from: S;
  readonly to: S;
  readonly payload: Readonly<P>;
}

export type GuardVerdict = { readonly verdict: "approved" } | DeniedVerdict;

export interface DeniedVerdict {
  readonly verdict: "denied";
  readonly reason: string;
}

export type ChainVerdict =
  | { verdict: "approved"; evaluated: readonly string[] }
  | { verdict: "denied"; reason: string; guardName: string; evaluated: readonly string[] };

export type Rejection<S extends string, A extends string> =
  | { kind: "structurally_illegal"; from: S; action: A }
  | { kind: "guard_denied"; from: S; action: A; reason: string; guardName: string }
  | { kind: "concurrency_conflict"; from: S; action: A; observed: S; attempts: number };

export type RejectionKind = Rejection<string, string>["kind"];

export type TransitionResult<S extends string, A extends string> =
  | { status: "committed"; action: A; from: S; to: S; version: number }
  | { status: "rejected"; rejection: Rejection<S, A> };

export interface TransitionCommittedEvent {
  kind: string;
  entityId: string;
  action: string;
  from: string;
  to: string;
  version: number;
  payload: unknown;
}

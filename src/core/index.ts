// ─── Class exports ───────────────────────────────────────────────────────────

export { ALL_ACTIONS, type AllActions, EntityKind, type EntityKindDefinition } from "./entity-kind.js";
export {
  evaluateGuards,
  GuardChain,
  type GuardChainOptions,
  type GuardPosition,
} from "./guard-chain.js";
export { type CommitHook, LifecycleEngine, type LifecycleEngineOptions } from "./lifecycle-engine.js";
export type { LifecycleEntity } from "./lifecycle-entity.js";
export type { StateSnapshot } from "./state-cell.js";
export {
  TransitionTable,
  TransitionTableBuilder,
  type TransitionVocabulary,
} from "./transition-table.js";

// ─── Guards ──────────────────────────────────────────────────────────────────

export { approve, defineGuard, deny, type Guard, type GuardOptions, isDenied } from "./guard.js";

// ─── Interface / type re-exports ─────────────────────────────────────────────

export type {
  ChainVerdict,
  DeniedVerdict,
  GuardVerdict,
  Rejection,
  RejectionKind,
  TransitionCommittedEvent,
  TransitionContext,
  TransitionResult,
  TransitionRule,
} from "./types/transition.js";

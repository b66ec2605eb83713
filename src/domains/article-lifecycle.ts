/**
 * Article lifecycle: draft → moderation → published.
 *
 * `published` has no outgoing rules and is terminal. Publishing additionally
 * requires an editor or admin (PublisherRoleGuard).
 *
 * @module Domains
 */

import type { EntityKind } from "../core/entity-kind.js";
import { approve, defineGuard, deny } from "../core/guard.js";
import type { LifecycleEngine } from "../core/lifecycle-engine.js";
import type { LifecycleEntity } from "../core/lifecycle-entity.js";
import type { TransitionResult } from "../core/types/transition.js";

export const ARTICLE_STATES = ["draft", "moderation", "published"] as const;
export type ArticleState = (typeof ARTICLE_STATES)[number];

export const ARTICLE_ACTIONS = ["submit-for-review", "publish", "revert-to-draft"] as const;
export type ArticleAction = (typeof ARTICLE_ACTIONS)[number];

export type ArticleRole = "author" | "editor" | "admin";

export interface ArticleRequest {
  actor: { id: string; role: ArticleRole };
}

export type ArticleKind = EntityKind<ArticleState, ArticleAction, ArticleRequest>;

const PUBLISHER_ROLES: ReadonlySet<ArticleRole> = new Set(["editor", "admin"]);

export const publisherRoleGuard = defineGuard<ArticleState, ArticleAction, ArticleRequest>(
  "PublisherRoleGuard",
  (context) =>
    PUBLISHER_ROLES.has(context.payload.actor.role)
      ? approve()
      : deny("only editors and admins can publish"),
);

export function defineArticleLifecycle(engine: LifecycleEngine): ArticleKind {
  const kind = engine.defineKind<ArticleState, ArticleAction, ArticleRequest>({
    name: "article",
    states: ARTICLE_STATES,
    actions: ARTICLE_ACTIONS,
  });

  engine
    .registerTransition(kind, "draft", "submit-for-review", "moderation")
    .registerTransition(kind, "moderation", "publish", "published")
    .registerTransition(kind, "moderation", "revert-to-draft", "draft")
    .registerGuard(kind, "publish", publisherRoleGuard);

  return kind;
}

type ArticleResult = TransitionResult<ArticleState, ArticleAction>;

/** An article; one method per domain action. */
export class Article {
  private constructor(
    private readonly entity: LifecycleEntity<ArticleState, ArticleAction, ArticleRequest>,
  ) {}

  static draft(engine: LifecycleEngine, kind: ArticleKind, id: string): Article {
    return new Article(engine.createEntity(kind, id, "draft"));
  }

  get id(): string {
    return this.entity.id;
  }

  get state(): ArticleState {
    return this.entity.currentState();
  }

  submitForReview(request: ArticleRequest): ArticleResult {
    return this.entity.requestTransition("submit-for-review", request);
  }

  publish(request: ArticleRequest): ArticleResult {
    return this.entity.requestTransition("publish", request);
  }

  revertToDraft(request: ArticleRequest): ArticleResult {
    return this.entity.requestTransition("revert-to-draft", request);
  }

  availableActions(): ArticleAction[] {
    return this.entity.availableActions();
  }
}

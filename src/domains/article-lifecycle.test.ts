import { describe, expect, it } from "vitest";
import { LifecycleEngine } from "../core/lifecycle-engine.js";
import { Article, type ArticleRequest, defineArticleLifecycle, publisherRoleGuard } from "./article-lifecycle.js";

const author: ArticleRequest = { actor: { id: "u-1", role: "author" } };
const editor: ArticleRequest = { actor: { id: "u-2", role: "editor" } };

function setup() {
  const engine = new LifecycleEngine();
  const kind = defineArticleLifecycle(engine);
  return { engine, kind, article: Article.draft(engine, kind, "article-1") };
}

describe("article lifecycle", () => {
  it("starts as a draft that can only be submitted", () => {
    const { article } = setup();
    expect(article.id).toBe("article-1");
    expect(article.state).toBe("draft");
    expect(article.availableActions()).toEqual(["submit-for-review"]);
  });

  it("moves draft → moderation → published for an editor", () => {
    const { article } = setup();

    expect(article.submitForReview(author).status).toBe("committed");
    expect(article.availableActions()).toEqual(["publish", "revert-to-draft"]);
    expect(article.publish(editor)).toEqual({
      status: "committed",
      action: "publish",
      from: "moderation",
      to: "published",
      version: 2,
    });
    expect(article.state).toBe("published");
  });

  it("denies publishing to authors", () => {
    const { article } = setup();
    article.submitForReview(author);

    expect(article.publish(author)).toEqual({
      status: "rejected",
      rejection: {
        kind: "guard_denied",
        from: "moderation",
        action: "publish",
        reason: "only editors and admins can publish",
        guardName: "PublisherRoleGuard",
      },
    });
    expect(article.state).toBe("moderation");
  });

  it("cannot publish straight from draft", () => {
    const { article } = setup();
    expect(article.publish(editor)).toEqual({
      status: "rejected",
      rejection: { kind: "structurally_illegal", from: "draft", action: "publish" },
    });
  });

  it("can be sent back to draft from moderation", () => {
    const { article } = setup();
    article.submitForReview(author);
    expect(article.revertToDraft(editor).status).toBe("committed");
    expect(article.state).toBe("draft");
  });

  it("is terminal once published", () => {
    const { article } = setup();
    article.submitForReview(author);
    article.publish(editor);

    expect(article.availableActions()).toEqual([]);
    expect(article.revertToDraft(editor)).toMatchObject({
      status: "rejected",
      rejection: { kind: "structurally_illegal", from: "published" },
    });
  });

  it("lets admins publish", () => {
    const verdict = publisherRoleGuard.evaluate({
      entity: { kind: "article", id: "a" },
      action: "publish",
      from: "moderation",
      to: "published",
      payload: { actor: { id: "u-3", role: "admin" } },
    });
    expect(verdict).toEqual({ verdict: "approved" });
  });

  it("seals the table once an article exists", () => {
    const { engine, kind } = setup();
    expect(() => engine.registerTransition(kind, "published", "revert-to-draft", "draft")).toThrow(
      'Transition table for "article" is sealed; register transitions before creating entities',
    );
  });
});

/**
 * Example: Article and registration workflows
 *
 * Shows how to:
 * 1. Configure a LifecycleEngine with a structured logger
 * 2. Define the bundled article and registration lifecycles
 * 3. Add a kind-wide guard and a post-commit hook
 * 4. Drive entities and read the returned results
 */

import {
  ALL_ACTIONS,
  approve,
  Article,
  type ArticleAction,
  type ArticleRequest,
  type ArticleState,
  defineArticleLifecycle,
  defineGuard,
  defineRegistrationLifecycle,
  deny,
  LifecycleEngine,
  LogLevel,
  MemoryRegistrationDirectory,
  Registration,
  StructuredLogger,
  type TransitionResult,
} from "../src/index.js";

const rootLogger = new StructuredLogger({ level: LogLevel.INFO, component: "example" });

function describeResult(result: TransitionResult<string, string>): string {
  if (result.status === "committed") {
    return `${result.from} -> ${result.to} (v${result.version})`;
  }
  const { rejection } = result;
  switch (rejection.kind) {
    case "guard_denied":
      return `denied by ${rejection.guardName}: ${rejection.reason}`;
    case "structurally_illegal":
      return `"${rejection.action}" is not possible from ${rejection.from}`;
    case "concurrency_conflict":
      return `lost the race after ${rejection.attempts} attempts`;
  }
}

function main(): void {
  const engine = new LifecycleEngine({
    config: { maxConflictRetries: 1, registration: { passwordMinLength: 10 } },
    logger: rootLogger.child("engine"),
  });

  // ── Articles ──────────────────────────────────────────────────────────────
  const articles = defineArticleLifecycle(engine);
  engine.registerGuard(
    articles,
    ALL_ACTIONS,
    defineGuard<ArticleState, ArticleAction, ArticleRequest>("ActorPresentGuard", (context) =>
      context.payload.actor.id ? approve() : deny("actor required"),
    ),
  );

  const unsubscribe = engine.onCommitted((event) => {
    rootLogger.info("committed", { kind: event.kind, entityId: event.entityId, to: event.to });
  });

  const article = Article.draft(engine, articles, "article-42");
  const author: ArticleRequest = { actor: { id: "writer-1", role: "author" } };
  const editor: ArticleRequest = { actor: { id: "editor-1", role: "editor" } };

  console.log("submit:", describeResult(article.submitForReview(author)));
  console.log("publish as author:", describeResult(article.publish(author)));
  console.log("publish as editor:", describeResult(article.publish(editor)));
  console.log("revert after publish:", describeResult(article.revertToDraft(editor)));
  console.log("available now:", article.availableActions());
  unsubscribe();

  // ── Registrations ─────────────────────────────────────────────────────────
  const directory = new MemoryRegistrationDirectory({
    emails: ["existing@example.com"],
    referralCodes: ["WELCOME-1"],
  });
  const registrations = defineRegistrationLifecycle(engine, { directory });

  const taken = Registration.open(engine, registrations, "signup-1");
  console.log(
    "taken email:",
    describeResult(taken.register({ email: "Existing@example.com", password: "a-long-password" })),
  );

  const fresh = Registration.open(engine, registrations, "signup-2");
  console.log(
    "fresh email:",
    describeResult(
      fresh.register({
        email: "someone@example.com",
        password: "a-long-password",
        referralCode: "WELCOME-1",
      }),
    ),
  );
}

main();

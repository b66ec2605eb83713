/**
 * Guarded lifecycle public API barrel.
 *
 * Re-exports the engine, guards, errors, loggers, configuration and the
 * bundled article and registration lifecycles.
 * @module
 */

// Adapters
export { ConsoleLogger, type ConsoleLoggerOptions } from "./adapters/console-logger.js";
export {
  MemoryRegistrationDirectory,
  type MemoryRegistrationDirectorySeed,
} from "./adapters/memory-registration-directory.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export { type EngineConfigInput, engineConfigSchema } from "./config/config-schema.js";
// Core
export * from "./core/index.js";
// Domains
export {
  ARTICLE_ACTIONS,
  ARTICLE_STATES,
  Article,
  type ArticleAction,
  type ArticleKind,
  type ArticleRequest,
  type ArticleRole,
  type ArticleState,
  defineArticleLifecycle,
  publisherRoleGuard,
} from "./domains/article-lifecycle.js";
export {
  defineRegistrationLifecycle,
  EmailExistsGuard,
  PasswordGuard,
  REGISTRATION_ACTIONS,
  REGISTRATION_STATES,
  ReferralGuard,
  type ReferralGuardOptions,
  Registration,
  type RegistrationAction,
  type RegistrationGuard,
  type RegistrationKind,
  type RegistrationLifecycleOptions,
  type RegistrationRequest,
  type RegistrationState,
} from "./domains/registration-lifecycle.js";
// Errors
export {
  ConfigurationError,
  errorMessage,
  GuardEvaluationError,
  InvalidStateError,
  LifecycleError,
  toLifecycleError,
} from "./errors.js";
// Interfaces
export type { Logger } from "./interfaces/logger.js";
export type { RegistrationDirectory } from "./interfaces/registration-directory.js";
export {
  DEFAULT_CONFIG,
  type EngineConfig,
  type ResolvedConfig,
  resolveConfig,
} from "./types/config.js";
// Utils
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
export { normalizeEmail } from "./utils/normalize-email.js";

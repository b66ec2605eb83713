import { engineConfigSchema } from "../config/config-schema.js";
import { ConfigurationError } from "../errors.js";

/** Engine configuration with sensible defaults */
export interface EngineConfig {
  /** Re-evaluations after losing a commit race before reporting a conflict */
  maxConflictRetries?: number; // default: 2

  // Registration guards
  registration?: {
    passwordMinLength?: number; // default: 8
    requireReferral?: boolean; // default: false
  };
}

/** Fully resolved configuration with defaults applied. */
export interface ResolvedConfig {
  maxConflictRetries: number;
  registration: {
    passwordMinLength: number;
    requireReferral: boolean;
  };
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  maxConflictRetries: 2,
  registration: {
    passwordMinLength: 8,
    requireReferral: false,
  },
};

export function resolveConfig(config: EngineConfig = {}): ResolvedConfig {
  // Validate user-provided config before merging
  const validation = engineConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigurationError(`Invalid configuration: ${validation.error.message}`);
  }

  const input = validation.data;
  return {
    maxConflictRetries: input.maxConflictRetries ?? DEFAULT_CONFIG.maxConflictRetries,
    registration: {
      passwordMinLength:
        input.registration?.passwordMinLength ?? DEFAULT_CONFIG.registration.passwordMinLength,
      requireReferral:
        input.registration?.requireReferral ?? DEFAULT_CONFIG.registration.requireReferral,
    },
  };
}

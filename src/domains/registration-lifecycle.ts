/**
 * Registration lifecycle: a sign-up request that becomes a registered account.
 *
 * `register` is gated by, in order:
 * 1. **EmailExistsGuard**: the email must not belong to an existing account
 * 2. **PasswordGuard**: the password must meet the configured minimum length
 * 3. **ReferralGuard**: a supplied referral code must exist (and one is
 *    required when `requireReferral` is set)
 *
 * @module Domains
 */

import type { EntityKind } from "../core/entity-kind.js";
import { approve, deny, type Guard } from "../core/guard.js";
import type { LifecycleEngine } from "../core/lifecycle-engine.js";
import type { LifecycleEntity } from "../core/lifecycle-entity.js";
import type { GuardVerdict, TransitionContext, TransitionResult } from "../core/types/transition.js";
import type { RegistrationDirectory } from "../interfaces/registration-directory.js";
import type { ResolvedConfig } from "../types/config.js";
import { normalizeEmail } from "../utils/normalize-email.js";

export const REGISTRATION_STATES = ["pending", "registered"] as const;
export type RegistrationState = (typeof REGISTRATION_STATES)[number];

export const REGISTRATION_ACTIONS = ["register"] as const;
export type RegistrationAction = (typeof REGISTRATION_ACTIONS)[number];

export interface RegistrationRequest {
  email: string;
  password: string;
  referralCode?: string;
}

export type RegistrationKind = EntityKind<RegistrationState, RegistrationAction, RegistrationRequest>;
export type RegistrationGuard = Guard<RegistrationState, RegistrationAction, RegistrationRequest>;
type RegistrationContext = TransitionContext<
  RegistrationState,
  RegistrationAction,
  RegistrationRequest
>;

// ─── Guards ───────────────────────────────────────────────────────────────────

export class EmailExistsGuard implements RegistrationGuard {
  readonly name = "EmailExistsGuard";

  constructor(private readonly directory: RegistrationDirectory) {}

  evaluate(context: RegistrationContext): GuardVerdict {
    return this.directory.emailExists(normalizeEmail(context.payload.email))
      ? deny("email exists")
      : approve();
  }
}

export class PasswordGuard implements RegistrationGuard {
  readonly name = "PasswordGuard";

  constructor(private readonly minLength: number) {}

  evaluate(context: RegistrationContext): GuardVerdict {
    if (context.payload.password.length < this.minLength) {
      return deny(`password must be at least ${this.minLength} characters`);
    }
    return approve();
  }
}

export interface ReferralGuardOptions {
  required: boolean;
}

export class ReferralGuard implements RegistrationGuard {
  readonly name = "ReferralGuard";

  constructor(
    private readonly directory: RegistrationDirectory,
    private readonly options: ReferralGuardOptions,
  ) {}

  evaluate(context: RegistrationContext): GuardVerdict {
    const code = context.payload.referralCode?.trim();
    if (!code) {
      return this.options.required ? deny("referral code required") : approve();
    }
    return this.directory.referralCodeExists(code) ? approve() : deny("referral code not found");
  }
}

// ─── Wiring ───────────────────────────────────────────────────────────────────

export interface RegistrationLifecycleOptions {
  directory: RegistrationDirectory;
  /** Defaults to the engine's resolved `registration` config. */
  settings?: ResolvedConfig["registration"];
}

export function defineRegistrationLifecycle(
  engine: LifecycleEngine,
  options: RegistrationLifecycleOptions,
): RegistrationKind {
  const settings = options.settings ?? engine.config.registration;
  const kind = engine.defineKind<RegistrationState, RegistrationAction, RegistrationRequest>({
    name: "registration",
    states: REGISTRATION_STATES,
    actions: REGISTRATION_ACTIONS,
  });

  engine
    .registerTransition(kind, "pending", "register", "registered")
    .registerGuard(kind, "register", new EmailExistsGuard(options.directory))
    .registerGuard(kind, "register", new PasswordGuard(settings.passwordMinLength))
    .registerGuard(
      kind,
      "register",
      new ReferralGuard(options.directory, { required: settings.requireReferral }),
    );

  return kind;
}

/** A sign-up request; one method per domain action. */
export class Registration {
  private constructor(
    private readonly entity: LifecycleEntity<
      RegistrationState,
      RegistrationAction,
      RegistrationRequest
    >,
  ) {}

  static open(engine: LifecycleEngine, kind: RegistrationKind, id: string): Registration {
    return new Registration(engine.createEntity(kind, id, "pending"));
  }

  get id(): string {
    return this.entity.id;
  }

  get state(): RegistrationState {
    return this.entity.currentState();
  }

  register(request: RegistrationRequest): TransitionResult<RegistrationState, RegistrationAction> {
    return this.entity.requestTransition("register", request);
  }
}

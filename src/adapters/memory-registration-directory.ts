import type { RegistrationDirectory } from "../interfaces/registration-directory.js";
import { normalizeEmail } from "../utils/normalize-email.js";

export interface MemoryRegistrationDirectorySeed {
  emails?: Iterable<string>;
  referralCodes?: Iterable<string>;
}

/**
 * In-memory directory for tests and ephemeral use.
 * Emails are stored normalized, so lookups ignore case and surrounding space.
 * Referral codes keep their case but lose surrounding space, matching ReferralGuard.
 */
export class MemoryRegistrationDirectory implements RegistrationDirectory {
  private readonly emails = new Set<string>();
  private readonly referralCodes = new Set<string>();

  constructor(seed: MemoryRegistrationDirectorySeed = {}) {
    for (const email of seed.emails ?? []) this.addEmail(email);
    for (const code of seed.referralCodes ?? []) this.addReferralCode(code);
  }

  emailExists(email: string): boolean {
    return this.emails.has(normalizeEmail(email));
  }

  referralCodeExists(code: string): boolean {
    return this.referralCodes.has(code.trim());
  }

  addEmail(email: string): void {
    this.emails.add(normalizeEmail(email));
  }

  addReferralCode(code: string): void {
    this.referralCodes.add(code.trim());
  }

  /** For testing: number of stored emails. */
  get emailCount(): number {
    return this.emails.size;
  }
}

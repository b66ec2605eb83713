/**
 * Synchronous lookup the registration guards consult.
 * Backed by whatever persistence the host owns; guards never manage connections.
 */
export interface RegistrationDirectory {
  /** Whether an account already uses this email. Callers pass it normalized. */
  emailExists(email: string): boolean;
  referralCodeExists(code: string): boolean;
}

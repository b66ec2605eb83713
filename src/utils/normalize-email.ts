/** Trim and lowercase; the form emails are compared in. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

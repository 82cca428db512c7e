import { AccessDeniedReason } from './errors/access-denied.exception';

export type AuthorizationDecision =
  | { allowed: true }
  | { allowed: false; reason: AccessDeniedReason; message: string };

export type AuthorizationDenial = Extract<
  AuthorizationDecision,
  { allowed: false }
>;

export const ALLOW: AuthorizationDecision = { allowed: true };

export function deny(
  reason: AccessDeniedReason,
  message: string,
): AuthorizationDenial {
  return { allowed: false, reason, message };
}

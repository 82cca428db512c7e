import { WeakCredentialException } from './errors/weak-credential.exception';

/**
 * At least 8 characters with 2 upper-case letters, 1 special character from
 * `!@#$&*`, 2 digits and 3 lower-case letters, in any order.
 */
export const PASSWORD_PATTERN =
  /^(?=.*[A-Z].*[A-Z])(?=.*[!@#$&*])(?=.*[0-9].*[0-9])(?=.*[a-z].*[a-z].*[a-z]).{8,}$/;

export const PASSWORD_POLICY_MESSAGE =
  'Password should have at least 8 characters length, 2 letters in Upper Case, ' +
  '1 Special Character (!@#$&*), 2 numerals (0-9), 3 letters in Lower Case';

export function isStrongPassword(password: string): boolean {
  return PASSWORD_PATTERN.test(password);
}

/**
 * Runs before every password-setting mutation.
 *
 * @throws WeakCredentialException when the password is missing or weak
 */
export function assertStrongPassword(
  password: string | null | undefined,
): void {
  if (!password || !isStrongPassword(password)) {
    throw new WeakCredentialException(PASSWORD_POLICY_MESSAGE);
  }
}

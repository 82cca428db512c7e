import { IsArray, IsBoolean, IsString, Length, Matches } from 'class-validator';
import { validateEntity } from '../../utils/validate-entity';

export const LOGIN_PATTERN = /^[a-zA-Z0-9._@-]+$/;

/**
 * Field-level constraints of a user about to be persisted. Business rules
 * (password strength, role grants) run elsewhere.
 */
export class UserCandidate {
  @IsString()
  @Length(3, 64)
  @Matches(LOGIN_PATTERN, { message: 'invalidLogin' })
  login!: string;

  @IsBoolean()
  enabled!: boolean;

  // an empty set is refused by the creation rules, not here
  @IsArray()
  @IsString({ each: true })
  roleNames!: string[];
}

/**
 * @throws BadRequestException with per-field errors
 */
export function buildUserCandidate(input: {
  login: string;
  roleNames: string[];
  enabled?: boolean;
}): UserCandidate {
  return validateEntity(UserCandidate, {
    login: typeof input.login === 'string' ? input.login.trim() : input.login,
    enabled: input.enabled ?? true,
    roleNames: input.roleNames,
  });
}

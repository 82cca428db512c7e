import { IsNotEmpty, IsString, Length, Matches, MaxLength } from 'class-validator';
import { validateEntity } from '../../utils/validate-entity';

export const ROLE_ALIAS_PATTERN = /^[A-Z][A-Z0-9]*$/;

export class CompanyCandidate {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsString()
  @Length(2, 20)
  @Matches(ROLE_ALIAS_PATTERN, { message: 'invalidRoleAlias' })
  roleAlias!: string;
}

export function normalizeRoleAlias(alias: string): string {
  return alias.trim().toUpperCase();
}

/**
 * Pure build step: normalizes the alias and checks field constraints.
 *
 * @throws BadRequestException with per-field errors
 */
export function buildCompanyCandidate(input: {
  name: string;
  roleAlias: string;
}): CompanyCandidate {
  return validateEntity(CompanyCandidate, {
    name: typeof input.name === 'string' ? input.name.trim() : input.name,
    roleAlias:
      typeof input.roleAlias === 'string'
        ? normalizeRoleAlias(input.roleAlias)
        : input.roleAlias,
  });
}

import { RoleEnum, RoleKindEnum } from '../roles.enum';

export function normalizeRoleName(name: string): string {
  return name.trim().toUpperCase();
}

/**
 * Tenant role name for an alias, e.g. roleName('acme', LOCAL_ADMIN) → ROLE_ACME_LOCAL_ADMIN
 */
export function roleName(alias: string, kind: RoleKindEnum): string {
  return `ROLE_${normalizeRoleName(alias)}_${kind}`;
}

/**
 * Classifies a role name by its kind segment without parsing the alias.
 */
export function isRoleNameOfKind(name: string, kind: RoleKindEnum): boolean {
  return normalizeRoleName(name).includes(kind);
}

/**
 * Replaces every occurrence of one kind segment with another.
 * ROLE_ACME_LOCAL_ADMIN → ROLE_ACME_LOCAL_USER
 */
export function substituteRoleKind(
  name: string,
  from: RoleKindEnum,
  to: RoleKindEnum,
): string {
  return normalizeRoleName(name).split(from).join(to);
}

export function isAdminRoleName(name: string): boolean {
  return normalizeRoleName(name) === RoleEnum.admin;
}

export function containsRoleName(names: Iterable<string>, name: string): boolean {
  const wanted = normalizeRoleName(name);
  for (const candidate of names) {
    if (normalizeRoleName(candidate) === wanted) {
      return true;
    }
  }
  return false;
}

/**
 * Both canonical role names a company owns, admin first.
 */
export function tenantRoleNames(alias: string): [string, string] {
  return [
    roleName(alias, RoleKindEnum.localAdmin),
    roleName(alias, RoleKindEnum.localUser),
  ];
}

/**
 * Global roles, held outside any tenant.
 */
export enum RoleEnum {
  admin = 'ROLE_ADMIN',
}

/**
 * Function segment of a tenant-scoped role name (`ROLE_<ALIAS>_<KIND>`).
 */
export enum RoleKindEnum {
  localAdmin = 'LOCAL_ADMIN',
  localUser = 'LOCAL_USER',
}

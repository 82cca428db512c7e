/**
 * Domain entity for Role
 *
 * Roles are identified by name. Tenant roles embed the owning company's
 * alias: ROLE_<ALIAS>_LOCAL_ADMIN / ROLE_<ALIAS>_LOCAL_USER.
 * Names never change after creation.
 */
export interface Role {
  id: number;
  name: string;
}

import { Actor } from './actor';
import {
  ALLOW,
  AuthorizationDecision,
  AuthorizationDenial,
  deny,
} from './authorization-decision';
import { AccessDeniedReason } from './errors/access-denied.exception';
import { AclPermission } from '../../access-control/domain/acl-permission.enum';
import { RoleEnum, RoleKindEnum } from '../../roles/roles.enum';
import {
  containsRoleName,
  isRoleNameOfKind,
  substituteRoleKind,
} from '../../roles/domain/role-name';

/**
 * User Authorization Policy
 *
 * Every permission rule for User records as a pure function of the actor,
 * the target and the actor's ACL grants on the target. Callers load the
 * grants; nothing here performs I/O.
 */

export function isGlobalAdmin(actor: Actor): boolean {
  return containsRoleName(actor.roles, RoleEnum.admin);
}

/**
 * Read (single record or list entry): global ADMIN or a READ grant.
 */
export function decideUserRead(
  actor: Actor,
  grants: ReadonlySet<AclPermission>,
): AuthorizationDecision {
  if (isGlobalAdmin(actor) || grants.has(AclPermission.READ)) {
    return ALLOW;
  }
  return deny(
    AccessDeniedReason.MISSING_READ_GRANT,
    'Actor has no READ permission on this user',
  );
}

export interface UserCreationRequest {
  /** Upper-cased, de-duplicated role names of the new user */
  requestedRoles: string[];
  /** Requested names with no stored role */
  unknownRoles: string[];
}

/**
 * Creation rules, evaluated in order; the first failing rule decides.
 *
 * 1. at least one role
 * 2. every role exists
 * 3. ROLE_ADMIN is never granted through this path
 * 4. a global ADMIN may create any other role combination
 * 5. otherwise the actor needs a LOCAL_ADMIN role
 * 6. the LOCAL_USER sibling of the actor's first LOCAL_ADMIN role is refused
 */
export function decideUserCreation(
  actor: Actor,
  request: UserCreationRequest,
): AuthorizationDecision {
  const { requestedRoles, unknownRoles } = request;

  if (requestedRoles.length === 0) {
    return deny(
      AccessDeniedReason.INVALID_ROLE_SET,
      'New user should have at least one valid role',
    );
  }

  if (unknownRoles.length > 0) {
    return deny(
      AccessDeniedReason.UNKNOWN_ROLE,
      `Role with name ${unknownRoles[0]} does not exist`,
    );
  }

  if (containsRoleName(requestedRoles, RoleEnum.admin)) {
    return deny(
      AccessDeniedReason.FORBIDDEN_ROLE_GRANT,
      `User can not create new user with ${RoleEnum.admin}`,
    );
  }

  if (isGlobalAdmin(actor)) {
    return ALLOW;
  }

  const localAdminRoles = actor.roles.filter((role) =>
    isRoleNameOfKind(role, RoleKindEnum.localAdmin),
  );
  if (localAdminRoles.length === 0) {
    return deny(
      AccessDeniedReason.INSUFFICIENT_PRIVILEGE,
      `Only ${RoleEnum.admin} or ${RoleKindEnum.localAdmin} holders can create users`,
    );
  }

  // NOTE: compares one derived name, not tenant identity. A local admin is
  // refused its own tenant's LOCAL_USER role (taken from its first
  // LOCAL_ADMIN role only) and may still assign other tenants' roles or its
  // own LOCAL_ADMIN role. Kept as observed behaviour; see DESIGN.md.
  const siblingLocalUserRole = substituteRoleKind(
    localAdminRoles[0],
    RoleKindEnum.localAdmin,
    RoleKindEnum.localUser,
  );
  if (containsRoleName(requestedRoles, siblingLocalUserRole)) {
    return deny(
      AccessDeniedReason.CROSS_TENANT_CREATION_FORBIDDEN,
      `${RoleKindEnum.localAdmin} can not create users with ${siblingLocalUserRole}`,
    );
  }

  return ALLOW;
}

export function missingWriteGrant(): AuthorizationDenial {
  return deny(
    AccessDeniedReason.MISSING_WRITE_GRANT,
    'Actor has no WRITE permission on this user',
  );
}

/**
 * Edit: a WRITE grant on the target (every user holds one on itself).
 */
export function decideUserEdit(
  grants: ReadonlySet<AclPermission>,
): AuthorizationDecision {
  return grants.has(AclPermission.WRITE) ? ALLOW : missingWriteGrant();
}

/**
 * Disable / delete: the edit rule, and a target holding ROLE_ADMIN is never
 * disabled or deleted, whoever asks and whatever grants exist.
 */
export function decideUserRemoval(
  targetRoles: string[],
  grants: ReadonlySet<AclPermission>,
): AuthorizationDecision {
  const editDecision = decideUserEdit(grants);
  if (!editDecision.allowed) {
    return editDecision;
  }

  if (containsRoleName(targetRoles, RoleEnum.admin)) {
    return deny(
      AccessDeniedReason.SELF_DISABLE_FORBIDDEN,
      'Admin can not be disabled or deleted',
    );
  }

  return ALLOW;
}

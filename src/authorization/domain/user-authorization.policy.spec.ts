import { AclPermission } from '../../access-control/domain/acl-permission.enum';
import { AccessDeniedReason } from './errors/access-denied.exception';
import { Actor } from './actor';
import {
  decideUserCreation,
  decideUserEdit,
  decideUserRead,
  decideUserRemoval,
  isGlobalAdmin,
} from './user-authorization.policy';

const admin: Actor = { login: 'admin', roles: ['ROLE_ADMIN'] };
const acmeAdmin: Actor = { login: 'acme.boss', roles: ['ROLE_ACME_LOCAL_ADMIN'] };
const acmeUser: Actor = { login: 'acme.worker', roles: ['ROLE_ACME_LOCAL_USER'] };

const NONE = new Set<AclPermission>();
const READ = new Set([AclPermission.READ]);
const READ_WRITE = new Set([AclPermission.READ, AclPermission.WRITE]);

function reasonOf(decision: ReturnType<typeof decideUserCreation>) {
  return decision.allowed ? 'ALLOWED' : decision.reason;
}

describe('user authorization policy', () => {
  it('isGlobalAdmin looks for ROLE_ADMIN only', () => {
    expect(isGlobalAdmin(admin)).toBe(true);
    expect(isGlobalAdmin(acmeAdmin)).toBe(false);
  });

  describe('decideUserRead', () => {
    it('allows a global admin without grants', () => {
      expect(decideUserRead(admin, NONE)).toEqual({ allowed: true });
    });

    it('allows a READ grant holder', () => {
      expect(decideUserRead(acmeUser, READ)).toEqual({ allowed: true });
    });

    it('denies anyone else', () => {
      expect(reasonOf(decideUserRead(acmeAdmin, NONE))).toBe(
        AccessDeniedReason.MISSING_READ_GRANT,
      );
    });
  });

  describe('decideUserCreation', () => {
    it('refuses an empty role set first', () => {
      expect(
        decideUserCreation(admin, { requestedRoles: [], unknownRoles: [] }),
      ).toEqual({
        allowed: false,
        reason: AccessDeniedReason.INVALID_ROLE_SET,
        message: 'New user should have at least one valid role',
      });
    });

    it('refuses unknown roles, naming the first one', () => {
      expect(
        decideUserCreation(admin, {
          requestedRoles: ['ROLE_NOPE_LOCAL_USER', 'ROLE_ZIP_LOCAL_USER'],
          unknownRoles: ['ROLE_NOPE_LOCAL_USER', 'ROLE_ZIP_LOCAL_USER'],
        }),
      ).toEqual({
        allowed: false,
        reason: AccessDeniedReason.UNKNOWN_ROLE,
        message: 'Role with name ROLE_NOPE_LOCAL_USER does not exist',
      });
    });

    it('refuses ROLE_ADMIN even for a global admin', () => {
      expect(
        reasonOf(
          decideUserCreation(admin, {
            requestedRoles: ['ROLE_ACME_LOCAL_USER', 'ROLE_ADMIN'],
            unknownRoles: [],
          }),
        ),
      ).toBe(AccessDeniedReason.FORBIDDEN_ROLE_GRANT);
    });

    it('lets a global admin grant any non-admin combination', () => {
      expect(
        decideUserCreation(admin, {
          requestedRoles: [
            'ROLE_ACME_LOCAL_ADMIN',
            'ROLE_ACME_LOCAL_USER',
            'ROLE_GLOBEX_LOCAL_USER',
          ],
          unknownRoles: [],
        }),
      ).toEqual({ allowed: true });
    });

    it('refuses an actor with neither ROLE_ADMIN nor a LOCAL_ADMIN role', () => {
      expect(
        reasonOf(
          decideUserCreation(acmeUser, {
            requestedRoles: ['ROLE_GLOBEX_LOCAL_USER'],
            unknownRoles: [],
          }),
        ),
      ).toBe(AccessDeniedReason.INSUFFICIENT_PRIVILEGE);
    });

    it("refuses a local admin its own tenant's LOCAL_USER role", () => {
      expect(
        decideUserCreation(acmeAdmin, {
          requestedRoles: ['ROLE_ACME_LOCAL_USER'],
          unknownRoles: [],
        }),
      ).toEqual({
        allowed: false,
        reason: AccessDeniedReason.CROSS_TENANT_CREATION_FORBIDDEN,
        message: 'LOCAL_ADMIN can not create users with ROLE_ACME_LOCAL_USER',
      });
    });

    it("lets a local admin grant another tenant's LOCAL_USER role", () => {
      expect(
        decideUserCreation(acmeAdmin, {
          requestedRoles: ['ROLE_OTHER_LOCAL_USER'],
          unknownRoles: [],
        }),
      ).toEqual({ allowed: true });
    });

    // The rule compares one derived role name rather than tenant identity:
    // a local admin may hand out its own LOCAL_ADMIN role, and only its first
    // LOCAL_ADMIN role is looked at.
    it('keeps the substitution-based comparison', () => {
      expect(
        decideUserCreation(acmeAdmin, {
          requestedRoles: ['ROLE_ACME_LOCAL_ADMIN'],
          unknownRoles: [],
        }),
      ).toEqual({ allowed: true });

      const twoTenantAdmin: Actor = {
        login: 'dual',
        roles: ['ROLE_ACME_LOCAL_ADMIN', 'ROLE_GLOBEX_LOCAL_ADMIN'],
      };
      expect(
        decideUserCreation(twoTenantAdmin, {
          requestedRoles: ['ROLE_GLOBEX_LOCAL_USER'],
          unknownRoles: [],
        }),
      ).toEqual({ allowed: true });
      expect(
        reasonOf(
          decideUserCreation(twoTenantAdmin, {
            requestedRoles: ['ROLE_GLOBEX_LOCAL_USER', 'ROLE_ACME_LOCAL_USER'],
            unknownRoles: [],
          }),
        ),
      ).toBe(AccessDeniedReason.CROSS_TENANT_CREATION_FORBIDDEN);
    });
  });

  describe('decideUserEdit', () => {
    it('needs WRITE', () => {
      expect(decideUserEdit(READ_WRITE)).toEqual({ allowed: true });
      expect(decideUserEdit(READ)).toEqual({
        allowed: false,
        reason: AccessDeniedReason.MISSING_WRITE_GRANT,
        message: 'Actor has no WRITE permission on this user',
      });
    });
  });

  describe('decideUserRemoval', () => {
    it('allows a WRITE holder to remove a non-admin', () => {
      expect(decideUserRemoval(['ROLE_ACME_LOCAL_USER'], READ_WRITE)).toEqual({
        allowed: true,
      });
    });

    it('never removes a ROLE_ADMIN holder, even with WRITE', () => {
      expect(decideUserRemoval(['ROLE_ADMIN'], READ_WRITE)).toEqual({
        allowed: false,
        reason: AccessDeniedReason.SELF_DISABLE_FORBIDDEN,
        message: 'Admin can not be disabled or deleted',
      });
    });

    it('checks the WRITE grant before admin immunity', () => {
      expect(reasonOf(decideUserRemoval(['ROLE_ADMIN'], NONE))).toBe(
        AccessDeniedReason.MISSING_WRITE_GRANT,
      );
    });
  });
});

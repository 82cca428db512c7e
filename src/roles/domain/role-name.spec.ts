import { RoleKindEnum } from '../roles.enum';
import {
  containsRoleName,
  isAdminRoleName,
  isRoleNameOfKind,
  normalizeRoleName,
  roleName,
  substituteRoleKind,
  tenantRoleNames,
} from './role-name';

describe('role names', () => {
  describe('roleName', () => {
    it('builds ROLE_<ALIAS>_<KIND>', () => {
      expect(roleName('ACME', RoleKindEnum.localAdmin)).toBe(
        'ROLE_ACME_LOCAL_ADMIN',
      );
      expect(roleName('ACME', RoleKindEnum.localUser)).toBe(
        'ROLE_ACME_LOCAL_USER',
      );
    });

    it('upper-cases the alias', () => {
      expect(roleName(' acme ', RoleKindEnum.localUser)).toBe(
        'ROLE_ACME_LOCAL_USER',
      );
    });
  });

  it('tenantRoleNames returns admin first, then user', () => {
    expect(tenantRoleNames('globex')).toEqual([
      'ROLE_GLOBEX_LOCAL_ADMIN',
      'ROLE_GLOBEX_LOCAL_USER',
    ]);
  });

  describe('isRoleNameOfKind', () => {
    it('classifies by kind segment', () => {
      expect(
        isRoleNameOfKind('ROLE_ACME_LOCAL_ADMIN', RoleKindEnum.localAdmin),
      ).toBe(true);
      expect(
        isRoleNameOfKind('ROLE_ACME_LOCAL_USER', RoleKindEnum.localAdmin),
      ).toBe(false);
      expect(isRoleNameOfKind('ROLE_ADMIN', RoleKindEnum.localAdmin)).toBe(
        false,
      );
    });

    it('ignores case', () => {
      expect(
        isRoleNameOfKind('role_acme_local_user', RoleKindEnum.localUser),
      ).toBe(true);
    });
  });

  it('substituteRoleKind swaps the kind segment', () => {
    expect(
      substituteRoleKind(
        'ROLE_ACME_LOCAL_ADMIN',
        RoleKindEnum.localAdmin,
        RoleKindEnum.localUser,
      ),
    ).toBe('ROLE_ACME_LOCAL_USER');
  });

  it('normalizeRoleName trims and upper-cases', () => {
    expect(normalizeRoleName('  role_admin ')).toBe('ROLE_ADMIN');
  });

  it('isAdminRoleName only matches the global admin role', () => {
    expect(isAdminRoleName('role_admin')).toBe(true);
    expect(isAdminRoleName('ROLE_ACME_LOCAL_ADMIN')).toBe(false);
  });

  it('containsRoleName compares normalized names', () => {
    expect(containsRoleName(['ROLE_ACME_LOCAL_USER'], 'role_acme_local_user')).toBe(
      true,
    );
    expect(containsRoleName(new Set(['ROLE_ADMIN']), 'ROLE_ACME_LOCAL_ADMIN')).toBe(
      false,
    );
  });
});

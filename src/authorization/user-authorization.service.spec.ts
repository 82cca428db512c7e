import { Test, TestingModule } from '@nestjs/testing';
import { UserAuthorizationService, userRef } from './user-authorization.service';
import { AclDomainService } from '../access-control/domain/services/acl.domain.service';
import { AclPermission } from '../access-control/domain/acl-permission.enum';
import { AuditService, AuditEventType } from '../audit/audit.service';
import {
  AccessDeniedException,
  AccessDeniedReason,
} from './domain/errors/access-denied.exception';
import { Actor } from './domain/actor';
import { InMemoryAclRepository } from '../../test/utils/in-memory-repositories';

describe('UserAuthorizationService', () => {
  let service: UserAuthorizationService;
  let aclService: AclDomainService;
  let auditService: { logEvent: jest.Mock };

  const admin: Actor = { login: 'admin', roles: ['ROLE_ADMIN'] };
  const jane: Actor = { login: 'jane', roles: ['ROLE_ACME_LOCAL_USER'] };
  const janeRecord = { id: 2, roles: [{ name: 'ROLE_ACME_LOCAL_USER' }] };
  const adminRecord = { id: 1, roles: [{ name: 'ROLE_ADMIN' }] };

  beforeEach(async () => {
    aclService = new AclDomainService(new InMemoryAclRepository());
    auditService = { logEvent: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UserAuthorizationService,
        { provide: AclDomainService, useValue: aclService },
        { provide: AuditService, useValue: auditService },
      ],
    }).compile();

    service = module.get(UserAuthorizationService);
  });

  describe('filterReadable', () => {
    const users = [{ id: 1 }, { id: 2 }, { id: 3 }];

    it('returns everything to a global admin', async () => {
      expect(await service.filterReadable(admin, users)).toEqual(users);
    });

    it('keeps only records with a READ grant', async () => {
      await aclService.grant('jane', userRef(2), AclPermission.READ);
      await aclService.grant('jane', userRef(3), AclPermission.WRITE);

      expect(await service.filterReadable(jane, users)).toEqual([{ id: 2 }]);
      expect(auditService.logEvent).not.toHaveBeenCalled();
    });
  });

  it('canRead follows the READ grant', async () => {
    await aclService.grant('jane', userRef(2), AclPermission.READ);

    expect(await service.canRead(jane, 2)).toBe(true);
    expect(await service.canRead(jane, 3)).toBe(false);
    expect(await service.canRead(admin, 3)).toBe(true);
  });

  describe('assertCanCreate', () => {
    it('throws with the reason and audits the denial', () => {
      let thrown: unknown;
      try {
        service.assertCanCreate(jane, {
          requestedRoles: ['ROLE_OTHER_LOCAL_USER'],
          unknownRoles: [],
        });
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(AccessDeniedException);
      if (thrown instanceof AccessDeniedException) {
        expect(thrown.reason).toBe(AccessDeniedReason.INSUFFICIENT_PRIVILEGE);
        expect(thrown.getStatus()).toBe(403);
      }
      expect(auditService.logEvent).toHaveBeenCalledWith(
        expect.objectContaining({
          actor: 'jane',
          component: 'authorization',
          event: AuditEventType.ACCESS_DENIED,
          target: 'user:new',
          success: false,
          metadata: { reason: AccessDeniedReason.INSUFFICIENT_PRIVILEGE },
        }),
      );
    });

    it('returns quietly when allowed', () => {
      expect(() =>
        service.assertCanCreate(admin, {
          requestedRoles: ['ROLE_ACME_LOCAL_USER'],
          unknownRoles: [],
        }),
      ).not.toThrow();
    });
  });

  describe('authorizeEdit', () => {
    it('returns the target to a WRITE holder', async () => {
      await aclService.grantReadWrite('jane', userRef(2));

      await expect(service.authorizeEdit(jane, 2, janeRecord)).resolves.toBe(
        janeRecord,
      );
    });

    it('refuses without WRITE, even to a global admin', async () => {
      await expect(
        service.authorizeEdit(admin, 2, janeRecord),
      ).rejects.toMatchObject({
        reason: AccessDeniedReason.MISSING_WRITE_GRANT,
      });
    });

    it('refuses a missing target as a missing WRITE grant', async () => {
      await expect(service.authorizeEdit(admin, 99, null)).rejects.toMatchObject({
        reason: AccessDeniedReason.MISSING_WRITE_GRANT,
      });
      expect(auditService.logEvent).toHaveBeenCalledWith(
        expect.objectContaining({ target: 'user#99' }),
      );
    });
  });

  describe('authorizeRemoval', () => {
    it('never removes an admin, even itself with WRITE', async () => {
      await aclService.grantReadWrite('admin', userRef(1));

      await expect(
        service.authorizeRemoval(admin, 1, adminRecord, 'disable'),
      ).rejects.toMatchObject({
        reason: AccessDeniedReason.SELF_DISABLE_FORBIDDEN,
      });
      expect(auditService.logEvent).toHaveBeenCalledWith(
        expect.objectContaining({
          metadata: {
            reason: AccessDeniedReason.SELF_DISABLE_FORBIDDEN,
            operation: 'disable',
          },
        }),
      );
    });

    it('lets a WRITE holder remove a regular user', async () => {
      await aclService.grantReadWrite('admin', userRef(2));

      await expect(
        service.authorizeRemoval(admin, 2, janeRecord, 'delete'),
      ).resolves.toBe(janeRecord);
    });
  });
});

import { AclDomainService } from './acl.domain.service';
import { AclPermission } from '../acl-permission.enum';
import { ObjectRef } from '../object-ref';
import { InMemoryAclRepository } from '../../../../test/utils/in-memory-repositories';

describe('AclDomainService', () => {
  let repository: InMemoryAclRepository;
  let service: AclDomainService;
  const user7: ObjectRef = { type: 'user', id: 7 };
  const user8: ObjectRef = { type: 'user', id: 8 };

  beforeEach(() => {
    repository = new InMemoryAclRepository();
    service = new AclDomainService(repository);
  });

  describe('registerObject', () => {
    it('records the owner and grants it READ and WRITE', async () => {
      await service.registerObject(user7, 'admin');

      expect(await service.ownerOf(user7)).toBe('admin');
      expect(await service.grantsFor('admin', user7)).toEqual(
        new Set([AclPermission.READ, AclPermission.WRITE]),
      );
    });

    it('keeps the first owner when registered twice', async () => {
      await service.registerObject(user7, 'admin');
      await service.registerObject(user7, 'someone.else');

      expect(await service.ownerOf(user7)).toBe('admin');
    });
  });

  it('grant is idempotent', async () => {
    await service.grant('jane', user7, AclPermission.READ);
    await service.grant('jane', user7, AclPermission.READ);

    expect(repository.entryCount()).toBe(1);
  });

  it('revoke removes one permission only', async () => {
    await service.grantReadWrite('jane', user7);
    await service.revoke('jane', user7, AclPermission.WRITE);

    expect(await service.grantsFor('jane', user7)).toEqual(
      new Set([AclPermission.READ]),
    );
    expect(await service.hasPermission('jane', user7, AclPermission.WRITE)).toBe(
      false,
    );
  });

  it('revokeReadWrite leaves no grants behind', async () => {
    await service.grantReadWrite('jane', user7);
    await service.revokeReadWrite('jane', user7);

    expect(await service.grantsFor('jane', user7)).toEqual(new Set());
  });

  it('ownerOf is null for an unregistered object', async () => {
    expect(await service.ownerOf(user8)).toBeNull();
  });

  it('removeObject drops the identity and every entry on it', async () => {
    await service.registerObject(user7, 'admin');
    await service.grantReadWrite('jane', user7);
    await service.grantReadWrite('jane', user8);

    await service.removeObject(user7);

    expect(await service.ownerOf(user7)).toBeNull();
    expect(await service.grantsFor('admin', user7)).toEqual(new Set());
    expect(await service.grantsFor('jane', user7)).toEqual(new Set());
    expect(await service.grantsFor('jane', user8)).toEqual(
      new Set([AclPermission.READ, AclPermission.WRITE]),
    );
  });

  it('revokeAllForSubject drops every entry held by one login', async () => {
    await service.grantReadWrite('jane', user7);
    await service.grantReadWrite('jane', user8);
    await service.grantReadWrite('admin', user8);

    await service.revokeAllForSubject('jane');

    expect(repository.entryCount()).toBe(2);
    expect(await service.grantsFor('admin', user8)).toEqual(
      new Set([AclPermission.READ, AclPermission.WRITE]),
    );
  });

  it('objectIdsWithPermission filters by type and permission', async () => {
    await service.grant('jane', user7, AclPermission.READ);
    await service.grant('jane', user8, AclPermission.WRITE);
    await service.grant('jane', { type: 'company', id: 7 }, AclPermission.READ);

    expect(
      await service.objectIdsWithPermission('jane', 'user', AclPermission.READ),
    ).toEqual(new Set([7]));
  });

  it('withRepository works against the given repository', async () => {
    const other = new InMemoryAclRepository();
    await service.withRepository(other).grant('jane', user7, AclPermission.READ);

    expect(other.entryCount()).toBe(1);
    expect(repository.entryCount()).toBe(0);
  });
});

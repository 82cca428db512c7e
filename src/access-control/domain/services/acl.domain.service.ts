import { Injectable, Logger } from '@nestjs/common';
import { AclRepositoryPort } from '../repositories/acl.repository.port';
import { AclPermission } from '../acl-permission.enum';
import { AclObjectType, ObjectRef, describeObjectRef } from '../object-ref';
import { NullableType } from '../../../utils/types/nullable.type';

const READ_WRITE: readonly AclPermission[] = [
  AclPermission.READ,
  AclPermission.WRITE,
];

/**
 * AclDomainService
 *
 * The ACL store: object registration, per-subject READ/WRITE entries and
 * the queries the authorization layer needs.
 *
 * Key Rules:
 * - Grants are idempotent (granting twice leaves one entry)
 * - Removing an object removes every entry on it
 * - Nothing here looks at roles
 */
@Injectable()
export class AclDomainService {
  private readonly logger = new Logger(AclDomainService.name);

  constructor(private readonly aclRepository: AclRepositoryPort) {}

  /**
   * Same store semantics over another repository, e.g. one bound to a
   * transaction.
   */
  withRepository(aclRepository: AclRepositoryPort): AclDomainService {
    return new AclDomainService(aclRepository);
  }

  /**
   * Register an object and give its owner READ and WRITE on it
   */
  async registerObject(ref: ObjectRef, ownerLogin: string): Promise<void> {
    const existing = await this.aclRepository.findObjectIdentity(ref);
    if (!existing) {
      await this.aclRepository.createObjectIdentity(ref, ownerLogin);
    }
    await this.grantReadWrite(ownerLogin, ref);
  }

  async removeObject(ref: ObjectRef): Promise<void> {
    await this.aclRepository.deleteObjectIdentity(ref);
    this.logger.log(`[REMOVE OBJECT] ${describeObjectRef(ref)}`);
  }

  async grant(
    subjectLogin: string,
    ref: ObjectRef,
    permission: AclPermission,
  ): Promise<void> {
    const held = await this.grantsFor(subjectLogin, ref);
    if (held.has(permission)) {
      return;
    }

    await this.aclRepository.createEntry({
      objectType: ref.type,
      objectId: ref.id,
      subjectLogin,
      permission,
    });

    this.logger.debug(
      `[GRANT] ${permission} on ${describeObjectRef(ref)} to ${subjectLogin}`,
    );
  }

  async revoke(
    subjectLogin: string,
    ref: ObjectRef,
    permission: AclPermission,
  ): Promise<void> {
    await this.aclRepository.deleteEntry(subjectLogin, ref, permission);

    this.logger.debug(
      `[REVOKE] ${permission} on ${describeObjectRef(ref)} from ${subjectLogin}`,
    );
  }

  async grantReadWrite(subjectLogin: string, ref: ObjectRef): Promise<void> {
    for (const permission of READ_WRITE) {
      await this.grant(subjectLogin, ref, permission);
    }
  }

  async revokeReadWrite(subjectLogin: string, ref: ObjectRef): Promise<void> {
    for (const permission of READ_WRITE) {
      await this.revoke(subjectLogin, ref, permission);
    }
  }

  async revokeAllForSubject(subjectLogin: string): Promise<void> {
    await this.aclRepository.deleteEntriesForSubject(subjectLogin);
  }

  async ownerOf(ref: ObjectRef): Promise<NullableType<string>> {
    const identity = await this.aclRepository.findObjectIdentity(ref);
    return identity ? identity.ownerLogin : null;
  }

  async grantsFor(
    subjectLogin: string,
    ref: ObjectRef,
  ): Promise<Set<AclPermission>> {
    const entries = await this.aclRepository.findEntries(subjectLogin, ref);
    return new Set(entries.map((entry) => entry.permission));
  }

  async hasPermission(
    subjectLogin: string,
    ref: ObjectRef,
    permission: AclPermission,
  ): Promise<boolean> {
    const held = await this.grantsFor(subjectLogin, ref);
    return held.has(permission);
  }

  async objectIdsWithPermission(
    subjectLogin: string,
    objectType: AclObjectType,
    permission: AclPermission,
  ): Promise<Set<number>> {
    const ids = await this.aclRepository.findObjectIds(
      subjectLogin,
      objectType,
      permission,
    );
    return new Set(ids);
  }
}

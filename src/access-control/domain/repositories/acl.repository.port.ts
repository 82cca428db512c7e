import { NullableType } from '../../../utils/types/nullable.type';
import { AclEntry } from '../entities/acl-entry.entity';
import { AclObjectIdentity } from '../entities/acl-object-identity.entity';
import { AclPermission } from '../acl-permission.enum';
import { AclObjectType, ObjectRef } from '../object-ref';

export abstract class AclRepositoryPort {
  /**
   * Find the registered identity (and owner) of an object
   */
  abstract findObjectIdentity(
    ref: ObjectRef,
  ): Promise<NullableType<AclObjectIdentity>>;

  abstract createObjectIdentity(
    ref: ObjectRef,
    ownerLogin: string,
  ): Promise<AclObjectIdentity>;

  /**
   * Remove an object identity together with every entry on the object
   */
  abstract deleteObjectIdentity(ref: ObjectRef): Promise<void>;

  /**
   * Find all entries a subject holds on one object
   */
  abstract findEntries(subjectLogin: string, ref: ObjectRef): Promise<AclEntry[]>;

  abstract createEntry(
    data: Omit<AclEntry, 'id' | 'createdAt'>,
  ): Promise<AclEntry>;

  abstract deleteEntry(
    subjectLogin: string,
    ref: ObjectRef,
    permission: AclPermission,
  ): Promise<void>;

  /**
   * Remove every entry held by a subject, on any object
   */
  abstract deleteEntriesForSubject(subjectLogin: string): Promise<void>;

  /**
   * Ids of objects of one type on which the subject holds a permission
   */
  abstract findObjectIds(
    subjectLogin: string,
    objectType: AclObjectType,
    permission: AclPermission,
  ): Promise<number[]>;
}

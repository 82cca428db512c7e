import { AclObjectType } from '../object-ref';

/**
 * Domain entity for AclObjectIdentity
 * Registers an object with the ACL store and records who owns it.
 */
export interface AclObjectIdentity {
  id: number;
  objectType: AclObjectType;
  objectId: number;
  ownerLogin: string;
  createdAt: Date;
}

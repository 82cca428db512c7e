import { AclPermission } from '../acl-permission.enum';
import { AclObjectType } from '../object-ref';

/**
 * Domain entity for AclEntry
 * One permission held by a subject (user login) on one object.
 *
 * NOTE: Independent of role membership. Role checks and ACL checks are
 * combined by the authorization layer, never here.
 */
export interface AclEntry {
  id: number;
  objectType: AclObjectType;
  objectId: number;
  subjectLogin: string;
  permission: AclPermission;
  createdAt: Date;
}

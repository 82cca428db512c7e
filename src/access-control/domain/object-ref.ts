export type AclObjectType = 'user' | 'company';

/**
 * Reference to a domain object protected by ACL entries
 */
export interface ObjectRef {
  type: AclObjectType;
  id: number;
}

export function describeObjectRef(ref: ObjectRef): string {
  return `${ref.type}#${ref.id}`;
}

export enum AclPermission {
  READ = 'READ',
  WRITE = 'WRITE',
}

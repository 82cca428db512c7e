export interface Company {
  id: number;
  name: string;
  // immutable once provisioned; embedded in the tenant's role names
  roleAlias: string;
  createdAt: Date;
  updatedAt: Date;
}

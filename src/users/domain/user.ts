import { Role } from '../../roles/domain/role';

export interface User {
  id: number;
  login: string;
  // bcrypt hash, never the raw password
  password: string;
  enabled: boolean;
  roles: Role[];
  createdAt: Date;
  updatedAt: Date;
}

import { SetMetadata } from '@nestjs/common';
import { RoleEnum } from './roles.enum';

export const ROLES_KEY = 'roles';

export const Roles = (...roles: (RoleEnum | string)[]) =>
  SetMetadata(ROLES_KEY, roles);

import { Injectable } from '@nestjs/common';
import { RoleRepositoryPort } from './domain/repositories/role.repository.port';
import { Role } from './domain/role';
import { normalizeRoleName } from './domain/role-name';

export interface ResolvedRoles {
  requested: string[];
  roles: Role[];
  missing: string[];
}

@Injectable()
export class RolesService {
  constructor(private readonly roleRepository: RoleRepositoryPort) {}

  findAll(): Promise<Role[]> {
    return this.roleRepository.findAll();
  }

  /**
   * Resolve role names against the Role Model.
   *
   * Names are upper-cased and de-duplicated into `requested`; `missing` lists
   * every requested name with no stored role, in request order.
   */
  async resolve(names: string[]): Promise<ResolvedRoles> {
    const normalized = [...new Set(names.map(normalizeRoleName))];
    const found = await this.roleRepository.findByNames(normalized);
    const byName = new Map(found.map((role) => [role.name, role]));

    const roles: Role[] = [];
    const missing: string[] = [];
    for (const name of normalized) {
      const role = byName.get(name);
      if (role) {
        roles.push(role);
      } else {
        missing.push(name);
      }
    }

    return { requested: normalized, roles, missing };
  }
}

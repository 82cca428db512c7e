import { NullableType } from '../../../utils/types/nullable.type';
import { Role } from '../role';

export abstract class RoleRepositoryPort {
  abstract findAll(): Promise<Role[]>;

  abstract findByName(name: string): Promise<NullableType<Role>>;

  /**
   * Roles whose names are in the list; unknown names are simply absent
   */
  abstract findByNames(names: string[]): Promise<Role[]>;

  /**
   * Persist several roles in one write
   */
  abstract createMany(names: string[]): Promise<Role[]>;
}

import { CompanyRepositoryPort } from '../../companies/domain/repositories/company.repository.port';
import { RoleRepositoryPort } from '../../roles/domain/repositories/role.repository.port';
import { UserRepository } from '../../users/infrastructure/persistence/user.repository';
import { AclRepositoryPort } from '../../access-control/domain/repositories/acl.repository.port';

/**
 * Repositories bound to one unit of work.
 */
export interface UnitOfWorkRepositories {
  companies: CompanyRepositoryPort;
  roles: RoleRepositoryPort;
  users: UserRepository;
  acl: AclRepositoryPort;
}

/**
 * Runs a multi-write operation so that every write inside `work` commits
 * together or not at all.
 *
 * `transactional` is false for stores that cannot give that guarantee;
 * callers that need both-or-neither semantics check it before running.
 */
export abstract class UnitOfWork {
  abstract readonly transactional: boolean;

  abstract run<T>(
    work: (repositories: UnitOfWorkRepositories) => Promise<T>,
  ): Promise<T>;
}

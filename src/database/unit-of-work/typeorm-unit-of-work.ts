import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { UnitOfWork, UnitOfWorkRepositories } from './unit-of-work';
import { CompanyEntity } from '../../companies/infrastructure/persistence/relational/entities/company.entity';
import { CompanyRelationalRepository } from '../../companies/infrastructure/persistence/relational/repositories/company.repository';
import { RoleEntity } from '../../roles/infrastructure/persistence/relational/entities/role.entity';
import { RoleRelationalRepository } from '../../roles/infrastructure/persistence/relational/repositories/role.repository';
import { UserEntity } from '../../users/infrastructure/persistence/relational/entities/user.entity';
import { UsersRelationalRepository } from '../../users/infrastructure/persistence/relational/repositories/user.repository';
import { AclObjectIdentityEntity } from '../../access-control/infrastructure/persistence/relational/entities/acl-object-identity.entity';
import { AclEntryEntity } from '../../access-control/infrastructure/persistence/relational/entities/acl-entry.entity';
import { AclRelationalRepository } from '../../access-control/infrastructure/persistence/relational/repositories/acl.repository';

@Injectable()
export class TypeOrmUnitOfWork extends UnitOfWork {
  constructor(private readonly dataSource: DataSource) {
    super();
  }

  // MongoDB is the only TypeORM driver without multi-document transactions
  get transactional(): boolean {
    return this.dataSource.options.type !== 'mongodb';
  }

  run<T>(work: (repositories: UnitOfWorkRepositories) => Promise<T>): Promise<T> {
    return this.dataSource.transaction((manager) =>
      work(this.repositoriesFor(manager)),
    );
  }

  private repositoriesFor(manager: EntityManager): UnitOfWorkRepositories {
    return {
      companies: new CompanyRelationalRepository(
        manager.getRepository(CompanyEntity),
      ),
      roles: new RoleRelationalRepository(manager.getRepository(RoleEntity)),
      users: new UsersRelationalRepository(manager.getRepository(UserEntity)),
      acl: new AclRelationalRepository(
        manager.getRepository(AclObjectIdentityEntity),
        manager.getRepository(AclEntryEntity),
      ),
    };
  }
}

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AclEntryEntity } from './entities/acl-entry.entity';
import { AclObjectIdentityEntity } from './entities/acl-object-identity.entity';
import { AclRepositoryPort } from '../../../domain/repositories/acl.repository.port';
import { AclRelationalRepository } from './repositories/acl.repository';

@Module({
  imports: [TypeOrmModule.forFeature([AclObjectIdentityEntity, AclEntryEntity])],
  providers: [
    {
      provide: AclRepositoryPort,
      useClass: AclRelationalRepository,
    },
  ],
  exports: [AclRepositoryPort],
})
export class RelationalAclPersistenceModule {}

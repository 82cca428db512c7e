import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RoleEntity } from './entities/role.entity';
import { RoleRepositoryPort } from '../../../domain/repositories/role.repository.port';
import { RoleRelationalRepository } from './repositories/role.repository';

@Module({
  imports: [TypeOrmModule.forFeature([RoleEntity])],
  providers: [
    {
      provide: RoleRepositoryPort,
      useClass: RoleRelationalRepository,
    },
  ],
  exports: [RoleRepositoryPort],
})
export class RelationalRolePersistenceModule {}

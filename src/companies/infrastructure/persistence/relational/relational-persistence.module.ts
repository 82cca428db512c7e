import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CompanyEntity } from './entities/company.entity';
import { CompanyRepositoryPort } from '../../../domain/repositories/company.repository.port';
import { CompanyRelationalRepository } from './repositories/company.repository';

@Module({
  imports: [TypeOrmModule.forFeature([CompanyEntity])],
  providers: [
    {
      provide: CompanyRepositoryPort,
      useClass: CompanyRelationalRepository,
    },
  ],
  exports: [CompanyRepositoryPort],
})
export class RelationalCompanyPersistenceModule {}

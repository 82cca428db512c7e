import { Module } from '@nestjs/common';
import { RelationalAclPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { AclDomainService } from './domain/services/acl.domain.service';

@Module({
  imports: [RelationalAclPersistenceModule],
  providers: [AclDomainService],
  exports: [AclDomainService, RelationalAclPersistenceModule],
})
export class AccessControlModule {}

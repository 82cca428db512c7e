import { Module } from '@nestjs/common';
import { RelationalRolePersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { RolesService } from './roles.service';
import { RolesGuard } from './roles.guard';

@Module({
  imports: [RelationalRolePersistenceModule],
  providers: [RolesService, RolesGuard],
  exports: [RolesService, RolesGuard, RelationalRolePersistenceModule],
})
export class RolesModule {}

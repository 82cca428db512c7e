import { Module } from '@nestjs/common';
import { AdminSeedService } from './admin-seed.service';
import { DatabaseModule } from '../../database.module';
import { RolesModule } from '../../../roles/roles.module';
import { UsersModule } from '../../../users/users.module';
import { AccessControlModule } from '../../../access-control/access-control.module';

@Module({
  imports: [DatabaseModule, RolesModule, UsersModule, AccessControlModule],
  providers: [AdminSeedService],
  exports: [AdminSeedService],
})
export class AdminSeedModule {}

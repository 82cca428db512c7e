import { Module } from '@nestjs/common';
import { AccessControlModule } from '../access-control/access-control.module';
import { AuditModule } from '../audit/audit.module';
import { UserAuthorizationService } from './user-authorization.service';

@Module({
  imports: [AccessControlModule, AuditModule],
  providers: [UserAuthorizationService],
  exports: [UserAuthorizationService],
})
export class AuthorizationModule {}

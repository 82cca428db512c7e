import { Module } from '@nestjs/common';

import { UsersController } from './users.controller';

import { UsersService } from './users.service';
import { RelationalUserPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { PasswordHasherPort } from './domain/ports/password-hasher.port';
import { BcryptPasswordHasher } from './infrastructure/password/bcrypt-password-hasher';
import { RolesModule } from '../roles/roles.module';
import { AuthorizationModule } from '../authorization/authorization.module';
import { AccessControlModule } from '../access-control/access-control.module';
import { DatabaseModule } from '../database/database.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    RelationalUserPersistenceModule,
    RolesModule,
    AuthorizationModule,
    AccessControlModule,
    DatabaseModule,
    AuditModule,
  ],
  controllers: [UsersController],
  providers: [
    UsersService,
    {
      provide: PasswordHasherPort,
      useClass: BcryptPasswordHasher,
    },
  ],
  exports: [UsersService, PasswordHasherPort, RelationalUserPersistenceModule],
})
export class UsersModule {}

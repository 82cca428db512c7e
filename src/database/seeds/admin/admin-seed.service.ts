import { Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty, IsString } from 'class-validator';
import validateConfig from '../../../utils/validate-config';
import { UnitOfWork } from '../../unit-of-work/unit-of-work';
import { RoleRepositoryPort } from '../../../roles/domain/repositories/role.repository.port';
import { RoleEnum } from '../../../roles/roles.enum';
import { UserRepository } from '../../../users/infrastructure/persistence/user.repository';
import { PasswordHasherPort } from '../../../users/domain/ports/password-hasher.port';
import { assertStrongPassword } from '../../../users/domain/password-policy';
import { buildUserCandidate } from '../../../users/domain/user-candidate';
import { AclDomainService } from '../../../access-control/domain/services/acl.domain.service';
import { userRef } from '../../../authorization/user-authorization.service';

class AdminSeedVariablesValidator {
  @IsString()
  @IsNotEmpty()
  ADMIN_LOGIN!: string;

  @IsString()
  @IsNotEmpty()
  ADMIN_PASSWORD!: string;
}

/**
 * Creates the global administrator if its login is free. The administrator
 * owns its own ACL object.
 */
@Injectable()
export class AdminSeedService {
  private readonly logger = new Logger(AdminSeedService.name);

  constructor(
    private readonly userRepository: UserRepository,
    private readonly roleRepository: RoleRepositoryPort,
    private readonly passwordHasher: PasswordHasherPort,
    private readonly aclService: AclDomainService,
    private readonly unitOfWork: UnitOfWork,
  ) {}

  async run(): Promise<void> {
    const env = validateConfig(process.env, AdminSeedVariablesValidator);
    const candidate = buildUserCandidate({
      login: env.ADMIN_LOGIN,
      roleNames: [RoleEnum.admin],
    });

    if (await this.userRepository.findByLogin(candidate.login)) {
      this.logger.log(`[SEED ADMIN] ${candidate.login} already exists`);
      return;
    }

    assertStrongPassword(env.ADMIN_PASSWORD);

    const adminRole = await this.roleRepository.findByName(RoleEnum.admin);
    const password = await this.passwordHasher.hash(env.ADMIN_PASSWORD);

    await this.unitOfWork.run(async ({ users, roles, acl }) => {
      const role = adminRole ?? (await roles.createMany([RoleEnum.admin]))[0];
      const admin = await users.create({
        login: candidate.login,
        password,
        enabled: true,
        roles: [role],
      });
      await this.aclService
        .withRepository(acl)
        .registerObject(userRef(admin.id), admin.login);
    });

    this.logger.log(`[SEED ADMIN] created ${candidate.login}`);
  }
}

import {
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { UserRepository } from './infrastructure/persistence/user.repository';
import { User } from './domain/user';
import { assertStrongPassword } from './domain/password-policy';
import { buildUserCandidate } from './domain/user-candidate';
import { UserLifecycle } from './domain/user-lifecycle.util';
import { PasswordHasherPort } from './domain/ports/password-hasher.port';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { UserResponseDto } from './dto/user-response.dto';
import { RolesService } from '../roles/roles.service';
import {
  UserAuthorizationService,
  userRef,
} from '../authorization/user-authorization.service';
import { Actor } from '../authorization/domain/actor';
import { AclDomainService } from '../access-control/domain/services/acl.domain.service';
import { AclPermission } from '../access-control/domain/acl-permission.enum';
import { UnitOfWork } from '../database/unit-of-work/unit-of-work';
import { AuditService, AuditEventType } from '../audit/audit.service';
import { isUniqueViolation } from '../database/utils/is-unique-violation';
import { NullableType } from '../utils/types/nullable.type';

function loginAlreadyExists(): UnprocessableEntityException {
  return new UnprocessableEntityException({
    status: HttpStatus.UNPROCESSABLE_ENTITY,
    errors: {
      login: 'alreadyExists',
    },
  });
}

/**
 * UsersService
 *
 * User lifecycle: create, edit (password), disable, delete. Every
 * operation takes the actor explicitly and asks UserAuthorizationService
 * before touching state.
 *
 * ACL side effects run in the same unit of work as the user write.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private readonly userRepository: UserRepository,
    private readonly rolesService: RolesService,
    private readonly authorizationService: UserAuthorizationService,
    private readonly aclService: AclDomainService,
    private readonly passwordHasher: PasswordHasherPort,
    private readonly unitOfWork: UnitOfWork,
    private readonly auditService: AuditService,
  ) {}

  /**
   * Users the actor may read; the rest are left out without an error.
   */
  async findAll(actor: Actor): Promise<UserResponseDto[]> {
    const users = await this.userRepository.findAll();
    const readable = await this.authorizationService.filterReadable(actor, users);
    return readable.map((user) => this.toResponse(user));
  }

  /**
   * A user the actor may not read is reported exactly like a missing one.
   */
  async findById(id: User['id'], actor: Actor): Promise<UserResponseDto> {
    const user = await this.userRepository.findById(id);
    if (!user || !(await this.authorizationService.canRead(actor, user.id))) {
      throw new NotFoundException(`User with id = ${id} does not exist!`);
    }
    return this.toDetailedResponse(user, actor);
  }

  async me(actor: Actor): Promise<UserResponseDto> {
    const user = await this.userRepository.findByLogin(actor.login);
    if (!user) {
      throw new NotFoundException(`User ${actor.login} does not exist!`);
    }
    return this.toDetailedResponse(user, actor);
  }

  findByLogin(login: User['login']): Promise<NullableType<User>> {
    return this.userRepository.findByLogin(login);
  }

  /**
   * Create a user on behalf of `actor`.
   *
   * Order: field constraints, password policy, role resolution and the
   * creation rules, then hash and persist. The actor becomes the ACL owner
   * and the new user gets READ and WRITE on itself.
   *
   * @throws BadRequestException on field-level errors
   * @throws WeakCredentialException
   * @throws AccessDeniedException when a creation rule refuses
   * @throws UnprocessableEntityException when the login is taken
   */
  async create(dto: CreateUserDto, actor: Actor): Promise<UserResponseDto> {
    const candidate = buildUserCandidate({
      login: dto.login,
      roleNames: dto.roles,
    });
    assertStrongPassword(dto.password);

    const { requested, roles, missing } = await this.rolesService.resolve(
      candidate.roleNames,
    );
    this.authorizationService.assertCanCreate(actor, {
      requestedRoles: requested,
      unknownRoles: missing,
    });

    if (await this.userRepository.findByLogin(candidate.login)) {
      throw loginAlreadyExists();
    }

    const passwordHash = await this.passwordHasher.hash(dto.password);

    let user: User;
    try {
      user = await this.unitOfWork.run(async ({ users, acl }) => {
        const saved = await users.create({
          login: candidate.login,
          password: passwordHash,
          enabled: candidate.enabled,
          roles,
        });

        const aclStore = this.aclService.withRepository(acl);
        await aclStore.registerObject(userRef(saved.id), actor.login);
        await aclStore.grantReadWrite(saved.login, userRef(saved.id));

        return saved;
      });
    } catch (error) {
      // a concurrent create of the same login got past the check above
      if (isUniqueViolation(error)) {
        throw loginAlreadyExists();
      }
      throw error;
    }

    this.logger.log(
      `[CREATE USER] id=${user.id} login=${user.login} by=${actor.login}`,
    );
    this.auditService.logEvent({
      actor: actor.login,
      component: 'users',
      event: AuditEventType.USER_CREATED,
      target: `user#${user.id}`,
      success: true,
      metadata: { roles: user.roles.map((role) => role.name) },
    });

    return this.toDetailedResponse(user, actor);
  }

  /**
   * Replace the password of an active user. The password is validated on
   * every call.
   */
  async update(
    id: User['id'],
    dto: UpdateUserDto,
    actor: Actor,
  ): Promise<UserResponseDto> {
    const target = await this.authorizationService.authorizeEdit(
      actor,
      id,
      await this.userRepository.findById(id),
    );
    UserLifecycle.validateOperation(target, 'edit');
    assertStrongPassword(dto.password);

    const password = await this.passwordHasher.hash(dto.password);
    const updated = await this.userRepository.update(target.id, { password });
    if (!updated) {
      throw new NotFoundException(`User with id = ${id} does not exist!`);
    }

    this.auditService.logEvent({
      actor: actor.login,
      component: 'users',
      event: AuditEventType.USER_UPDATED,
      target: `user#${id}`,
      success: true,
    });

    return this.toDetailedResponse(updated, actor);
  }

  /**
   * Soft lock: only `enabled` changes; grants and roles stay.
   */
  async disable(id: User['id'], actor: Actor): Promise<void> {
    const target = await this.authorizationService.authorizeRemoval(
      actor,
      id,
      await this.userRepository.findById(id),
      'disable',
    );
    UserLifecycle.validateOperation(target, 'disable');

    if (UserLifecycle.isNoOp(target, 'disable')) {
      return;
    }

    await this.userRepository.update(target.id, { enabled: false });

    this.logger.log(`[DISABLE USER] id=${id} by=${actor.login}`);
    this.auditService.logEvent({
      actor: actor.login,
      component: 'users',
      event: AuditEventType.USER_DISABLED,
      target: `user#${id}`,
      success: true,
    });
  }

  /**
   * Hard delete. The user row, the ACL object of the user and every entry
   * held by its login go together.
   */
  async remove(id: User['id'], actor: Actor): Promise<void> {
    const target = await this.authorizationService.authorizeRemoval(
      actor,
      id,
      await this.userRepository.findById(id),
      'delete',
    );
    UserLifecycle.validateOperation(target, 'delete');

    await this.unitOfWork.run(async ({ users, acl }) => {
      const aclStore = this.aclService.withRepository(acl);
      await users.remove(target.id);
      await aclStore.removeObject(userRef(target.id));
      await aclStore.revokeAllForSubject(target.login);
    });

    this.logger.log(
      `[DELETE USER] id=${id} login=${target.login} by=${actor.login}`,
    );
    this.auditService.logEvent({
      actor: actor.login,
      component: 'users',
      event: AuditEventType.USER_DELETED,
      target: `user#${id}`,
      success: true,
    });
  }

  private toResponse(user: User): UserResponseDto {
    return {
      id: user.id,
      login: user.login,
      enabled: user.enabled,
      roles: user.roles.map((role) => role.name),
      createdAt: user.createdAt,
      updatedAt: user.updatedAt,
    };
  }

  private async toDetailedResponse(
    user: User,
    actor: Actor,
  ): Promise<UserResponseDto> {
    const ref = userRef(user.id);
    const [owner, grants] = await Promise.all([
      this.aclService.ownerOf(ref),
      this.aclService.grantsFor(actor.login, ref),
    ]);

    return {
      ...this.toResponse(user),
      owner,
      acls: [AclPermission.READ, AclPermission.WRITE].filter((permission) =>
        grants.has(permission),
      ),
    };
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { AclDomainService } from '../access-control/domain/services/acl.domain.service';
import { AclPermission } from '../access-control/domain/acl-permission.enum';
import { ObjectRef } from '../access-control/domain/object-ref';
import { AuditService, AuditEventType } from '../audit/audit.service';
import { Actor } from './domain/actor';
import { AuthorizationDenial } from './domain/authorization-decision';
import { AccessDeniedException } from './domain/errors/access-denied.exception';
import {
  UserCreationRequest,
  decideUserCreation,
  decideUserEdit,
  decideUserRead,
  decideUserRemoval,
  isGlobalAdmin,
  missingWriteGrant,
} from './domain/user-authorization.policy';

export type UserRemovalOperation = 'disable' | 'delete';

export interface UserTarget {
  id: number;
  roles: { name: string }[];
}

export function userRef(id: number): ObjectRef {
  return { type: 'user', id };
}

/**
 * UserAuthorizationService
 *
 * Loads the ACL grants a decision needs, applies the user policy and
 * audits every denial. Services call it explicitly at the start of each
 * operation with the actor of the request.
 *
 * Write paths treat a missing user like a user without a WRITE grant.
 */
@Injectable()
export class UserAuthorizationService {
  private readonly logger = new Logger(UserAuthorizationService.name);

  constructor(
    private readonly aclService: AclDomainService,
    private readonly auditService: AuditService,
  ) {}

  /**
   * Keep only the users the actor may read. Denied entries are dropped
   * silently.
   */
  async filterReadable<T extends { id: number }>(
    actor: Actor,
    users: T[],
  ): Promise<T[]> {
    if (isGlobalAdmin(actor)) {
      return users;
    }

    const readableIds = await this.aclService.objectIdsWithPermission(
      actor.login,
      'user',
      AclPermission.READ,
    );
    return users.filter((user) => readableIds.has(user.id));
  }

  async canRead(actor: Actor, userId: number): Promise<boolean> {
    const grants = await this.aclService.grantsFor(actor.login, userRef(userId));
    return decideUserRead(actor, grants).allowed;
  }

  /**
   * @throws AccessDeniedException
   */
  assertCanCreate(actor: Actor, request: UserCreationRequest): void {
    const decision = decideUserCreation(actor, request);
    if (!decision.allowed) {
      this.reject(actor, 'user:new', decision);
    }
  }

  /**
   * @param target - null when no user has the requested id
   * @returns the target, once the actor may edit it
   * @throws AccessDeniedException
   */
  async authorizeEdit<T extends UserTarget>(
    actor: Actor,
    userId: number,
    target: T | null,
  ): Promise<T> {
    if (!target) {
      return this.reject(actor, `user#${userId}`, missingWriteGrant());
    }

    const grants = await this.aclService.grantsFor(actor.login, userRef(target.id));
    const decision = decideUserEdit(grants);
    if (!decision.allowed) {
      return this.reject(actor, `user#${userId}`, decision);
    }
    return target;
  }

  /**
   * @param target - null when no user has the requested id
   * @returns the target, once the actor may disable or delete it
   * @throws AccessDeniedException
   */
  async authorizeRemoval<T extends UserTarget>(
    actor: Actor,
    userId: number,
    target: T | null,
    operation: UserRemovalOperation,
  ): Promise<T> {
    if (!target) {
      return this.reject(
        actor,
        `user#${userId}`,
        missingWriteGrant(),
        operation,
      );
    }

    const grants = await this.aclService.grantsFor(actor.login, userRef(target.id));
    const decision = decideUserRemoval(
      target.roles.map((role) => role.name),
      grants,
    );
    if (!decision.allowed) {
      return this.reject(actor, `user#${userId}`, decision, operation);
    }
    return target;
  }

  private reject(
    actor: Actor,
    target: string,
    denial: AuthorizationDenial,
    operation?: UserRemovalOperation,
  ): never {
    this.logger.warn(
      `[ACCESS DENIED] actor=${actor.login} target=${target} reason=${denial.reason}` +
        (operation ? ` operation=${operation}` : ''),
    );
    this.auditService.logEvent({
      actor: actor.login,
      component: 'authorization',
      event: AuditEventType.ACCESS_DENIED,
      target,
      success: false,
      errorMessage: denial.message,
      metadata: operation
        ? { reason: denial.reason, operation }
        : { reason: denial.reason },
    });

    throw new AccessDeniedException(denial.reason, denial.message);
  }
}

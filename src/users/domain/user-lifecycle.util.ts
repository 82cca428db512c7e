import { BadRequestException } from '@nestjs/common';
import { UserStatus } from './enums/user-status.enum';

export type UserLifecycleOperation = 'edit' | 'disable' | 'delete';

/**
 * User Lifecycle
 *
 * Status is derived from `enabled`. Deletion is terminal and has no status.
 *
 * Allowed operations:
 * - ACTIVE: edit, disable, delete
 * - DISABLED: disable (no-op), delete
 */
export class UserLifecycle {
  private static readonly ALLOWED_OPERATIONS: Map<
    UserStatus,
    UserLifecycleOperation[]
  > = new Map([
    [UserStatus.ACTIVE, ['edit', 'disable', 'delete']],
    [UserStatus.DISABLED, ['disable', 'delete']],
  ]);

  static statusOf(user: { enabled: boolean }): UserStatus {
    return user.enabled ? UserStatus.ACTIVE : UserStatus.DISABLED;
  }

  static isAllowed(
    status: UserStatus,
    operation: UserLifecycleOperation,
  ): boolean {
    return this.ALLOWED_OPERATIONS.get(status)?.includes(operation) ?? false;
  }

  /**
   * @throws BadRequestException if the operation is not allowed in the
   * user's current status
   */
  static validateOperation(
    user: { enabled: boolean },
    operation: UserLifecycleOperation,
  ): void {
    const status = this.statusOf(user);
    if (!this.isAllowed(status, operation)) {
      throw new BadRequestException(
        `Invalid user operation: ${operation} on ${status} user. ` +
          `Allowed: ${this.ALLOWED_OPERATIONS.get(status)?.join(', ') || 'none'}`,
      );
    }
  }

  /**
   * Disabling an already disabled user changes nothing.
   */
  static isNoOp(
    user: { enabled: boolean },
    operation: UserLifecycleOperation,
  ): boolean {
    return operation === 'disable' && this.statusOf(user) === UserStatus.DISABLED;
  }
}

import { ForbiddenException } from '@nestjs/common';

/**
 * Which permission rule rejected the operation.
 *
 * Kept on the exception for logs and tests; the HTTP response only
 * carries the message.
 */
export enum AccessDeniedReason {
  INVALID_ROLE_SET = 'INVALID_ROLE_SET',
  UNKNOWN_ROLE = 'UNKNOWN_ROLE',
  FORBIDDEN_ROLE_GRANT = 'FORBIDDEN_ROLE_GRANT',
  INSUFFICIENT_PRIVILEGE = 'INSUFFICIENT_PRIVILEGE',
  CROSS_TENANT_CREATION_FORBIDDEN = 'CROSS_TENANT_CREATION_FORBIDDEN',
  SELF_DISABLE_FORBIDDEN = 'SELF_DISABLE_FORBIDDEN',
  MISSING_READ_GRANT = 'MISSING_READ_GRANT',
  MISSING_WRITE_GRANT = 'MISSING_WRITE_GRANT',
}

export class AccessDeniedException extends ForbiddenException {
  readonly reason: AccessDeniedReason;

  constructor(reason: AccessDeniedReason, message: string) {
    super(message);
    this.reason = reason;
    this.name = 'AccessDeniedException';

    Object.setPrototypeOf(this, AccessDeniedException.prototype);
  }
}

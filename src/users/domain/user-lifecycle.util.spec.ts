import { BadRequestException } from '@nestjs/common';
import { UserLifecycle } from './user-lifecycle.util';
import { UserStatus } from './enums/user-status.enum';

describe('UserLifecycle', () => {
  const active = { enabled: true };
  const disabled = { enabled: false };

  it('derives status from enabled', () => {
    expect(UserLifecycle.statusOf(active)).toBe(UserStatus.ACTIVE);
    expect(UserLifecycle.statusOf(disabled)).toBe(UserStatus.DISABLED);
  });

  it('allows every operation on an active user', () => {
    expect(() => UserLifecycle.validateOperation(active, 'edit')).not.toThrow();
    expect(() =>
      UserLifecycle.validateOperation(active, 'disable'),
    ).not.toThrow();
    expect(() =>
      UserLifecycle.validateOperation(active, 'delete'),
    ).not.toThrow();
  });

  it('refuses to edit a disabled user', () => {
    expect(() => UserLifecycle.validateOperation(disabled, 'edit')).toThrow(
      new BadRequestException(
        'Invalid user operation: edit on DISABLED user. Allowed: disable, delete',
      ),
    );
  });

  it('still deletes a disabled user', () => {
    expect(() =>
      UserLifecycle.validateOperation(disabled, 'delete'),
    ).not.toThrow();
  });

  it('treats disabling a disabled user as a no-op', () => {
    expect(UserLifecycle.isNoOp(disabled, 'disable')).toBe(true);
    expect(UserLifecycle.isNoOp(active, 'disable')).toBe(false);
    expect(UserLifecycle.isNoOp(disabled, 'delete')).toBe(false);
  });
});

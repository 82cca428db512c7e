import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { RolesGuard } from './roles.guard';
import { Roles } from './roles.decorator';
import { RoleEnum } from './roles.enum';
import { Actor } from '../authorization/domain/actor';

@Roles(RoleEnum.admin)
class AdminOnlyController {
  list(): void {}
}

class OpenController {
  list(): void {}

  @Roles('ROLE_ACME_LOCAL_ADMIN', RoleEnum.admin)
  tenantList(): void {}
}

describe('RolesGuard', () => {
  let guard: RolesGuard;

  beforeEach(() => {
    guard = new RolesGuard(new Reflector());
  });

  const createContext = (
    controller: new () => object,
    handler: () => void,
    user?: Actor,
  ) => new ExecutionContextHost([{ user }, {}, () => undefined], controller, handler);

  it('allows access when no roles are required', () => {
    const context = createContext(OpenController, OpenController.prototype.list);

    expect(guard.canActivate(context)).toBe(true);
  });

  it('allows a holder of the required role', () => {
    const context = createContext(
      AdminOnlyController,
      AdminOnlyController.prototype.list,
      { login: 'admin', roles: ['ROLE_ADMIN'] },
    );

    expect(guard.canActivate(context)).toBe(true);
  });

  it('compares role names case-insensitively', () => {
    const context = createContext(
      AdminOnlyController,
      AdminOnlyController.prototype.list,
      { login: 'admin', roles: ['role_admin'] },
    );

    expect(guard.canActivate(context)).toBe(true);
  });

  it('denies an actor without the role', () => {
    const context = createContext(
      AdminOnlyController,
      AdminOnlyController.prototype.list,
      { login: 'jane', roles: ['ROLE_ACME_LOCAL_ADMIN'] },
    );

    expect(guard.canActivate(context)).toBe(false);
  });

  it('denies a request without an actor', () => {
    const context = createContext(
      AdminOnlyController,
      AdminOnlyController.prototype.list,
    );

    expect(guard.canActivate(context)).toBe(false);
  });

  it('accepts any one of several roles', () => {
    const context = createContext(
      OpenController,
      OpenController.prototype.tenantList,
      { login: 'jane', roles: ['ROLE_ACME_LOCAL_ADMIN'] },
    );

    expect(guard.canActivate(context)).toBe(true);
  });
});

import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { ROLES_KEY } from './roles.decorator';
import { containsRoleName } from './domain/role-name';
import { Actor } from '../authorization/domain/actor';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const roles = this.reflector.getAllAndOverride<string[] | undefined>(
      ROLES_KEY,
      [context.getClass(), context.getHandler()],
    );
    if (!roles || !roles.length) {
      return true;
    }
    const request = context
      .switchToHttp()
      .getRequest<Request & { user?: Actor }>();

    const heldRoles = request.user?.roles;
    if (!heldRoles) {
      return false;
    }

    // Any one of the required roles is enough
    return roles.some((role) => containsRoleName(heldRoles, role));
  }
}

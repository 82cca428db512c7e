import { UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { Actor } from '../../authorization/domain/actor';

export type AuthenticatedRequest = Request & { user?: Actor };

/**
 * Extract the actor set on the request by JwtStrategy.
 *
 * @throws UnauthorizedException when the request carries no actor
 */
export function extractActorFromRequest(req: AuthenticatedRequest): Actor {
  const user = req.user;

  if (!user?.login || !Array.isArray(user.roles)) {
    throw new UnauthorizedException('No authenticated actor on request');
  }

  return {
    login: user.login,
    roles: [...user.roles],
  };
}

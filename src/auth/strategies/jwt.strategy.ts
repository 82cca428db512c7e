import { ExtractJwt, Strategy } from 'passport-jwt';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { JwtPayloadType } from './types/jwt-payload.type';
import { AllConfigType } from '../../config/config.type';
import { UsersService } from '../../users/users.service';
import { Actor } from '../../authorization/domain/actor';
import { AuditService, AuditEventType } from '../../audit/audit.service';

/**
 * Rebuilds the Actor for every request from the stored user, so that a
 * disabled or deleted user is locked out before the token expires.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(
    private readonly usersService: UsersService,
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    const issuer = configService.get('auth.jwtIssuer', { infer: true });
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: configService.getOrThrow('auth.secret', { infer: true }),
      ...(issuer ? { issuer } : {}),
    });
  }

  public async validate(payload: JwtPayloadType): Promise<Actor> {
    if (!payload.sub) {
      throw new UnauthorizedException();
    }

    const user = await this.usersService.findByLogin(payload.sub);
    if (!user || !user.enabled) {
      this.auditService.logEvent({
        actor: payload.sub,
        component: 'auth',
        event: AuditEventType.TOKEN_VALIDATION_FAILED,
        success: false,
        errorMessage: user ? 'User is disabled' : 'User not found',
      });
      throw new UnauthorizedException();
    }

    return {
      login: user.login,
      roles: user.roles.map((role) => role.name),
    };
  }
}

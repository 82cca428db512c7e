import {
  HttpStatus,
  Injectable,
  UnprocessableEntityException,
} from '@nestjs/common';
import ms from 'ms';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { AuthLoginDto } from './dto/auth-login.dto';
import { LoginResponseDto } from './dto/login-response.dto';
import { JwtPayloadType } from './strategies/types/jwt-payload.type';
import { UsersService } from '../users/users.service';
import { PasswordHasherPort } from '../users/domain/ports/password-hasher.port';
import { AllConfigType } from '../config/config.type';
import { AuditService, AuditEventType } from '../audit/audit.service';

@Injectable()
export class AuthService {
  constructor(
    private jwtService: JwtService,
    private usersService: UsersService,
    private passwordHasher: PasswordHasherPort,
    private configService: ConfigService<AllConfigType>,
    private auditService: AuditService,
  ) {}

  async validateLogin(loginDto: AuthLoginDto): Promise<LoginResponseDto> {
    const user = await this.usersService.findByLogin(loginDto.login);

    if (!user) {
      this.logFailedLogin(loginDto.login, 'User not found');
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: {
          login: 'notFound',
        },
      });
    }

    const isValidPassword = await this.passwordHasher.compare(
      loginDto.password,
      user.password,
    );

    if (!isValidPassword) {
      this.logFailedLogin(user.login, 'Incorrect password');
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: {
          password: 'incorrectPassword',
        },
      });
    }

    if (!user.enabled) {
      this.logFailedLogin(user.login, 'User is disabled');
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: {
          login: 'userDisabled',
        },
      });
    }

    const { token, tokenExpires } = await this.getTokenData({
      sub: user.login,
    });

    this.auditService.logEvent({
      actor: user.login,
      component: 'auth',
      event: AuditEventType.LOGIN_SUCCESS,
      success: true,
    });

    return {
      token,
      tokenExpires,
      login: user.login,
      roles: user.roles.map((role) => role.name),
    };
  }

  private logFailedLogin(login: string, reason: string): void {
    this.auditService.logEvent({
      actor: login,
      component: 'auth',
      event: AuditEventType.LOGIN_FAILED,
      success: false,
      errorMessage: reason,
    });
  }

  private async getTokenData(payload: JwtPayloadType) {
    const tokenExpiresIn = this.configService.getOrThrow('auth.expires', {
      infer: true,
    });
    const expiresInMs = ms(tokenExpiresIn);
    const tokenExpires = Date.now() + expiresInMs;
    const issuer = this.configService.get('auth.jwtIssuer', { infer: true });

    const token = await this.jwtService.signAsync(
      {
        sub: payload.sub,
        ...(issuer ? { iss: issuer } : {}),
      },
      {
        secret: this.configService.getOrThrow('auth.secret', { infer: true }),
        expiresIn: Math.floor(expiresInMs / 1000),
      },
    );

    return {
      token,
      tokenExpires,
    };
  }
}

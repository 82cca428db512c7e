import { registerAs } from '@nestjs/config';

import { IsString, IsOptional, IsInt, Min, Max } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { IsMsDuration } from '../../utils/validators/is-ms-duration.validator';
import { AuthConfig } from './auth-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  AUTH_JWT_SECRET!: string;

  @IsString()
  @IsMsDuration()
  AUTH_JWT_TOKEN_EXPIRES_IN!: string;

  @IsInt()
  @Min(4)
  @Max(31)
  @IsOptional()
  AUTH_BCRYPT_ROUNDS?: number;

  @IsString()
  @IsOptional()
  AUTH_JWT_ISSUER?: string;
}

export default registerAs<AuthConfig>('auth', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    secret: process.env.AUTH_JWT_SECRET,
    expires: process.env.AUTH_JWT_TOKEN_EXPIRES_IN,
    bcryptRounds: process.env.AUTH_BCRYPT_ROUNDS
      ? parseInt(process.env.AUTH_BCRYPT_ROUNDS, 10)
      : 10,
    jwtIssuer: process.env.AUTH_JWT_ISSUER,
  };
});

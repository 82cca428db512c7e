import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import bcrypt from 'bcryptjs';
import { AllConfigType } from '../../../config/config.type';
import { PasswordHasherPort } from '../../domain/ports/password-hasher.port';

@Injectable()
export class BcryptPasswordHasher implements PasswordHasherPort {
  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  async hash(password: string): Promise<string> {
    const rounds = this.configService.get('auth.bcryptRounds', { infer: true });
    const salt = await bcrypt.genSalt(rounds ?? 10);
    return bcrypt.hash(password, salt);
  }

  compare(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }
}

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export interface AuditEventData {
  actor: string;
  component: AuditComponent;
  event: AuditEventType;
  target?: string;
  success: boolean;
  errorMessage?: string;
  metadata?: Record<string, string | number | boolean | string[]>;
}

export type AuditComponent = 'auth' | 'users' | 'companies' | 'authorization';

export enum AuditEventType {
  LOGIN_SUCCESS = 'LOGIN_SUCCESS',
  LOGIN_FAILED = 'LOGIN_FAILED',
  TOKEN_VALIDATION_FAILED = 'TOKEN_VALIDATION_FAILED',
  USER_CREATED = 'USER_CREATED',
  USER_UPDATED = 'USER_UPDATED',
  USER_DISABLED = 'USER_DISABLED',
  USER_DELETED = 'USER_DELETED',
  COMPANY_PROVISIONED = 'COMPANY_PROVISIONED',
  COMPANY_UPDATED = 'COMPANY_UPDATED',
  COMPANY_DELETED = 'COMPANY_DELETED',
  ACCESS_DENIED = 'ACCESS_DENIED',
}

/**
 * Audit Service for security-relevant events
 *
 * - One structured JSON line per event (log collectors parse stdout)
 * - Actor login, target reference, event type and outcome only
 * - NO passwords, hashes or tokens
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  logEvent(data: AuditEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: this.configService.get('app.name', { infer: true }),
      component: data.component,
      actor: data.actor,
      event: data.event,
      target: data.target,
      success: data.success,
      errorType: data.errorMessage
        ? this.sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: data.metadata } : {}),
    };

    console.info(JSON.stringify(logEntry));
  }

  /**
   * Strip bearer tokens and hashes from error messages
   */
  private sanitizeErrorMessage(error: string): string {
    return error
      .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
      .replace(/token[:\s]+[^\s]+/gi, 'token: [REDACTED]')
      .replace(/\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}/g, '[HASH_REDACTED]')
      .substring(0, 500);
  }
}

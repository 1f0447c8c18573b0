import { CanActivate, ExecutionContext, Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request, Response } from 'express';
import * as crypto from 'node:crypto';

import { SYNC_CONFIG, type SyncConfig } from '../config/sync-config';
import { SyncLogger } from '../logging/sync-logger.service';
import { LogCategory } from '../logging/log-levels';
import { IS_PUBLIC_KEY } from './public.decorator';

/**
 * Bearer shared-secret check for the admin and event-ingress routes.
 *
 * Without ADMIN_SHARED_SECRET, production refuses every request; other
 * environments generate an ephemeral secret once per process and log that
 * they did so.
 */
@Injectable()
export class SharedSecretGuard implements CanActivate {
  private ephemeralSecret?: string;

  constructor(
    @Inject(SYNC_CONFIG) private readonly config: Pick<SyncConfig, 'adminSharedSecret'>,
    private readonly reflector: Reflector,
    private readonly logger: SyncLogger,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      this.logger.trace(LogCategory.AUTH, 'Skipping auth, route is public');
      return true;
    }

    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();

    const expectedSecret = this.resolveSecret(response);
    const header = request.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      this.logger.warn(LogCategory.AUTH, 'Missing or malformed Authorization header', { path: request.path });
      this.reject(response, 'Missing bearer token.');
    }

    if (!safeEqual(header.slice(7), expectedSecret)) {
      this.logger.warn(LogCategory.AUTH, 'Invalid bearer token', { path: request.path });
      this.reject(response, 'Invalid bearer token.');
    }
    return true;
  }

  private resolveSecret(response: Response): string {
    if (this.config.adminSharedSecret) return this.config.adminSharedSecret;

    if (process.env.NODE_ENV === 'production') {
      this.logger.fatal(LogCategory.AUTH, 'ADMIN_SHARED_SECRET is not configured');
      this.reject(response, 'Shared secret not configured.');
    }

    if (!this.ephemeralSecret) {
      this.ephemeralSecret = crypto.randomBytes(32).toString('base64url');
      this.logger.warn(LogCategory.AUTH, `Auto-generated ephemeral ADMIN_SHARED_SECRET for ${process.env.NODE_ENV || 'development'}`, {
        hint: 'Set ADMIN_SHARED_SECRET to suppress this warning',
      });
    }
    return this.ephemeralSecret;
  }

  private reject(response: Response, detail: string): never {
    response.setHeader('WWW-Authenticate', 'Bearer realm="access-sync"');
    throw new UnauthorizedException(detail);
  }
}

function safeEqual(actual: string, expected: string): boolean {
  const a = Buffer.from(actual);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

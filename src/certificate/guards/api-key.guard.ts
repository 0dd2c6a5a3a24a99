import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { createHash, timingSafeEqual } from 'crypto';

/**
 * Guards the operator API with the `X-API-Key` header. Without a configured
 * key every request is rejected.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKeyDigest: Buffer | undefined;

  constructor(configService: ConfigService) {
    const apiKey = configService.get<string>('certd.main.apiKey');

    if (apiKey) {
      this.apiKeyDigest = digest(apiKey);
    } else {
      this.logger.error('CERTD_API_KEY not configured - operator API will reject all requests');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();

    // CORS preflight
    if (request.method === 'OPTIONS') {
      return true;
    }

    const providedKey = this.extractApiKey(request);

    if (!providedKey) {
      this.logger.warn(`Operator API call without credentials ${request.method} ${request.path}`);
      throw new UnauthorizedException('Missing X-API-Key header');
    }

    if (!this.apiKeyDigest) {
      this.logger.error(`Operator API call refused, no key configured ${request.method} ${request.path}`);
      throw new UnauthorizedException('API authentication not configured');
    }

    // Digests have a fixed length, so the comparison never depends on key length.
    if (!timingSafeEqual(digest(providedKey), this.apiKeyDigest)) {
      this.logger.warn(`Operator API call with invalid key ${request.method} ${request.path}`);
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }

  private extractApiKey(request: Request): string | undefined {
    const header = request.headers['x-api-key'];
    return Array.isArray(header) ? header[0] : header;
  }
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

import { CanActivate, ExecutionContext, HttpException, HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { JwtService } from '@nestjs/jwt';
import { Request, Response } from 'express';
import { RateLimiterService } from '../services/rate-limiter.service';
import { SKIP_RATE_LIMIT_KEY } from '../decorators/skip-rate-limit.decorator';
import { getClientIp } from '../utils/client-ip.util';

interface TokenPayload {
  sub: string;
}

@Injectable()
export class RateLimitGuard implements CanActivate {
  private readonly logger = new Logger(RateLimitGuard.name);
  private readonly windowSeconds: number;
  private readonly anonymousLimit: number;
  private readonly authenticatedLimit: number;

  constructor(
    private readonly rateLimiter: RateLimiterService,
    private readonly jwtService: JwtService,
    private readonly reflector: Reflector,
    configService: ConfigService,
  ) {
    this.windowSeconds = Number(configService.get('RATE_LIMIT_WINDOW_SECONDS', 3600));
    this.anonymousLimit = Number(configService.get('RATE_LIMIT_ANONYMOUS', 100));
    this.authenticatedLimit = Number(configService.get('RATE_LIMIT_AUTHENTICATED', 1000));
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const skip = this.reflector.getAllAndOverride<boolean>(SKIP_RATE_LIMIT_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (skip) {
      return true;
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const userId = this.resolveUserId(request);
    const identity = userId ? `user:${userId}` : `ip:${getClientIp(request)}`;
    const limit = userId ? this.authenticatedLimit : this.anonymousLimit;

    const decision = await this.rateLimiter.hit(identity, limit, this.windowSeconds);

    response.setHeader('X-RateLimit-Limit', decision.limit);
    response.setHeader('X-RateLimit-Remaining', decision.remaining);
    response.setHeader('X-RateLimit-Reset', Math.ceil(decision.resetAt.getTime() / 1000));

    if (!decision.allowed) {
      this.logger.warn(`Rate limit exceeded for ${identity}`);
      throw new HttpException('Rate limit exceeded. Please try again later.', HttpStatus.TOO_MANY_REQUESTS);
    }

    return true;
  }

  private resolveUserId(request: Request): string | null {
    const header = request.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      return null;
    }

    try {
      const payload = this.jwtService.verify<TokenPayload>(header.slice('Bearer '.length));
      return payload.sub;
    } catch {
      return null;
    }
  }
}

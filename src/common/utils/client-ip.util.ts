import { Request } from 'express';

export function getClientIp(request: Request): string {
  const forwarded = request.headers['x-forwarded-for'];
  const realIp = request.headers['x-real-ip'];
  const candidate =
    (Array.isArray(forwarded) ? forwarded[0] : forwarded) ||
    (Array.isArray(realIp) ? realIp[0] : realIp) ||
    request.socket?.remoteAddress ||
    'unknown';

  return candidate.split(',')[0].trim();
}

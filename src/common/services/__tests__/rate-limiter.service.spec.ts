import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { RateLimiterService } from '../rate-limiter.service';
import { REDIS_CLIENT } from '../../redis/redis.provider';

describe('RateLimiterService', () => {
  let service: RateLimiterService;

  const mockRedis = {
    incr: jest.fn(),
    expire: jest.fn(),
  };

  // 2025-03-01T12:30:00Z sits in the hourly window that resets at 13:00.
  const now = new Date('2025-03-01T12:30:00.000Z');
  const windowIndex = Math.floor(now.getTime() / 3_600_000);

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [RateLimiterService, { provide: REDIS_CLIENT, useValue: mockRedis }],
    }).compile();

    service = module.get<RateLimiterService>(RateLimiterService);
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should start a window on the first hit', async () => {
    mockRedis.incr.mockResolvedValue(1);

    const decision = await service.hit('ip:10.0.0.1', 100, 3600, now);

    expect(mockRedis.incr).toHaveBeenCalledWith(`ratelimit:ip:10.0.0.1:${windowIndex}`);
    expect(mockRedis.expire).toHaveBeenCalledWith(`ratelimit:ip:10.0.0.1:${windowIndex}`, 3600);
    expect(decision).toEqual({
      allowed: true,
      count: 1,
      limit: 100,
      remaining: 99,
      resetAt: new Date('2025-03-01T13:00:00.000Z'),
    });
  });

  it('should allow the last request of the window and refuse the next', async () => {
    mockRedis.incr.mockResolvedValueOnce(100).mockResolvedValueOnce(101);

    const last = await service.hit('user:user-1', 100, 3600, now);
    const over = await service.hit('user:user-1', 100, 3600, now);

    expect(last.allowed).toBe(true);
    expect(last.remaining).toBe(0);
    expect(over.allowed).toBe(false);
    expect(over.remaining).toBe(0);
    expect(mockRedis.expire).not.toHaveBeenCalled();
  });

  it('should let requests through when Redis is unavailable', async () => {
    mockRedis.incr.mockRejectedValue(new Error('ECONNREFUSED'));

    const decision = await service.hit('ip:10.0.0.1', 100, 3600, now);

    expect(decision.allowed).toBe(true);
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      'Rate limit counter unavailable for ip:10.0.0.1: ECONNREFUSED',
    );
  });
});

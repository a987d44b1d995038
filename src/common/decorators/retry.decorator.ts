import { RetryConfig } from '../interfaces/retry-config.interface';
import { RetryConfigService } from '../services/retry-config.service';

const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 3,
  delay: 1000,
  backoff: true,
  backoffFactor: 2,
};

interface RetryHost {
  retryConfigService?: RetryConfigService;
}

type AsyncMethod = (...args: unknown[]) => Promise<unknown>;

/**
 * Re-invokes an async method when it rejects.
 *
 * Without an explicit config the host's `retryConfigService` supplies the
 * Stripe retry settings, falling back to three attempts with exponential
 * backoff.
 */
export function Retry(config?: RetryConfig | number) {
  return function (
    _target: object,
    _propertyKey: string | symbol,
    descriptor: PropertyDescriptor,
  ): PropertyDescriptor {
    const originalMethod: AsyncMethod = descriptor.value;

    descriptor.value = async function (this: RetryHost, ...args: unknown[]) {
      const retryConfig: RetryConfig =
        typeof config === 'number'
          ? { maxAttempts: config, delay: DEFAULT_RETRY.delay }
          : config ?? this.retryConfigService?.getStripeConfig() ?? DEFAULT_RETRY;

      const maxAttempts = Math.max(1, retryConfig.maxAttempts);

      for (let attempt = 1; ; attempt++) {
        try {
          return await originalMethod.apply(this, args);
        } catch (error) {
          if (attempt >= maxAttempts) {
            throw error;
          }

          const delay = retryConfig.backoff
            ? retryConfig.delay * Math.pow(retryConfig.backoffFactor || 2, attempt - 1)
            : retryConfig.delay;

          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    };

    return descriptor;
  };
}

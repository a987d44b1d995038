import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { StripeService } from '../stripe.service';
import { RetryConfigService } from '../../../../common/services/retry-config.service';

const mockStripeInstance = {
  paymentIntents: {
    create: jest.fn(),
    cancel: jest.fn(),
  },
  customers: {
    create: jest.fn(),
  },
  webhooks: {
    constructEvent: jest.fn(),
  },
};

jest.mock('stripe', () => jest.fn().mockImplementation(() => mockStripeInstance));

describe('StripeService', () => {
  let service: StripeService;

  const mockConfigService = {
    get: jest.fn((key: string, defaultValue?: unknown) => {
      const values: Record<string, unknown> = {
        STRIPE_SECRET_KEY: 'sk_test_placeholder',
        STRIPE_CURRENCY: 'nok',
      };
      return values[key] ?? defaultValue;
    }),
  };

  const mockRetryConfigService = {
    getStripeConfig: jest.fn().mockReturnValue({ maxAttempts: 2, delay: 0, backoff: false }),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StripeService,
        { provide: ConfigService, useValue: mockConfigService },
        { provide: RetryConfigService, useValue: mockRetryConfigService },
      ],
    }).compile();

    service = module.get<StripeService>(StripeService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('createPaymentIntent', () => {
    const params = {
      amount: 225000,
      currency: 'nok',
      customerId: 'cus_test',
      metadata: { order_id: 'order-1', order_number: 'ORD202503011200', user_id: 'user-1' },
      idempotencyKey: 'order-1',
    };

    it('should pass the amount, metadata and idempotency key to Stripe', async () => {
      mockStripeInstance.paymentIntents.create.mockResolvedValue({ id: 'pi_test', client_secret: 'secret' });

      const intent = await service.createPaymentIntent(params);

      expect(intent.id).toBe('pi_test');
      expect(mockStripeInstance.paymentIntents.create).toHaveBeenCalledWith(
        expect.objectContaining({
          amount: 225000,
          currency: 'nok',
          customer: 'cus_test',
          metadata: { order_id: 'order-1', order_number: 'ORD202503011200', user_id: 'user-1' },
        }),
        { idempotencyKey: 'order-1' },
      );
    });

    it('should retry a failed call with the configured attempts', async () => {
      mockStripeInstance.paymentIntents.create
        .mockRejectedValueOnce(new Error('connection reset'))
        .mockResolvedValueOnce({ id: 'pi_retry' });

      const intent = await service.createPaymentIntent(params);

      expect(intent.id).toBe('pi_retry');
      expect(mockStripeInstance.paymentIntents.create).toHaveBeenCalledTimes(2);
    });

    it('should rethrow once attempts are exhausted', async () => {
      mockStripeInstance.paymentIntents.create.mockRejectedValue(new Error('card_declined'));

      await expect(service.createPaymentIntent(params)).rejects.toThrow('card_declined');
      expect(mockStripeInstance.paymentIntents.create).toHaveBeenCalledTimes(2);
    });
  });

  describe('createCustomer', () => {
    it('should create a customer with email and name', async () => {
      mockStripeInstance.customers.create.mockResolvedValue({ id: 'cus_new' });

      const customer = await service.createCustomer('kari@example.com', 'Kari Nordmann');

      expect(customer.id).toBe('cus_new');
      expect(mockStripeInstance.customers.create).toHaveBeenCalledWith({
        email: 'kari@example.com',
        name: 'Kari Nordmann',
      });
    });
  });

  describe('currency', () => {
    it('should default to the configured currency', () => {
      expect(service.currency).toBe('nok');
    });
  });
});

import { loadConfig } from '../../src/utils/config';
import { ValidationError } from '../../src/utils/errors';

describe('loadConfig', () => {
  it('should fall back to defaults for unset keys', () => {
    const config = loadConfig({});

    expect(config.optimistic).toEqual({ maxAttempts: 3, baseDelayMs: 50 });
    expect(config.remoteTimeoutMs).toBe(3000);
    expect(config.maxReceiveCount).toBe(5);
    expect(config.webhook).toEqual({ maxAttempts: 3, baseDelayMs: 200, timeoutMs: 3000 });
    expect(config.payment).toEqual({
      billerCode: '93242',
      merchantAccountId: 'merchant-store',
      instructionTtlMinutes: 30,
    });
    expect(config.delivery).toEqual({ carrier: 'Express Freight', estimateDays: 4, lossRatePercent: 5 });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      REMOTE_TIMEOUT_MS: '1500',
      DELIVERY_LOSS_RATE_PERCENT: '0',
      ORDER_SERVICE_URL: 'https://orders.internal',
    });

    expect(config.remoteTimeoutMs).toBe(1500);
    expect(config.delivery.lossRatePercent).toBe(0);
    expect(config.services.orderUrl).toBe('https://orders.internal');
  });

  it('should reject a non-integer value', () => {
    expect(() => loadConfig({ MAX_RECEIVE_COUNT: 'five' })).toThrow(ValidationError);
    expect(() => loadConfig({ REMOTE_TIMEOUT_MS: '0' })).toThrow('REMOTE_TIMEOUT_MS must be an integer >= 1');
  });

  it('should return a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});

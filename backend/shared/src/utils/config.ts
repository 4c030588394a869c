import { ValidationError } from './errors';

/**
 * Runtime configuration shared by every service.
 * Read once per cold start from the Lambda environment.
 */
export interface AppConfig {
  region: string;
  eventBusName: string;
  optimistic: {
    maxAttempts: number;
    baseDelayMs: number;
  };
  remoteTimeoutMs: number;
  maxReceiveCount: number;
  webhook: {
    maxAttempts: number;
    baseDelayMs: number;
    timeoutMs: number;
  };
  payment: {
    billerCode: string;
    merchantAccountId: string;
    instructionTtlMinutes: number;
  };
  delivery: {
    carrier: string;
    estimateDays: number;
    lossRatePercent: number;
  };
  services: {
    inventoryUrl: string;
    paymentUrl: string;
    deliveryUrl: string;
    orderUrl: string;
  };
  notificationSender: string;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${name} must be an integer >= ${min}`, name, raw);
  }
  return value;
}

function readText(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw === undefined || raw === '' ? fallback : raw;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return Object.freeze({
    region: readText(env, 'AWS_REGION', 'us-east-2'),
    eventBusName: readText(env, 'EVENT_BUS_NAME', 'fulfillment-events'),
    optimistic: {
      maxAttempts: readInt(env, 'OPTIMISTIC_MAX_ATTEMPTS', 3),
      baseDelayMs: readInt(env, 'OPTIMISTIC_BASE_DELAY_MS', 50, 0),
    },
    remoteTimeoutMs: readInt(env, 'REMOTE_TIMEOUT_MS', 3000),
    maxReceiveCount: readInt(env, 'MAX_RECEIVE_COUNT', 5),
    webhook: {
      maxAttempts: readInt(env, 'WEBHOOK_MAX_ATTEMPTS', 3),
      baseDelayMs: readInt(env, 'WEBHOOK_BASE_DELAY_MS', 200, 0),
      timeoutMs: readInt(env, 'WEBHOOK_TIMEOUT_MS', 3000),
    },
    payment: {
      billerCode: readText(env, 'BPAY_BILLER_CODE', '93242'),
      merchantAccountId: readText(env, 'MERCHANT_ACCOUNT_ID', 'merchant-store'),
      instructionTtlMinutes: readInt(env, 'PAYMENT_INSTRUCTION_TTL_MINUTES', 30),
    },
    delivery: {
      carrier: readText(env, 'DELIVERY_CARRIER', 'Express Freight'),
      estimateDays: readInt(env, 'DELIVERY_ESTIMATE_DAYS', 4),
      lossRatePercent: readInt(env, 'DELIVERY_LOSS_RATE_PERCENT', 5, 0),
    },
    services: {
      inventoryUrl: readText(env, 'INVENTORY_SERVICE_URL', 'http://localhost:3001'),
      paymentUrl: readText(env, 'PAYMENT_SERVICE_URL', 'http://localhost:3002'),
      deliveryUrl: readText(env, 'DELIVERY_SERVICE_URL', 'http://localhost:3003'),
      orderUrl: readText(env, 'ORDER_SERVICE_URL', 'http://localhost:3000'),
    },
    notificationSender: readText(env, 'NOTIFICATION_SENDER', 'orders@example.com'),
  });
}

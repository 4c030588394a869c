import { SQSHandler } from 'aws-lambda';
import {
  createPaymentLedger,
  createSqsConsumer,
  IdempotencyService,
  loadConfig,
  logger,
  parseRefundMessage,
  QueueName,
  SqsMessagePublisher,
} from 'fulfillment-backend-shared';

const config = loadConfig();
const ledger = createPaymentLedger(config);

/**
 * Payment Refund Consumer
 * Refunds a settled payment or voids an unpaid instruction
 */
export const handler: SQSHandler = createSqsConsumer({
  consumerName: 'payment-refund',
  queue: QueueName.PAYMENT_REFUND,
  parse: parseRefundMessage,
  handle: async (message, guard) => {
    const outcome = await ledger.requestRefund(message.orderId, message.reason, guard);
    logger.info('Refund message applied', { orderId: message.orderId, outcome });
  },
  idempotency: new IdempotencyService(),
  publisher: new SqsMessagePublisher(),
  maxReceiveCount: config.maxReceiveCount,
});

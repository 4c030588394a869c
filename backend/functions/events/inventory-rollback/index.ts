import { SQSHandler } from 'aws-lambda';
import {
  createInventoryLedger,
  createSqsConsumer,
  IdempotencyService,
  loadConfig,
  parseRollbackMessage,
  QueueName,
  SqsMessagePublisher,
} from 'fulfillment-backend-shared';

const config = loadConfig();
const ledger = createInventoryLedger(config);

/**
 * Inventory Rollback Consumer
 * Returns an order's reserved stock. The idempotency record is written in
 * the same transaction as the last release.
 */
export const handler: SQSHandler = createSqsConsumer({
  consumerName: 'inventory-rollback',
  queue: QueueName.INVENTORY_ROLLBACK,
  parse: parseRollbackMessage,
  handle: async (message, guard) => {
    await ledger.rollback(message.orderId, { guard, reservationId: message.reservationId });
  },
  idempotency: new IdempotencyService(),
  publisher: new SqsMessagePublisher(),
  maxReceiveCount: config.maxReceiveCount,
});

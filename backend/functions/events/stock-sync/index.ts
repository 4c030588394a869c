import { SQSHandler } from 'aws-lambda';
import {
  createOrderOrchestrator,
  createSqsConsumer,
  IdempotencyService,
  loadConfig,
  parseStockSyncMessage,
  QueueName,
  SqsMessagePublisher,
} from 'fulfillment-backend-shared';

const config = loadConfig();
const orchestrator = createOrderOrchestrator(config);

/**
 * Stock Sync Consumer
 * Copies warehouse stock totals into the orchestrator's catalog
 */
export const handler: SQSHandler = createSqsConsumer({
  consumerName: 'stock-sync',
  queue: QueueName.STOCK_SYNC,
  parse: parseStockSyncMessage,
  handle: async (message, guard) => {
    await orchestrator.applyStockSync(message, guard);
  },
  idempotency: new IdempotencyService(),
  publisher: new SqsMessagePublisher(),
  maxReceiveCount: config.maxReceiveCount,
});

import { SQSHandler } from 'aws-lambda';
import {
  createNotificationService,
  createSqsConsumer,
  IdempotencyService,
  loadConfig,
  parseNotificationMessage,
  QueueName,
  SqsMessagePublisher,
} from 'fulfillment-backend-shared';

const config = loadConfig();
const notifications = createNotificationService(config);

/**
 * Send Notification Consumer
 * E-mails the customer about order events through SES
 */
export const handler: SQSHandler = createSqsConsumer({
  consumerName: 'send-notification',
  queue: QueueName.NOTIFICATION,
  parse: parseNotificationMessage,
  handle: async (message, guard) => {
    await notifications.deliver(message, guard);
  },
  idempotency: new IdempotencyService(),
  publisher: new SqsMessagePublisher(),
  maxReceiveCount: config.maxReceiveCount,
});

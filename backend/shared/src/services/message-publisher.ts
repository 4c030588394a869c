import { SQSClient, SendMessageCommand } from '@aws-sdk/client-sqs';
import { logger } from '../utils/logger';
import { QueueName, SagaMessage } from '../types';

/**
 * Durable queues between services. Delivery is at-least-once; consumers
 * deduplicate on the message's eventId.
 */
export interface MessagePublisher {
  publish(queue: QueueName, message: SagaMessage): Promise<void>;
  deadLetter(queue: QueueName, body: string, reason: string): Promise<void>;
}

const QUEUE_URL_ENV: Record<QueueName, string> = {
  [QueueName.INVENTORY_ROLLBACK]: 'INVENTORY_ROLLBACK_QUEUE_URL',
  [QueueName.PAYMENT_REFUND]: 'PAYMENT_REFUND_QUEUE_URL',
  [QueueName.NOTIFICATION]: 'NOTIFICATION_QUEUE_URL',
  [QueueName.STOCK_SYNC]: 'STOCK_SYNC_QUEUE_URL',
};

/**
 * Queue URL from environment; `DLQ` selects the dead-letter queue
 */
export function getQueueUrl(queue: QueueName, kind: 'MAIN' | 'DLQ' = 'MAIN'): string {
  const envVar = kind === 'DLQ'
    ? QUEUE_URL_ENV[queue].replace('_QUEUE_URL', '_DLQ_URL')
    : QUEUE_URL_ENV[queue];
  const url = process.env[envVar];
  if (!url) {
    throw new Error(`Environment variable ${envVar} is not set`);
  }
  return url;
}

// Cache SQS client
let sqsClient: SQSClient | null = null;

function getSQSClient(): SQSClient {
  if (!sqsClient) {
    sqsClient = new SQSClient({
      region: process.env.AWS_REGION || 'us-east-2',
    });
  }
  return sqsClient;
}

export class SqsMessagePublisher implements MessagePublisher {
  async publish(queue: QueueName, message: SagaMessage): Promise<void> {
    await getSQSClient().send(
      new SendMessageCommand({
        QueueUrl: getQueueUrl(queue),
        MessageBody: JSON.stringify(message),
        MessageAttributes: {
          eventId: { DataType: 'String', StringValue: message.eventId },
        },
      })
    );

    logger.info('Message published', { queue, eventId: message.eventId });
  }

  /**
   * Park an unprocessable message for manual inspection
   */
  async deadLetter(queue: QueueName, body: string, reason: string): Promise<void> {
    await getSQSClient().send(
      new SendMessageCommand({
        QueueUrl: getQueueUrl(queue, 'DLQ'),
        MessageBody: body,
        MessageAttributes: {
          reason: { DataType: 'String', StringValue: reason.slice(0, 256) },
          sourceQueue: { DataType: 'String', StringValue: queue },
        },
      })
    );

    logger.warn('Message dead-lettered', { queue, reason });
  }
}

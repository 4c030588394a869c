import { SQSBatchItemFailure, SQSBatchResponse, SQSEvent, SQSRecord } from 'aws-lambda';
import { MessageGuard, QueueName } from '../types';
import {
  DuplicateMessageError,
  errorMessage,
  MalformedMessageError,
  NotFoundError,
  ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { IdempotencyService } from './idempotency-service';
import { MessagePublisher } from './message-publisher';

export type FailureAction = 'ack' | 'retry' | 'dead-letter';

/**
 * What to do with a message whose handler threw.
 * Duplicates are already applied; malformed or unresolvable messages will
 * never succeed; everything else is retried until the receive ceiling.
 */
export function classifyFailure(error: unknown, receiveCount: number, maxReceiveCount: number): FailureAction {
  if (error instanceof DuplicateMessageError) {
    return 'ack';
  }
  if (
    error instanceof MalformedMessageError ||
    error instanceof ValidationError ||
    error instanceof NotFoundError
  ) {
    return 'dead-letter';
  }
  return receiveCount >= maxReceiveCount ? 'dead-letter' : 'retry';
}

export interface ConsumerOptions<T extends { eventId: string }> {
  consumerName: string;
  queue: QueueName;
  parse: (body: string) => T;
  /** Must write `guard` with its side effect, or via IdempotencyService.record */
  handle: (message: T, guard: MessageGuard) => Promise<void>;
  idempotency: IdempotencyService;
  publisher: Pick<MessagePublisher, 'deadLetter'>;
  maxReceiveCount: number;
}

function receiveCountOf(record: SQSRecord): number {
  const count = Number(record.attributes.ApproximateReceiveCount);
  return Number.isInteger(count) && count > 0 ? count : 1;
}

/**
 * Build an SQS Lambda handler with partial batch responses.
 * Records run in order; retried records are reported in batchItemFailures,
 * dead-lettered ones are forwarded to the DLQ and acknowledged.
 */
export function createSqsConsumer<T extends { eventId: string }>(
  options: ConsumerOptions<T>
): (event: SQSEvent) => Promise<SQSBatchResponse> {
  const { consumerName, queue } = options;

  const processRecord = async (record: SQSRecord): Promise<SQSBatchItemFailure | null> => {
    const receiveCount = receiveCountOf(record);
    const log = logger.child({ service: consumerName, sqsMessageId: record.messageId });

    try {
      const message = options.parse(record.body);
      const guard = IdempotencyService.guardFor(consumerName, message.eventId);

      if (await options.idempotency.isProcessed(guard)) {
        return null;
      }

      await options.handle(message, guard);
      log.info('Message processed', { eventId: message.eventId, receiveCount });
      return null;
    } catch (error) {
      const action = classifyFailure(error, receiveCount, options.maxReceiveCount);

      switch (action) {
        case 'ack':
          log.info('Duplicate message acknowledged', { error: errorMessage(error) });
          return null;

        case 'retry':
          log.warn('Message failed, will be retried', { receiveCount, error: errorMessage(error) });
          return { itemIdentifier: record.messageId };

        case 'dead-letter':
          log.error('Message dead-lettered', error, { receiveCount });
          try {
            await options.publisher.deadLetter(queue, record.body, errorMessage(error));
            return null;
          } catch (dlqError) {
            log.error('Failed to dead-letter message', dlqError);
            return { itemIdentifier: record.messageId };
          }
      }
    }
  };

  return async (event: SQSEvent): Promise<SQSBatchResponse> => {
    const batchItemFailures: SQSBatchItemFailure[] = [];

    for (const record of event.Records) {
      const failure = await processRecord(record);
      if (failure) {
        batchItemFailures.push(failure);
      }
    }

    return { batchItemFailures };
  };
}

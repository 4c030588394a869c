import { SQSBatchResponse, SQSEvent } from 'aws-lambda';
import { IdempotencyService } from '../../src/services/idempotency-service';
import { classifyFailure, createSqsConsumer } from '../../src/services/message-consumer';
import { parseRefundMessage } from '../../src/services/message-schemas';
import { MessageGuard, QueueName, RefundRequestMessage } from '../../src/types';
import {
  DuplicateMessageError,
  MalformedMessageError,
  NotFoundError,
  RemoteTimeoutError,
  TransientInfraError,
  ValidationError,
} from '../../src/utils/errors';
import { InMemoryProcessedMessageStore } from '../fakes/in-memory-stores';
import { RecordingPublisher } from '../fakes/recorders';
import { createSqsEvent, createSqsRecord } from '../fixtures/test-data';

describe('classifyFailure', () => {
  it.each([
    { label: 'a duplicate', error: new DuplicateMessageError('evt-1', 'payment-refund'), receiveCount: 1, expected: 'ack' },
    { label: 'a malformed message', error: new MalformedMessageError('eventId is required'), receiveCount: 1, expected: 'dead-letter' },
    { label: 'an invalid message', error: new ValidationError('bad'), receiveCount: 1, expected: 'dead-letter' },
    { label: 'a missing entity', error: new NotFoundError('Order', 'o-1'), receiveCount: 1, expected: 'dead-letter' },
    { label: 'a transient failure', error: new TransientInfraError('throttled'), receiveCount: 1, expected: 'retry' },
    { label: 'a timeout', error: new RemoteTimeoutError('payment', 3000), receiveCount: 4, expected: 'retry' },
    { label: 'a failure on the last receive', error: new Error('boom'), receiveCount: 5, expected: 'dead-letter' },
  ])('should handle $label', ({ error, receiveCount, expected }) => {
    expect(classifyFailure(error, receiveCount, 5)).toBe(expected);
  });
});

describe('createSqsConsumer', () => {
  const body = JSON.stringify({
    eventId: 'evt-1',
    orderId: 'order-1',
    reason: 'Order cancelled',
    userId: 'user-1',
    timestamp: '2024-01-01T00:00:00.000Z',
  });

  let processed: InMemoryProcessedMessageStore;
  let publisher: RecordingPublisher;
  let handle: jest.Mock<Promise<void>, [RefundRequestMessage, MessageGuard]>;
  let consume: (event: SQSEvent) => Promise<SQSBatchResponse>;

  beforeEach(() => {
    processed = new InMemoryProcessedMessageStore();
    publisher = new RecordingPublisher();
    handle = jest.fn<Promise<void>, [RefundRequestMessage, MessageGuard]>().mockResolvedValue(undefined);
    consume = createSqsConsumer({
      consumerName: 'payment-refund',
      queue: QueueName.PAYMENT_REFUND,
      parse: parseRefundMessage,
      handle,
      idempotency: new IdempotencyService(processed),
      publisher,
      maxReceiveCount: 5,
    });
  });

  it('should hand the parsed message and its guard to the handler', async () => {
    const result = await consume(createSqsEvent(createSqsRecord(body)));

    expect(result).toEqual({ batchItemFailures: [] });
    expect(handle).toHaveBeenCalledWith(
      expect.objectContaining({ eventId: 'evt-1', orderId: 'order-1' }),
      { consumerName: 'payment-refund', messageId: 'evt-1' }
    );
  });

  it('should skip a message already processed', async () => {
    processed.records.add('payment-refund#evt-1');

    await consume(createSqsEvent(createSqsRecord(body)));

    expect(handle).not.toHaveBeenCalled();
  });

  it('should dead-letter a malformed body without retrying', async () => {
    const result = await consume(createSqsEvent(createSqsRecord('{"eventId": 42}')));

    expect(result.batchItemFailures).toEqual([]);
    expect(publisher.deadLetters).toHaveLength(1);
    expect(publisher.deadLetters[0]).toMatchObject({ queue: QueueName.PAYMENT_REFUND, body: '{"eventId": 42}' });
    expect(handle).not.toHaveBeenCalled();
  });

  it('should report a transient failure for redelivery', async () => {
    handle.mockRejectedValueOnce(new TransientInfraError('throttled'));

    const result = await consume(createSqsEvent(createSqsRecord(body, {}, 2)));

    expect(result.batchItemFailures).toEqual([{ itemIdentifier: 'sqs-message-1' }]);
    expect(publisher.deadLetters).toHaveLength(0);
  });

  it('should dead-letter once the receive ceiling is reached', async () => {
    handle.mockRejectedValueOnce(new TransientInfraError('throttled'));

    const result = await consume(createSqsEvent(createSqsRecord(body, {}, 5)));

    expect(result.batchItemFailures).toEqual([]);
    expect(publisher.deadLetters).toEqual([
      { queue: QueueName.PAYMENT_REFUND, body, reason: 'throttled' },
    ]);
  });

  it('should acknowledge a duplicate raised by the side effect', async () => {
    handle.mockRejectedValueOnce(new DuplicateMessageError('evt-1', 'payment-refund'));

    const result = await consume(createSqsEvent(createSqsRecord(body)));

    expect(result.batchItemFailures).toEqual([]);
    expect(publisher.deadLetters).toHaveLength(0);
  });

  it('should leave the message on the queue when the dead-letter queue is unavailable', async () => {
    jest.spyOn(publisher, 'deadLetter').mockRejectedValueOnce(new Error('queue unavailable'));

    const result = await consume(createSqsEvent(createSqsRecord('not json')));

    expect(result.batchItemFailures).toEqual([{ itemIdentifier: 'sqs-message-1' }]);
  });

  it('should process every record of a batch independently', async () => {
    handle.mockRejectedValueOnce(new TransientInfraError('throttled'));
    const second = body.replace('evt-1', 'evt-2');

    const result = await consume(
      createSqsEvent(
        createSqsRecord(body, { messageId: 'sqs-a' }, 1),
        createSqsRecord(second, { messageId: 'sqs-b' }, 1)
      )
    );

    expect(result.batchItemFailures).toEqual([{ itemIdentifier: 'sqs-a' }]);
    expect(handle).toHaveBeenCalledTimes(2);
  });
});

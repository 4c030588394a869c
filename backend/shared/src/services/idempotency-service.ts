import { ProcessedMessageRepository } from '../repositories/processed-message-repository';
import { ProcessedMessageStore } from '../repositories/stores';
import { MessageGuard } from '../types';
import { logger } from '../utils/logger';

/**
 * Idempotency Ledger
 * Remembers which messages each consumer has already applied.
 *
 * Consumers check `isProcessed` before doing any work, then hand the guard to
 * the store method performing the side effect so the record is written in the
 * same transaction. `record` covers side effects that turn out to be no-ops.
 */
export class IdempotencyService {
  constructor(private readonly store: ProcessedMessageStore = new ProcessedMessageRepository()) {}

  static guardFor(consumerName: string, messageId: string): MessageGuard {
    return { consumerName, messageId };
  }

  async isProcessed(guard: MessageGuard): Promise<boolean> {
    const processed = await this.store.exists(guard);
    if (processed) {
      logger.info('Message already processed, skipping', { ...guard });
    }
    return processed;
  }

  /**
   * Record a message with no side effect; false when it was already recorded
   */
  async record(guard: MessageGuard): Promise<boolean> {
    return this.store.record(guard);
  }
}

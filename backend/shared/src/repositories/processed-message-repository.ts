import { GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTTLTimestamp,
  getTableName,
  isConditionalCheckFailed,
  TransactItem,
} from '../utils/dynamodb-client';
import { DynamoDBItem, MessageGuard, ProcessedMessage } from '../types';
import { ProcessedMessageStore } from './stores';

const RETENTION_DAYS = 30;
const TABLE_ENV = 'PROCESSED_MESSAGES_TABLE_NAME';

function buildKey(guard: MessageGuard): string {
  return `${guard.consumerName}#${guard.messageId}`;
}

function buildItem(guard: MessageGuard): DynamoDBItem<ProcessedMessage> {
  return {
    PK: buildKey(guard),
    messageId: guard.messageId,
    consumerName: guard.consumerName,
    processedAt: getCurrentTimestamp(),
    expiresAt: getTTLTimestamp(RETENTION_DAYS),
  };
}

/**
 * Conditional insert of an idempotency record, for use inside another
 * repository's TransactWriteCommand
 */
export function buildProcessedMessagePut(guard: MessageGuard): TransactItem {
  return {
    Put: {
      TableName: getTableName(TABLE_ENV),
      Item: buildItem(guard),
      ConditionExpression: 'attribute_not_exists(PK)',
    },
  };
}

/**
 * Idempotency ledger: one row per (consumer, message id)
 */
export class ProcessedMessageRepository implements ProcessedMessageStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName(TABLE_ENV);
  }

  async exists(guard: MessageGuard): Promise<boolean> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: buildKey(guard) },
          ConsistentRead: true,
        })
      );
      return response.Item !== undefined;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Record a message on its own, for consumers whose side effect
   * turned out to be a no-op
   */
  async record(guard: MessageGuard): Promise<boolean> {
    try {
      await withRetry(() =>
        dynamoClient.send(
          new PutCommand({
            TableName: this.tableName,
            Item: buildItem(guard),
            ConditionExpression: 'attribute_not_exists(PK)',
          })
        )
      );
      return true;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        return false;
      }
      return handleDynamoDBError(error);
    }
  }
}

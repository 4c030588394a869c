import { TransactWriteCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getTableName,
  getCancellationReasons,
} from '../utils/dynamodb-client';
import { DuplicateMessageError } from '../utils/errors';
import { EmailLog, EmailStatus, MessageGuard } from '../types';
import { buildProcessedMessagePut } from './processed-message-repository';
import { EmailLogStore } from './stores';

export class EmailLogRepository implements EmailLogStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('EMAIL_LOG_TABLE_NAME');
  }

  /**
   * Insert the log row together with the idempotency record of its message
   */
  async create(email: EmailLog, guard: MessageGuard): Promise<void> {
    try {
      await withRetry(() =>
        dynamoClient.send(
          new TransactWriteCommand({
            TransactItems: [
              {
                Put: {
                  TableName: this.tableName,
                  Item: { PK: email.emailId, ...email },
                },
              },
              buildProcessedMessagePut(guard),
            ],
          })
        )
      );
    } catch (error) {
      if (getCancellationReasons(error)[1] === 'ConditionalCheckFailed') {
        throw new DuplicateMessageError(guard.messageId, guard.consumerName);
      }
      return handleDynamoDBError(error);
    }
  }

  async updateStatus(emailId: string, status: EmailStatus, sentAt?: string): Promise<void> {
    try {
      await withRetry(() =>
        dynamoClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { PK: emailId },
            UpdateExpression: sentAt
              ? 'SET #status = :status, sentAt = :sentAt'
              : 'SET #status = :status',
            ExpressionAttributeNames: { '#status': 'status' },
            ExpressionAttributeValues: {
              ':status': status,
              ...(sentAt ? { ':sentAt': sentAt } : {}),
            },
          })
        )
      );
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}

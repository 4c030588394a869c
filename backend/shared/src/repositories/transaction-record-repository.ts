import { GetCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import { dynamoClient, handleDynamoDBError, getTableName } from '../utils/dynamodb-client';
import { readEnum, readNumber, readString } from '../utils/validators';
import { TransactionKind, TransactionRecord, TransactionStatus } from '../types';
import { TransactionRecordStore } from './stores';

function toTransactionRecord(item: Record<string, unknown>): TransactionRecord {
  return {
    transactionId: readString(item, 'transactionId'),
    paymentId: readString(item, 'paymentId'),
    orderId: readString(item, 'orderId'),
    kind: readEnum(item, 'kind', TransactionKind),
    fromAccountId: readString(item, 'fromAccountId'),
    toAccountId: readString(item, 'toAccountId'),
    amount: readNumber(item, 'amount'),
    memo: readString(item, 'memo'),
    status: readEnum(item, 'status', TransactionStatus),
    createdAt: readString(item, 'createdAt'),
    updatedAt: readString(item, 'updatedAt'),
  };
}

/**
 * Read side of the transfer log; rows are appended by PaymentRepository.settle
 */
export class TransactionRecordRepository implements TransactionRecordStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('TRANSACTIONS_TABLE_NAME');
  }

  async getById(transactionId: string): Promise<TransactionRecord | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: transactionId },
          ConsistentRead: true,
        })
      );

      return response.Item ? toTransactionRecord(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async listByOrder(orderId: string): Promise<TransactionRecord[]> {
    try {
      const response = await dynamoClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: 'orderId-index',
          KeyConditionExpression: 'orderId = :orderId',
          ExpressionAttributeValues: {
            ':orderId': orderId,
          },
        })
      );

      return (response.Items ?? []).map(toTransactionRecord);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}

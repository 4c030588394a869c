import { GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
  isConditionalCheckFailed,
} from '../utils/dynamodb-client';
import { ValidationError } from '../utils/errors';
import { readNumber, readString } from '../utils/validators';
import { Account, DynamoDBItem } from '../types';
import { AccountStore } from './stores';

function toAccount(item: Record<string, unknown>): Account {
  return {
    accountId: readString(item, 'accountId'),
    ownerName: readString(item, 'ownerName'),
    balance: readNumber(item, 'balance'),
    version: readNumber(item, 'version'),
    updatedAt: readString(item, 'updatedAt'),
  };
}

/**
 * Bank accounts. Balance changes only happen through
 * PaymentRepository.settle, together with the transfer record.
 */
export class AccountRepository implements AccountStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('ACCOUNTS_TABLE_NAME');
  }

  async create(account: Omit<Account, 'version' | 'updatedAt'>): Promise<Account> {
    const newAccount: Account = { ...account, version: 0, updatedAt: getCurrentTimestamp() };
    const item: DynamoDBItem<Account> = { PK: account.accountId, ...newAccount };

    try {
      await withRetry(() =>
        dynamoClient.send(
          new PutCommand({
            TableName: this.tableName,
            Item: item,
            ConditionExpression: 'attribute_not_exists(PK)',
          })
        )
      );
      return newAccount;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        throw new ValidationError(`Account ${account.accountId} already exists`, 'accountId', account.accountId);
      }
      return handleDynamoDBError(error);
    }
  }

  async get(accountId: string): Promise<Account | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: accountId },
          ConsistentRead: true,
        })
      );

      return response.Item ? toAccount(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}

import { GetCommand, PutCommand, TransactWriteCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
  getCancellationReasons,
  isConditionalCheckFailed,
  TransactItem,
} from '../utils/dynamodb-client';
import { DuplicateMessageError, VersionConflictError } from '../utils/errors';
import { readEnum, readNumber, readOptionalString, readString } from '../utils/validators';
import {
  Account,
  DynamoDBItem,
  MessageGuard,
  Payment,
  PaymentStatus,
  TransactionKind,
  TransactionStatus,
} from '../types';
import { buildProcessedMessagePut } from './processed-message-repository';
import { PaymentStore, Settlement } from './stores';

const CONDITION_FAILED = 'ConditionalCheckFailed';

function toPayment(item: Record<string, unknown>): Payment {
  return {
    paymentId: readString(item, 'paymentId'),
    orderId: readString(item, 'orderId'),
    referenceNumber: readString(item, 'referenceNumber'),
    billerCode: readString(item, 'billerCode'),
    amount: readNumber(item, 'amount'),
    customerId: readString(item, 'customerId'),
    customerAccountId: readOptionalString(item, 'customerAccountId'),
    transactionId: readOptionalString(item, 'transactionId'),
    status: readEnum(item, 'status', PaymentStatus),
    expiresAt: readString(item, 'expiresAt'),
    version: readNumber(item, 'version'),
    createdAt: readString(item, 'createdAt'),
    updatedAt: readString(item, 'updatedAt'),
  };
}

/**
 * Payments, keyed by order id. Settlements also touch the accounts and
 * transaction log tables so a transfer is all-or-nothing.
 */
export class PaymentRepository implements PaymentStore {
  private tableName: string;
  private accountsTableName: string;
  private transactionsTableName: string;

  constructor() {
    this.tableName = getTableName('PAYMENTS_TABLE_NAME');
    this.accountsTableName = getTableName('ACCOUNTS_TABLE_NAME');
    this.transactionsTableName = getTableName('TRANSACTIONS_TABLE_NAME');
  }

  async create(payment: Payment): Promise<boolean> {
    const item: DynamoDBItem<Payment> = { PK: payment.orderId, ...payment };

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
      return true;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        return false;
      }
      return handleDynamoDBError(error);
    }
  }

  async getByOrderId(orderId: string): Promise<Payment | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: orderId },
          ConsistentRead: true,
        })
      );

      return response.Item ? toPayment(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Status change with no money movement (e.g. PENDING -> PROCESSING, voids)
   */
  async updateStatus(payment: Payment, status: PaymentStatus, guard?: MessageGuard): Promise<Payment> {
    const updated: Payment = {
      ...payment,
      status,
      version: payment.version + 1,
      updatedAt: getCurrentTimestamp(),
    };

    const items = [this.buildPaymentWrite(payment, updated)];
    if (guard) {
      items.push(buildProcessedMessagePut(guard));
    }

    await this.transact(items, `payment ${payment.orderId}`, guard);
    return updated;
  }

  /**
   * Move money and the payment status together: both account balances
   * (compare-and-swap on their versions), the new transfer record, the
   * payment row and optionally the superseded transfer.
   */
  async settle(settlement: Settlement, guard?: MessageGuard): Promise<Payment> {
    const { payment, status, from, to, record, supersedes } = settlement;
    const now = getCurrentTimestamp();
    const updated: Payment = {
      ...payment,
      status,
      version: payment.version + 1,
      updatedAt: now,
      ...(record.kind === TransactionKind.PAYMENT
        ? { transactionId: record.transactionId, customerAccountId: record.fromAccountId }
        : {}),
    };

    const items: TransactItem[] = [
      this.buildBalanceWrite(from, from.balance - record.amount, now),
      this.buildBalanceWrite(to, to.balance + record.amount, now),
      {
        Put: {
          TableName: this.transactionsTableName,
          Item: { PK: record.transactionId, ...record },
          ConditionExpression: 'attribute_not_exists(PK)',
        },
      },
      this.buildPaymentWrite(payment, updated),
    ];

    if (supersedes) {
      items.push({
        Update: {
          TableName: this.transactionsTableName,
          Key: { PK: supersedes.transactionId },
          UpdateExpression: 'SET #status = :refunded, updatedAt = :now',
          ConditionExpression: '#status = :completed',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: {
            ':refunded': TransactionStatus.REFUNDED,
            ':completed': TransactionStatus.COMPLETED,
            ':now': now,
          },
        },
      });
    }
    if (guard) {
      items.push(buildProcessedMessagePut(guard));
    }

    await this.transact(items, `payment ${payment.orderId}`, guard);
    return updated;
  }

  private buildPaymentWrite(current: Payment, next: Payment): TransactItem {
    return {
      Put: {
        TableName: this.tableName,
        Item: { PK: next.orderId, ...next },
        ConditionExpression: 'version = :expectedVersion',
        ExpressionAttributeValues: { ':expectedVersion': current.version },
      },
    };
  }

  private buildBalanceWrite(account: Account, balance: number, now: string): TransactItem {
    return {
      Update: {
        TableName: this.accountsTableName,
        Key: { PK: account.accountId },
        UpdateExpression: 'SET balance = :balance, version = :nextVersion, updatedAt = :now',
        ConditionExpression: 'version = :expectedVersion',
        ExpressionAttributeValues: {
          ':balance': balance,
          ':nextVersion': account.version + 1,
          ':expectedVersion': account.version,
          ':now': now,
        },
      },
    };
  }

  /**
   * Send a transaction; the idempotency record, when present, is the last item
   */
  private async transact(items: TransactItem[], resource: string, guard?: MessageGuard): Promise<void> {
    try {
      await withRetry(() =>
        dynamoClient.send(new TransactWriteCommand({ TransactItems: items }))
      );
    } catch (error) {
      const reasons = getCancellationReasons(error);
      if (guard && reasons[items.length - 1] === CONDITION_FAILED) {
        throw new DuplicateMessageError(guard.messageId, guard.consumerName);
      }
      if (reasons.includes(CONDITION_FAILED)) {
        throw new VersionConflictError(resource);
      }
      return handleDynamoDBError(error);
    }
  }
}

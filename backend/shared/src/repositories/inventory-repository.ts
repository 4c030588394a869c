import {
  GetCommand,
  PutCommand,
  UpdateCommand,
  QueryCommand,
  TransactWriteCommand,
} from '@aws-sdk/lib-dynamodb';
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
import { DuplicateMessageError, ValidationError, VersionConflictError } from '../utils/errors';
import { readNumber, readOptionalString, readString } from '../utils/validators';
import { DynamoDBItem, Inventory, MessageGuard, Reservation } from '../types';
import { buildProcessedMessagePut } from './processed-message-repository';
import { InventoryStore, ReleaseOutcome, ReserveOutcome } from './stores';

const CONDITION_FAILED = 'ConditionalCheckFailed';

function toInventory(item: Record<string, unknown>): Inventory {
  return {
    productId: readString(item, 'productId'),
    warehouseId: readString(item, 'warehouseId'),
    quantity: readNumber(item, 'quantity'),
    warehouseAddress: readOptionalString(item, 'warehouseAddress'),
    version: readNumber(item, 'version'),
    updatedAt: readString(item, 'updatedAt'),
  };
}

export class InventoryRepository implements InventoryStore {
  private tableName: string;
  private reservationsTableName: string;

  constructor() {
    this.tableName = getTableName('INVENTORY_TABLE_NAME');
    this.reservationsTableName = getTableName('RESERVATIONS_TABLE_NAME');
  }

  /**
   * Create new inventory record
   */
  async create(inventory: Omit<Inventory, 'updatedAt' | 'version'>): Promise<Inventory> {
    const newInventory: Inventory = {
      ...inventory,
      version: 0,
      updatedAt: getCurrentTimestamp(),
    };

    const item: DynamoDBItem<Inventory> = {
      PK: this.buildInventoryId(inventory.productId, inventory.warehouseId),
      ...newInventory,
    };

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

      return newInventory;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        throw new ValidationError(
          `Inventory already exists for ${inventory.productId} in ${inventory.warehouseId}`,
          'warehouseId',
          inventory.warehouseId
        );
      }
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get inventory by product and warehouse
   */
  async get(productId: string, warehouseId: string): Promise<Inventory | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: this.buildInventoryId(productId, warehouseId) },
          ConsistentRead: true,
        })
      );

      return response.Item ? toInventory(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get all inventory for a product across all warehouses
   */
  async listByProduct(productId: string): Promise<Inventory[]> {
    const items: Inventory[] = [];
    let lastEvaluatedKey: Record<string, unknown> | undefined;

    try {
      do {
        const response = await dynamoClient.send(
          new QueryCommand({
            TableName: this.tableName,
            IndexName: 'productId-warehouseId-index',
            KeyConditionExpression: 'productId = :productId',
            ExpressionAttributeValues: {
              ':productId': productId,
            },
            ExclusiveStartKey: lastEvaluatedKey,
          })
        );

        items.push(...(response.Items ?? []).map(toInventory));
        lastEvaluatedKey = response.LastEvaluatedKey;
      } while (lastEvaluatedKey);

      return items;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Debit stock and record the reservation in one transaction.
   * The debit is a compare-and-swap on `version`; the reservation insert
   * fails if the same reservation was already made.
   */
  async reserve(inventory: Inventory, reservation: Reservation): Promise<ReserveOutcome> {
    const now = getCurrentTimestamp();
    const updated: Inventory = {
      ...inventory,
      quantity: inventory.quantity - reservation.quantity,
      version: inventory.version + 1,
      updatedAt: now,
    };

    const items: TransactItem[] = [
      this.buildStockWrite(inventory, updated),
      {
        Put: {
          TableName: this.reservationsTableName,
          Item: { PK: reservation.reservationId, ...reservation },
          ConditionExpression: 'attribute_not_exists(PK)',
        },
      },
    ];

    try {
      await withRetry(() =>
        dynamoClient.send(new TransactWriteCommand({ TransactItems: items }))
      );
      return { kind: 'RESERVED', inventory: updated, reservation };
    } catch (error) {
      const reasons = getCancellationReasons(error);
      if (reasons[1] === CONDITION_FAILED) {
        return { kind: 'ALREADY_RESERVED' };
      }
      if (reasons[0] === CONDITION_FAILED) {
        throw new VersionConflictError(this.describe(inventory));
      }
      return handleDynamoDBError(error);
    }
  }

  /**
   * Credit the reserved quantity back and delete the reservation in one
   * transaction. A reservation already deleted credits nothing.
   */
  async release(
    inventory: Inventory,
    reservation: Reservation,
    guard?: MessageGuard
  ): Promise<ReleaseOutcome> {
    const updated: Inventory = {
      ...inventory,
      quantity: inventory.quantity + reservation.quantity,
      version: inventory.version + 1,
      updatedAt: getCurrentTimestamp(),
    };

    const items: TransactItem[] = [
      this.buildStockWrite(inventory, updated),
      {
        Delete: {
          TableName: this.reservationsTableName,
          Key: { PK: reservation.reservationId },
          ConditionExpression: 'attribute_exists(PK)',
        },
      },
    ];
    if (guard) {
      items.push(buildProcessedMessagePut(guard));
    }

    try {
      await withRetry(() =>
        dynamoClient.send(new TransactWriteCommand({ TransactItems: items }))
      );
      return 'RELEASED';
    } catch (error) {
      const reasons = getCancellationReasons(error);
      if (guard && reasons[2] === CONDITION_FAILED) {
        throw new DuplicateMessageError(guard.messageId, guard.consumerName);
      }
      if (reasons[1] === CONDITION_FAILED) {
        return 'ALREADY_RELEASED';
      }
      if (reasons[0] === CONDITION_FAILED) {
        throw new VersionConflictError(this.describe(inventory));
      }
      return handleDynamoDBError(error);
    }
  }

  /**
   * Add stock (restocking)
   */
  async restock(inventory: Inventory, quantity: number): Promise<Inventory> {
    try {
      const response = await withRetry(() =>
        dynamoClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { PK: this.buildInventoryId(inventory.productId, inventory.warehouseId) },
            UpdateExpression:
              'SET quantity = quantity + :qty, version = version + :one, updatedAt = :now',
            ExpressionAttributeValues: {
              ':qty': quantity,
              ':one': 1,
              ':now': getCurrentTimestamp(),
              ':expectedVersion': inventory.version,
            },
            ConditionExpression: 'version = :expectedVersion',
            ReturnValues: 'ALL_NEW',
          })
        )
      );

      if (!response.Attributes) {
        throw new VersionConflictError(this.describe(inventory));
      }
      return toInventory(response.Attributes);
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        throw new VersionConflictError(this.describe(inventory));
      }
      return handleDynamoDBError(error);
    }
  }

  /**
   * Stock count overwrite guarded by the version read by the caller
   */
  private buildStockWrite(current: Inventory, next: Inventory): TransactItem {
    return {
      Update: {
        TableName: this.tableName,
        Key: { PK: this.buildInventoryId(current.productId, current.warehouseId) },
        UpdateExpression: 'SET quantity = :quantity, version = :nextVersion, updatedAt = :now',
        ConditionExpression: 'version = :expectedVersion',
        ExpressionAttributeValues: {
          ':quantity': next.quantity,
          ':nextVersion': next.version,
          ':now': next.updatedAt,
          ':expectedVersion': current.version,
        },
      },
    };
  }

  private describe(inventory: Inventory): string {
    return `inventory ${this.buildInventoryId(inventory.productId, inventory.warehouseId)}`;
  }

  /**
   * Helper: Build inventory ID
   */
  private buildInventoryId(productId: string, warehouseId: string): string {
    return `${productId}#${warehouseId}`;
  }
}

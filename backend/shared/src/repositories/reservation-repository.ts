import { GetCommand, QueryCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
  isConditionalCheckFailed,
} from '../utils/dynamodb-client';
import { readEnum, readNumber, readOptionalString, readString } from '../utils/validators';
import { Reservation, ReservationStatus } from '../types';
import { ReservationStore } from './stores';

function toReservation(item: Record<string, unknown>): Reservation {
  return {
    reservationId: readString(item, 'reservationId'),
    orderId: readString(item, 'orderId'),
    warehouseId: readString(item, 'warehouseId'),
    productId: readString(item, 'productId'),
    quantity: readNumber(item, 'quantity'),
    status: readEnum(item, 'status', ReservationStatus),
    createdAt: readString(item, 'createdAt'),
    committedAt: readOptionalString(item, 'committedAt'),
  };
}

/**
 * Reads and state changes of reservations. Inserts and deletes happen in
 * InventoryRepository, inside the same transaction as the stock change.
 */
export class ReservationRepository implements ReservationStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('RESERVATIONS_TABLE_NAME');
  }

  async getById(reservationId: string): Promise<Reservation | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: reservationId },
          ConsistentRead: true,
        })
      );

      return response.Item ? toReservation(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * All live reservations of an order
   */
  async listByOrder(orderId: string): Promise<Reservation[]> {
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

      return (response.Items ?? []).map(toReservation);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async markCommitted(reservationId: string): Promise<boolean> {
    try {
      await withRetry(() =>
        dynamoClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { PK: reservationId },
            UpdateExpression: 'SET #status = :committed, committedAt = :now',
            ConditionExpression: 'attribute_exists(PK) AND #status = :reserved',
            ExpressionAttributeNames: {
              '#status': 'status',
            },
            ExpressionAttributeValues: {
              ':committed': ReservationStatus.COMMITTED,
              ':reserved': ReservationStatus.RESERVED,
              ':now': getCurrentTimestamp(),
            },
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

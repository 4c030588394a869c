import { GetCommand, PutCommand, UpdateCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
  buildUpdateExpression,
  isConditionalCheckFailed,
} from '../utils/dynamodb-client';
import { ValidationError, VersionConflictError } from '../utils/errors';
import {
  readEnum,
  readNumber,
  readOptionalEnum,
  readOptionalString,
  readString,
} from '../utils/validators';
import { CancelReason, DynamoDBItem, Order, OrderStatus, OrderUpdate } from '../types';
import { OrderStore } from './stores';

function toOrder(item: Record<string, unknown>): Order {
  return {
    orderId: readString(item, 'orderId'),
    userId: readString(item, 'userId'),
    productId: readString(item, 'productId'),
    quantity: readNumber(item, 'quantity'),
    unitPrice: readNumber(item, 'unitPrice'),
    totalAmount: readNumber(item, 'totalAmount'),
    status: readEnum(item, 'status', OrderStatus),
    cancelReason: readOptionalEnum(item, 'cancelReason', CancelReason),
    recipientName: readString(item, 'recipientName'),
    recipientEmail: readString(item, 'recipientEmail'),
    deliveryAddress: readString(item, 'deliveryAddress'),
    reservationId: readOptionalString(item, 'reservationId'),
    warehouseId: readOptionalString(item, 'warehouseId'),
    paymentReference: readOptionalString(item, 'paymentReference'),
    billerCode: readOptionalString(item, 'billerCode'),
    paymentExpiresAt: readOptionalString(item, 'paymentExpiresAt'),
    shipmentId: readOptionalString(item, 'shipmentId'),
    trackingNumber: readOptionalString(item, 'trackingNumber'),
    version: readNumber(item, 'version'),
    createdAt: readString(item, 'createdAt'),
    updatedAt: readString(item, 'updatedAt'),
  };
}

export class OrderRepository implements OrderStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('ORDERS_TABLE_NAME');
  }

  /**
   * Create a new order
   */
  async create(order: Order): Promise<Order> {
    const item: DynamoDBItem<Order> = {
      PK: order.orderId,
      ...order,
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

      return order;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        throw new ValidationError(`Order ${order.orderId} already exists`, 'orderId', order.orderId);
      }
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get order by ID
   */
  async getById(orderId: string): Promise<Order | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: orderId },
          ConsistentRead: true,
        })
      );

      return response.Item ? toOrder(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Find the order a shipment belongs to
   */
  async getByShipmentId(shipmentId: string): Promise<Order | null> {
    try {
      const response = await dynamoClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: 'shipmentId-index',
          KeyConditionExpression: 'shipmentId = :shipmentId',
          ExpressionAttributeValues: {
            ':shipmentId': shipmentId,
          },
          Limit: 1,
        })
      );

      const item = response.Items?.[0];
      if (!item) {
        return null;
      }

      // GSI reads are eventually consistent; re-read the base item
      return this.getById(readString(item, 'orderId'));
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Apply updates if the stored version still matches `order.version`
   */
  async update(order: Order, updates: OrderUpdate): Promise<Order> {
    const now = getCurrentTimestamp();
    const { UpdateExpression, ExpressionAttributeNames, ExpressionAttributeValues } =
      buildUpdateExpression({ ...updates, updatedAt: now, version: order.version + 1 });

    try {
      const response = await withRetry(() =>
        dynamoClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { PK: order.orderId },
            UpdateExpression,
            ExpressionAttributeNames: {
              ...ExpressionAttributeNames,
              '#version': 'version',
            },
            ExpressionAttributeValues: {
              ...ExpressionAttributeValues,
              ':expectedVersion': order.version,
            },
            ConditionExpression: 'attribute_exists(PK) AND #version = :expectedVersion',
            ReturnValues: 'ALL_NEW',
          })
        )
      );

      if (!response.Attributes) {
        throw new VersionConflictError(`order ${order.orderId}`);
      }
      return toOrder(response.Attributes);
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        throw new VersionConflictError(`order ${order.orderId}`);
      }
      return handleDynamoDBError(error);
    }
  }
}

import { GetCommand, PutCommand, QueryCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
  buildUpdateExpression,
  isConditionalCheckFailed,
} from '../utils/dynamodb-client';
import { VersionConflictError } from '../utils/errors';
import { readEnum, readNumber, readOptionalString, readString } from '../utils/validators';
import { DynamoDBItem, Shipment, ShipmentStatus } from '../types';
import { ShipmentStore } from './stores';

function toShipment(item: Record<string, unknown>): Shipment {
  return {
    shipmentId: readString(item, 'shipmentId'),
    orderId: readString(item, 'orderId'),
    trackingNumber: readString(item, 'trackingNumber'),
    carrier: readString(item, 'carrier'),
    status: readEnum(item, 'status', ShipmentStatus),
    progress: readNumber(item, 'progress'),
    warehouseId: readString(item, 'warehouseId'),
    warehouseAddress: readOptionalString(item, 'warehouseAddress'),
    productId: readString(item, 'productId'),
    quantity: readNumber(item, 'quantity'),
    recipientName: readString(item, 'recipientName'),
    recipientEmail: readString(item, 'recipientEmail'),
    deliveryAddress: readString(item, 'deliveryAddress'),
    estimatedDelivery: readString(item, 'estimatedDelivery'),
    actualDelivery: readOptionalString(item, 'actualDelivery'),
    version: readNumber(item, 'version'),
    createdAt: readString(item, 'createdAt'),
    updatedAt: readString(item, 'updatedAt'),
  };
}

/**
 * Shipments, one per order (partition key is the order id)
 */
export class ShipmentRepository implements ShipmentStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('SHIPMENTS_TABLE_NAME');
  }

  async create(shipment: Shipment): Promise<boolean> {
    const item: DynamoDBItem<Shipment> = { PK: shipment.orderId, ...shipment };

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

  async getByOrderId(orderId: string): Promise<Shipment | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: orderId },
          ConsistentRead: true,
        })
      );

      return response.Item ? toShipment(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async getByShipmentId(shipmentId: string): Promise<Shipment | null> {
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
      return item ? this.getByOrderId(readString(item, 'orderId')) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Oldest shipments in a status, for the simulation tick
   */
  async listByStatus(status: ShipmentStatus, limit: number): Promise<Shipment[]> {
    try {
      const response = await dynamoClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: 'status-index',
          KeyConditionExpression: '#status = :status',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: { ':status': status },
          ScanIndexForward: true,
          Limit: limit,
        })
      );

      return (response.Items ?? []).map(toShipment);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async update(
    shipment: Shipment,
    updates: Pick<Shipment, 'status' | 'progress'> & Partial<Pick<Shipment, 'actualDelivery'>>
  ): Promise<Shipment> {
    const { UpdateExpression, ExpressionAttributeNames, ExpressionAttributeValues } =
      buildUpdateExpression({
        ...updates,
        version: shipment.version + 1,
        updatedAt: getCurrentTimestamp(),
      });

    try {
      const response = await withRetry(() =>
        dynamoClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { PK: shipment.orderId },
            UpdateExpression,
            ExpressionAttributeNames: { ...ExpressionAttributeNames, '#version': 'version' },
            ExpressionAttributeValues: {
              ...ExpressionAttributeValues,
              ':expectedVersion': shipment.version,
            },
            ConditionExpression: '#version = :expectedVersion',
            ReturnValues: 'ALL_NEW',
          })
        )
      );

      if (!response.Attributes) {
        throw new VersionConflictError(`shipment ${shipment.shipmentId}`);
      }
      return toShipment(response.Attributes);
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        throw new VersionConflictError(`shipment ${shipment.shipmentId}`);
      }
      return handleDynamoDBError(error);
    }
  }
}

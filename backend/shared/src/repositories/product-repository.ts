import {
  GetCommand,
  PutCommand,
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
import { DuplicateMessageError, ValidationError } from '../utils/errors';
import {
  readBoolean,
  readNumber,
  readOptionalString,
  readString,
} from '../utils/validators';
import { DynamoDBItem, MessageGuard, Product, StockSyncNotification } from '../types';
import { buildProcessedMessagePut } from './processed-message-repository';
import { ProductStore } from './stores';

function toProduct(item: Record<string, unknown>): Product {
  return {
    productId: readString(item, 'productId'),
    name: readString(item, 'name'),
    price: readNumber(item, 'price'),
    published: readBoolean(item, 'published'),
    imageUrl: readOptionalString(item, 'imageUrl'),
    stock: readNumber(item, 'stock'),
    stockUpdatedAt: readOptionalString(item, 'stockUpdatedAt'),
    createdAt: readString(item, 'createdAt'),
    updatedAt: readString(item, 'updatedAt'),
  };
}

export class ProductRepository implements ProductStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('PRODUCTS_TABLE_NAME');
  }

  /**
   * Create a new product
   */
  async create(product: Omit<Product, 'createdAt' | 'updatedAt'>): Promise<Product> {
    const now = getCurrentTimestamp();
    const newProduct: Product = {
      ...product,
      createdAt: now,
      updatedAt: now,
    };

    const item: DynamoDBItem<Product> = {
      PK: newProduct.productId,
      ...newProduct,
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

      return newProduct;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        throw new ValidationError(`Product ${product.productId} already exists`, 'productId', product.productId);
      }
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get product by ID
   */
  async getById(productId: string): Promise<Product | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: productId },
        })
      );

      return response.Item ? toProduct(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Upsert the catalog copy from a stock-sync broadcast.
   * Broadcasts can arrive out of order, so an older timestamp never
   * overwrites a newer one.
   */
  async applyStockSync(sync: StockSyncNotification, guard?: MessageGuard): Promise<boolean> {
    const update: TransactItem = {
      Update: {
        TableName: this.tableName,
        Key: { PK: sync.productId },
        UpdateExpression:
          'SET productId = :productId, #name = :name, price = :price, stock = :stock, ' +
          'published = :published, imageUrl = :imageUrl, stockUpdatedAt = :syncedAt, ' +
          'updatedAt = :now, createdAt = if_not_exists(createdAt, :now)',
        ConditionExpression: 'attribute_not_exists(stockUpdatedAt) OR stockUpdatedAt <= :syncedAt',
        ExpressionAttributeNames: {
          '#name': 'name',
        },
        ExpressionAttributeValues: {
          ':productId': sync.productId,
          ':name': sync.name,
          ':price': sync.price,
          ':stock': sync.stock,
          ':published': sync.published,
          ':imageUrl': sync.imageUrl ?? null,
          ':syncedAt': sync.timestamp,
          ':now': getCurrentTimestamp(),
        },
      },
    };

    const items = guard ? [update, buildProcessedMessagePut(guard)] : [update];

    try {
      await withRetry(() =>
        dynamoClient.send(new TransactWriteCommand({ TransactItems: items }))
      );
      return true;
    } catch (error) {
      const reasons = getCancellationReasons(error);
      if (guard && reasons[1] === 'ConditionalCheckFailed') {
        throw new DuplicateMessageError(guard.messageId, guard.consumerName);
      }
      if (reasons[0] === 'ConditionalCheckFailed') {
        return false;
      }
      return handleDynamoDBError(error);
    }
  }
}

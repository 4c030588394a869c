import { randomUUID } from 'crypto';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, TransactWriteCommandInput } from '@aws-sdk/lib-dynamodb';
import { AppError } from './errors';
import { logger } from './logger';

/**
 * DynamoDB Client Configuration
 * Singleton pattern for reusing connections across Lambda invocations
 */
class DynamoDBClientManager {
  private static instance: DynamoDBDocumentClient | undefined;

  static getClient(): DynamoDBDocumentClient {
    if (!this.instance) {
      const client = new DynamoDBClient({
        region: process.env.AWS_REGION || 'us-east-2',
      });

      this.instance = DynamoDBDocumentClient.from(client, {
        marshallOptions: {
          removeUndefinedValues: true,
          convertEmptyValues: false,
        },
        unmarshallOptions: {
          wrapNumbers: false,
        },
      });
    }

    return this.instance;
  }
}

export const dynamoClient = DynamoDBClientManager.getClient();

/**
 * One entry of a TransactWriteCommand
 */
export type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

/**
 * DynamoDB Error Handler
 */
export class DynamoDBError extends AppError {
  constructor(message: string, code: string, statusCode: number) {
    super(message, code, statusCode);
    this.name = 'DynamoDBError';
  }
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

/**
 * Translate SDK exceptions into DynamoDBError.
 * Errors already in the application taxonomy pass through untouched.
 */
export function handleDynamoDBError(error: unknown): never {
  if (error instanceof AppError) {
    throw error;
  }

  logger.error('DynamoDB Error', error);

  switch (errorName(error)) {
    case 'ConditionalCheckFailedException':
      throw new DynamoDBError(
        'Conditional check failed - item may have been modified',
        'CONDITIONAL_CHECK_FAILED',
        409
      );
    case 'ResourceNotFoundException':
      throw new DynamoDBError('Resource not found', 'RESOURCE_NOT_FOUND', 503);
    case 'ValidationException':
      throw new DynamoDBError('Invalid request parameters', 'VALIDATION_ERROR', 400);
    case 'ProvisionedThroughputExceededException':
    case 'ThrottlingException':
      throw new DynamoDBError('Request rate too high - throttled', 'THROTTLED', 429);
    default:
      // The SDK's own message stays in the log above
      throw new DynamoDBError('Unknown DynamoDB error', 'UNKNOWN_ERROR', 500);
  }
}

/**
 * Retry logic for throttled requests
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 100
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const name = errorName(error);
      const throttled =
        name === 'ProvisionedThroughputExceededException' || name === 'ThrottlingException';

      if (!throttled || attempt >= maxRetries) {
        throw error;
      }

      const delay = baseDelay * Math.pow(2, attempt); // Exponential backoff
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

export function isConditionalCheckFailed(error: unknown): boolean {
  return errorName(error) === 'ConditionalCheckFailedException';
}

/**
 * Cancellation reason codes of a failed TransactWriteCommand, one per item
 * in request order. Empty when the error is not a transaction cancellation.
 */
export function getCancellationReasons(error: unknown): string[] {
  if (!(error instanceof Error) || error.name !== 'TransactionCanceledException') {
    return [];
  }
  if (!('CancellationReasons' in error) || !Array.isArray(error.CancellationReasons)) {
    return [];
  }

  return error.CancellationReasons.map((reason: unknown) => {
    if (typeof reason === 'object' && reason !== null && 'Code' in reason) {
      return String(reason.Code);
    }
    return 'None';
  });
}

/**
 * Generate timestamps
 */
export function getCurrentTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Generate TTL (Time To Live) timestamp
 * @param daysFromNow Number of days from now
 */
export function getTTLTimestamp(daysFromNow: number = 7): number {
  const ttl = Date.now() + daysFromNow * 24 * 60 * 60 * 1000;
  return Math.floor(ttl / 1000); // DynamoDB TTL is in seconds
}

export function generateId(): string {
  return randomUUID();
}

/**
 * Build update expression from object
 */
export function buildUpdateExpression(updates: Record<string, unknown>): {
  UpdateExpression: string;
  ExpressionAttributeNames: Record<string, string>;
  ExpressionAttributeValues: Record<string, unknown>;
} {
  const attributeNames: Record<string, string> = {};
  const attributeValues: Record<string, unknown> = {};
  const setParts: string[] = [];

  Object.entries(updates)
    .filter(([, value]) => value !== undefined)
    .forEach(([key, value], index) => {
      const nameKey = `#attr${index}`;
      const valueKey = `:val${index}`;

      attributeNames[nameKey] = key;
      attributeValues[valueKey] = value;
      setParts.push(`${nameKey} = ${valueKey}`);
    });

  return {
    UpdateExpression: `SET ${setParts.join(', ')}`,
    ExpressionAttributeNames: attributeNames,
    ExpressionAttributeValues: attributeValues,
  };
}

/**
 * Get table name from environment
 */
export function getTableName(tableEnvVar: string): string {
  const tableName = process.env[tableEnvVar];
  if (!tableName) {
    throw new Error(`Environment variable ${tableEnvVar} is not set`);
  }
  return tableName;
}

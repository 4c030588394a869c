import { PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getTableName,
  isConditionalCheckFailed,
} from '../utils/dynamodb-client';
import { readEnum, readString } from '../utils/validators';
import { DynamoDBItem, WebhookEvent, WebhookRegistration } from '../types';
import { WebhookRegistrationStore } from './stores';

function toRegistration(item: Record<string, unknown>): WebhookRegistration {
  return {
    event: readEnum(item, 'event', WebhookEvent),
    subscriberKey: readString(item, 'subscriberKey'),
    callbackUrl: readString(item, 'callbackUrl'),
    registeredAt: readString(item, 'registeredAt'),
  };
}

/**
 * Callback URLs per (event, subscriber). Concurrent registrations for the same
 * key resolve by `registeredAt` inside the conditional write, so the latest
 * registration wins no matter which instance writes last.
 */
export class WebhookRegistrationRepository implements WebhookRegistrationStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('WEBHOOKS_TABLE_NAME');
  }

  async upsert(registration: WebhookRegistration): Promise<boolean> {
    const item: DynamoDBItem<WebhookRegistration> = {
      PK: `${registration.event}#${registration.subscriberKey}`,
      ...registration,
    };

    try {
      await withRetry(() =>
        dynamoClient.send(
          new PutCommand({
            TableName: this.tableName,
            Item: item,
            ConditionExpression: 'attribute_not_exists(PK) OR registeredAt <= :registeredAt',
            ExpressionAttributeValues: {
              ':registeredAt': registration.registeredAt,
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

  async listByEvent(event: WebhookEvent): Promise<WebhookRegistration[]> {
    try {
      const response = await dynamoClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: 'event-index',
          KeyConditionExpression: '#event = :event',
          ExpressionAttributeNames: { '#event': 'event' },
          ExpressionAttributeValues: { ':event': event },
        })
      );

      return (response.Items ?? []).map(toRegistration);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}

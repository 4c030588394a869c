import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { logger } from '../utils/logger';
import { StockSyncNotification } from '../types';

/**
 * Event Publisher Service
 * Broadcasts stock changes on EventBridge; a rule fans them out to the
 * stock-sync queue of every service keeping a catalog copy.
 */

interface PublishEventParams {
  source: string;
  detailType: string;
  detail: object;
}

export interface StockSyncPublisher {
  publishStockSync(notification: StockSyncNotification): Promise<void>;
}

export const STOCK_SYNC_SOURCE = 'fulfillment.inventory';
export const STOCK_SYNC_DETAIL_TYPE = 'StockSync';

export class EventPublisher implements StockSyncPublisher {
  private client: EventBridgeClient;
  private eventBusName: string;

  constructor() {
    this.client = new EventBridgeClient({
      region: process.env.AWS_REGION || 'us-east-2',
    });
    this.eventBusName = process.env.EVENT_BUS_NAME || 'fulfillment-events';
  }

  /**
   * Publish a generic event to EventBridge
   */
  async publish(params: PublishEventParams): Promise<void> {
    const response = await this.client.send(
      new PutEventsCommand({
        Entries: [
          {
            Source: params.source,
            DetailType: params.detailType,
            Detail: JSON.stringify(params.detail),
            EventBusName: this.eventBusName,
          },
        ],
      })
    );

    if (response.FailedEntryCount && response.FailedEntryCount > 0) {
      logger.error('Failed to publish event', undefined, {
        failedEntries: response.Entries,
        detailType: params.detailType,
      });
      throw new Error(`Failed to publish event: ${params.detailType}`);
    }

    logger.info('Event published successfully', {
      source: params.source,
      detailType: params.detailType,
      eventBusName: this.eventBusName,
    });
  }

  async publishStockSync(notification: StockSyncNotification): Promise<void> {
    await this.publish({
      source: STOCK_SYNC_SOURCE,
      detailType: STOCK_SYNC_DETAIL_TYPE,
      detail: notification,
    });
  }
}

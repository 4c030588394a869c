import { ScheduledHandler } from 'aws-lambda';
import {
  createDeliveryDispatcher,
  loadConfig,
  logger,
} from 'fulfillment-backend-shared';

const dispatcher = createDeliveryDispatcher(loadConfig());

/**
 * Simulate Deliveries Lambda
 * Scheduled every minute. Moves each active shipment one carrier step and
 * lets a small share of picked-up parcels go missing.
 */
export const handler: ScheduledHandler = async (event) => {
  logger.clearContext();
  logger.setContext({ requestId: event.id, service: 'delivery-simulator' });

  const report = await dispatcher.simulateProgress();

  if (report.failed > 0) {
    logger.warn('Some shipments did not advance', { failed: report.failed });
  }
};

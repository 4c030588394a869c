import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  createOrderOrchestrator,
  loadConfig,
  logger,
  parseDeliveryWebhook,
  successResponse,
  toErrorResponse,
} from 'fulfillment-backend-shared';

const orchestrator = createOrderOrchestrator(loadConfig());

/**
 * Delivery Webhook Lambda Handler
 * POST /webhooks/delivery
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.clearContext();
  logger.setContext({ requestId, service: 'delivery-webhook' });

  try {
    const deliveryEvent = parseDeliveryWebhook(event.body);
    logger.info('Delivery event received', {
      shipmentId: deliveryEvent.shipment_id,
      status: deliveryEvent.status,
    });

    const order = await orchestrator.handleDeliveryWebhook(deliveryEvent);

    return successResponse(200, {
      received: true,
      orderId: order.orderId,
      status: order.status,
    });
  } catch (error) {
    logger.error('Failed to handle delivery webhook', error);
    return toErrorResponse(error);
  }
};

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  createOrderOrchestrator,
  loadConfig,
  logger,
  parsePaymentWebhook,
  successResponse,
  toErrorResponse,
} from 'fulfillment-backend-shared';

const orchestrator = createOrderOrchestrator(loadConfig());

/**
 * Payment Webhook Lambda Handler
 * POST /webhooks/payment
 *
 * Receives PAYMENT_EVENT callbacks from the payment service. A non-2xx reply
 * makes the sender retry, so a redelivered event must be harmless.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.clearContext();
  logger.setContext({ requestId, service: 'payment-webhook' });

  try {
    const paymentEvent = parsePaymentWebhook(event.body);
    const order = await orchestrator.handlePaymentWebhook(paymentEvent);

    return successResponse(200, {
      received: true,
      orderId: order.orderId,
      status: order.status,
    });
  } catch (error) {
    logger.error('Failed to handle payment webhook', error);
    return toErrorResponse(error);
  }
};

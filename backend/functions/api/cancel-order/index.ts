import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  createOrderOrchestrator,
  loadConfig,
  logger,
  errorResponse,
  requireUserId,
  successResponse,
  toErrorResponse,
} from 'fulfillment-backend-shared';

const orchestrator = createOrderOrchestrator(loadConfig());

/**
 * Cancel Order Lambda Handler
 * POST /orders/{orderId}/cancel
 *
 * Allowed while the order is PENDING or PROCESSING. Stock rollback and the
 * refund go out as queue messages; the order turns REFUNDED once the
 * payment service confirms.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.clearContext();
  logger.setContext({ requestId });

  try {
    const orderId = event.pathParameters?.orderId;
    if (!orderId) {
      return errorResponse(400, 'Order ID is required', 'VALIDATION_ERROR');
    }

    const userId = requireUserId(event);
    logger.setContext({ orderId, userId });

    const order = await orchestrator.cancelOrder(orderId, userId);

    return successResponse(200, {
      orderId: order.orderId,
      status: order.status,
      cancelReason: order.cancelReason,
    });
  } catch (error) {
    logger.error('Failed to cancel order', error);
    return toErrorResponse(error);
  }
};

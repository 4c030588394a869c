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
 * Get Order Lambda Handler
 * GET /orders/{orderId}
 *
 * Only the user who placed the order may read it
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

    logger.setContext({ orderId });
    logger.info('Get order request received', { orderId });

    const order = await orchestrator.getOrder(orderId, requireUserId(event));

    logger.info('Order retrieved successfully', {
      orderId,
      status: order.status,
    });

    return successResponse(200, { order });
  } catch (error) {
    logger.error('Failed to get order', error);
    return toErrorResponse(error);
  }
};

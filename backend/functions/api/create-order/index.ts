import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  createOrderOrchestrator,
  loadConfig,
  logger,
  parseBody,
  requireUserId,
  successResponse,
  toErrorResponse,
  readNumber,
  readString,
  validateShippingInfo,
  OrderStatus,
} from 'fulfillment-backend-shared';

// Initialize services (reused across invocations)
const orchestrator = createOrderOrchestrator(loadConfig());

/**
 * Create Order Lambda Handler
 * POST /orders
 *
 * Flow:
 * 1. Validates the product and finds a warehouse with enough stock
 * 2. Reserves the stock with the inventory service
 * 3. Stores the order and requests a payment instruction
 * 4. Returns the order with the biller code and payment reference
 *
 * The rest of the saga is driven by the payment and delivery webhooks.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.clearContext();
  logger.setContext({ requestId });

  logger.info('Create order request received', {
    path: event.path,
    method: event.httpMethod,
  });

  try {
    const userId = requireUserId(event);
    const body = parseBody(event);

    const order = await orchestrator.createOrder({
      userId,
      productId: readString(body, 'productId'),
      quantity: readNumber(body, 'quantity'),
      shippingInfo: validateShippingInfo(body),
    });

    if (order.status === OrderStatus.CANCELLED) {
      logger.warn('Order cancelled during creation', {
        orderId: order.orderId,
        cancelReason: order.cancelReason,
      });
    }

    return successResponse(201, {
      orderId: order.orderId,
      status: order.status,
      cancelReason: order.cancelReason,
      totalAmount: order.totalAmount,
      billerCode: order.billerCode,
      paymentReference: order.paymentReference,
      paymentExpiresAt: order.paymentExpiresAt,
    });
  } catch (error) {
    logger.error('Failed to create order', error);
    return toErrorResponse(error);
  }
};

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  createInventoryLedger,
  loadConfig,
  logger,
  errorResponse,
  parseBody,
  readNumber,
  readOptionalString,
  readString,
  successResponse,
  toErrorResponse,
} from 'fulfillment-backend-shared';

const ledger = createInventoryLedger(loadConfig());

/**
 * Inventory RPC Lambda Handler
 * POST /inventory/{action}
 *
 * check    { productId, quantity }                          -> { available, warehouseId }
 * reserve  { orderId, warehouseId, productId, quantity }    -> { reservation }
 * commit   { reservationId }                                -> { committed, reservation }
 * rollback { orderId, reservationId? }                      -> { released, quantity }
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.clearContext();
  logger.setContext({ requestId, service: 'inventory' });

  const action = event.pathParameters?.action;

  try {
    const body = parseBody(event);

    switch (action) {
      case 'check': {
        const productId = readString(body, 'productId');
        const quantity = readNumber(body, 'quantity');
        const warehouseId = await ledger.locateStock(productId, quantity);
        return successResponse(200, { available: warehouseId !== null, warehouseId });
      }

      case 'reserve': {
        const orderId = readString(body, 'orderId');
        logger.setContext({ orderId });
        const reservation = await ledger.reserve({
          orderId,
          warehouseId: readString(body, 'warehouseId'),
          productId: readString(body, 'productId'),
          quantity: readNumber(body, 'quantity'),
        });
        return successResponse(200, { reservation });
      }

      case 'commit': {
        const result = await ledger.commit(readString(body, 'reservationId'));
        return successResponse(200, result);
      }

      case 'rollback': {
        const orderId = readString(body, 'orderId');
        logger.setContext({ orderId });
        const result = await ledger.rollback(orderId, {
          reservationId: readOptionalString(body, 'reservationId'),
        });
        return successResponse(200, result);
      }

      default:
        return errorResponse(404, `Unknown inventory action: ${action ?? ''}`, 'NOT_FOUND');
    }
  } catch (error) {
    logger.error('Inventory request failed', error, { action });
    return toErrorResponse(error);
  }
};

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  createInventoryLedger,
  loadConfig,
  logger,
  parseBody,
  readNumber,
  readString,
  successResponse,
  toErrorResponse,
} from 'fulfillment-backend-shared';

const ledger = createInventoryLedger(loadConfig());

/**
 * Admin: Restock Inventory
 * POST /admin/inventory/restock
 *
 * Body: { productId, warehouseId, quantity }
 * The new product total is broadcast to catalog copies.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.clearContext();
  logger.setContext({ requestId, service: 'inventory' });

  try {
    const body = parseBody(event);
    const productId = readString(body, 'productId');
    const warehouseId = readString(body, 'warehouseId');
    const quantity = readNumber(body, 'quantity');

    logger.info('Restock request received', { productId, warehouseId, quantity });

    const inventory = await ledger.restock(productId, warehouseId, quantity);

    return successResponse(200, {
      message: 'Inventory updated successfully',
      inventory,
    });
  } catch (error) {
    logger.error('Failed to update inventory', error);
    return toErrorResponse(error);
  }
};

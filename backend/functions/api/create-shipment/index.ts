import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  createDeliveryDispatcher,
  loadConfig,
  logger,
  parseBody,
  readNumber,
  readOptionalString,
  readString,
  successResponse,
  toErrorResponse,
  validateShippingInfo,
} from 'fulfillment-backend-shared';

const dispatcher = createDeliveryDispatcher(loadConfig());

/**
 * Create Shipment Lambda Handler
 * POST /shipments
 *
 * One shipment per order; a repeated request returns the existing one.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.clearContext();
  logger.setContext({ requestId, service: 'delivery' });

  try {
    const body = parseBody(event);
    const orderId = readString(body, 'orderId');
    logger.setContext({ orderId });

    const shipment = await dispatcher.createShipment({
      orderId,
      warehouseId: readString(body, 'warehouseId'),
      warehouseAddress: readOptionalString(body, 'warehouseAddress'),
      productId: readString(body, 'productId'),
      quantity: readNumber(body, 'quantity'),
      ...validateShippingInfo(body),
    });

    return successResponse(201, {
      shipmentId: shipment.shipmentId,
      trackingNumber: shipment.trackingNumber,
      carrier: shipment.carrier,
      status: shipment.status,
      estimatedDelivery: shipment.estimatedDelivery,
    });
  } catch (error) {
    logger.error('Failed to create shipment', error);
    return toErrorResponse(error);
  }
};

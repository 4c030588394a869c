import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  createPaymentLedger,
  loadConfig,
  logger,
  parseBody,
  readString,
  successResponse,
  toErrorResponse,
} from 'fulfillment-backend-shared';

const ledger = createPaymentLedger(loadConfig());

/**
 * Payment Confirmation Lambda Handler
 * POST /payments/confirm
 *
 * Bank-side settlement of an instruction: { referenceNumber, customerAccountId }.
 * Replies with the payment's final status; the order learns of it through
 * the PAYMENT_EVENT webhook.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.clearContext();
  logger.setContext({ requestId, service: 'payment' });

  try {
    const body = parseBody(event);
    const payment = await ledger.confirmPayment({
      referenceNumber: readString(body, 'referenceNumber'),
      customerAccountId: readString(body, 'customerAccountId'),
    });

    return successResponse(200, {
      orderId: payment.orderId,
      paymentId: payment.paymentId,
      status: payment.status,
      amount: payment.amount,
    });
  } catch (error) {
    logger.error('Failed to confirm payment', error);
    return toErrorResponse(error);
  }
};

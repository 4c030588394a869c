import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  createPaymentLedger,
  loadConfig,
  logger,
  parseBody,
  readNumber,
  readString,
  successResponse,
  toErrorResponse,
} from 'fulfillment-backend-shared';

const ledger = createPaymentLedger(loadConfig());

/**
 * Payment Instruction Lambda Handler
 * POST /payments
 *
 * Issues the biller code and reference the customer pays with.
 * Calling it again for the same order returns the same instruction.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.clearContext();
  logger.setContext({ requestId, service: 'payment' });

  try {
    const body = parseBody(event);
    const orderId = readString(body, 'orderId');
    logger.setContext({ orderId });

    const instruction = await ledger.createInstruction({
      orderId,
      amount: readNumber(body, 'amount'),
      customerId: readString(body, 'customerId'),
    });

    return successResponse(201, instruction);
  } catch (error) {
    logger.error('Failed to create payment instruction', error);
    return toErrorResponse(error);
  }
};

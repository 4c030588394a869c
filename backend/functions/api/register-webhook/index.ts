import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  createWebhookRegistry,
  DEFAULT_SUBSCRIBER,
  logger,
  parseBody,
  readEnum,
  readOptionalString,
  readString,
  successResponse,
  toErrorResponse,
  WebhookEvent,
} from 'fulfillment-backend-shared';

const registry = createWebhookRegistry();

/**
 * Register Webhook Lambda Handler
 * POST /webhooks/register
 *
 * Deployed with both the payment and the delivery service, each over its
 * own registrations table. Body: { event, callbackUrl, subscriberKey? }.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.clearContext();
  logger.setContext({ requestId, service: 'webhook-registry' });

  try {
    const body = parseBody(event);
    const webhookEvent = readEnum(body, 'event', WebhookEvent);
    const callbackUrl = readString(body, 'callbackUrl');
    const subscriberKey = readOptionalString(body, 'subscriberKey') ?? DEFAULT_SUBSCRIBER;

    const registered = await registry.register(webhookEvent, callbackUrl, subscriberKey);

    return successResponse(200, { event: webhookEvent, callbackUrl, registered });
  } catch (error) {
    logger.error('Failed to register webhook', error);
    return toErrorResponse(error);
  }
};

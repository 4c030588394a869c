import { Handler } from 'aws-lambda';
import {
  createSagaWebhookTargets,
  loadConfig,
  logger,
  registerSagaWebhooks,
} from 'fulfillment-backend-shared';

const config = loadConfig();

interface RegistrationResult {
  payment: boolean;
  delivery: boolean;
}

/**
 * Register Webhooks Lambda
 * Invoked after each deploy and on a schedule. Never fails: a service that
 * is not reachable yet is picked up by the next run.
 */
export const handler: Handler<unknown, RegistrationResult> = async () => {
  logger.clearContext();
  logger.setContext({ service: 'webhook-registration' });

  const result = await registerSagaWebhooks(createSagaWebhookTargets(config));

  logger.info('Webhook registration finished', { ...result });
  return result;
};

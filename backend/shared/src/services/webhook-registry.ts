import axios from 'axios';
import { WebhookRegistrationStore } from '../repositories/stores';
import { WebhookEvent, WebhookRegistration } from '../types';
import { errorMessage, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { sleep } from '../utils/optimistic-retry';

/**
 * Webhook registry and dispatcher shared by the payment and delivery services.
 *
 * A registration is keyed by (event, subscriberKey). Registering again
 * replaces the callback URL unless the stored registration is newer.
 */

export const DEFAULT_SUBSCRIBER = 'default';

export type WebhookSender = (url: string, payload: object, timeoutMs: number) => Promise<void>;

export const httpSender: WebhookSender = async (url, payload, timeoutMs) => {
  await axios.post(url, payload, {
    timeout: timeoutMs,
    headers: { 'Content-Type': 'application/json' },
  });
};

export interface DeliveryReport {
  event: WebhookEvent;
  delivered: string[];
  failed: string[];
}

export interface WebhookNotifier {
  deliver(event: WebhookEvent, payload: object): Promise<DeliveryReport>;
}

export interface WebhookDispatchOptions {
  maxAttempts: number;
  baseDelayMs: number;
  timeoutMs: number;
}

function assertCallbackUrl(callbackUrl: string): void {
  let parsed: URL;
  try {
    parsed = new URL(callbackUrl);
  } catch {
    throw new ValidationError('callbackUrl must be an absolute URL', 'callbackUrl', callbackUrl);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError('callbackUrl must use http or https', 'callbackUrl', callbackUrl);
  }
}

export class WebhookRegistry {
  constructor(
    private readonly store: WebhookRegistrationStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Store a callback URL. Storage failures are logged and reported as
   * false; the caller's request still succeeds.
   */
  async register(
    event: WebhookEvent,
    callbackUrl: string,
    subscriberKey: string = DEFAULT_SUBSCRIBER
  ): Promise<boolean> {
    assertCallbackUrl(callbackUrl);

    try {
      const stored = await this.store.upsert({
        event,
        subscriberKey,
        callbackUrl,
        registeredAt: this.clock().toISOString(),
      });

      if (stored) {
        logger.info('Webhook registered', { event, subscriberKey, callbackUrl });
      } else {
        logger.warn('Newer webhook registration kept', { event, subscriberKey });
      }
      return stored;
    } catch (error) {
      logger.error('Failed to store webhook registration', error, { event, subscriberKey });
      return false;
    }
  }
}

export class WebhookDispatcher implements WebhookNotifier {
  constructor(
    private readonly store: WebhookRegistrationStore,
    private readonly options: WebhookDispatchOptions,
    private readonly send: WebhookSender = httpSender
  ) {}

  /**
   * POST the payload to every URL registered for the event. Each URL gets
   * `maxAttempts` tries with exponential backoff; a URL that never accepts
   * is logged and reported, not thrown.
   */
  async deliver(event: WebhookEvent, payload: object): Promise<DeliveryReport> {
    const report: DeliveryReport = { event, delivered: [], failed: [] };

    let registrations: WebhookRegistration[];
    try {
      registrations = await this.store.listByEvent(event);
    } catch (error) {
      logger.error('Failed to load webhook registrations', error, { event });
      return report;
    }

    if (registrations.length === 0) {
      logger.warn('No webhook registered for event', { event });
      return report;
    }

    for (const registration of registrations) {
      const ok = await this.deliverOne(registration.callbackUrl, event, payload);
      (ok ? report.delivered : report.failed).push(registration.callbackUrl);
    }

    return report;
  }

  private async deliverOne(url: string, event: WebhookEvent, payload: object): Promise<boolean> {
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        await this.send(url, payload, this.options.timeoutMs);
        logger.info('Webhook delivered', { event, url, attempt });
        return true;
      } catch (error) {
        logger.warn('Webhook delivery attempt failed', {
          event,
          url,
          attempt,
          error: errorMessage(error),
        });

        if (attempt < this.options.maxAttempts && this.options.baseDelayMs > 0) {
          await sleep(this.options.baseDelayMs * Math.pow(2, attempt - 1));
        }
      }
    }

    logger.error('Webhook delivery abandoned', undefined, {
      event,
      url,
      attempts: this.options.maxAttempts,
    });
    return false;
  }
}

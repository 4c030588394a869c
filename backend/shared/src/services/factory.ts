import { AccountRepository } from '../repositories/account-repository';
import { EmailLogRepository } from '../repositories/email-log-repository';
import { InventoryRepository } from '../repositories/inventory-repository';
import { OrderRepository } from '../repositories/order-repository';
import { PaymentRepository } from '../repositories/payment-repository';
import { ProcessedMessageRepository } from '../repositories/processed-message-repository';
import { ProductRepository } from '../repositories/product-repository';
import { ReservationRepository } from '../repositories/reservation-repository';
import { ShipmentRepository } from '../repositories/shipment-repository';
import { TransactionRecordRepository } from '../repositories/transaction-record-repository';
import { WebhookRegistrationRepository } from '../repositories/webhook-registration-repository';
import { AppConfig } from '../utils/config';
import { DeliveryDispatcher } from './delivery-dispatcher';
import { NotificationService, SesEmailSender } from './email-service';
import { EventPublisher } from './event-publisher';
import { InventoryLedger } from './inventory-ledger';
import { OrderOrchestrator } from './order-orchestrator';
import { PaymentLedger } from './payment-ledger';
import {
  DeliveryClient,
  InventoryClient,
  PaymentClient,
  SagaWebhookTargets,
  WebhookRegistrationClient,
} from './service-clients';
import { SqsMessagePublisher } from './message-publisher';
import { WebhookDispatcher, WebhookRegistry } from './webhook-registry';

/**
 * Production wiring of each service onto DynamoDB, SQS, EventBridge,
 * SES and HTTP. Handlers build their service once per cold start.
 */

export function createInventoryLedger(config: AppConfig): InventoryLedger {
  return new InventoryLedger({
    inventory: new InventoryRepository(),
    reservations: new ReservationRepository(),
    products: new ProductRepository(),
    processedMessages: new ProcessedMessageRepository(),
    stockSync: new EventPublisher(),
    retry: config.optimistic,
  });
}

export function createWebhookDispatcher(config: AppConfig): WebhookDispatcher {
  return new WebhookDispatcher(new WebhookRegistrationRepository(), config.webhook);
}

export function createWebhookRegistry(): WebhookRegistry {
  return new WebhookRegistry(new WebhookRegistrationRepository());
}

export function createPaymentLedger(config: AppConfig): PaymentLedger {
  return new PaymentLedger({
    payments: new PaymentRepository(),
    accounts: new AccountRepository(),
    transactions: new TransactionRecordRepository(),
    processedMessages: new ProcessedMessageRepository(),
    webhooks: createWebhookDispatcher(config),
    config: config.payment,
    retry: config.optimistic,
  });
}

export function createDeliveryDispatcher(config: AppConfig): DeliveryDispatcher {
  return new DeliveryDispatcher({
    shipments: new ShipmentRepository(),
    webhooks: createWebhookDispatcher(config),
    config: config.delivery,
    retry: config.optimistic,
  });
}

export function createOrderOrchestrator(config: AppConfig): OrderOrchestrator {
  const timeoutMs = config.remoteTimeoutMs;
  return new OrderOrchestrator({
    orders: new OrderRepository(),
    products: new ProductRepository(),
    processedMessages: new ProcessedMessageRepository(),
    inventory: new InventoryClient({ baseURL: config.services.inventoryUrl, timeoutMs }),
    payment: new PaymentClient({ baseURL: config.services.paymentUrl, timeoutMs }),
    delivery: new DeliveryClient({ baseURL: config.services.deliveryUrl, timeoutMs }),
    publisher: new SqsMessagePublisher(),
    retry: config.optimistic,
  });
}

export function createNotificationService(config: AppConfig): NotificationService {
  return new NotificationService(new EmailLogRepository(), new SesEmailSender(config.notificationSender));
}

export function createSagaWebhookTargets(config: AppConfig): SagaWebhookTargets {
  const timeoutMs = config.remoteTimeoutMs;
  return {
    payment: new WebhookRegistrationClient('payment', { baseURL: config.services.paymentUrl, timeoutMs }),
    delivery: new WebhookRegistrationClient('delivery', { baseURL: config.services.deliveryUrl, timeoutMs }),
    orderServiceUrl: config.services.orderUrl,
  };
}

/**
 * Main export file for shared backend code
 * Import all repositories, services, utilities, and types from here
 */

// Types
export * from './types';

// Utilities
export {
  dynamoClient,
  DynamoDBError,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTTLTimestamp,
  generateId,
  buildUpdateExpression,
  getTableName,
  getCancellationReasons,
  isConditionalCheckFailed,
  TransactItem,
} from './utils/dynamodb-client';

export { logger, Logger, LogLevel, LogContext, LogData } from './utils/logger';
export * from './utils/errors';
export { loadConfig, AppConfig } from './utils/config';
export { withOptimisticRetry, OptimisticRetryOptions, sleep } from './utils/optimistic-retry';
export { defineStateMachine, StateMachine, TransitionTable } from './utils/state-machine';
export {
  successResponse,
  errorResponse,
  toErrorResponse,
  parseBody,
  requireUserId,
} from './utils/http';
export {
  validateEmail,
  validatePositiveInteger,
  validateStringLength,
  validateEnum,
  validateShippingInfo,
  asRecord,
  parseJsonObject,
  readString,
  readOptionalString,
  readNumber,
  readOptionalNumber,
  readBoolean,
  readEnum,
  readOptionalEnum,
  sanitizeString,
} from './utils/validators';

// Repositories
export * from './repositories/stores';
export { OrderRepository } from './repositories/order-repository';
export { ProductRepository } from './repositories/product-repository';
export { InventoryRepository } from './repositories/inventory-repository';
export { ReservationRepository } from './repositories/reservation-repository';
export { PaymentRepository } from './repositories/payment-repository';
export { AccountRepository } from './repositories/account-repository';
export { TransactionRecordRepository } from './repositories/transaction-record-repository';
export { ShipmentRepository } from './repositories/shipment-repository';
export { WebhookRegistrationRepository } from './repositories/webhook-registration-repository';
export { EmailLogRepository } from './repositories/email-log-repository';
export {
  ProcessedMessageRepository,
  buildProcessedMessagePut,
} from './repositories/processed-message-repository';

// Services
export * from './services/order-orchestrator';
export * from './services/inventory-ledger';
export * from './services/payment-ledger';
export * from './services/delivery-dispatcher';
export * from './services/webhook-registry';
export * from './services/service-clients';
export * from './services/message-publisher';
export * from './services/message-consumer';
export * from './services/message-schemas';
export * from './services/notification-templates';
export * from './services/email-service';
export * from './services/event-publisher';
export * from './services/factory';
export { IdempotencyService } from './services/idempotency-service';

/**
 * Usage Example:
 *
 * import {
 *   createOrderOrchestrator,
 *   loadConfig,
 *   logger,
 *   toErrorResponse,
 * } from 'fulfillment-backend-shared';
 *
 * const orchestrator = createOrderOrchestrator(loadConfig());
 *
 * logger.setContext({ requestId: 'req-123' });
 * const order = await orchestrator.getOrder('order-123', 'user-1');
 * logger.info('Order retrieved', { orderId: order.orderId });
 */

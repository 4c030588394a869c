import {
  InventoryRollbackMessage,
  NotificationMessage,
  NotificationType,
  PaymentEventType,
  PaymentWebhookEvent,
  RefundRequestMessage,
  ShipmentStatus,
  DeliveryWebhookEvent,
  StockSyncMessage,
} from '../types';
import { MalformedMessageError, ValidationError } from '../utils/errors';
import {
  asRecord,
  parseJsonObject,
  readBoolean,
  readEnum,
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readString,
  validatePositiveInteger,
} from '../utils/validators';

/**
 * Queue message parsers. Anything that does not match its schema can never
 * succeed on redelivery and is raised as MalformedMessageError.
 */
function parseWith<T>(body: string, build: (record: Record<string, unknown>) => T): T {
  try {
    return build(parseJsonObject(body, 'message'));
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new MalformedMessageError(error.message);
    }
    throw error;
  }
}

export function parseRollbackMessage(body: string): InventoryRollbackMessage {
  return parseWith(body, (record) => ({
    eventId: readString(record, 'eventId'),
    orderId: readString(record, 'orderId'),
    productId: readString(record, 'productId'),
    amount: validatePositiveInteger(record.amount, 'amount'),
    reservationId: readOptionalString(record, 'reservationId'),
    reason: readString(record, 'reason'),
    timestamp: readString(record, 'timestamp'),
  }));
}

export function parseRefundMessage(body: string): RefundRequestMessage {
  return parseWith(body, (record) => ({
    eventId: readString(record, 'eventId'),
    orderId: readString(record, 'orderId'),
    reason: readString(record, 'reason'),
    userId: readString(record, 'userId'),
    timestamp: readString(record, 'timestamp'),
  }));
}

/**
 * Accepts the EventBridge envelope the stock-sync rule delivers (event id
 * in `id`, payload in `detail`) as well as a flat message.
 */
export function parseStockSyncMessage(body: string): StockSyncMessage {
  return parseWith(body, (record) => {
    const enveloped = record.detail !== undefined;
    const payload = enveloped ? asRecord(record.detail, 'detail') : record;

    return {
      eventId: readString(record, enveloped ? 'id' : 'eventId'),
      productId: readString(payload, 'productId'),
      name: readString(payload, 'name'),
      price: readNumber(payload, 'price'),
      stock: readNumber(payload, 'stock'),
      published: readBoolean(payload, 'published'),
      imageUrl: readOptionalString(payload, 'imageUrl'),
      timestamp: readString(payload, 'timestamp'),
    };
  });
}

export function parseNotificationMessage(body: string): NotificationMessage {
  return parseWith(body, (record) => ({
    eventId: readString(record, 'eventId'),
    type: readEnum(record, 'type', NotificationType),
    orderId: readString(record, 'orderId'),
    recipient: readString(record, 'recipient'),
    recipientName: readString(record, 'recipientName'),
    subject: readString(record, 'subject'),
    body: readString(record, 'body'),
    timestamp: readString(record, 'timestamp'),
  }));
}

/**
 * Webhook bodies posted to the orchestrator. These arrive over HTTP, so a bad
 * body is a ValidationError (400) and the sender's retry decides what next.
 */
export function parsePaymentWebhook(body: string | null): PaymentWebhookEvent {
  const record = parseJsonObject(body, 'body');
  return {
    type: readEnum(record, 'type', PaymentEventType),
    order_id: readString(record, 'order_id'),
    payment_id: readString(record, 'payment_id'),
    amount: readOptionalNumber(record, 'amount') ?? 0,
    paid_at: readOptionalString(record, 'paid_at') ?? '',
    refund_id: readOptionalString(record, 'refund_id'),
    refunded_at: readOptionalString(record, 'refunded_at'),
  };
}

export function parseDeliveryWebhook(body: string | null): DeliveryWebhookEvent {
  const record = parseJsonObject(body, 'body');
  return {
    shipment_id: readString(record, 'shipment_id'),
    status: readEnum(record, 'status', ShipmentStatus),
    timestamp: readOptionalString(record, 'timestamp') ?? '',
  };
}

/**
 * Order Status Enum
 * Lifecycle of an order through the fulfillment saga
 */
export enum OrderStatus {
  PENDING = 'PENDING',         // Stock reserved, awaiting payment instruction
  PROCESSING = 'PROCESSING',   // Payment instruction issued or payment settled
  PICKED_UP = 'PICKED_UP',     // Carrier collected the parcel
  DELIVERING = 'DELIVERING',   // Parcel in transit
  DELIVERED = 'DELIVERED',
  CANCELLED = 'CANCELLED',
  REFUNDED = 'REFUNDED',       // Cancelled and money returned
}

/**
 * Reason codes surfaced to the user on a cancelled order
 */
export enum CancelReason {
  USER_CANCELLED = 'USER_CANCELLED',
  PAYMENT_FAILED = 'PAYMENT_FAILED',
  PAYMENT_UNAVAILABLE = 'PAYMENT_UNAVAILABLE',
  SHIPMENT_LOST = 'SHIPMENT_LOST',
}

export enum ReservationStatus {
  RESERVED = 'RESERVED',
  COMMITTED = 'COMMITTED',
}

/**
 * Payment Status Enum
 * COMPLETED -> REFUNDED is the only move out of a settled payment
 */
export enum PaymentStatus {
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  REFUNDED = 'REFUNDED',
}

export enum TransactionKind {
  PAYMENT = 'PAYMENT',
  REFUND = 'REFUND',
}

export enum TransactionStatus {
  COMPLETED = 'COMPLETED',
  REFUNDED = 'REFUNDED',
}

/**
 * Shipment Status Enum
 */
export enum ShipmentStatus {
  SHIPMENT_CREATED = 'SHIPMENT_CREATED',
  PROCESSING = 'PROCESSING',
  PICKED_UP = 'PICKED_UP',
  IN_TRANSIT = 'IN_TRANSIT',
  DELIVERED = 'DELIVERED',
  LOST = 'LOST',
}

/**
 * Discriminator carried in the `type` field of payment webhooks
 */
export enum PaymentEventType {
  PAYMENT_PROCESSING = 'PAYMENT_PROCESSING',
  PAYMENT_COMPLETED = 'PAYMENT_COMPLETED',
  PAYMENT_FAILED = 'PAYMENT_FAILED',
  REFUND_COMPLETED = 'REFUND_COMPLETED',
}

/**
 * Event names a callback URL can be registered for
 */
export enum WebhookEvent {
  PAYMENT_EVENT = 'PAYMENT_EVENT',
  DELIVERY_EVENT = 'DELIVERY_EVENT',
}

export enum NotificationType {
  ORDER_CONFIRMATION = 'ORDER_CONFIRMATION',
  PAYMENT_FAILED = 'PAYMENT_FAILED',
  REFUND_CONFIRMATION = 'REFUND_CONFIRMATION',
  ORDER_CANCELLED = 'ORDER_CANCELLED',
  DELIVERY_UPDATE = 'DELIVERY_UPDATE',
}

export enum EmailStatus {
  PENDING = 'PENDING',
  SENT = 'SENT',
  FAILED = 'FAILED',
}

/**
 * Durable queues between the services
 */
export enum QueueName {
  INVENTORY_ROLLBACK = 'inventory-rollback',
  PAYMENT_REFUND = 'payment-refund',
  NOTIFICATION = 'notification',
  STOCK_SYNC = 'stock-sync',
}

/**
 * Recipient and destination of an order
 */
export interface ShippingInfo {
  recipientName: string;
  recipientEmail: string;
  deliveryAddress: string;
}

/**
 * Order
 * Owned by the orchestrator. totalAmount is fixed at creation.
 */
export interface Order extends ShippingInfo {
  orderId: string;
  userId: string;
  productId: string;
  quantity: number;
  unitPrice: number;   // In cents
  totalAmount: number; // In cents
  status: OrderStatus;
  cancelReason?: CancelReason;
  reservationId?: string;
  warehouseId?: string;
  paymentReference?: string;
  billerCode?: string;
  paymentExpiresAt?: string;
  shipmentId?: string;
  trackingNumber?: string;
  version: number;
  createdAt: string;
  updatedAt: string;
}

/**
 * Fields the orchestrator may change after creation
 */
export type OrderUpdate = Partial<
  Pick<
    Order,
    | 'status'
    | 'cancelReason'
    | 'reservationId'
    | 'warehouseId'
    | 'paymentReference'
    | 'billerCode'
    | 'paymentExpiresAt'
    | 'shipmentId'
    | 'trackingNumber'
  >
>;

/**
 * Product
 * Master copy lives with the warehouse; the orchestrator keeps a synced copy
 */
export interface Product {
  productId: string;
  name: string;
  price: number; // In cents
  published: boolean;
  imageUrl?: string;
  stock: number;
  stockUpdatedAt?: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Inventory
 * Stock of one product in one warehouse
 */
export interface Inventory {
  productId: string;
  warehouseId: string;
  quantity: number;
  warehouseAddress?: string;
  version: number;
  updatedAt: string;
}

/**
 * Reservation
 * Its existence means `quantity` was debited from the matching inventory row
 */
export interface Reservation {
  reservationId: string;
  orderId: string;
  warehouseId: string;
  productId: string;
  quantity: number;
  status: ReservationStatus;
  createdAt: string;
  committedAt?: string;
}

export interface Payment {
  paymentId: string;
  orderId: string;
  referenceNumber: string;
  billerCode: string;
  amount: number; // In cents
  customerId: string;
  customerAccountId?: string;
  transactionId?: string;
  status: PaymentStatus;
  expiresAt: string;
  version: number;
  createdAt: string;
  updatedAt: string;
}

/**
 * Payment instruction handed to the customer
 */
export interface PaymentInstruction {
  orderId: string;
  paymentId: string;
  billerCode: string;
  referenceNumber: string;
  amount: number;
  expiresAt: string;
  status: PaymentStatus;
}

export interface Account {
  accountId: string;
  ownerName: string;
  balance: number; // In cents
  version: number;
  updatedAt: string;
}

/**
 * Append-only record of one transfer between two accounts
 */
export interface TransactionRecord {
  transactionId: string;
  paymentId: string;
  orderId: string;
  kind: TransactionKind;
  fromAccountId: string;
  toAccountId: string;
  amount: number;
  memo: string;
  status: TransactionStatus;
  createdAt: string;
  updatedAt: string;
}

export interface Shipment extends ShippingInfo {
  shipmentId: string;
  orderId: string;
  trackingNumber: string;
  carrier: string;
  status: ShipmentStatus;
  progress: number;
  warehouseId: string;
  warehouseAddress?: string;
  productId: string;
  quantity: number;
  estimatedDelivery: string;
  actualDelivery?: string;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface ShipmentRequest extends ShippingInfo {
  orderId: string;
  warehouseId: string;
  warehouseAddress?: string;
  productId: string;
  quantity: number;
}

/**
 * Identifies one message as seen by one consumer
 */
export interface MessageGuard {
  messageId: string;
  consumerName: string;
}

export interface ProcessedMessage extends MessageGuard {
  processedAt: string;
  expiresAt: number; // TTL in epoch seconds
}

export interface WebhookRegistration {
  event: WebhookEvent;
  subscriberKey: string;
  callbackUrl: string;
  registeredAt: string;
}

export interface EmailLog {
  emailId: string;
  messageId: string;
  orderId: string;
  type: NotificationType;
  recipient: string;
  subject: string;
  body: string;
  status: EmailStatus;
  createdAt: string;
  sentAt?: string;
}

/**
 * Message: return an order's reserved stock
 */
export interface InventoryRollbackMessage {
  eventId: string;
  orderId: string;
  productId: string;
  amount: number; // Quantity reserved for the order
  reservationId?: string;
  reason: string;
  timestamp: string;
}

/**
 * Message: refund (or void) an order's payment
 */
export interface RefundRequestMessage {
  eventId: string;
  orderId: string;
  reason: string;
  userId: string;
  timestamp: string;
}

/**
 * Broadcast after a warehouse stock change so catalog copies converge
 */
export interface StockSyncNotification {
  productId: string;
  name: string;
  price: number;
  stock: number;
  published: boolean;
  imageUrl?: string;
  timestamp: string;
}

export interface StockSyncMessage extends StockSyncNotification {
  eventId: string;
}

export interface NotificationMessage {
  eventId: string;
  type: NotificationType;
  orderId: string;
  recipient: string;
  recipientName: string;
  subject: string;
  body: string;
  timestamp: string;
}

export type SagaMessage =
  | InventoryRollbackMessage
  | RefundRequestMessage
  | StockSyncMessage
  | NotificationMessage;

/**
 * Payment webhook body, as posted to the orchestrator
 */
export interface PaymentWebhookEvent {
  type: PaymentEventType;
  order_id: string;
  payment_id: string;
  amount: number;
  paid_at: string;
  refund_id?: string;
  refunded_at?: string;
}

/**
 * Delivery webhook body, as posted to the orchestrator
 */
export interface DeliveryWebhookEvent {
  shipment_id: string;
  status: ShipmentStatus;
  timestamp: string;
}

/**
 * DynamoDB Item Types (with partition key)
 */
export type DynamoDBItem<T> = T & { PK: string };

export interface QueryOptions {
  limit?: number;
  lastEvaluatedKey?: Record<string, unknown>;
}

export interface PaginatedResult<T> {
  items: T[];
  lastEvaluatedKey?: Record<string, unknown>;
  hasMore: boolean;
}

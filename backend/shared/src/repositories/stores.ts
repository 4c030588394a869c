import {
  Account,
  EmailLog,
  EmailStatus,
  Inventory,
  MessageGuard,
  Order,
  OrderUpdate,
  Payment,
  PaymentStatus,
  Product,
  Reservation,
  Shipment,
  ShipmentStatus,
  StockSyncNotification,
  TransactionRecord,
  WebhookEvent,
  WebhookRegistration,
} from '../types';

/**
 * Persistence ports used by the saga services.
 *
 * The DynamoDB repositories implement them for production. Every method that
 * takes a `version`-carrying entity performs a compare-and-swap on it and
 * throws VersionConflictError when another writer got there first. Methods
 * taking a MessageGuard write the idempotency record in the same transaction
 * and throw DuplicateMessageError if it already exists.
 */

export interface OrderStore {
  create(order: Order): Promise<Order>;
  getById(orderId: string): Promise<Order | null>;
  getByShipmentId(shipmentId: string): Promise<Order | null>;
  update(order: Order, updates: OrderUpdate): Promise<Order>;
}

export interface ProductStore {
  getById(productId: string): Promise<Product | null>;
  /**
   * Overwrite the catalog copy's stock fields unless a newer sync is stored.
   * Returns false when the notification is older than what is stored.
   */
  applyStockSync(sync: StockSyncNotification, guard?: MessageGuard): Promise<boolean>;
}

export type ReserveOutcome =
  | { kind: 'RESERVED'; inventory: Inventory; reservation: Reservation }
  | { kind: 'ALREADY_RESERVED' };

export type ReleaseOutcome = 'RELEASED' | 'ALREADY_RELEASED';

export interface InventoryStore {
  get(productId: string, warehouseId: string): Promise<Inventory | null>;
  listByProduct(productId: string): Promise<Inventory[]>;
  /** Debit inventory and insert the reservation in one transaction */
  reserve(inventory: Inventory, reservation: Reservation): Promise<ReserveOutcome>;
  /** Credit inventory and delete the reservation in one transaction */
  release(inventory: Inventory, reservation: Reservation, guard?: MessageGuard): Promise<ReleaseOutcome>;
  restock(inventory: Inventory, quantity: number): Promise<Inventory>;
}

export interface ReservationStore {
  getById(reservationId: string): Promise<Reservation | null>;
  listByOrder(orderId: string): Promise<Reservation[]>;
  /** RESERVED -> COMMITTED; false when the reservation is gone or already committed */
  markCommitted(reservationId: string): Promise<boolean>;
}

/**
 * One atomic money movement: both balances, the transfer log and the payment
 */
export interface Settlement {
  payment: Payment;
  status: PaymentStatus;
  from: Account;
  to: Account;
  record: TransactionRecord;
  /** Earlier transfer whose status moves along with the payment */
  supersedes?: TransactionRecord;
}

export interface PaymentStore {
  /** Insert; false when a payment already exists for the order */
  create(payment: Payment): Promise<boolean>;
  getByOrderId(orderId: string): Promise<Payment | null>;
  updateStatus(payment: Payment, status: PaymentStatus, guard?: MessageGuard): Promise<Payment>;
  settle(settlement: Settlement, guard?: MessageGuard): Promise<Payment>;
}

export interface AccountStore {
  get(accountId: string): Promise<Account | null>;
}

export interface TransactionRecordStore {
  getById(transactionId: string): Promise<TransactionRecord | null>;
  listByOrder(orderId: string): Promise<TransactionRecord[]>;
}

export interface ShipmentStore {
  /** Insert; false when the order already has a shipment */
  create(shipment: Shipment): Promise<boolean>;
  getByOrderId(orderId: string): Promise<Shipment | null>;
  getByShipmentId(shipmentId: string): Promise<Shipment | null>;
  listByStatus(status: ShipmentStatus, limit: number): Promise<Shipment[]>;
  update(
    shipment: Shipment,
    updates: Pick<Shipment, 'status' | 'progress'> & Partial<Pick<Shipment, 'actualDelivery'>>
  ): Promise<Shipment>;
}

export interface ProcessedMessageStore {
  exists(guard: MessageGuard): Promise<boolean>;
  /** Insert; false when the record already exists */
  record(guard: MessageGuard): Promise<boolean>;
}

export interface WebhookRegistrationStore {
  /** Conditional upsert; false when a newer registration is stored */
  upsert(registration: WebhookRegistration): Promise<boolean>;
  listByEvent(event: WebhookEvent): Promise<WebhookRegistration[]>;
}

export interface EmailLogStore {
  create(email: EmailLog, guard: MessageGuard): Promise<void>;
  updateStatus(emailId: string, status: EmailStatus, sentAt?: string): Promise<void>;
}

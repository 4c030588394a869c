import {
  AccountStore,
  EmailLogStore,
  InventoryStore,
  OrderStore,
  PaymentStore,
  ProcessedMessageStore,
  ProductStore,
  ReleaseOutcome,
  ReservationStore,
  ReserveOutcome,
  Settlement,
  ShipmentStore,
  TransactionRecordStore,
  WebhookRegistrationStore,
} from '../../src/repositories/stores';
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
  ReservationStatus,
  Shipment,
  ShipmentStatus,
  StockSyncNotification,
  TransactionKind,
  TransactionRecord,
  TransactionStatus,
  WebhookEvent,
  WebhookRegistration,
} from '../../src/types';
import { DuplicateMessageError, ValidationError, VersionConflictError } from '../../src/utils/errors';

/**
 * In-memory stores with the conditional-write behaviour of the DynamoDB
 * repositories: version compare-and-swap, insert-if-absent and idempotency
 * records written with the side effect. Every check of a "transaction" runs
 * before any of its writes.
 */

function now(): string {
  return new Date().toISOString();
}

function guardKey(guard: MessageGuard): string {
  return `${guard.consumerName}#${guard.messageId}`;
}

export class InMemoryProcessedMessageStore implements ProcessedMessageStore {
  readonly records = new Set<string>();

  async exists(guard: MessageGuard): Promise<boolean> {
    return this.records.has(guardKey(guard));
  }

  async record(guard: MessageGuard): Promise<boolean> {
    if (this.records.has(guardKey(guard))) {
      return false;
    }
    this.records.add(guardKey(guard));
    return true;
  }

  /** Condition check of a guard inside another store's transaction */
  assertFree(guard: MessageGuard | undefined): void {
    if (guard && this.records.has(guardKey(guard))) {
      throw new DuplicateMessageError(guard.messageId, guard.consumerName);
    }
  }

  commit(guard: MessageGuard | undefined): void {
    if (guard) {
      this.records.add(guardKey(guard));
    }
  }
}

export class InMemoryOrderStore implements OrderStore {
  readonly orders = new Map<string, Order>();

  async create(order: Order): Promise<Order> {
    if (this.orders.has(order.orderId)) {
      throw new ValidationError(`Order ${order.orderId} already exists`, 'orderId', order.orderId);
    }
    this.orders.set(order.orderId, { ...order });
    return { ...order };
  }

  async getById(orderId: string): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? { ...order } : null;
  }

  async getByShipmentId(shipmentId: string): Promise<Order | null> {
    const order = [...this.orders.values()].find((candidate) => candidate.shipmentId === shipmentId);
    return order ? { ...order } : null;
  }

  async update(order: Order, updates: OrderUpdate): Promise<Order> {
    const stored = this.orders.get(order.orderId);
    if (!stored || stored.version !== order.version) {
      throw new VersionConflictError(`order ${order.orderId}`);
    }

    const defined = Object.fromEntries(Object.entries(updates).filter(([, value]) => value !== undefined));
    const updated: Order = { ...stored, ...defined, version: stored.version + 1, updatedAt: now() };
    this.orders.set(order.orderId, updated);
    return { ...updated };
  }
}

export class InMemoryProductStore implements ProductStore {
  readonly products = new Map<string, Product>();

  constructor(private readonly processed: InMemoryProcessedMessageStore) {}

  seed(product: Product): void {
    this.products.set(product.productId, { ...product });
  }

  async getById(productId: string): Promise<Product | null> {
    const product = this.products.get(productId);
    return product ? { ...product } : null;
  }

  async applyStockSync(sync: StockSyncNotification, guard?: MessageGuard): Promise<boolean> {
    this.processed.assertFree(guard);

    const stored = this.products.get(sync.productId);
    if (stored?.stockUpdatedAt && stored.stockUpdatedAt > sync.timestamp) {
      return false;
    }

    const timestamp = now();
    this.products.set(sync.productId, {
      productId: sync.productId,
      name: sync.name,
      price: sync.price,
      stock: sync.stock,
      published: sync.published,
      imageUrl: sync.imageUrl,
      stockUpdatedAt: sync.timestamp,
      createdAt: stored?.createdAt ?? timestamp,
      updatedAt: timestamp,
    });
    this.processed.commit(guard);
    return true;
  }
}

export class InMemoryReservationStore implements ReservationStore {
  readonly reservations = new Map<string, Reservation>();
  /** Simulates the order index lagging behind writes */
  indexLagging = false;

  async getById(reservationId: string): Promise<Reservation | null> {
    const reservation = this.reservations.get(reservationId);
    return reservation ? { ...reservation } : null;
  }

  async listByOrder(orderId: string): Promise<Reservation[]> {
    if (this.indexLagging) {
      return [];
    }
    return [...this.reservations.values()]
      .filter((reservation) => reservation.orderId === orderId)
      .map((reservation) => ({ ...reservation }));
  }

  async markCommitted(reservationId: string): Promise<boolean> {
    const reservation = this.reservations.get(reservationId);
    if (!reservation || reservation.status !== ReservationStatus.RESERVED) {
      return false;
    }
    this.reservations.set(reservationId, {
      ...reservation,
      status: ReservationStatus.COMMITTED,
      committedAt: now(),
    });
    return true;
  }
}

function inventoryKey(productId: string, warehouseId: string): string {
  return `${productId}#${warehouseId}`;
}

export class InMemoryInventoryStore implements InventoryStore {
  readonly rows = new Map<string, Inventory>();

  constructor(
    private readonly reservations: InMemoryReservationStore,
    private readonly processed: InMemoryProcessedMessageStore
  ) {}

  seed(inventory: Inventory): void {
    this.rows.set(inventoryKey(inventory.productId, inventory.warehouseId), { ...inventory });
  }

  quantityOf(productId: string, warehouseId: string): number {
    return this.rows.get(inventoryKey(productId, warehouseId))?.quantity ?? 0;
  }

  async get(productId: string, warehouseId: string): Promise<Inventory | null> {
    const row = this.rows.get(inventoryKey(productId, warehouseId));
    return row ? { ...row } : null;
  }

  async listByProduct(productId: string): Promise<Inventory[]> {
    return [...this.rows.values()].filter((row) => row.productId === productId).map((row) => ({ ...row }));
  }

  async reserve(inventory: Inventory, reservation: Reservation): Promise<ReserveOutcome> {
    if (this.reservations.reservations.has(reservation.reservationId)) {
      return { kind: 'ALREADY_RESERVED' };
    }
    this.assertVersion(inventory);

    const updated: Inventory = {
      ...inventory,
      quantity: inventory.quantity - reservation.quantity,
      version: inventory.version + 1,
      updatedAt: now(),
    };
    this.rows.set(inventoryKey(inventory.productId, inventory.warehouseId), updated);
    this.reservations.reservations.set(reservation.reservationId, { ...reservation });
    return { kind: 'RESERVED', inventory: { ...updated }, reservation: { ...reservation } };
  }

  async release(inventory: Inventory, reservation: Reservation, guard?: MessageGuard): Promise<ReleaseOutcome> {
    this.processed.assertFree(guard);
    if (!this.reservations.reservations.has(reservation.reservationId)) {
      return 'ALREADY_RELEASED';
    }
    this.assertVersion(inventory);

    this.rows.set(inventoryKey(inventory.productId, inventory.warehouseId), {
      ...inventory,
      quantity: inventory.quantity + reservation.quantity,
      version: inventory.version + 1,
      updatedAt: now(),
    });
    this.reservations.reservations.delete(reservation.reservationId);
    this.processed.commit(guard);
    return 'RELEASED';
  }

  async restock(inventory: Inventory, quantity: number): Promise<Inventory> {
    this.assertVersion(inventory);

    const updated: Inventory = {
      ...inventory,
      quantity: inventory.quantity + quantity,
      version: inventory.version + 1,
      updatedAt: now(),
    };
    this.rows.set(inventoryKey(inventory.productId, inventory.warehouseId), updated);
    return { ...updated };
  }

  private assertVersion(inventory: Inventory): void {
    const stored = this.rows.get(inventoryKey(inventory.productId, inventory.warehouseId));
    if (!stored || stored.version !== inventory.version) {
      throw new VersionConflictError(`inventory ${inventoryKey(inventory.productId, inventory.warehouseId)}`);
    }
  }
}

export class InMemoryAccountStore implements AccountStore {
  readonly accounts = new Map<string, Account>();

  seed(account: Account): void {
    this.accounts.set(account.accountId, { ...account });
  }

  balanceOf(accountId: string): number {
    return this.accounts.get(accountId)?.balance ?? 0;
  }

  async get(accountId: string): Promise<Account | null> {
    const account = this.accounts.get(accountId);
    return account ? { ...account } : null;
  }
}

export class InMemoryTransactionRecordStore implements TransactionRecordStore {
  readonly records = new Map<string, TransactionRecord>();

  async getById(transactionId: string): Promise<TransactionRecord | null> {
    const record = this.records.get(transactionId);
    return record ? { ...record } : null;
  }

  async listByOrder(orderId: string): Promise<TransactionRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.orderId === orderId)
      .map((record) => ({ ...record }));
  }
}

export class InMemoryPaymentStore implements PaymentStore {
  readonly payments = new Map<string, Payment>();

  constructor(
    private readonly accounts: InMemoryAccountStore,
    private readonly transactions: InMemoryTransactionRecordStore,
    private readonly processed: InMemoryProcessedMessageStore
  ) {}

  seed(payment: Payment): void {
    this.payments.set(payment.orderId, { ...payment });
  }

  async create(payment: Payment): Promise<boolean> {
    if (this.payments.has(payment.orderId)) {
      return false;
    }
    this.payments.set(payment.orderId, { ...payment });
    return true;
  }

  async getByOrderId(orderId: string): Promise<Payment | null> {
    const payment = this.payments.get(orderId);
    return payment ? { ...payment } : null;
  }

  async updateStatus(payment: Payment, status: PaymentStatus, guard?: MessageGuard): Promise<Payment> {
    this.processed.assertFree(guard);
    this.assertPaymentVersion(payment);

    const updated: Payment = { ...payment, status, version: payment.version + 1, updatedAt: now() };
    this.payments.set(payment.orderId, updated);
    this.processed.commit(guard);
    return { ...updated };
  }

  async settle(settlement: Settlement, guard?: MessageGuard): Promise<Payment> {
    const { payment, status, from, to, record, supersedes } = settlement;
    const resource = `payment ${payment.orderId}`;

    this.processed.assertFree(guard);
    this.assertPaymentVersion(payment);
    for (const account of [from, to]) {
      if (this.accounts.accounts.get(account.accountId)?.version !== account.version) {
        throw new VersionConflictError(resource);
      }
    }
    if (this.transactions.records.has(record.transactionId)) {
      throw new VersionConflictError(resource);
    }
    if (supersedes && this.transactions.records.get(supersedes.transactionId)?.status !== TransactionStatus.COMPLETED) {
      throw new VersionConflictError(resource);
    }

    const timestamp = now();
    this.accounts.accounts.set(from.accountId, {
      ...from,
      balance: from.balance - record.amount,
      version: from.version + 1,
      updatedAt: timestamp,
    });
    this.accounts.accounts.set(to.accountId, {
      ...to,
      balance: to.balance + record.amount,
      version: to.version + 1,
      updatedAt: timestamp,
    });
    this.transactions.records.set(record.transactionId, { ...record });
    if (supersedes) {
      this.transactions.records.set(supersedes.transactionId, {
        ...supersedes,
        status: TransactionStatus.REFUNDED,
        updatedAt: timestamp,
      });
    }

    const updated: Payment = {
      ...payment,
      status,
      version: payment.version + 1,
      updatedAt: timestamp,
      ...(record.kind === TransactionKind.PAYMENT
        ? { transactionId: record.transactionId, customerAccountId: record.fromAccountId }
        : {}),
    };
    this.payments.set(payment.orderId, updated);
    this.processed.commit(guard);
    return { ...updated };
  }

  private assertPaymentVersion(payment: Payment): void {
    if (this.payments.get(payment.orderId)?.version !== payment.version) {
      throw new VersionConflictError(`payment ${payment.orderId}`);
    }
  }
}

export class InMemoryShipmentStore implements ShipmentStore {
  readonly shipments = new Map<string, Shipment>();

  async create(shipment: Shipment): Promise<boolean> {
    if (this.shipments.has(shipment.orderId)) {
      return false;
    }
    this.shipments.set(shipment.orderId, { ...shipment });
    return true;
  }

  async getByOrderId(orderId: string): Promise<Shipment | null> {
    const shipment = this.shipments.get(orderId);
    return shipment ? { ...shipment } : null;
  }

  async getByShipmentId(shipmentId: string): Promise<Shipment | null> {
    const shipment = [...this.shipments.values()].find((candidate) => candidate.shipmentId === shipmentId);
    return shipment ? { ...shipment } : null;
  }

  async listByStatus(status: ShipmentStatus, limit: number): Promise<Shipment[]> {
    return [...this.shipments.values()]
      .filter((shipment) => shipment.status === status)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .slice(0, limit)
      .map((shipment) => ({ ...shipment }));
  }

  async update(
    shipment: Shipment,
    updates: Pick<Shipment, 'status' | 'progress'> & Partial<Pick<Shipment, 'actualDelivery'>>
  ): Promise<Shipment> {
    const stored = this.shipments.get(shipment.orderId);
    if (!stored || stored.version !== shipment.version) {
      throw new VersionConflictError(`shipment ${shipment.shipmentId}`);
    }

    const updated: Shipment = {
      ...stored,
      ...updates,
      actualDelivery: updates.actualDelivery ?? stored.actualDelivery,
      version: stored.version + 1,
      updatedAt: now(),
    };
    this.shipments.set(shipment.orderId, updated);
    return { ...updated };
  }
}

export class InMemoryWebhookRegistrationStore implements WebhookRegistrationStore {
  readonly registrations = new Map<string, WebhookRegistration>();

  async upsert(registration: WebhookRegistration): Promise<boolean> {
    const key = `${registration.event}#${registration.subscriberKey}`;
    const stored = this.registrations.get(key);
    if (stored && stored.registeredAt > registration.registeredAt) {
      return false;
    }
    this.registrations.set(key, { ...registration });
    return true;
  }

  async listByEvent(event: WebhookEvent): Promise<WebhookRegistration[]> {
    return [...this.registrations.values()].filter((registration) => registration.event === event);
  }
}

export class InMemoryEmailLogStore implements EmailLogStore {
  readonly emails = new Map<string, EmailLog>();

  constructor(private readonly processed: InMemoryProcessedMessageStore) {}

  async create(email: EmailLog, guard: MessageGuard): Promise<void> {
    this.processed.assertFree(guard);
    this.emails.set(email.emailId, { ...email });
    this.processed.commit(guard);
  }

  async updateStatus(emailId: string, status: EmailStatus, sentAt?: string): Promise<void> {
    const stored = this.emails.get(emailId);
    if (stored) {
      this.emails.set(emailId, { ...stored, status, ...(sentAt ? { sentAt } : {}) });
    }
  }
}

import {
  InventoryStore,
  ProcessedMessageStore,
  ProductStore,
  ReservationStore,
} from '../repositories/stores';
import { Inventory, MessageGuard, Reservation, ReservationStatus } from '../types';
import { getCurrentTimestamp } from '../utils/dynamodb-client';
import { InsufficientStockError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { OptimisticRetryOptions, withOptimisticRetry } from '../utils/optimistic-retry';
import { validatePositiveInteger, validateStringLength } from '../utils/validators';
import { StockSyncPublisher } from './event-publisher';

/**
 * Inventory Ledger
 * Warehouse-side stock: reservations against per-warehouse inventory rows.
 *
 * Reserve debits stock once. Commit only marks the reservation; Rollback is
 * the single undo path and returns the quantity whether or not the
 * reservation was committed.
 */

export interface InventoryLedgerDeps {
  inventory: InventoryStore;
  reservations: ReservationStore;
  products: ProductStore;
  processedMessages: ProcessedMessageStore;
  stockSync: StockSyncPublisher;
  retry: OptimisticRetryOptions;
}

export interface ReserveRequest {
  orderId: string;
  productId: string;
  warehouseId: string;
  quantity: number;
}

export interface CommitResult {
  committed: boolean;
  reservation: Reservation | null;
}

export interface RollbackResult {
  released: number;
  quantity: number;
}

export interface RollbackOptions {
  guard?: MessageGuard;
  /** Read directly as well as through the order index, which lags writes */
  reservationId?: string;
}

/**
 * Reservation ids are derived from the order line, so a retried Reserve
 * lands on the same row.
 */
export function buildReservationId(orderId: string, warehouseId: string, productId: string): string {
  return `${orderId}#${warehouseId}#${productId}`;
}

export class InventoryLedger {
  constructor(private readonly deps: InventoryLedgerDeps) {}

  /**
   * True when some warehouse holds at least `quantity` of the product
   */
  async checkStock(productId: string, quantity: number): Promise<boolean> {
    return (await this.locateStock(productId, quantity)) !== null;
  }

  /**
   * First warehouse able to fill the whole quantity, or null
   */
  async locateStock(productId: string, quantity: number): Promise<string | null> {
    validateStringLength(productId, 'productId', 1);
    validatePositiveInteger(quantity, 'quantity');

    const rows = await this.deps.inventory.listByProduct(productId);
    const match = rows
      .filter((row) => row.quantity >= quantity)
      .sort((a, b) => b.quantity - a.quantity)[0];

    return match ? match.warehouseId : null;
  }

  async reserve(request: ReserveRequest): Promise<Reservation> {
    validateStringLength(request.orderId, 'orderId', 1);
    validateStringLength(request.productId, 'productId', 1);
    validateStringLength(request.warehouseId, 'warehouseId', 1);
    validatePositiveInteger(request.quantity, 'quantity');

    const { orderId, productId, warehouseId, quantity } = request;
    const reservationId = buildReservationId(orderId, warehouseId, productId);

    const result = await withOptimisticRetry(
      `inventory ${productId}#${warehouseId}`,
      async () => {
        const existing = await this.deps.reservations.getById(reservationId);
        if (existing) {
          return { reservation: existing, created: false };
        }

        const inventory = await this.requireInventory(productId, warehouseId);
        if (inventory.quantity < quantity) {
          throw new InsufficientStockError(productId, quantity, inventory.quantity);
        }

        const reservation: Reservation = {
          reservationId,
          orderId,
          warehouseId,
          productId,
          quantity,
          status: ReservationStatus.RESERVED,
          createdAt: getCurrentTimestamp(),
        };

        const outcome = await this.deps.inventory.reserve(inventory, reservation);
        if (outcome.kind === 'ALREADY_RESERVED') {
          const stored = await this.deps.reservations.getById(reservationId);
          if (!stored) {
            throw new NotFoundError('Reservation', reservationId);
          }
          return { reservation: stored, created: false };
        }

        return { reservation: outcome.reservation, created: true };
      },
      this.deps.retry
    );

    if (result.created) {
      logger.info('Stock reserved', { orderId, productId, warehouseId, quantity });
      await this.broadcastStock([productId]);
    }

    return result.reservation;
  }

  /**
   * Mark a reservation as part of a paid order. Committing twice, or
   * committing a reservation already rolled back, changes nothing.
   */
  async commit(reservationId: string): Promise<CommitResult> {
    validateStringLength(reservationId, 'reservationId', 1);

    const committed = await this.deps.reservations.markCommitted(reservationId);
    const reservation = await this.deps.reservations.getById(reservationId);

    if (committed) {
      logger.info('Reservation committed', { reservationId });
    } else {
      logger.info('Reservation not committed; already committed or released', {
        reservationId,
        found: reservation !== null,
      });
    }

    return { committed, reservation };
  }

  /**
   * Return every reservation of an order to stock.
   *
   * With a guard, the idempotency record is written with the last release,
   * or on its own when nothing was left to release.
   */
  async rollback(orderId: string, options: RollbackOptions = {}): Promise<RollbackResult> {
    validateStringLength(orderId, 'orderId', 1);
    const { guard } = options;

    const reservations = await this.findReservations(orderId, options.reservationId);
    let released = 0;
    let quantity = 0;
    let guardWritten = false;
    const touched = new Set<string>();

    for (const [index, reservation] of reservations.entries()) {
      const isLast = index === reservations.length - 1;
      const rowGuard = isLast ? guard : undefined;

      const outcome = await withOptimisticRetry(
        `inventory ${reservation.productId}#${reservation.warehouseId}`,
        async () => {
          const inventory = await this.requireInventory(reservation.productId, reservation.warehouseId);
          return this.deps.inventory.release(inventory, reservation, rowGuard);
        },
        this.deps.retry
      );

      if (outcome === 'RELEASED') {
        released++;
        quantity += reservation.quantity;
        touched.add(reservation.productId);
        guardWritten = guardWritten || rowGuard !== undefined;
      }
    }

    if (guard && !guardWritten) {
      await this.deps.processedMessages.record(guard);
    }

    if (released === 0) {
      logger.info('Nothing to roll back', { orderId });
      return { released, quantity };
    }

    logger.info('Reservations rolled back', { orderId, released, quantity });
    await this.broadcastStock([...touched]);
    return { released, quantity };
  }

  /**
   * Add stock to a warehouse row
   */
  async restock(productId: string, warehouseId: string, quantity: number): Promise<Inventory> {
    validatePositiveInteger(quantity, 'quantity');

    const updated = await withOptimisticRetry(
      `inventory ${productId}#${warehouseId}`,
      async () => {
        const inventory = await this.requireInventory(productId, warehouseId);
        return this.deps.inventory.restock(inventory, quantity);
      },
      this.deps.retry
    );

    logger.info('Stock replenished', { productId, warehouseId, quantity, total: updated.quantity });
    await this.broadcastStock([productId]);
    return updated;
  }

  private async findReservations(orderId: string, reservationId?: string): Promise<Reservation[]> {
    const listed = await this.deps.reservations.listByOrder(orderId);
    if (!reservationId || listed.some((r) => r.reservationId === reservationId)) {
      return listed;
    }

    const direct = await this.deps.reservations.getById(reservationId);
    return direct && direct.orderId === orderId ? [...listed, direct] : listed;
  }

  private async requireInventory(productId: string, warehouseId: string): Promise<Inventory> {
    const inventory = await this.deps.inventory.get(productId, warehouseId);
    if (!inventory) {
      throw new NotFoundError('Inventory', `${productId}#${warehouseId}`);
    }
    return inventory;
  }

  /**
   * Publish the new total of each product to catalog copies.
   * The stock change is already durable, so a failed broadcast is logged
   * and the next change carries the correct total.
   */
  private async broadcastStock(productIds: string[]): Promise<void> {
    for (const productId of productIds) {
      try {
        const product = await this.deps.products.getById(productId);
        if (!product) {
          logger.warn('Product master missing, stock not broadcast', { productId });
          continue;
        }

        const rows = await this.deps.inventory.listByProduct(productId);
        await this.deps.stockSync.publishStockSync({
          productId,
          name: product.name,
          price: product.price,
          stock: rows.reduce((total, row) => total + row.quantity, 0),
          published: product.published,
          imageUrl: product.imageUrl,
          timestamp: getCurrentTimestamp(),
        });
      } catch (error) {
        logger.error('Failed to broadcast stock', error, { productId });
      }
    }
  }
}

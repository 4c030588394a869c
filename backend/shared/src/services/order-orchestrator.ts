import { OrderStore, ProcessedMessageStore, ProductStore } from '../repositories/stores';
import {
  CancelReason,
  DeliveryWebhookEvent,
  MessageGuard,
  NotificationType,
  Order,
  OrderStatus,
  OrderUpdate,
  PaymentEventType,
  PaymentInstruction,
  PaymentWebhookEvent,
  QueueName,
  ShipmentStatus,
  ShippingInfo,
  StockSyncNotification,
} from '../types';
import { generateId } from '../utils/dynamodb-client';
import {
  AccessDeniedError,
  InsufficientStockError,
  InvalidStateTransitionError,
  NotFoundError,
  RemoteTimeoutError,
  TransientInfraError,
  ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { OptimisticRetryOptions, withOptimisticRetry } from '../utils/optimistic-retry';
import { defineStateMachine } from '../utils/state-machine';
import {
  validatePositiveInteger,
  validateShippingInfo,
  validateStringLength,
} from '../utils/validators';
import { buildReservationId } from './inventory-ledger';
import { MessagePublisher } from './message-publisher';
import { buildNotification } from './notification-templates';
import { DeliveryPort, InventoryPort, PaymentPort } from './service-clients';

export const orderMachine = defineStateMachine<OrderStatus>('Order', {
  [OrderStatus.PENDING]: [OrderStatus.PROCESSING, OrderStatus.CANCELLED],
  [OrderStatus.PROCESSING]: [
    OrderStatus.PICKED_UP,
    OrderStatus.DELIVERING,
    OrderStatus.DELIVERED,
    OrderStatus.CANCELLED,
  ],
  [OrderStatus.PICKED_UP]: [OrderStatus.DELIVERING, OrderStatus.DELIVERED, OrderStatus.CANCELLED],
  [OrderStatus.DELIVERING]: [OrderStatus.DELIVERED, OrderStatus.CANCELLED],
  [OrderStatus.CANCELLED]: [OrderStatus.REFUNDED],
  [OrderStatus.DELIVERED]: [],
  [OrderStatus.REFUNDED]: [],
});

/**
 * Order status a carrier status maps to; null carries no order change
 */
const ORDER_STATUS_BY_SHIPMENT: Record<ShipmentStatus, OrderStatus | null> = {
  [ShipmentStatus.SHIPMENT_CREATED]: null,
  [ShipmentStatus.PROCESSING]: null,
  [ShipmentStatus.PICKED_UP]: OrderStatus.PICKED_UP,
  [ShipmentStatus.IN_TRANSIT]: OrderStatus.DELIVERING,
  [ShipmentStatus.DELIVERED]: OrderStatus.DELIVERED,
  [ShipmentStatus.LOST]: OrderStatus.CANCELLED,
};

const CANCELLABLE_BY_USER: readonly OrderStatus[] = [OrderStatus.PENDING, OrderStatus.PROCESSING];

/**
 * Cancellations no webhook redelivers. A cancel request on an order left in
 * one of these publishes its compensations again.
 */
const REDRIVABLE_CANCEL_REASONS: readonly CancelReason[] = [
  CancelReason.USER_CANCELLED,
  CancelReason.PAYMENT_UNAVAILABLE,
];

export interface OrderOrchestratorDeps {
  orders: OrderStore;
  products: ProductStore;
  processedMessages: ProcessedMessageStore;
  inventory: InventoryPort;
  payment: PaymentPort;
  delivery: DeliveryPort;
  publisher: MessagePublisher;
  retry: OptimisticRetryOptions;
  clock?: () => Date;
}

export interface CreateOrderRequest {
  userId: string;
  productId: string;
  quantity: number;
  shippingInfo: ShippingInfo;
}

interface TransitionOptions {
  /** Throw on an illegal transition instead of skipping it */
  reject?: boolean;
  /** Further restrict the states the transition may start from */
  from?: readonly OrderStatus[];
  /** When the order already has the target status, still write `updates` */
  refresh?: boolean;
}

interface TransitionResult {
  order: Order;
  changed: boolean;
}

/**
 * Order Orchestrator
 * Drives an order through the fulfillment saga: stock reservation, payment,
 * shipment and the compensations when any of them fails.
 *
 * Synchronous steps call the other services through their ports; compensations
 * and notifications go out as queue messages after the order write resolves.
 */
export class OrderOrchestrator {
  private readonly clock: () => Date;

  constructor(private readonly deps: OrderOrchestratorDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async createOrder(request: CreateOrderRequest): Promise<Order> {
    const userId = validateStringLength(request.userId, 'userId', 1, 128);
    const productId = validateStringLength(request.productId, 'productId', 1, 128);
    const quantity = validatePositiveInteger(request.quantity, 'quantity');
    const shippingInfo = validateShippingInfo({ ...request.shippingInfo });

    const product = await this.deps.products.getById(productId);
    if (!product || !product.published) {
      throw new NotFoundError('Product', productId);
    }
    const totalAmount = product.price * quantity;

    const warehouseId = await this.deps.inventory.locateStock(productId, quantity);
    if (!warehouseId) {
      throw new InsufficientStockError(productId, quantity, product.stock);
    }

    const orderId = generateId();
    logger.setContext({ orderId, userId });
    const reservationId = buildReservationId(orderId, warehouseId, productId);

    try {
      await this.deps.inventory.reserve({ orderId, productId, warehouseId, quantity });
    } catch (error) {
      // The reservation may have landed even though we never saw the reply
      if (error instanceof RemoteTimeoutError || error instanceof TransientInfraError) {
        await this.publishRollback(orderId, productId, quantity, reservationId, 'RESERVE_FAILED');
      }
      throw error;
    }

    const now = this.clock().toISOString();
    const order: Order = {
      orderId,
      userId,
      productId,
      quantity,
      unitPrice: product.price,
      totalAmount,
      status: OrderStatus.PENDING,
      ...shippingInfo,
      reservationId,
      warehouseId,
      version: 0,
      createdAt: now,
      updatedAt: now,
    };

    try {
      await this.deps.orders.create(order);
    } catch (error) {
      await this.publishRollback(orderId, productId, quantity, reservationId, 'ORDER_NOT_STORED');
      throw error;
    }

    logger.info('Order created', { productId, quantity, warehouseId, totalAmount });

    let instruction: PaymentInstruction;
    try {
      instruction = await this.deps.payment.createInstruction({
        orderId,
        amount: totalAmount,
        customerId: userId,
      });
    } catch (error) {
      logger.error('Payment instruction unavailable, cancelling order', error);
      const { order: cancelled } = await this.transition(orderId, OrderStatus.CANCELLED, {
        cancelReason: CancelReason.PAYMENT_UNAVAILABLE,
      });

      // The refund voids an instruction issued just before the failure
      try {
        await this.publishCompensations(cancelled, CancelReason.PAYMENT_UNAVAILABLE);
      } catch (publishError) {
        // The caller gets the order id back; cancelling it publishes again
        logger.error('Compensation publish failed for cancelled order', publishError, {
          cancelReason: CancelReason.PAYMENT_UNAVAILABLE,
        });
      }
      return cancelled;
    }

    const { order: processing } = await this.transition(orderId, OrderStatus.PROCESSING, {
      billerCode: instruction.billerCode,
      paymentReference: instruction.referenceNumber,
      paymentExpiresAt: instruction.expiresAt,
    }, { refresh: true });
    return processing;
  }

  async handlePaymentWebhook(event: PaymentWebhookEvent): Promise<Order> {
    const order = await this.requireOrder(event.order_id);
    logger.setContext({ orderId: order.orderId });
    logger.info('Payment event received', { type: event.type, paymentId: event.payment_id });

    switch (event.type) {
      case PaymentEventType.PAYMENT_PROCESSING:
        return order;

      case PaymentEventType.PAYMENT_COMPLETED:
        return this.onPaymentCompleted(order);

      case PaymentEventType.PAYMENT_FAILED: {
        const result = await this.transition(order.orderId, OrderStatus.CANCELLED, {
          cancelReason: CancelReason.PAYMENT_FAILED,
        });
        if (!this.reached(result, OrderStatus.CANCELLED, CancelReason.PAYMENT_FAILED)) {
          return result.order;
        }

        await this.publishRollback(
          order.orderId,
          order.productId,
          order.quantity,
          order.reservationId,
          'PAYMENT_FAILED'
        );
        await this.notify(NotificationType.PAYMENT_FAILED, result.order);
        return result.order;
      }

      case PaymentEventType.REFUND_COMPLETED: {
        const result = await this.transition(order.orderId, OrderStatus.REFUNDED, {});
        if (this.reached(result, OrderStatus.REFUNDED)) {
          await this.notify(NotificationType.REFUND_CONFIRMATION, result.order);
        }
        return result.order;
      }
    }
  }

  async handleDeliveryWebhook(event: DeliveryWebhookEvent): Promise<Order> {
    const order = await this.deps.orders.getByShipmentId(event.shipment_id);
    if (!order) {
      throw new NotFoundError('Order for shipment', event.shipment_id);
    }
    logger.setContext({ orderId: order.orderId });

    const target = ORDER_STATUS_BY_SHIPMENT[event.status];
    if (!target) {
      logger.info('Delivery event carries no order change', { status: event.status });
      return order;
    }

    const lost = event.status === ShipmentStatus.LOST;
    const result = await this.transition(
      order.orderId,
      target,
      lost ? { cancelReason: CancelReason.SHIPMENT_LOST } : {}
    );
    if (!this.reached(result, target, lost ? CancelReason.SHIPMENT_LOST : undefined)) {
      return result.order;
    }

    if (lost) {
      await this.publishRollback(
        order.orderId,
        order.productId,
        order.quantity,
        order.reservationId,
        'SHIPMENT_LOST'
      );
      await this.publishRefund(result.order, 'SHIPMENT_LOST');
    }
    await this.notify(NotificationType.DELIVERY_UPDATE, result.order, event.status);
    return result.order;
  }

  async cancelOrder(orderId: string, requesterId: string): Promise<Order> {
    const order = await this.requireOrder(orderId);
    this.assertOwner(order, requesterId);

    if (
      order.status === OrderStatus.CANCELLED &&
      order.cancelReason !== undefined &&
      REDRIVABLE_CANCEL_REASONS.includes(order.cancelReason)
    ) {
      logger.info('Order already cancelled, publishing compensations again', {
        orderId,
        cancelReason: order.cancelReason,
      });
      await this.publishCompensations(order, order.cancelReason);
      if (order.cancelReason === CancelReason.USER_CANCELLED) {
        await this.notify(NotificationType.ORDER_CANCELLED, order);
      }
      return order;
    }

    const { order: cancelled } = await this.transition(
      orderId,
      OrderStatus.CANCELLED,
      { cancelReason: CancelReason.USER_CANCELLED },
      { reject: true, from: CANCELLABLE_BY_USER }
    );
    logger.info('Order cancelled by user', { orderId, userId: requesterId });

    await this.publishCompensations(cancelled, CancelReason.USER_CANCELLED);
    await this.notify(NotificationType.ORDER_CANCELLED, cancelled);
    return cancelled;
  }

  async getOrder(orderId: string, requesterId: string): Promise<Order> {
    const order = await this.requireOrder(orderId);
    this.assertOwner(order, requesterId);
    return order;
  }

  /**
   * Catalog copy update from a stock-sync broadcast. A stale broadcast
   * leaves the catalog alone but is still recorded as processed.
   */
  async applyStockSync(notification: StockSyncNotification, guard: MessageGuard): Promise<boolean> {
    const applied = await this.deps.products.applyStockSync(notification, guard);
    if (!applied) {
      logger.info('Stale stock sync ignored', {
        productId: notification.productId,
        timestamp: notification.timestamp,
      });
      await this.deps.processedMessages.record(guard);
    }
    return applied;
  }

  private async onPaymentCompleted(order: Order): Promise<Order> {
    if (!CANCELLABLE_BY_USER.includes(order.status)) {
      logger.warn('Payment completed for an order no longer awaiting payment', { status: order.status });
      return order;
    }

    if (order.reservationId) {
      await this.deps.inventory.commit(order.reservationId);
    }

    let current = order;
    if (!order.shipmentId) {
      if (!order.warehouseId) {
        throw new ValidationError(`Order ${order.orderId} has no warehouse`, 'warehouseId');
      }

      const receipt = await this.deps.delivery.createShipment({
        orderId: order.orderId,
        warehouseId: order.warehouseId,
        productId: order.productId,
        quantity: order.quantity,
        recipientName: order.recipientName,
        recipientEmail: order.recipientEmail,
        deliveryAddress: order.deliveryAddress,
      });

      const result = await this.transition(
        order.orderId,
        OrderStatus.PROCESSING,
        { shipmentId: receipt.shipmentId, trackingNumber: receipt.trackingNumber },
        { from: CANCELLABLE_BY_USER, refresh: true }
      );
      current = result.order;
      logger.info('Shipment requested', { shipmentId: receipt.shipmentId, trackingNumber: receipt.trackingNumber });
    }

    if (current.status === OrderStatus.PROCESSING) {
      await this.notify(NotificationType.ORDER_CONFIRMATION, current);
    }
    return current;
  }

  /**
   * Read-check-write on the order under its version. A transition the fresh
   * status does not allow is skipped, or thrown with `reject`. Moving to the
   * status the order already has is a no-op unless `refresh` asks for the
   * extra fields to be written.
   */
  private async transition(
    orderId: string,
    to: OrderStatus,
    updates: OrderUpdate,
    options: TransitionOptions = {}
  ): Promise<TransitionResult> {
    return withOptimisticRetry(
      `order ${orderId}`,
      async () => {
        const current = await this.requireOrder(orderId);
        const startAllowed = !options.from || options.from.includes(current.status);

        if (startAllowed && current.status === to && !options.reject) {
          const hasUpdates = options.refresh && Object.values(updates).some((value) => value !== undefined);
          return {
            order: hasUpdates ? await this.deps.orders.update(current, updates) : current,
            changed: false,
          };
        }

        if (!startAllowed || !orderMachine.canTransition(current.status, to)) {
          if (options.reject) {
            throw new InvalidStateTransitionError('Order', current.status, to);
          }
          logger.info('Order transition skipped', { orderId, from: current.status, to });
          return { order: current, changed: false };
        }

        const updated = await this.deps.orders.update(current, { ...updates, status: to });
        logger.info('Order status changed', { orderId, from: current.status, to });
        return { order: updated, changed: true };
      },
      this.deps.retry
    );
  }

  /**
   * The order is in `status`, whether this call moved it there or a
   * redelivered event finds it there already. Follow-up messages are
   * idempotent, so they are published in both cases.
   */
  private reached(result: TransitionResult, status: OrderStatus, reason?: CancelReason): boolean {
    if (result.changed) {
      return true;
    }
    return result.order.status === status && (reason === undefined || result.order.cancelReason === reason);
  }

  private async publishRollback(
    orderId: string,
    productId: string,
    quantity: number,
    reservationId: string | undefined,
    reason: string
  ): Promise<void> {
    await this.deps.publisher.publish(QueueName.INVENTORY_ROLLBACK, {
      eventId: generateId(),
      orderId,
      productId,
      amount: quantity,
      reservationId,
      reason,
      timestamp: this.clock().toISOString(),
    });
  }

  private async publishCompensations(order: Order, reason: CancelReason): Promise<void> {
    await this.publishRollback(order.orderId, order.productId, order.quantity, order.reservationId, reason);
    await this.publishRefund(order, reason);
  }

  private async publishRefund(order: Order, reason: string): Promise<void> {
    await this.deps.publisher.publish(QueueName.PAYMENT_REFUND, {
      eventId: generateId(),
      orderId: order.orderId,
      reason,
      userId: order.userId,
      timestamp: this.clock().toISOString(),
    });
  }

  private async notify(type: NotificationType, order: Order, status?: ShipmentStatus): Promise<void> {
    await this.deps.publisher.publish(
      QueueName.NOTIFICATION,
      buildNotification(type, order, this.clock().toISOString(), status)
    );
  }

  private assertOwner(order: Order, requesterId: string): void {
    if (order.userId !== requesterId) {
      throw new AccessDeniedError(`Order ${order.orderId} belongs to another user`);
    }
  }

  private async requireOrder(orderId: string): Promise<Order> {
    const order = await this.deps.orders.getById(orderId);
    if (!order) {
      throw new NotFoundError('Order', orderId);
    }
    return order;
  }
}

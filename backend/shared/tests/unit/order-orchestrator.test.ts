import { ReserveRequest } from '../../src/services/inventory-ledger';
import { OrderOrchestrator } from '../../src/services/order-orchestrator';
import { ShipmentReceipt } from '../../src/services/service-clients';
import {
  CancelReason,
  NotificationType,
  OrderStatus,
  PaymentEventType,
  PaymentInstruction,
  PaymentStatus,
  QueueName,
  Reservation,
  ShipmentRequest,
  ShipmentStatus,
} from '../../src/types';
import {
  AccessDeniedError,
  InsufficientStockError,
  InvalidStateTransitionError,
  NotFoundError,
  RemoteTimeoutError,
} from '../../src/utils/errors';
import {
  InMemoryOrderStore,
  InMemoryProcessedMessageStore,
  InMemoryProductStore,
} from '../fakes/in-memory-stores';
import { RecordingPublisher } from '../fakes/recorders';
import {
  createMockOrder,
  createMockProduct,
  createMockReservation,
  mockShippingInfo,
  TEST_RETRY,
} from '../fixtures/test-data';

describe('OrderOrchestrator', () => {
  let processed: InMemoryProcessedMessageStore;
  let orders: InMemoryOrderStore;
  let products: InMemoryProductStore;
  let publisher: RecordingPublisher;
  let orchestrator: OrderOrchestrator;

  const inventory = {
    locateStock: jest.fn<Promise<string | null>, [string, number]>(),
    reserve: jest.fn<Promise<Reservation>, [ReserveRequest]>(),
    commit: jest.fn<Promise<boolean>, [string]>(),
  };
  const payment = {
    createInstruction: jest.fn<Promise<PaymentInstruction>, [{ orderId: string; amount: number; customerId: string }]>(),
  };
  const delivery = {
    createShipment: jest.fn<Promise<ShipmentReceipt>, [ShipmentRequest]>(),
  };

  const orderRequest = {
    userId: 'user-test-456',
    productId: 'prod-test-123',
    quantity: 2,
    shippingInfo: mockShippingInfo,
  };

  beforeEach(() => {
    jest.clearAllMocks();
    processed = new InMemoryProcessedMessageStore();
    orders = new InMemoryOrderStore();
    products = new InMemoryProductStore(processed);
    publisher = new RecordingPublisher();

    products.seed(createMockProduct());
    inventory.locateStock.mockResolvedValue('warehouse-1');
    inventory.reserve.mockImplementation(async (request) =>
      createMockReservation({ ...request, reservationId: `${request.orderId}#warehouse-1#prod-test-123` })
    );
    inventory.commit.mockResolvedValue(true);
    payment.createInstruction.mockImplementation(async (request) => ({
      orderId: request.orderId,
      paymentId: 'payment-1',
      billerCode: '93242',
      referenceNumber: `BP-${request.orderId}`,
      amount: request.amount,
      expiresAt: '2024-01-01T00:30:00.000Z',
      status: PaymentStatus.PENDING,
    }));
    delivery.createShipment.mockResolvedValue({
      shipmentId: 'SHIP-1',
      trackingNumber: 'TRK-0000AAAA',
      carrier: 'Express Freight',
      status: ShipmentStatus.SHIPMENT_CREATED,
      estimatedDelivery: '2024-01-05T00:00:00.000Z',
    });

    orchestrator = new OrderOrchestrator({
      orders,
      products,
      processedMessages: processed,
      inventory,
      payment,
      delivery,
      publisher,
      retry: TEST_RETRY,
      clock: () => new Date('2024-01-01T00:00:00.000Z'),
    });
  });

  describe('createOrder', () => {
    it('should reserve stock, issue a payment instruction and await payment', async () => {
      const order = await orchestrator.createOrder(orderRequest);

      expect(order).toMatchObject({
        status: OrderStatus.PROCESSING,
        unitPrice: 1999,
        totalAmount: 3998,
        warehouseId: 'warehouse-1',
        reservationId: `${order.orderId}#warehouse-1#prod-test-123`,
        billerCode: '93242',
        paymentReference: `BP-${order.orderId}`,
        paymentExpiresAt: '2024-01-01T00:30:00.000Z',
      });
      expect(inventory.reserve).toHaveBeenCalledWith({
        orderId: order.orderId,
        productId: 'prod-test-123',
        warehouseId: 'warehouse-1',
        quantity: 2,
      });
      expect(payment.createInstruction).toHaveBeenCalledWith({
        orderId: order.orderId,
        amount: 3998,
        customerId: 'user-test-456',
      });
      expect(publisher.published).toHaveLength(0);
    });

    it('should reject an unpublished product', async () => {
      products.seed(createMockProduct({ published: false }));

      await expect(orchestrator.createOrder(orderRequest)).rejects.toBeInstanceOf(NotFoundError);
      expect(inventory.locateStock).not.toHaveBeenCalled();
    });

    it('should reject the order when no warehouse can fill it', async () => {
      inventory.locateStock.mockResolvedValueOnce(null);

      await expect(orchestrator.createOrder(orderRequest)).rejects.toBeInstanceOf(InsufficientStockError);
      expect(inventory.reserve).not.toHaveBeenCalled();
      expect(orders.orders.size).toBe(0);
    });

    it('should not compensate a reservation the warehouse refused', async () => {
      inventory.reserve.mockRejectedValueOnce(new InsufficientStockError('prod-test-123', 2, 1));

      await expect(orchestrator.createOrder(orderRequest)).rejects.toBeInstanceOf(InsufficientStockError);
      expect(publisher.published).toHaveLength(0);
    });

    it('should publish a rollback when the reservation reply timed out', async () => {
      inventory.reserve.mockRejectedValueOnce(new RemoteTimeoutError('inventory', 3000));

      await expect(orchestrator.createOrder(orderRequest)).rejects.toBeInstanceOf(RemoteTimeoutError);

      const [rollback] = publisher.on(QueueName.INVENTORY_ROLLBACK);
      expect(rollback).toMatchObject({ productId: 'prod-test-123', amount: 2, reason: 'RESERVE_FAILED' });
      expect(orders.orders.size).toBe(0);
    });

    it('should cancel and compensate when the payment service is unavailable', async () => {
      payment.createInstruction.mockRejectedValueOnce(new RemoteTimeoutError('payment', 3000));

      const order = await orchestrator.createOrder(orderRequest);

      expect(order.status).toBe(OrderStatus.CANCELLED);
      expect(order.cancelReason).toBe(CancelReason.PAYMENT_UNAVAILABLE);
      expect(publisher.published.map((entry) => entry.queue)).toEqual([
        QueueName.INVENTORY_ROLLBACK,
        QueueName.PAYMENT_REFUND,
      ]);
      expect(publisher.on(QueueName.INVENTORY_ROLLBACK)[0]).toMatchObject({
        orderId: order.orderId,
        reservationId: order.reservationId,
        reason: 'PAYMENT_UNAVAILABLE',
      });
    });

    it('should return the cancelled order when its compensations cannot be queued, and queue them on cancel', async () => {
      payment.createInstruction.mockRejectedValueOnce(new RemoteTimeoutError('payment', 3000));
      publisher.failNext();

      const order = await orchestrator.createOrder(orderRequest);

      expect(order.status).toBe(OrderStatus.CANCELLED);
      expect(publisher.published).toHaveLength(0);

      await orchestrator.cancelOrder(order.orderId, 'user-test-456');

      expect(publisher.published.map((entry) => entry.queue)).toEqual([
        QueueName.INVENTORY_ROLLBACK,
        QueueName.PAYMENT_REFUND,
      ]);
      expect(publisher.on(QueueName.PAYMENT_REFUND)[0]).toMatchObject({
        orderId: order.orderId,
        reason: 'PAYMENT_UNAVAILABLE',
      });
    });
  });

  describe('handlePaymentWebhook', () => {
    const paid = {
      type: PaymentEventType.PAYMENT_COMPLETED,
      order_id: 'order-test-123',
      payment_id: 'payment-1',
      amount: 3998,
      paid_at: '2024-01-01T00:10:00.000Z',
    };

    beforeEach(async () => {
      await orders.create(createMockOrder({ status: OrderStatus.PROCESSING }));
    });

    it('should commit the reservation, request a shipment and confirm the order', async () => {
      const order = await orchestrator.handlePaymentWebhook(paid);

      expect(inventory.commit).toHaveBeenCalledWith('order-test-123#warehouse-1#prod-test-123');
      expect(delivery.createShipment).toHaveBeenCalledWith(
        expect.objectContaining({ orderId: 'order-test-123', warehouseId: 'warehouse-1', quantity: 2 })
      );
      expect(order).toMatchObject({
        status: OrderStatus.PROCESSING,
        shipmentId: 'SHIP-1',
        trackingNumber: 'TRK-0000AAAA',
      });
      expect(publisher.on(QueueName.NOTIFICATION)).toEqual([
        expect.objectContaining({
          eventId: 'ORDER_CONFIRMATION-order-test-123',
          type: NotificationType.ORDER_CONFIRMATION,
          recipient: 'customer@example.com',
        }),
      ]);
    });

    it('should not request a second shipment for a redelivered event', async () => {
      await orchestrator.handlePaymentWebhook(paid);
      await orchestrator.handlePaymentWebhook(paid);

      expect(delivery.createShipment).toHaveBeenCalledTimes(1);
      const notifications = publisher.on(QueueName.NOTIFICATION);
      expect(notifications.map((message) => message.eventId)).toEqual([
        'ORDER_CONFIRMATION-order-test-123',
        'ORDER_CONFIRMATION-order-test-123',
      ]);
    });

    it('should ignore a payment that arrives after the order was cancelled', async () => {
      await orchestrator.cancelOrder('order-test-123', 'user-test-456');
      publisher.drain();

      const order = await orchestrator.handlePaymentWebhook(paid);

      expect(order.status).toBe(OrderStatus.CANCELLED);
      expect(inventory.commit).not.toHaveBeenCalled();
      expect(publisher.published).toHaveLength(0);
    });

    it('should cancel the order and release stock when payment failed', async () => {
      const order = await orchestrator.handlePaymentWebhook({ ...paid, type: PaymentEventType.PAYMENT_FAILED });

      expect(order.status).toBe(OrderStatus.CANCELLED);
      expect(order.cancelReason).toBe(CancelReason.PAYMENT_FAILED);
      expect(publisher.published.map((entry) => entry.queue)).toEqual([
        QueueName.INVENTORY_ROLLBACK,
        QueueName.NOTIFICATION,
      ]);
    });

    it('should mark a cancelled order refunded', async () => {
      await orchestrator.cancelOrder('order-test-123', 'user-test-456');
      publisher.drain();

      const order = await orchestrator.handlePaymentWebhook({ ...paid, type: PaymentEventType.REFUND_COMPLETED });

      expect(order.status).toBe(OrderStatus.REFUNDED);
      expect(publisher.on(QueueName.NOTIFICATION)[0]).toMatchObject({ type: NotificationType.REFUND_CONFIRMATION });
    });

    it('should leave an active order alone on a refund event', async () => {
      const order = await orchestrator.handlePaymentWebhook({ ...paid, type: PaymentEventType.REFUND_COMPLETED });

      expect(order.status).toBe(OrderStatus.PROCESSING);
      expect(publisher.published).toHaveLength(0);
    });

    it('should do nothing for a processing event', async () => {
      const order = await orchestrator.handlePaymentWebhook({ ...paid, type: PaymentEventType.PAYMENT_PROCESSING });

      expect(order.version).toBe(0);
      expect(inventory.commit).not.toHaveBeenCalled();
    });

    it('should fail for an unknown order', async () => {
      await expect(
        orchestrator.handlePaymentWebhook({ ...paid, order_id: 'order-missing' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('handleDeliveryWebhook', () => {
    const event = { shipment_id: 'SHIP-1', status: ShipmentStatus.IN_TRANSIT, timestamp: '2024-01-02T00:00:00.000Z' };

    beforeEach(async () => {
      await orders.create(createMockOrder({ status: OrderStatus.PROCESSING, shipmentId: 'SHIP-1' }));
    });

    it('should follow the carrier status and notify the customer', async () => {
      const order = await orchestrator.handleDeliveryWebhook(event);

      expect(order.status).toBe(OrderStatus.DELIVERING);
      expect(publisher.on(QueueName.NOTIFICATION)[0]).toMatchObject({
        eventId: 'DELIVERY_UPDATE-order-test-123-IN_TRANSIT',
        type: NotificationType.DELIVERY_UPDATE,
      });
    });

    it('should ignore carrier statuses with no order counterpart', async () => {
      const order = await orchestrator.handleDeliveryWebhook({ ...event, status: ShipmentStatus.PROCESSING });

      expect(order.status).toBe(OrderStatus.PROCESSING);
      expect(publisher.published).toHaveLength(0);
    });

    it('should cancel, release stock and refund when the parcel is lost', async () => {
      const order = await orchestrator.handleDeliveryWebhook({ ...event, status: ShipmentStatus.LOST });

      expect(order.status).toBe(OrderStatus.CANCELLED);
      expect(order.cancelReason).toBe(CancelReason.SHIPMENT_LOST);
      expect(publisher.published.map((entry) => entry.queue)).toEqual([
        QueueName.INVENTORY_ROLLBACK,
        QueueName.PAYMENT_REFUND,
        QueueName.NOTIFICATION,
      ]);
    });

    it('should not move a delivered order backwards', async () => {
      await orchestrator.handleDeliveryWebhook({ ...event, status: ShipmentStatus.DELIVERED });
      publisher.drain();

      const order = await orchestrator.handleDeliveryWebhook(event);

      expect(order.status).toBe(OrderStatus.DELIVERED);
      expect(publisher.published).toHaveLength(0);
    });

    it('should fail for an unknown shipment', async () => {
      await expect(
        orchestrator.handleDeliveryWebhook({ ...event, shipment_id: 'SHIP-missing' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('cancelOrder', () => {
    beforeEach(async () => {
      await orders.create(createMockOrder({ status: OrderStatus.PENDING }));
    });

    it('should cancel, release stock, void payment and notify', async () => {
      const order = await orchestrator.cancelOrder('order-test-123', 'user-test-456');

      expect(order.status).toBe(OrderStatus.CANCELLED);
      expect(order.cancelReason).toBe(CancelReason.USER_CANCELLED);
      expect(publisher.published.map((entry) => entry.queue)).toEqual([
        QueueName.INVENTORY_ROLLBACK,
        QueueName.PAYMENT_REFUND,
        QueueName.NOTIFICATION,
      ]);
      expect(publisher.on(QueueName.PAYMENT_REFUND)[0]).toMatchObject({
        orderId: 'order-test-123',
        reason: 'USER_CANCELLED',
        userId: 'user-test-456',
      });
    });

    it('should refuse another user', async () => {
      await expect(orchestrator.cancelOrder('order-test-123', 'someone-else')).rejects.toBeInstanceOf(
        AccessDeniedError
      );
    });

    it('should publish the compensations again when a cancel is retried after the queue failed', async () => {
      publisher.failNext();

      await expect(orchestrator.cancelOrder('order-test-123', 'user-test-456')).rejects.toThrow(
        'queue unavailable'
      );
      expect((await orders.getById('order-test-123'))?.status).toBe(OrderStatus.CANCELLED);
      expect(publisher.published).toHaveLength(0);

      const order = await orchestrator.cancelOrder('order-test-123', 'user-test-456');

      expect(order.status).toBe(OrderStatus.CANCELLED);
      expect(order.version).toBe(1);
      expect(publisher.published.map((entry) => entry.queue)).toEqual([
        QueueName.INVENTORY_ROLLBACK,
        QueueName.PAYMENT_REFUND,
        QueueName.NOTIFICATION,
      ]);
      expect(publisher.on(QueueName.INVENTORY_ROLLBACK)[0]).toMatchObject({
        orderId: 'order-test-123',
        reservationId: 'order-test-123#warehouse-1#prod-test-123',
        reason: 'USER_CANCELLED',
      });
    });

    it('should refuse to cancel an order cancelled for a failed payment', async () => {
      await orders.create(
        createMockOrder({
          orderId: 'order-3',
          status: OrderStatus.CANCELLED,
          cancelReason: CancelReason.PAYMENT_FAILED,
        })
      );

      await expect(orchestrator.cancelOrder('order-3', 'user-test-456')).rejects.toBeInstanceOf(
        InvalidStateTransitionError
      );
      expect(publisher.published).toHaveLength(0);
    });

    it('should refuse an order already out for delivery', async () => {
      await orders.create(createMockOrder({ orderId: 'order-2', status: OrderStatus.DELIVERING }));

      await expect(orchestrator.cancelOrder('order-2', 'user-test-456')).rejects.toBeInstanceOf(
        InvalidStateTransitionError
      );
      expect(publisher.published).toHaveLength(0);
    });
  });

  describe('getOrder', () => {
    it('should only show an order to its owner', async () => {
      await orders.create(createMockOrder());

      await expect(orchestrator.getOrder('order-test-123', 'user-test-456')).resolves.toMatchObject({
        orderId: 'order-test-123',
      });
      await expect(orchestrator.getOrder('order-test-123', 'user-other')).rejects.toBeInstanceOf(AccessDeniedError);
    });
  });

  describe('applyStockSync', () => {
    const sync = {
      productId: 'prod-test-123',
      name: 'Test Product',
      price: 1999,
      stock: 7,
      published: true,
      timestamp: '2024-01-02T00:00:00.000Z',
    };
    const guard = { consumerName: 'stock-sync', messageId: 'evt-1' };

    it('should update the catalog copy', async () => {
      await expect(orchestrator.applyStockSync(sync, guard)).resolves.toBe(true);

      expect((await products.getById('prod-test-123'))?.stock).toBe(7);
      expect(processed.records.has('stock-sync#evt-1')).toBe(true);
    });

    it('should skip an older broadcast but still record it', async () => {
      await orchestrator.applyStockSync(sync, { consumerName: 'stock-sync', messageId: 'evt-0' });

      const stale = { ...sync, stock: 9, timestamp: '2024-01-01T12:00:00.000Z' };
      await expect(orchestrator.applyStockSync(stale, guard)).resolves.toBe(false);

      expect((await products.getById('prod-test-123'))?.stock).toBe(7);
      expect(processed.records.has('stock-sync#evt-1')).toBe(true);
    });
  });
});

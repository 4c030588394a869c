import { NotificationMessage, NotificationType, Order, ShipmentStatus } from '../types';

/**
 * E-mail content for order notifications.
 *
 * The eventId is derived from the order, the type and (for delivery updates)
 * the shipment status, so a notification enqueued twice is sent once.
 */

function formatAmount(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}

function describe(type: NotificationType, order: Order, status?: ShipmentStatus): { subject: string; body: string } {
  const greeting = `Hi ${order.recipientName},`;
  const ref = `#${order.orderId.toUpperCase()}`;

  switch (type) {
    case NotificationType.ORDER_CONFIRMATION:
      return {
        subject: `Order Confirmation - Order ${ref}`,
        body: [
          greeting,
          `We received your payment of ${formatAmount(order.totalAmount)} and your order is being prepared.`,
          order.trackingNumber ? `Tracking number: ${order.trackingNumber}` : '',
          `Delivering to: ${order.deliveryAddress}`,
        ]
          .filter(Boolean)
          .join('\n\n'),
      };

    case NotificationType.PAYMENT_FAILED:
      return {
        subject: `Payment Failed - Order ${ref}`,
        body: `${greeting}\n\nWe could not collect payment for your order, so it has been cancelled. No money was taken.`,
      };

    case NotificationType.REFUND_CONFIRMATION:
      return {
        subject: `Refund Processed - Order ${ref}`,
        body: `${greeting}\n\n${formatAmount(order.totalAmount)} has been returned to your account.`,
      };

    case NotificationType.ORDER_CANCELLED:
      return {
        subject: `Order Cancelled - Order ${ref}`,
        body: `${greeting}\n\nYour order has been cancelled. Any payment made will be refunded.`,
      };

    case NotificationType.DELIVERY_UPDATE:
      return {
        subject: `Delivery Update - Order ${ref}`,
        body:
          status === ShipmentStatus.LOST
            ? `${greeting}\n\nYour parcel was lost in transit. Your order has been cancelled and a refund is on its way.`
            : `${greeting}\n\nYour parcel is now ${(status ?? 'UPDATED').replace(/_/g, ' ').toLowerCase()}.`,
      };
  }
}

export function notificationId(type: NotificationType, orderId: string, status?: ShipmentStatus): string {
  return status ? `${type}-${orderId}-${status}` : `${type}-${orderId}`;
}

export function buildNotification(
  type: NotificationType,
  order: Order,
  timestamp: string,
  status?: ShipmentStatus
): NotificationMessage {
  const { subject, body } = describe(type, order, status);
  return {
    eventId: notificationId(type, order.orderId, status),
    type,
    orderId: order.orderId,
    recipient: order.recipientEmail,
    recipientName: order.recipientName,
    subject,
    body,
    timestamp,
  };
}

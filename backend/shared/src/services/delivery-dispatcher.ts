import { randomUUID } from 'crypto';
import { ShipmentStore } from '../repositories/stores';
import { DeliveryWebhookEvent, Shipment, ShipmentRequest, ShipmentStatus, WebhookEvent } from '../types';
import { AppConfig } from '../utils/config';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { OptimisticRetryOptions, withOptimisticRetry } from '../utils/optimistic-retry';
import { defineStateMachine } from '../utils/state-machine';
import {
  validatePositiveInteger,
  validateShippingInfo,
  validateStringLength,
} from '../utils/validators';
import { WebhookNotifier } from './webhook-registry';

export const shipmentMachine = defineStateMachine<ShipmentStatus>('Shipment', {
  [ShipmentStatus.SHIPMENT_CREATED]: [ShipmentStatus.PROCESSING, ShipmentStatus.LOST],
  [ShipmentStatus.PROCESSING]: [ShipmentStatus.PICKED_UP, ShipmentStatus.LOST],
  [ShipmentStatus.PICKED_UP]: [ShipmentStatus.IN_TRANSIT, ShipmentStatus.LOST],
  [ShipmentStatus.IN_TRANSIT]: [ShipmentStatus.DELIVERED, ShipmentStatus.LOST],
  [ShipmentStatus.DELIVERED]: [],
  [ShipmentStatus.LOST]: [],
});

const PROGRESS_STEP = 20;
const SIMULATION_BATCH = 20;

const PROGRESS_BY_STATUS: Record<ShipmentStatus, number> = {
  [ShipmentStatus.SHIPMENT_CREATED]: 0,
  [ShipmentStatus.PROCESSING]: 0,
  [ShipmentStatus.PICKED_UP]: PROGRESS_STEP,
  [ShipmentStatus.IN_TRANSIT]: 2 * PROGRESS_STEP,
  [ShipmentStatus.DELIVERED]: 100,
  [ShipmentStatus.LOST]: 0,
};

export interface DeliveryDispatcherDeps {
  shipments: ShipmentStore;
  webhooks: WebhookNotifier;
  config: AppConfig['delivery'];
  retry: OptimisticRetryOptions;
  clock?: () => Date;
  /** Uniform in [0, 1) */
  random?: () => number;
}

export interface SimulationReport {
  advanced: number;
  delivered: number;
  lost: number;
  failed: number;
}

interface Step {
  status: ShipmentStatus;
  progress: number;
}

export function buildTrackingNumber(): string {
  return `TRK-${randomUUID().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}

/**
 * Delivery Dispatcher
 * Carrier side: one shipment per order, moved along by status updates
 * or the simulation tick. Status changes reach the orchestrator through
 * DELIVERY_EVENT webhooks.
 */
export class DeliveryDispatcher {
  private readonly clock: () => Date;
  private readonly random: () => number;

  constructor(private readonly deps: DeliveryDispatcherDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  async createShipment(request: ShipmentRequest): Promise<Shipment> {
    const orderId = validateStringLength(request.orderId, 'orderId', 1);
    const warehouseId = validateStringLength(request.warehouseId, 'warehouseId', 1);
    const productId = validateStringLength(request.productId, 'productId', 1);
    const quantity = validatePositiveInteger(request.quantity, 'quantity');
    const shippingInfo = validateShippingInfo({ ...request });

    const existing = await this.deps.shipments.getByOrderId(orderId);
    if (existing) {
      logger.info('Shipment already exists for order', { orderId, shipmentId: existing.shipmentId });
      return existing;
    }

    const now = this.clock();
    const estimated = new Date(now.getTime() + this.deps.config.estimateDays * 24 * 60 * 60 * 1000);
    const shipment: Shipment = {
      shipmentId: `SHIP-${randomUUID()}`,
      orderId,
      trackingNumber: buildTrackingNumber(),
      carrier: this.deps.config.carrier,
      status: ShipmentStatus.SHIPMENT_CREATED,
      progress: 0,
      warehouseId,
      warehouseAddress: request.warehouseAddress,
      productId,
      quantity,
      ...shippingInfo,
      estimatedDelivery: estimated.toISOString(),
      version: 0,
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    };

    const created = await this.deps.shipments.create(shipment);
    if (!created) {
      return this.requireByOrder(orderId);
    }

    logger.info('Shipment created', {
      orderId,
      shipmentId: shipment.shipmentId,
      trackingNumber: shipment.trackingNumber,
      warehouseId,
    });
    return shipment;
  }

  /**
   * Move a shipment to `status`. Re-sending the current status changes nothing
   * and sends no webhook.
   */
  async updateStatus(shipmentId: string, status: ShipmentStatus): Promise<Shipment> {
    validateStringLength(shipmentId, 'shipmentId', 1);

    return this.advance(shipmentId, (shipment) => {
      if (shipment.status === status) {
        return null;
      }
      shipmentMachine.assertTransition(shipment.status, status);
      return { status, progress: PROGRESS_BY_STATUS[status] };
    });
  }

  async getShipment(shipmentId: string): Promise<Shipment> {
    const shipment = await this.deps.shipments.getByShipmentId(shipmentId);
    if (!shipment) {
      throw new NotFoundError('Shipment', shipmentId);
    }
    return shipment;
  }

  /**
   * One tick of the carrier simulation over the oldest shipments of each
   * active status. A shipment that fails to advance is logged and left for
   * the next tick.
   */
  async simulateProgress(): Promise<SimulationReport> {
    const report: SimulationReport = { advanced: 0, delivered: 0, lost: 0, failed: 0 };
    const active = [
      ShipmentStatus.SHIPMENT_CREATED,
      ShipmentStatus.PROCESSING,
      ShipmentStatus.PICKED_UP,
      ShipmentStatus.IN_TRANSIT,
    ];
    // one step per shipment per tick
    const seen = new Set<string>();

    for (const status of active) {
      const batch = await this.deps.shipments.listByStatus(status, SIMULATION_BATCH);

      for (const candidate of batch) {
        if (seen.has(candidate.shipmentId)) {
          continue;
        }
        seen.add(candidate.shipmentId);

        try {
          const updated = await this.advance(candidate.shipmentId, (shipment) =>
            shipment.status === status ? this.nextStep(shipment) : null
          );

          if (updated.status === ShipmentStatus.DELIVERED) report.delivered++;
          else if (updated.status === ShipmentStatus.LOST) report.lost++;
          else report.advanced++;
        } catch (error) {
          report.failed++;
          logger.error('Failed to advance shipment', error, { shipmentId: candidate.shipmentId });
        }
      }
    }

    logger.info('Delivery simulation tick finished', { ...report });
    return report;
  }

  private nextStep(shipment: Shipment): Step {
    switch (shipment.status) {
      case ShipmentStatus.SHIPMENT_CREATED:
        return { status: ShipmentStatus.PROCESSING, progress: 0 };

      case ShipmentStatus.PROCESSING:
        if (this.random() * 100 < this.deps.config.lossRatePercent) {
          logger.warn('Shipment lost at pick-up', {
            shipmentId: shipment.shipmentId,
            orderId: shipment.orderId,
            warehouseId: shipment.warehouseId,
          });
          return { status: ShipmentStatus.LOST, progress: 0 };
        }
        return { status: ShipmentStatus.PICKED_UP, progress: PROGRESS_STEP };

      case ShipmentStatus.PICKED_UP:
      case ShipmentStatus.IN_TRANSIT:
        if (shipment.progress >= 100) {
          return { status: ShipmentStatus.DELIVERED, progress: 100 };
        }
        return {
          status: ShipmentStatus.IN_TRANSIT,
          progress: Math.min(shipment.progress + PROGRESS_STEP, 100),
        };

      case ShipmentStatus.DELIVERED:
      case ShipmentStatus.LOST:
        return { status: shipment.status, progress: shipment.progress };
    }
  }

  /**
   * Read, decide and write under the version check. `decide` returning null
   * leaves the shipment as it is. The webhook goes out only when the status
   * actually changed.
   */
  private async advance(shipmentId: string, decide: (shipment: Shipment) => Step | null): Promise<Shipment> {
    const { shipment, previous } = await withOptimisticRetry(
      `shipment ${shipmentId}`,
      async () => {
        const current = await this.getShipment(shipmentId);
        const step = decide(current);
        if (!step || (step.status === current.status && step.progress === current.progress)) {
          return { shipment: current, previous: current.status };
        }

        const updated = await this.deps.shipments.update(current, {
          status: step.status,
          progress: step.progress,
          ...(step.status === ShipmentStatus.DELIVERED
            ? { actualDelivery: this.clock().toISOString() }
            : {}),
        });
        return { shipment: updated, previous: current.status };
      },
      this.deps.retry
    );

    if (shipment.status !== previous) {
      logger.info('Shipment status changed', {
        shipmentId,
        orderId: shipment.orderId,
        from: previous,
        to: shipment.status,
      });

      const event: DeliveryWebhookEvent = {
        shipment_id: shipment.shipmentId,
        status: shipment.status,
        timestamp: shipment.updatedAt,
      };
      await this.deps.webhooks.deliver(WebhookEvent.DELIVERY_EVENT, event);
    }

    return shipment;
  }

  private async requireByOrder(orderId: string): Promise<Shipment> {
    const shipment = await this.deps.shipments.getByOrderId(orderId);
    if (!shipment) {
      throw new NotFoundError('Shipment', orderId);
    }
    return shipment;
  }
}

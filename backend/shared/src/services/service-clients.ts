import axios, { AxiosInstance } from 'axios';
import {
  PaymentInstruction,
  PaymentStatus,
  Reservation,
  ReservationStatus,
  ShipmentRequest,
  ShipmentStatus,
  WebhookEvent,
} from '../types';
import {
  InsufficientStockError,
  NotFoundError,
  RemoteTimeoutError,
  TransientInfraError,
  ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import {
  asRecord,
  readEnum,
  readNumber,
  readOptionalString,
  readString,
  validateEnum,
} from '../utils/validators';

/**
 * Cross-service ports of the orchestrator and their HTTP clients.
 *
 * Every call has a bounded timeout. Failures are mapped onto the error
 * taxonomy so the saga can decide between compensation and rejection.
 */

export interface InventoryPort {
  locateStock(productId: string, quantity: number): Promise<string | null>;
  reserve(request: { orderId: string; productId: string; warehouseId: string; quantity: number }): Promise<Reservation>;
  commit(reservationId: string): Promise<boolean>;
}

export interface PaymentPort {
  createInstruction(request: { orderId: string; amount: number; customerId: string }): Promise<PaymentInstruction>;
}

export interface ShipmentReceipt {
  shipmentId: string;
  trackingNumber: string;
  carrier: string;
  status: ShipmentStatus;
  estimatedDelivery: string;
}

export interface DeliveryPort {
  createShipment(request: ShipmentRequest): Promise<ShipmentReceipt>;
}

export interface WebhookRegistrationPort {
  register(event: WebhookEvent, callbackUrl: string): Promise<void>;
}

export interface ClientOptions {
  baseURL: string;
  timeoutMs: number;
}

/**
 * Shared axios plumbing: one instance per remote service
 */
abstract class HttpServiceClient {
  protected readonly http: AxiosInstance;

  constructor(
    protected readonly service: string,
    private readonly options: ClientOptions
  ) {
    this.http = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  protected async post(path: string, body: object): Promise<Record<string, unknown>> {
    try {
      const response = await this.http.post<unknown>(path, body);
      return asRecord(response.data, `${this.service} response`);
    } catch (error) {
      throw this.mapError(error, path);
    }
  }

  private mapError(error: unknown, path: string): Error {
    if (error instanceof ValidationError) {
      return new TransientInfraError(`${this.service} sent an unreadable response`, error);
    }
    if (!axios.isAxiosError(error)) {
      return new TransientInfraError(`${this.service} call failed`, error);
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      logger.warn('Remote call timed out', { service: this.service, path, timeoutMs: this.options.timeoutMs });
      return new RemoteTimeoutError(this.service, this.options.timeoutMs);
    }

    const status = error.response?.status;
    const data: unknown = error.response?.data;
    const body: Record<string, unknown> =
      typeof data === 'object' && data !== null && !Array.isArray(data) ? asRecord(data, 'error') : {};
    const message = typeof body.error === 'string' ? body.error : error.message;

    if (status === 409 && body.code === 'INSUFFICIENT_STOCK') {
      const productId = typeof body.productId === 'string' ? body.productId : 'unknown';
      const requested = typeof body.requested === 'number' ? body.requested : 0;
      const available = typeof body.available === 'number' ? body.available : 0;
      return new InsufficientStockError(productId, requested, available);
    }
    if (status === 404) {
      return new NotFoundError(this.service, path);
    }
    if (status === 400) {
      return new ValidationError(message);
    }

    logger.warn('Remote call failed', { service: this.service, path, status, message });
    return new TransientInfraError(`${this.service} call failed`, error);
  }
}

export class InventoryClient extends HttpServiceClient implements InventoryPort {
  constructor(options: ClientOptions) {
    super('inventory', options);
  }

  async locateStock(productId: string, quantity: number): Promise<string | null> {
    const data = await this.post('/inventory/check', { productId, quantity });
    return readOptionalString(data, 'warehouseId') ?? null;
  }

  async reserve(request: {
    orderId: string;
    productId: string;
    warehouseId: string;
    quantity: number;
  }): Promise<Reservation> {
    const data = await this.post('/inventory/reserve', request);
    const reservation = asRecord(data.reservation, 'reservation');
    return {
      reservationId: readString(reservation, 'reservationId'),
      orderId: readString(reservation, 'orderId'),
      warehouseId: readString(reservation, 'warehouseId'),
      productId: readString(reservation, 'productId'),
      quantity: readNumber(reservation, 'quantity'),
      status: readEnum(reservation, 'status', ReservationStatus),
      createdAt: readString(reservation, 'createdAt'),
      committedAt: readOptionalString(reservation, 'committedAt'),
    };
  }

  async commit(reservationId: string): Promise<boolean> {
    const data = await this.post('/inventory/commit', { reservationId });
    return data.committed === true;
  }
}

export class PaymentClient extends HttpServiceClient implements PaymentPort {
  constructor(options: ClientOptions) {
    super('payment', options);
  }

  async createInstruction(request: {
    orderId: string;
    amount: number;
    customerId: string;
  }): Promise<PaymentInstruction> {
    const data = await this.post('/payments', request);
    return {
      orderId: readString(data, 'orderId'),
      paymentId: readString(data, 'paymentId'),
      billerCode: readString(data, 'billerCode'),
      referenceNumber: readString(data, 'referenceNumber'),
      amount: readNumber(data, 'amount'),
      expiresAt: readString(data, 'expiresAt'),
      status: validateEnum(data.status, PaymentStatus, 'status'),
    };
  }
}

export class DeliveryClient extends HttpServiceClient implements DeliveryPort {
  constructor(options: ClientOptions) {
    super('delivery', options);
  }

  async createShipment(request: ShipmentRequest): Promise<ShipmentReceipt> {
    const data = await this.post('/shipments', request);
    return {
      shipmentId: readString(data, 'shipmentId'),
      trackingNumber: readString(data, 'trackingNumber'),
      carrier: readString(data, 'carrier'),
      status: readEnum(data, 'status', ShipmentStatus),
      estimatedDelivery: readString(data, 'estimatedDelivery'),
    };
  }
}

export class WebhookRegistrationClient extends HttpServiceClient implements WebhookRegistrationPort {
  async register(event: WebhookEvent, callbackUrl: string): Promise<void> {
    await this.post('/webhooks/register', { event, callbackUrl });
  }
}

export interface SagaWebhookTargets {
  payment: WebhookRegistrationPort;
  delivery: WebhookRegistrationPort;
  orderServiceUrl: string;
}

/**
 * Point the payment and delivery services at the orchestrator's webhook
 * endpoints. Run at deploy time and on a schedule; a failed registration is
 * logged and picked up by the next run.
 */
export async function registerSagaWebhooks(targets: SagaWebhookTargets): Promise<{ payment: boolean; delivery: boolean }> {
  const base = targets.orderServiceUrl.replace(/\/+$/, '');

  const attempt = async (
    name: string,
    port: WebhookRegistrationPort,
    event: WebhookEvent,
    url: string
  ): Promise<boolean> => {
    try {
      await port.register(event, url);
      logger.info('Saga webhook registered', { service: name, event, url });
      return true;
    } catch (error) {
      logger.error('Saga webhook registration failed', error, { service: name, event, url });
      return false;
    }
  };

  return {
    payment: await attempt('payment', targets.payment, WebhookEvent.PAYMENT_EVENT, `${base}/webhooks/payment`),
    delivery: await attempt('delivery', targets.delivery, WebhookEvent.DELIVERY_EVENT, `${base}/webhooks/delivery`),
  };
}

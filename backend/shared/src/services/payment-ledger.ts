import {
  AccountStore,
  PaymentStore,
  ProcessedMessageStore,
  TransactionRecordStore,
} from '../repositories/stores';
import {
  Account,
  MessageGuard,
  Payment,
  PaymentEventType,
  PaymentInstruction,
  PaymentStatus,
  PaymentWebhookEvent,
  TransactionKind,
  TransactionRecord,
  TransactionStatus,
  WebhookEvent,
} from '../types';
import { AppConfig } from '../utils/config';
import { generateId } from '../utils/dynamodb-client';
import { InvalidStateTransitionError, NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { OptimisticRetryOptions, withOptimisticRetry } from '../utils/optimistic-retry';
import { defineStateMachine } from '../utils/state-machine';
import { validatePositiveInteger, validateStringLength } from '../utils/validators';
import { WebhookNotifier } from './webhook-registry';

/**
 * Payment Ledger
 * Issues bill-payment instructions, settles them against customer accounts
 * and performs refunds. Every status change is pushed to the registered
 * PAYMENT_EVENT webhook after it is stored.
 */

export const paymentMachine = defineStateMachine<PaymentStatus>('Payment', {
  [PaymentStatus.PENDING]: [PaymentStatus.PROCESSING, PaymentStatus.FAILED],
  [PaymentStatus.PROCESSING]: [PaymentStatus.COMPLETED, PaymentStatus.FAILED],
  [PaymentStatus.COMPLETED]: [PaymentStatus.REFUNDED],
  [PaymentStatus.FAILED]: [],
  [PaymentStatus.REFUNDED]: [],
});

export const REFERENCE_PREFIX = 'BP-';

export interface PaymentLedgerDeps {
  payments: PaymentStore;
  accounts: AccountStore;
  transactions: TransactionRecordStore;
  processedMessages: ProcessedMessageStore;
  webhooks: WebhookNotifier;
  config: AppConfig['payment'];
  retry: OptimisticRetryOptions;
  clock?: () => Date;
}

export interface InstructionRequest {
  orderId: string;
  amount: number;
  customerId: string;
}

export interface ConfirmRequest {
  referenceNumber: string;
  customerAccountId: string;
}

/**
 * NO_PAYMENT: nothing was ever charged. VOIDED: an unpaid instruction was
 * failed. ALREADY_SETTLED: the payment is FAILED or REFUNDED already.
 */
export type RefundOutcome = 'REFUNDED' | 'VOIDED' | 'NO_PAYMENT' | 'ALREADY_SETTLED';

export function buildReferenceNumber(orderId: string): string {
  return `${REFERENCE_PREFIX}${orderId}`;
}

function toInstruction(payment: Payment): PaymentInstruction {
  return {
    orderId: payment.orderId,
    paymentId: payment.paymentId,
    billerCode: payment.billerCode,
    referenceNumber: payment.referenceNumber,
    amount: payment.amount,
    expiresAt: payment.expiresAt,
    status: payment.status,
  };
}

export class PaymentLedger {
  private readonly clock: () => Date;

  constructor(private readonly deps: PaymentLedgerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Issue (or return the already issued) instruction for an order
   */
  async createInstruction(request: InstructionRequest): Promise<PaymentInstruction> {
    const orderId = validateStringLength(request.orderId, 'orderId', 1);
    const amount = validatePositiveInteger(request.amount, 'amount');
    const customerId = validateStringLength(request.customerId, 'customerId', 1);

    const existing = await this.deps.payments.getByOrderId(orderId);
    if (existing) {
      return this.reuseInstruction(existing, amount);
    }

    const now = this.clock();
    const expiresAt = new Date(now.getTime() + this.deps.config.instructionTtlMinutes * 60_000);
    const payment: Payment = {
      paymentId: generateId(),
      orderId,
      referenceNumber: buildReferenceNumber(orderId),
      billerCode: this.deps.config.billerCode,
      amount,
      customerId,
      status: PaymentStatus.PENDING,
      expiresAt: expiresAt.toISOString(),
      version: 0,
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    };

    const created = await this.deps.payments.create(payment);
    if (!created) {
      const stored = await this.requirePayment(orderId);
      return this.reuseInstruction(stored, amount);
    }

    logger.info('Payment instruction issued', {
      orderId,
      paymentId: payment.paymentId,
      referenceNumber: payment.referenceNumber,
      amount,
    });
    return toInstruction(payment);
  }

  /**
   * Customer pays an instruction from one of their accounts
   */
  async confirmPayment(request: ConfirmRequest): Promise<Payment> {
    const referenceNumber = validateStringLength(request.referenceNumber, 'referenceNumber', 4);
    const customerAccountId = validateStringLength(request.customerAccountId, 'customerAccountId', 1);

    if (!referenceNumber.startsWith(REFERENCE_PREFIX)) {
      throw new ValidationError('Unknown payment reference', 'referenceNumber', referenceNumber);
    }
    if (customerAccountId === this.deps.config.merchantAccountId) {
      throw new ValidationError('Cannot pay from the merchant account', 'customerAccountId', customerAccountId);
    }

    const orderId = referenceNumber.slice(REFERENCE_PREFIX.length);
    const payment = await this.requirePayment(orderId);

    if (payment.status === PaymentStatus.COMPLETED) {
      logger.info('Payment already completed', { orderId, paymentId: payment.paymentId });
      return payment;
    }

    if (payment.status === PaymentStatus.PENDING) {
      if (new Date(payment.expiresAt).getTime() <= this.clock().getTime()) {
        logger.warn('Payment instruction expired', { orderId, expiresAt: payment.expiresAt });
        return this.changeStatus(orderId, PaymentStatus.FAILED);
      }
      await this.changeStatus(orderId, PaymentStatus.PROCESSING);
    }

    return this.settlePayment(orderId, customerAccountId);
  }

  /**
   * Return the money of an order, or void its unpaid instruction.
   * Safe to repeat: a second request finds the payment settled.
   */
  async requestRefund(orderId: string, reason: string, guard?: MessageGuard): Promise<RefundOutcome> {
    validateStringLength(orderId, 'orderId', 1);

    const result = await withOptimisticRetry(
      `payment ${orderId}`,
      async (): Promise<{ outcome: RefundOutcome; payment?: Payment; record?: TransactionRecord }> => {
        const payment = await this.deps.payments.getByOrderId(orderId);
        if (!payment) {
          await this.recordGuard(guard);
          return { outcome: 'NO_PAYMENT' };
        }

        switch (payment.status) {
          case PaymentStatus.FAILED:
          case PaymentStatus.REFUNDED:
            await this.recordGuard(guard);
            return { outcome: 'ALREADY_SETTLED', payment };

          case PaymentStatus.PENDING:
          case PaymentStatus.PROCESSING: {
            const voided = await this.deps.payments.updateStatus(payment, PaymentStatus.FAILED, guard);
            return { outcome: 'VOIDED', payment: voided };
          }

          case PaymentStatus.COMPLETED: {
            const { refunded, record } = await this.refundTransfer(payment, reason, guard);
            return { outcome: 'REFUNDED', payment: refunded, record };
          }
        }
      },
      this.deps.retry
    );

    logger.info('Refund request handled', { orderId, reason, outcome: result.outcome });

    if (result.outcome === 'VOIDED' && result.payment) {
      await this.notify(PaymentEventType.PAYMENT_FAILED, result.payment);
    }
    if (result.outcome === 'REFUNDED' && result.payment) {
      await this.notify(PaymentEventType.REFUND_COMPLETED, result.payment, result.record);
    }

    return result.outcome;
  }

  async getPayment(orderId: string): Promise<Payment> {
    return this.requirePayment(orderId);
  }

  async getTransactions(orderId: string): Promise<TransactionRecord[]> {
    return this.deps.transactions.listByOrder(orderId);
  }

  private reuseInstruction(payment: Payment, amount: number): PaymentInstruction {
    if (payment.amount !== amount) {
      throw new ValidationError(
        `Order ${payment.orderId} already has an instruction for ${payment.amount}`,
        'amount',
        amount
      );
    }
    return toInstruction(payment);
  }

  /**
   * Status change with no money movement, then the webhook
   */
  private async changeStatus(orderId: string, status: PaymentStatus): Promise<Payment> {
    const updated = await withOptimisticRetry(
      `payment ${orderId}`,
      async () => {
        const payment = await this.requirePayment(orderId);
        if (payment.status === status) {
          return payment;
        }
        paymentMachine.assertTransition(payment.status, status);
        return this.deps.payments.updateStatus(payment, status);
      },
      this.deps.retry
    );

    const type =
      status === PaymentStatus.PROCESSING
        ? PaymentEventType.PAYMENT_PROCESSING
        : PaymentEventType.PAYMENT_FAILED;
    await this.notify(type, updated);
    return updated;
  }

  private async settlePayment(orderId: string, customerAccountId: string): Promise<Payment> {
    const settled = await withOptimisticRetry(
      `payment ${orderId}`,
      async () => {
        const payment = await this.requirePayment(orderId);
        if (payment.status !== PaymentStatus.PROCESSING) {
          throw new InvalidStateTransitionError('Payment', payment.status, PaymentStatus.COMPLETED);
        }

        const from = await this.requireAccount(customerAccountId);
        const to = await this.requireAccount(this.deps.config.merchantAccountId);

        if (from.balance < payment.amount) {
          logger.warn('Insufficient funds', {
            orderId,
            accountId: from.accountId,
            amount: payment.amount,
          });
          return this.deps.payments.updateStatus(payment, PaymentStatus.FAILED);
        }

        const record = this.buildRecord(payment, TransactionKind.PAYMENT, from, to, `Payment ${payment.referenceNumber}`);
        return this.deps.payments.settle({
          payment,
          status: PaymentStatus.COMPLETED,
          from,
          to,
          record,
        });
      },
      this.deps.retry
    );

    if (settled.status === PaymentStatus.COMPLETED) {
      logger.info('Payment completed', { orderId, paymentId: settled.paymentId, amount: settled.amount });
      await this.notify(PaymentEventType.PAYMENT_COMPLETED, settled);
    } else {
      await this.notify(PaymentEventType.PAYMENT_FAILED, settled);
    }
    return settled;
  }

  private async refundTransfer(
    payment: Payment,
    reason: string,
    guard?: MessageGuard
  ): Promise<{ refunded: Payment; record: TransactionRecord }> {
    if (!payment.transactionId) {
      throw new NotFoundError('TransactionRecord', `payment ${payment.paymentId}`);
    }
    const original = await this.deps.transactions.getById(payment.transactionId);
    if (!original) {
      throw new NotFoundError('TransactionRecord', payment.transactionId);
    }

    const merchant = await this.requireAccount(original.toAccountId);
    const customer = await this.requireAccount(original.fromAccountId);
    if (merchant.balance < original.amount) {
      throw new ValidationError(
        `Merchant account ${merchant.accountId} cannot cover refund of ${original.amount}`,
        'amount',
        original.amount
      );
    }

    const record = this.buildRecord(payment, TransactionKind.REFUND, merchant, customer, `Refund: ${reason}`);
    const refunded = await this.deps.payments.settle(
      {
        payment,
        status: PaymentStatus.REFUNDED,
        from: merchant,
        to: customer,
        record,
        supersedes: original,
      },
      guard
    );

    return { refunded, record };
  }

  private buildRecord(
    payment: Payment,
    kind: TransactionKind,
    from: Account,
    to: Account,
    memo: string
  ): TransactionRecord {
    const now = this.clock().toISOString();
    return {
      transactionId: generateId(),
      paymentId: payment.paymentId,
      orderId: payment.orderId,
      kind,
      fromAccountId: from.accountId,
      toAccountId: to.accountId,
      amount: payment.amount,
      memo,
      status: TransactionStatus.COMPLETED,
      createdAt: now,
      updatedAt: now,
    };
  }

  private async notify(type: PaymentEventType, payment: Payment, refund?: TransactionRecord): Promise<void> {
    const event: PaymentWebhookEvent = {
      type,
      order_id: payment.orderId,
      payment_id: payment.paymentId,
      amount: payment.amount,
      paid_at: payment.updatedAt,
      ...(refund ? { refund_id: refund.transactionId, refunded_at: refund.createdAt } : {}),
    };

    await this.deps.webhooks.deliver(WebhookEvent.PAYMENT_EVENT, event);
  }

  private async recordGuard(guard?: MessageGuard): Promise<void> {
    if (guard) {
      await this.deps.processedMessages.record(guard);
    }
  }

  private async requirePayment(orderId: string): Promise<Payment> {
    const payment = await this.deps.payments.getByOrderId(orderId);
    if (!payment) {
      throw new NotFoundError('Payment', orderId);
    }
    return payment;
  }

  private async requireAccount(accountId: string): Promise<Account> {
    const account = await this.deps.accounts.get(accountId);
    if (!account) {
      throw new NotFoundError('Account', accountId);
    }
    return account;
  }
}

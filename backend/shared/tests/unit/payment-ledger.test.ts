import { PaymentLedger } from '../../src/services/payment-ledger';
import {
  PaymentEventType,
  PaymentStatus,
  TransactionKind,
  TransactionStatus,
  WebhookEvent,
} from '../../src/types';
import { NotFoundError, ValidationError } from '../../src/utils/errors';
import {
  InMemoryAccountStore,
  InMemoryPaymentStore,
  InMemoryProcessedMessageStore,
  InMemoryTransactionRecordStore,
} from '../fakes/in-memory-stores';
import { RecordingWebhooks } from '../fakes/recorders';
import { createMockAccount, createMockPayment, TEST_RETRY, testConfig } from '../fixtures/test-data';

function eventTypes(webhooks: RecordingWebhooks): unknown[] {
  return webhooks.sent.map((entry) => {
    expect(entry.event).toBe(WebhookEvent.PAYMENT_EVENT);
    return 'type' in entry.payload ? entry.payload.type : undefined;
  });
}

describe('PaymentLedger', () => {
  let now: Date;
  let processed: InMemoryProcessedMessageStore;
  let accounts: InMemoryAccountStore;
  let transactions: InMemoryTransactionRecordStore;
  let payments: InMemoryPaymentStore;
  let webhooks: RecordingWebhooks;
  let ledger: PaymentLedger;

  const instruction = { orderId: 'order-1', amount: 3998, customerId: 'user-1' };

  beforeEach(() => {
    now = new Date('2024-01-01T00:00:00.000Z');
    processed = new InMemoryProcessedMessageStore();
    accounts = new InMemoryAccountStore();
    transactions = new InMemoryTransactionRecordStore();
    payments = new InMemoryPaymentStore(accounts, transactions, processed);
    webhooks = new RecordingWebhooks();

    accounts.seed(createMockAccount({ accountId: 'acct-customer-1', balance: 10000 }));
    accounts.seed(createMockAccount({ accountId: 'merchant-store', ownerName: 'Store', balance: 0 }));

    ledger = new PaymentLedger({
      payments,
      accounts,
      transactions,
      processedMessages: processed,
      webhooks,
      config: testConfig.payment,
      retry: TEST_RETRY,
      clock: () => now,
    });
  });

  describe('createInstruction', () => {
    it('should issue a pending instruction that expires after the configured window', async () => {
      const result = await ledger.createInstruction(instruction);

      expect(result).toMatchObject({
        orderId: 'order-1',
        billerCode: '93242',
        referenceNumber: 'BP-order-1',
        amount: 3998,
        status: PaymentStatus.PENDING,
        expiresAt: '2024-01-01T00:30:00.000Z',
      });
    });

    it('should return the same instruction when asked again', async () => {
      const first = await ledger.createInstruction(instruction);
      const second = await ledger.createInstruction(instruction);

      expect(second.paymentId).toBe(first.paymentId);
      expect(payments.payments.size).toBe(1);
    });

    it('should refuse a second instruction for a different amount', async () => {
      await ledger.createInstruction(instruction);

      await expect(ledger.createInstruction({ ...instruction, amount: 1 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject a non-positive amount', async () => {
      await expect(ledger.createInstruction({ ...instruction, amount: 0 })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('confirmPayment', () => {
    const confirm = { referenceNumber: 'BP-order-1', customerAccountId: 'acct-customer-1' };

    beforeEach(async () => {
      await ledger.createInstruction(instruction);
    });

    it('should move the money and report PROCESSING then COMPLETED', async () => {
      const payment = await ledger.confirmPayment(confirm);

      expect(payment.status).toBe(PaymentStatus.COMPLETED);
      expect(payment.customerAccountId).toBe('acct-customer-1');
      expect(accounts.balanceOf('acct-customer-1')).toBe(6002);
      expect(accounts.balanceOf('merchant-store')).toBe(3998);
      expect(eventTypes(webhooks)).toEqual([
        PaymentEventType.PAYMENT_PROCESSING,
        PaymentEventType.PAYMENT_COMPLETED,
      ]);

      const [record] = await ledger.getTransactions('order-1');
      expect(record).toMatchObject({
        kind: TransactionKind.PAYMENT,
        fromAccountId: 'acct-customer-1',
        toAccountId: 'merchant-store',
        amount: 3998,
        status: TransactionStatus.COMPLETED,
      });
    });

    it('should not charge twice for a repeated confirmation', async () => {
      await ledger.confirmPayment(confirm);
      webhooks.drain();

      const again = await ledger.confirmPayment(confirm);

      expect(again.status).toBe(PaymentStatus.COMPLETED);
      expect(accounts.balanceOf('acct-customer-1')).toBe(6002);
      expect(webhooks.sent).toHaveLength(0);
    });

    it('should fail the payment when the account cannot cover it', async () => {
      accounts.seed(createMockAccount({ accountId: 'acct-poor', balance: 1000 }));

      const payment = await ledger.confirmPayment({ ...confirm, customerAccountId: 'acct-poor' });

      expect(payment.status).toBe(PaymentStatus.FAILED);
      expect(accounts.balanceOf('acct-poor')).toBe(1000);
      expect(eventTypes(webhooks)).toEqual([
        PaymentEventType.PAYMENT_PROCESSING,
        PaymentEventType.PAYMENT_FAILED,
      ]);
    });

    it('should fail an instruction that has expired', async () => {
      now = new Date('2024-01-01T00:30:00.000Z');

      const payment = await ledger.confirmPayment(confirm);

      expect(payment.status).toBe(PaymentStatus.FAILED);
      expect(accounts.balanceOf('acct-customer-1')).toBe(10000);
      expect(eventTypes(webhooks)).toEqual([PaymentEventType.PAYMENT_FAILED]);
    });

    it('should refuse payment from the merchant account', async () => {
      await expect(
        ledger.confirmPayment({ ...confirm, customerAccountId: 'merchant-store' })
      ).rejects.toThrow('Cannot pay from the merchant account');
    });

    it('should refuse a reference without the biller prefix', async () => {
      await expect(
        ledger.confirmPayment({ ...confirm, referenceNumber: 'XX-order-1' })
      ).rejects.toThrow('Unknown payment reference');
    });

    it('should fail for an unknown account', async () => {
      await expect(
        ledger.confirmPayment({ ...confirm, customerAccountId: 'acct-missing' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('requestRefund', () => {
    const guard = { consumerName: 'payment-refund', messageId: 'evt-7' };

    it('should reverse a completed payment and mark the transfer refunded', async () => {
      await ledger.createInstruction(instruction);
      await ledger.confirmPayment({ referenceNumber: 'BP-order-1', customerAccountId: 'acct-customer-1' });
      webhooks.drain();

      await expect(ledger.requestRefund('order-1', 'Order cancelled', guard)).resolves.toBe('REFUNDED');

      expect(accounts.balanceOf('acct-customer-1')).toBe(10000);
      expect(accounts.balanceOf('merchant-store')).toBe(0);
      expect((await ledger.getPayment('order-1')).status).toBe(PaymentStatus.REFUNDED);
      expect(processed.records.has('payment-refund#evt-7')).toBe(true);

      const records = await ledger.getTransactions('order-1');
      expect(records.map((r) => [r.kind, r.status])).toEqual([
        [TransactionKind.PAYMENT, TransactionStatus.REFUNDED],
        [TransactionKind.REFUND, TransactionStatus.COMPLETED],
      ]);
      expect(records[1].memo).toBe('Refund: Order cancelled');

      const [sent] = webhooks.sent;
      expect(sent.payload).toMatchObject({
        type: PaymentEventType.REFUND_COMPLETED,
        order_id: 'order-1',
        refund_id: records[1].transactionId,
      });
    });

    it('should report a second refund as already settled', async () => {
      await ledger.createInstruction(instruction);
      await ledger.confirmPayment({ referenceNumber: 'BP-order-1', customerAccountId: 'acct-customer-1' });
      await ledger.requestRefund('order-1', 'Order cancelled');

      await expect(ledger.requestRefund('order-1', 'Order cancelled')).resolves.toBe('ALREADY_SETTLED');
      expect(accounts.balanceOf('acct-customer-1')).toBe(10000);
    });

    it('should void an unpaid instruction', async () => {
      await ledger.createInstruction(instruction);

      await expect(ledger.requestRefund('order-1', 'Order cancelled')).resolves.toBe('VOIDED');

      expect((await ledger.getPayment('order-1')).status).toBe(PaymentStatus.FAILED);
      expect(eventTypes(webhooks)).toEqual([PaymentEventType.PAYMENT_FAILED]);
    });

    it('should record the guard when no payment exists', async () => {
      await expect(ledger.requestRefund('order-none', 'Order cancelled', guard)).resolves.toBe('NO_PAYMENT');

      expect(processed.records.has('payment-refund#evt-7')).toBe(true);
      expect(webhooks.sent).toHaveLength(0);
    });

    it('should refuse a refund the merchant account cannot cover', async () => {
      payments.seed(
        createMockPayment({ orderId: 'order-1', status: PaymentStatus.COMPLETED, transactionId: 'txn-1' })
      );
      transactions.records.set('txn-1', {
        transactionId: 'txn-1',
        paymentId: 'payment-test-789',
        orderId: 'order-1',
        kind: TransactionKind.PAYMENT,
        fromAccountId: 'acct-customer-1',
        toAccountId: 'merchant-store',
        amount: 3998,
        memo: 'Payment BP-order-1',
        status: TransactionStatus.COMPLETED,
        createdAt: '2024-01-01T00:00:00.000Z',
        updatedAt: '2024-01-01T00:00:00.000Z',
      });

      await expect(ledger.requestRefund('order-1', 'Order cancelled')).rejects.toBeInstanceOf(ValidationError);
    });
  });
});

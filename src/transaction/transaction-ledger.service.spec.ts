import { Test, TestingModule } from '@nestjs/testing';
import { PurchaseInput, TransactionLedgerService } from './transaction-ledger.service';
import { ContributionLedgerService } from '../contribution/contribution-ledger.service';
import { MemberRegistry } from '../contribution/member-registry.service';
import { LedgerStore } from '../storage/ledger.store';
import { InMemoryLedgerStore } from '../storage/in-memory-ledger.store';
import { POOL_CONFIG, loadPoolConfig } from '../config/pool.config';
import { InsufficientBalanceError, ValidationError } from '../common/errors/ledger.errors';
import { createPurchaseRecord } from './entities/transaction-record.entity';

describe('TransactionLedgerService', () => {
  let service: TransactionLedgerService;
  let contributions: ContributionLedgerService;
  let store: InMemoryLedgerStore;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TransactionLedgerService,
        ContributionLedgerService,
        MemberRegistry,
        { provide: LedgerStore, useClass: InMemoryLedgerStore },
        { provide: POOL_CONFIG, useValue: loadPoolConfig({ MEMBERS: 'alice,bob', STORAGE_DRIVER: 'memory' }) },
      ],
    }).compile();

    service = module.get<TransactionLedgerService>(TransactionLedgerService);
    contributions = module.get<ContributionLedgerService>(ContributionLedgerService);
    store = module.get<InMemoryLedgerStore>(LedgerStore);
  });

  afterEach(() => {
    store.clear();
    jest.useRealTimers();
  });

  describe('recordPurchase', () => {
    beforeEach(() => {
      contributions.recordContribution('alice', 500);
      contributions.recordContribution('bob', 500);
    });

    it('should record a purchase with its total cost', () => {
      const record = service.recordPurchase({ asset: 'BTC', unitAmount: 0.001, unitPrice: 90000, fee: 10 });

      expect(record.asset).toBe('BTC');
      expect(record.kind).toBe('buy');
      expect(record.totalCost.toNumber()).toBe(100);
      expect(record.fee.toNumber()).toBe(10);
      expect(Object.isFrozen(record)).toBe(true);
    });

    it('should normalize the asset symbol', () => {
      const record = service.recordPurchase({ asset: '  eth ', unitAmount: 0.01, unitPrice: 5000 });

      expect(record.asset).toBe('ETH');
      expect(service.history()[0].asset).toBe('ETH');
    });

    it('should default the fee to zero and drop blank notes', () => {
      const record = service.recordPurchase({ asset: 'ETH', unitAmount: 1, unitPrice: 100, notes: '   ' });

      expect(record.fee.toNumber()).toBe(0);
      expect(record.totalCost.toNumber()).toBe(100);
      expect(record.notes).toBeUndefined();
    });

    it('should keep trimmed notes and a backdated purchase date', () => {
      const occurredAt = new Date(2023, 11, 24);
      const record = service.recordPurchase({
        asset: 'BTC',
        unitAmount: 0.001,
        unitPrice: 90000,
        occurredAt,
        notes: ' bought on exchange A ',
      });

      expect(record.notes).toBe('bought on exchange A');
      expect(record.occurredAt).toEqual(occurredAt);
    });

    it('should decrease the available balance by exactly the total cost', () => {
      const before = service.availableBalance();
      const record = service.recordPurchase({ asset: 'BTC', unitAmount: 0.0031, unitPrice: 97123.45, fee: 1.99 });

      expect(before.minus(service.availableBalance()).equals(record.totalCost)).toBe(true);
      expect(service.availableBalance().toString()).toBe('696.927305');
    });

    it('should increment holdings by the unit amount', () => {
      service.recordPurchase({ asset: 'BTC', unitAmount: 0.001, unitPrice: 90000 });

      expect(store.loadHoldings().BTC.toString()).toBe('0.001');
    });

    it('should accumulate holdings exactly across purchases', () => {
      for (const unitAmount of [0.1, 0.2, 0.3]) {
        service.recordPurchase({ asset: 'ETH', unitAmount, unitPrice: 100 });
      }

      expect(store.loadHoldings().ETH.toString()).toBe('0.6');
    });

    it('should allow spending the exact available balance', () => {
      service.recordPurchase({ asset: 'BTC', unitAmount: 0.01, unitPrice: 99000, fee: 10 });

      expect(service.availableBalance().toNumber()).toBe(0);
    });
  });

  describe('insufficient balance', () => {
    it('should reject a purchase costing more than the balance and change nothing', () => {
      contributions.recordContribution('alice', 90);

      expect(() => service.recordPurchase({ asset: 'BTC', unitAmount: 0.001, unitPrice: 90000, fee: 10 })).toThrow(
        InsufficientBalanceError,
      );
      expect(service.availableBalance().toNumber()).toBe(90);
      expect(store.loadTransactions()).toHaveLength(0);
      expect(store.loadHoldings()).toEqual({});
    });

    it('should report the required and available amounts', () => {
      contributions.recordContribution('alice', 90);

      let caught: unknown;
      try {
        service.recordPurchase({ asset: 'BTC', unitAmount: 0.001, unitPrice: 90000, fee: 10 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InsufficientBalanceError);
      if (caught instanceof InsufficientBalanceError) {
        expect(caught.required.toNumber()).toBe(100);
        expect(caught.available.toNumber()).toBe(90);
      }
    });

    it('should count earlier purchases against the balance', () => {
      contributions.recordContribution('bob', 150);
      service.recordPurchase({ asset: 'ETH', unitAmount: 1, unitPrice: 100 });

      expect(() => service.recordPurchase({ asset: 'ETH', unitAmount: 1, unitPrice: 60 })).toThrow(
        InsufficientBalanceError,
      );
      expect(service.availableBalance().toNumber()).toBe(50);
    });
  });

  describe('validation', () => {
    beforeEach(() => {
      contributions.recordContribution('alice', 1000);
    });

    const invalidPurchases: Array<[string, PurchaseInput]> = [
      ['empty asset', { asset: '   ', unitAmount: 1, unitPrice: 1 }],
      ['zero amount', { asset: 'BTC', unitAmount: 0, unitPrice: 1 }],
      ['negative price', { asset: 'BTC', unitAmount: 1, unitPrice: -1 }],
      ['negative fee', { asset: 'BTC', unitAmount: 1, unitPrice: 1, fee: -0.01 }],
    ];

    it.each(invalidPurchases)('should reject %s without changing state', (_label, input) => {
      expect(() => service.recordPurchase(input)).toThrow(ValidationError);
      expect(store.loadTransactions()).toHaveLength(0);
      expect(service.availableBalance().toNumber()).toBe(1000);
    });
  });

  describe('availableBalance', () => {
    it('should not clamp a negative balance', () => {
      contributions.recordContribution('alice', 50);
      store.saveTransactions([createPurchaseRecord({ asset: 'BTC', unitAmount: 1, unitPrice: 100 })]);

      expect(service.availableBalance().toNumber()).toBe(-50);
    });
  });

  describe('history', () => {
    beforeEach(() => {
      contributions.recordContribution('alice', 1000);
      jest.useFakeTimers();
      jest.setSystemTime(new Date(2024, 4, 1, 12));
      service.recordPurchase({ asset: 'BTC', unitAmount: 0.001, unitPrice: 90000, occurredAt: new Date(2024, 3, 20) });
      jest.setSystemTime(new Date(2024, 4, 2, 12));
      service.recordPurchase({ asset: 'ETH', unitAmount: 0.01, unitPrice: 5000, occurredAt: new Date(2024, 3, 10) });
      jest.setSystemTime(new Date(2024, 4, 3, 12));
      service.recordPurchase({ asset: 'BTC', unitAmount: 0.002, unitPrice: 91000, occurredAt: new Date(2024, 4, 3) });
    });

    it('should default to newest recorded first', () => {
      expect(service.history().map((r) => r.unitPrice.toNumber())).toEqual([91000, 5000, 90000]);
    });

    it('should sort chronologically by purchase date', () => {
      const history = service.history({ sortBy: 'occurredAt', order: 'asc' });
      expect(history.map((r) => r.asset)).toEqual(['ETH', 'BTC', 'BTC']);
    });

    it('should filter by asset case-insensitively', () => {
      expect(service.history({ asset: 'btc' })).toHaveLength(2);
    });

    it('should return a fresh copy each call', () => {
      const first = service.history();
      first.pop();

      expect(service.history()).toHaveLength(3);
    });
  });
});

import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { PortfolioQueryService } from './portfolio-query.service';
import { ContributionLedgerService } from '../contribution/contribution-ledger.service';
import { MemberRegistry } from '../contribution/member-registry.service';
import { TransactionLedgerService } from '../transaction/transaction-ledger.service';
import { LedgerStore } from '../storage/ledger.store';
import { InMemoryLedgerStore } from '../storage/in-memory-ledger.store';
import { POOL_CONFIG, loadPoolConfig } from '../config/pool.config';
import { createPriceSnapshot } from '../market-price/entities/price-snapshot.entity';
import { createPurchaseRecord } from '../transaction/entities/transaction-record.entity';

describe('PortfolioQueryService', () => {
  let queryService: PortfolioQueryService;
  let contributions: ContributionLedgerService;
  let transactions: TransactionLedgerService;
  let store: InMemoryLedgerStore;

  const snapshot = createPriceSnapshot({ BTC: 120000, ETH: 6000 });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PortfolioQueryService,
        ContributionLedgerService,
        TransactionLedgerService,
        MemberRegistry,
        { provide: LedgerStore, useClass: InMemoryLedgerStore },
        { provide: POOL_CONFIG, useValue: loadPoolConfig({ MEMBERS: 'alice,bob', STORAGE_DRIVER: 'memory' }) },
      ],
    }).compile();

    queryService = module.get<PortfolioQueryService>(PortfolioQueryService);
    contributions = module.get<ContributionLedgerService>(ContributionLedgerService);
    transactions = module.get<TransactionLedgerService>(TransactionLedgerService);
    store = module.get<InMemoryLedgerStore>(LedgerStore);
  });

  afterEach(() => {
    store.clear();
  });

  const seedPortfolio = () => {
    contributions.recordContribution('alice', 2000);
    contributions.recordContribution('bob', 2000);
    transactions.recordPurchase({ asset: 'BTC', unitAmount: 0.01, unitPrice: 95000, fee: 50 });
    transactions.recordPurchase({ asset: 'ETH', unitAmount: 0.5, unitPrice: 5000 });
  };

  describe('holdings', () => {
    it('should be empty initially', () => {
      expect(queryService.holdings()).toEqual({});
    });

    it('should return a copy that callers cannot use to mutate holdings', () => {
      seedPortfolio();
      const holdings = queryService.holdings();
      holdings.BTC = new Decimal(99);

      expect(queryService.holdings().BTC.toString()).toBe('0.01');
    });
  });

  describe('portfolioValue', () => {
    it('should be zero with no holdings', () => {
      const valuation = queryService.portfolioValue(snapshot);
      expect(valuation.value.toNumber()).toBe(0);
      expect(valuation.unpricedAssets).toEqual([]);
    });

    it('should value every holding at snapshot prices', () => {
      seedPortfolio();

      expect(queryService.portfolioValue(snapshot).value.toNumber()).toBe(4200);
    });

    it('should flag held assets missing from the snapshot', () => {
      seedPortfolio();
      transactions.recordPurchase({ asset: 'ADA', unitAmount: 100, unitPrice: 1 });

      const valuation = queryService.portfolioValue(snapshot);
      expect(valuation.value.toNumber()).toBe(4200);
      expect(valuation.unpricedAssets).toEqual(['ADA']);
    });
  });

  describe('getHoldings', () => {
    it('should list positions sorted by asset with a null price when unpriced', () => {
      seedPortfolio();
      transactions.recordPurchase({ asset: 'ADA', unitAmount: 100, unitPrice: 1 });

      const response = queryService.getHoldings(snapshot);

      expect(response.positions).toEqual([
        { asset: 'ADA', quantity: 100, price: null, value: 0 },
        { asset: 'BTC', quantity: 0.01, price: 120000, value: 1200 },
        { asset: 'ETH', quantity: 0.5, price: 6000, value: 3000 },
      ]);
      expect(response.totalValue).toBe(4200);
      expect(response.pricesStale).toBe(false);
    });
  });

  describe('getOverview', () => {
    it('should report totals and gain against contributions and against cost', () => {
      seedPortfolio();

      expect(queryService.getOverview(snapshot)).toEqual({
        totalContributed: 4000,
        totalSpent: 3500,
        availableBalance: 500,
        portfolioValue: 4200,
        gainLoss: 200,
        gainLossPct: 5,
        gainOnSpent: 700,
        gainOnSpentPct: 20,
        pricesStale: false,
        unpricedAssets: [],
        anomalies: [],
      });
    });

    it('should count unspent contributions against the gain', () => {
      contributions.recordContribution('alice', 100);

      const overview = queryService.getOverview(snapshot);
      expect(overview.gainLoss).toBe(-100);
      expect(overview.gainLossPct).toBe(-100);
      expect(overview.gainOnSpent).toBe(0);
      expect(overview.gainOnSpentPct).toBe(0);
    });

    it('should report zero gain percentages while the pool is empty', () => {
      const overview = queryService.getOverview(snapshot);
      expect(overview.gainLoss).toBe(0);
      expect(overview.gainLossPct).toBe(0);
    });

    it('should flag a negative available balance', () => {
      contributions.recordContribution('alice', 50);
      store.saveTransactions([createPurchaseRecord({ asset: 'ETH', unitAmount: 1, unitPrice: 100 })]);
      store.saveHoldings({ ETH: new Decimal(1) });

      const overview = queryService.getOverview(snapshot);
      expect(overview.availableBalance).toBe(-50);
      expect(overview.anomalies).toEqual(['Available balance is negative: -50']);
    });

    it('should flag holdings that drifted from the purchase records', () => {
      store.saveHoldings({ BTC: new Decimal('0.5') });

      expect(queryService.getOverview(snapshot).anomalies).toEqual([
        'Holdings for BTC (0.5) do not match purchases (0)',
      ]);
    });
  });

  describe('findHoldingsDiscrepancies', () => {
    it('should find none when holdings come from purchases', () => {
      seedPortfolio();
      expect(queryService.findHoldingsDiscrepancies()).toEqual([]);
    });
  });
});

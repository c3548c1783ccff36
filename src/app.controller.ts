import { Controller, Get, Inject } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { POOL_CONFIG, PoolConfig } from './config/pool.config';

@Controller()
export class AppController {
  constructor(@Inject(POOL_CONFIG) private readonly config: PoolConfig) {}

  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'crypto-pool-ledger',
      storage: this.config.storageDriver,
      members: this.config.members.length,
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Crypto Pool Ledger API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        contributions: '/contributions',
        ownership: '/contributions/ownership',
        purchases: '/transactions/purchases',
        transactions: '/transactions',
        balance: '/transactions/balance',
        overview: '/portfolio/overview',
        holdings: '/portfolio/holdings',
        equity: '/portfolio/equity',
        prices: '/portfolio/prices',
        roi: '/analytics/roi',
        weekly: '/analytics/weekly',
        streaks: '/analytics/streaks',
        heatmap: '/analytics/heatmap',
        trend: '/analytics/trend',
        summary: '/analytics/summary',
      },
    };
  }
}

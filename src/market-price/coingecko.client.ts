import { Inject, Injectable } from '@nestjs/common';
import axios from 'axios';
import { z } from 'zod';
import { POOL_CONFIG, PoolConfig } from '../config/pool.config';

// simple/price response: { bitcoin: { aud: 97500 }, ethereum: { aud: 5250 } }
const spotPriceResponseSchema = z.record(z.record(z.number()));

export type SpotPriceResponse = z.infer<typeof spotPriceResponseSchema>;

export class OracleUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OracleUnavailableError';
  }
}

/**
 * Thin HTTP client for the CoinGecko simple price endpoint.
 * Every failure (network, timeout, HTTP status, unexpected body) surfaces as OracleUnavailableError.
 */
@Injectable()
export class CoinGeckoClient {
  constructor(@Inject(POOL_CONFIG) private readonly config: PoolConfig) {}

  async fetchSpotPrices(ids: string[], currency: string): Promise<SpotPriceResponse> {
    try {
      const response = await axios.get<unknown>(this.config.priceOracleUrl, {
        params: { ids: ids.join(','), vs_currencies: currency },
        timeout: this.config.priceOracleTimeoutMs,
        // timeout is per socket idle period; signal is the total deadline
        signal: AbortSignal.timeout(this.config.priceOracleTimeoutMs),
      });
      return spotPriceResponseSchema.parse(response.data);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new OracleUnavailableError(`Price oracle request failed: ${reason}`);
    }
  }
}

import { Module } from '@nestjs/common';
import { CoinGeckoClient } from './coingecko.client';
import { MarketPriceService } from './market-price.service';

@Module({
  providers: [CoinGeckoClient, MarketPriceService],
  exports: [MarketPriceService],
})
export class MarketPriceModule {}

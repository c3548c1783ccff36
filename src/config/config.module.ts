import { Global, Module } from '@nestjs/common';
import { POOL_CONFIG, loadPoolConfig } from './pool.config';

@Global()
@Module({
  providers: [{ provide: POOL_CONFIG, useFactory: () => loadPoolConfig() }],
  exports: [POOL_CONFIG],
})
export class PoolConfigModule {}

import { Global, Logger, Module } from '@nestjs/common';
import { POOL_CONFIG, PoolConfig } from '../config/pool.config';
import { LedgerStore } from './ledger.store';
import { InMemoryLedgerStore } from './in-memory-ledger.store';
import { JsonFileLedgerStore } from './json-file-ledger.store';

@Global()
@Module({
  providers: [
    {
      provide: LedgerStore,
      useFactory: (config: PoolConfig): LedgerStore => {
        if (config.storageDriver === 'memory') {
          new Logger('StorageModule').warn('Using in-memory ledger store; data is lost on restart');
          return new InMemoryLedgerStore();
        }
        return new JsonFileLedgerStore(config.dataDirectory);
      },
      inject: [POOL_CONFIG],
    },
  ],
  exports: [LedgerStore],
})
export class StorageModule {}

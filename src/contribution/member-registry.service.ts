import { Inject, Injectable } from '@nestjs/common';
import { POOL_CONFIG, PoolConfig } from '../config/pool.config';

// Fixed, ordered list of pool members taken from configuration.
@Injectable()
export class MemberRegistry {
  private readonly members: readonly string[];
  private readonly memberSet: ReadonlySet<string>;

  constructor(@Inject(POOL_CONFIG) config: PoolConfig) {
    this.members = Object.freeze([...config.members]);
    this.memberSet = new Set(this.members);
  }

  list(): readonly string[] {
    return this.members;
  }

  has(memberId: string): boolean {
    return this.memberSet.has(memberId);
  }
}

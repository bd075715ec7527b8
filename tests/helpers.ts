import { StakingEngine, type StakingEngineOptions } from '../src/staking';
import type { Clock } from '../src/types';
import { AllowlistAuthorizer } from '../src/vault/authorizer';
import { InMemoryTokenVault } from '../src/vault/memory-vault';
import { MemoryEventSink } from '../src/vault/sinks';

export const DAY = 86_400n;

export class ManualClock implements Clock {
  constructor(public time: bigint = 0n) {}

  now(): bigint {
    return this.time;
  }

  advance(seconds: bigint): void {
    this.time += seconds;
  }
}

export interface Harness {
  engine: StakingEngine;
  clock: ManualClock;
  vault: InMemoryTokenVault;
  sink: MemoryEventSink;
}

export function setup(
  overrides: Partial<StakingEngineOptions> = {},
  vault: InMemoryTokenVault = new InMemoryTokenVault('custody'),
): Harness {
  const clock = new ManualClock(0n);
  const sink = new MemoryEventSink();
  const engine = new StakingEngine({
    vault,
    authorizer: new AllowlistAuthorizer(['admin']),
    sink,
    clock,
    custodyAccount: 'custody',
    feeRecipient: 'treasury',
    ...overrides,
  });
  return { engine, clock, vault, sink };
}

import type { ServiceConfig } from './config.js';
import type { Clock } from './registry/clock.js';
import type { AccountLedger, TaskRegistry } from './registry/index.js';
import type { ReplayGuard } from './replay.js';

export interface AppContext {
  config: ServiceConfig;
  registry: TaskRegistry;
  ledger: AccountLedger;
  replayGuard: ReplayGuard;
  clock: Clock;
}

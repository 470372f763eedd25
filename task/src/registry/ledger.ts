import { ESCROW_ACCOUNT, type RegistryStore } from '@taskescrow/task-db';
import { forbidden, invalidInput } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

/**
 * Custodial balances backing the value-transfer primitive. Funding is an
 * operator action that mirrors a deposit made outside the platform.
 */
export class AccountLedger {
  constructor(
    private readonly store: RegistryStore,
    private readonly logger: Logger = createLogger('account-ledger')
  ) {}

  async fundAccount(account: string, amount: bigint, caller: string): Promise<bigint> {
    if (amount <= 0n) {
      throw invalidInput('Amount must be greater than zero');
    }
    if (account === ESCROW_ACCOUNT) {
      throw invalidInput('The escrow account cannot be funded directly');
    }
    const balance = await this.store.transaction(async (ledger) => {
      const { owner } = await ledger.getSettings();
      if (caller !== owner) {
        throw forbidden('Only the owner can fund accounts');
      }
      const next = (await ledger.getBalance(account)) + amount;
      await ledger.setBalance(account, next);
      return next;
    });
    this.logger.info({ account, amount: amount.toString(), balance: balance.toString() }, 'Account funded');
    return balance;
  }

  getBalance(account: string): Promise<bigint> {
    return this.store.read((reader) => reader.getBalance(account));
  }
}

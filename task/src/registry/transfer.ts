import type { RegistryWriter } from '@taskescrow/task-db';
import { transferFailure } from '../errors.js';

/**
 * Value-transfer primitive. Runs inside the caller's unit of work, so a
 * rejection aborts the whole operation.
 */
export interface ValueTransfer {
  transfer(ledger: RegistryWriter, from: string, to: string, amount: bigint): Promise<void>;
}

/** Moves balances between ledger accounts. Zero amounts are a no-op. */
export class LedgerTransfer implements ValueTransfer {
  private readonly blockedRecipients: ReadonlySet<string>;

  constructor(blockedRecipients: Iterable<string> = []) {
    this.blockedRecipients = new Set(blockedRecipients);
  }

  async transfer(ledger: RegistryWriter, from: string, to: string, amount: bigint): Promise<void> {
    if (amount < 0n) {
      throw new RangeError(`Transfer amount must not be negative: ${amount}`);
    }
    if (amount === 0n) {
      return;
    }
    if (this.blockedRecipients.has(to)) {
      throw transferFailure(`Recipient ${to} cannot accept funds`);
    }
    const available = await ledger.getBalance(from);
    if (available < amount) {
      throw transferFailure(`Insufficient balance in ${from}: ${available} available, ${amount} required`);
    }
    await ledger.setBalance(from, available - amount);
    await ledger.setBalance(to, (await ledger.getBalance(to)) + amount);
  }
}

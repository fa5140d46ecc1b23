/**
 * Atomic pool operations
 *
 * Couples a PoolState transaction with the ledger transfers made inside it, so
 * a failed operation leaves both the pool and the ledgers as they were.
 */

import type { Provider } from './types.js';
import type { AssetLedger } from './ledger.js';
import { PoolState } from './pool.js';
import { AmmError, TransferFailure } from './errors.js';
import { logger } from './utils/logger.js';

const log = logger.child('Settlement');

/** A ledger movement recorded by a settlement */
export interface LedgerTransfer {
  ledger: AssetLedger;
  account: Provider;
  amount: bigint;
}

/**
 * Journal of the ledger transfers made by one operation
 */
export class Settlement {
  readonly operation: string;
  private readonly pulled: LedgerTransfer[] = [];
  private readonly pushed: LedgerTransfer[] = [];
  private outboundRejected = false;

  constructor(operation: string) {
    this.operation = operation;
  }

  /** Transfers into the pool made so far */
  get inbound(): readonly LedgerTransfer[] {
    return this.pulled;
  }

  /** Transfers out of the pool made so far */
  get outbound(): readonly LedgerTransfer[] {
    return this.pushed;
  }

  /**
   * True when an outbound transfer was made or rejected. Either way the
   * ledgers and the reserves can no longer be brought back into step.
   */
  get unrecoverable(): boolean {
    return this.outboundRejected || this.pushed.length > 0;
  }

  /**
   * Pull `amount` from `from` into the pool. Only transfers that complete are
   * recorded; a ledger whose transferIn throws must leave its balances as
   * they were.
   */
  pull(ledger: AssetLedger, from: Provider, amount: bigint): void {
    try {
      ledger.transferIn(from, amount);
    } catch (error) {
      throw toTransferFailure(error, ledger, 'in', from, amount);
    }
    this.pulled.push({ ledger, account: from, amount });
  }

  /**
   * Push `amount` from the pool to `to`. Pool accounting must already be
   * committed when this is called.
   */
  push(ledger: AssetLedger, to: Provider, amount: bigint): void {
    try {
      ledger.transferOut(to, amount);
    } catch (error) {
      // Reserves said the pool could pay; the ledger disagrees.
      this.outboundRejected = true;
      log.error(`${this.operation}: outbound ${amount} ${ledger.asset} to ${to} rejected, reserve accounting out of step with ledger`);
      throw toTransferFailure(error, ledger, 'out', to, amount);
    }
    this.pushed.push({ ledger, account: to, amount });
  }

  /**
   * Return every pulled amount to its sender, newest first.
   *
   * Outbound transfers already made cannot be reclaimed; they are reported.
   */
  revert(): void {
    for (const transfer of [...this.pushed].reverse()) {
      log.error(
        `${this.operation}: cannot reclaim ${transfer.amount} ${transfer.ledger.asset} already sent to ${transfer.account}`
      );
    }

    for (const transfer of [...this.pulled].reverse()) {
      try {
        if (transfer.ledger.refund) {
          transfer.ledger.refund(transfer.account, transfer.amount);
        } else {
          transfer.ledger.transferOut(transfer.account, transfer.amount);
        }
      } catch (error) {
        log.error(
          `${this.operation}: refund of ${transfer.amount} ${transfer.ledger.asset} to ${transfer.account} failed`,
          error
        );
      }
    }
    this.pulled.length = 0;
    this.pushed.length = 0;
    this.outboundRejected = false;
  }
}

function toTransferFailure(
  error: unknown,
  ledger: AssetLedger,
  direction: 'in' | 'out',
  account: Provider,
  amount: bigint
): AmmError {
  if (error instanceof TransferFailure) return error;
  // Pool errors raised by a reentrant ledger keep their own type.
  if (error instanceof AmmError) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new TransferFailure(ledger.asset, direction, account, amount, reason, { cause: error });
}

/**
 * Run `body` as one atomic pool operation with its own settlement journal.
 *
 * A failure after any outbound transfer was attempted halts the pool: the
 * rollback restores reserves the ledgers no longer hold.
 */
export function atomic<T>(
  pool: PoolState,
  operation: string,
  body: (settlement: Settlement) => T
): T {
  return pool.transact(operation, () => {
    const settlement = new Settlement(operation);
    try {
      const result = body(settlement);
      pool.assertInvariants();
      return result;
    } catch (error) {
      const fatal = settlement.unrecoverable;
      settlement.revert();
      if (fatal) {
        pool.halt(`${operation} failed after an outbound transfer`);
      }
      throw error;
    }
  });
}

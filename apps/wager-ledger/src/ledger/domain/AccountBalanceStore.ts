import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';
import { InsufficientBalanceError } from '@shared/kernel/DomainError';

/**
 * Pegged-asset balance per identity. Entries appear on first credit and
 * are never removed; an identity without an entry reads as zero.
 */
export class AccountBalanceStore {
  private readonly balances: Map<Identity, Amount>;

  constructor(entries?: Iterable<[Identity, Amount]>) {
    this.balances = new Map(entries);
  }

  balanceOf(identity: Identity): Amount {
    return this.balances.get(identity) ?? Amount.zero();
  }

  has(identity: Identity): boolean {
    return this.balances.has(identity);
  }

  credit(identity: Identity, amount: Amount): Amount {
    const next = this.balanceOf(identity).add(amount);
    this.balances.set(identity, next);
    return next;
  }

  debit(identity: Identity, amount: Amount): Amount {
    const current = this.balanceOf(identity);
    if (current.isLessThan(amount)) {
      throw new InsufficientBalanceError(
        `Balance ${current} of ${identity} is below ${amount}`,
      );
    }
    const next = current.subtract(amount);
    this.balances.set(identity, next);
    return next;
  }

  total(): Amount {
    let sum = Amount.zero();
    for (const balance of this.balances.values()) {
      sum = sum.add(balance);
    }
    return sum;
  }

  get size(): number {
    return this.balances.size;
  }

  clone(): AccountBalanceStore {
    return new AccountBalanceStore(this.balances);
  }
}

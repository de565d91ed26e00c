import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';
import { NoFeesAccruedError } from '@shared/kernel/DomainError';

/**
 * Pegged-denominated fee counter and the sink identity fees are paid out to.
 * The counter only grows through settlement and only drops to zero on
 * withdrawal.
 */
export class FeeTreasury {
  constructor(
    private _accrued: Amount = Amount.zero(),
    private _sink: Identity | null = null,
  ) {}

  get accrued(): Amount {
    return this._accrued;
  }

  get sink(): Identity | null {
    return this._sink;
  }

  accrue(fee: Amount): void {
    this._accrued = this._accrued.add(fee);
  }

  /** Returns the previous sink. */
  setSink(sink: Identity): Identity | null {
    const previous = this._sink;
    this._sink = sink;
    return previous;
  }

  /** Zeroes the counter and returns what it held. */
  drain(): Amount {
    if (this._accrued.isZero()) {
      throw new NoFeesAccruedError('No fees accrued');
    }
    const drained = this._accrued;
    this._accrued = Amount.zero();
    return drained;
  }

  clone(): FeeTreasury {
    return new FeeTreasury(this._accrued, this._sink);
  }
}

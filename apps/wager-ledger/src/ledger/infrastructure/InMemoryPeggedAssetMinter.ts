import { Injectable } from '@nestjs/common';
import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';
import { InsufficientCustodyError } from '@shared/kernel/DomainError';
import { PeggedAssetMinter } from '@shared/ports/PeggedAssetMinter';
import { gameUnitsToNative, nativeToGameUnits } from '@banking/domain/PegConversion';

@Injectable()
export class InMemoryPeggedAssetMinter implements PeggedAssetMinter {
  private readonly holdings: Map<Identity, Amount> = new Map();
  private supply: Amount = Amount.zero();

  constructor(readonly address: Identity = 'pegged-minter') {}

  async mint(holder: Identity, amount: Amount): Promise<void> {
    this.supply = this.supply.add(amount);
    this.holdings.set(holder, this.holdingOf(holder).add(amount));
  }

  async burn(holder: Identity, amount: Amount): Promise<void> {
    const held = this.holdingOf(holder);
    if (held.isLessThan(amount)) {
      throw new InsufficientCustodyError(`${holder} holds ${held}, cannot burn ${amount}`);
    }
    this.holdings.set(holder, held.subtract(amount));
    this.supply = this.supply.subtract(amount);
  }

  async balanceOf(holder: Identity): Promise<Amount> {
    return this.holdingOf(holder);
  }

  nativeToGameUnits(amount: Amount): Amount {
    return nativeToGameUnits(amount);
  }

  gameUnitsToNative(amount: Amount): Amount {
    return gameUnitsToNative(amount);
  }

  get totalSupply(): Amount {
    return this.supply;
  }

  private holdingOf(holder: Identity): Amount {
    return this.holdings.get(holder) ?? Amount.zero();
  }
}

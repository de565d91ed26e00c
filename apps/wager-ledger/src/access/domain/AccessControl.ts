import { Capability } from '@shared/kernel/Capability';
import { Identity } from '@shared/kernel/Identity';

/**
 * Owner, pause flag and the capability set. Capabilities are independent
 * of ownership: the owner holds none unless granted.
 */
export class AccessControl {
  private readonly grants: Map<Identity, Set<Capability>>;

  constructor(
    private _owner: Identity,
    private _paused: boolean = false,
    grants?: Iterable<[Identity, Iterable<Capability>]>,
  ) {
    this.grants = new Map();
    for (const [identity, capabilities] of grants ?? []) {
      this.grants.set(identity, new Set(capabilities));
    }
  }

  get owner(): Identity {
    return this._owner;
  }

  get paused(): boolean {
    return this._paused;
  }

  isOwner(identity: Identity): boolean {
    return identity === this._owner;
  }

  hasCapability(identity: Identity, capability: Capability): boolean {
    return this.grants.get(identity)?.has(capability) ?? false;
  }

  grant(capability: Capability, identity: Identity): void {
    let held = this.grants.get(identity);
    if (!held) {
      held = new Set();
      this.grants.set(identity, held);
    }
    held.add(capability);
  }

  revoke(capability: Capability, identity: Identity): void {
    const held = this.grants.get(identity);
    if (!held) return;
    held.delete(capability);
    if (held.size === 0) this.grants.delete(identity);
  }

  setPaused(paused: boolean): void {
    this._paused = paused;
  }

  /** Returns the previous owner. */
  transferOwnership(newOwner: Identity): Identity {
    const previous = this._owner;
    this._owner = newOwner;
    return previous;
  }

  clone(): AccessControl {
    return new AccessControl(this._owner, this._paused, this.grants);
  }
}

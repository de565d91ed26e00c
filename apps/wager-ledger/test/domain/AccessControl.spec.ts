import { Capability } from '@shared/kernel/Capability';
import { AccessControl } from '@access/domain/AccessControl';

describe('AccessControl', () => {
  let access: AccessControl;

  beforeEach(() => {
    access = new AccessControl('owner-1');
  });

  it('starts unpaused with the given owner', () => {
    expect(access.owner).toBe('owner-1');
    expect(access.isOwner('owner-1')).toBe(true);
    expect(access.isOwner('someone')).toBe(false);
    expect(access.paused).toBe(false);
  });

  it('does not give the owner any capability implicitly', () => {
    expect(access.hasCapability('owner-1', Capability.GAME_MANAGER)).toBe(false);
    expect(access.hasCapability('owner-1', Capability.MINTER)).toBe(false);
  });

  it('grants and revokes capabilities independently', () => {
    access.grant(Capability.GAME_MANAGER, 'svc');
    access.grant(Capability.MINTER, 'svc');
    access.revoke(Capability.MINTER, 'svc');

    expect(access.hasCapability('svc', Capability.GAME_MANAGER)).toBe(true);
    expect(access.hasCapability('svc', Capability.MINTER)).toBe(false);
  });

  it('treats repeated grants and revokes as no-ops', () => {
    access.grant(Capability.MINTER, 'svc');
    access.grant(Capability.MINTER, 'svc');
    access.revoke(Capability.GAME_MANAGER, 'nobody');
    expect(access.hasCapability('svc', Capability.MINTER)).toBe(true);
  });

  it('seeds grants from the constructor', () => {
    const seeded = new AccessControl('owner-1', true, [['engine', [Capability.MINTER]]]);
    expect(seeded.paused).toBe(true);
    expect(seeded.hasCapability('engine', Capability.MINTER)).toBe(true);
  });

  it('transfers ownership and returns the previous owner', () => {
    expect(access.transferOwnership('owner-2')).toBe('owner-1');
    expect(access.isOwner('owner-1')).toBe(false);
    expect(access.isOwner('owner-2')).toBe(true);
  });

  it('clones without sharing capability sets', () => {
    access.grant(Capability.MINTER, 'svc');
    const copy = access.clone();
    copy.revoke(Capability.MINTER, 'svc');
    copy.setPaused(true);

    expect(access.hasCapability('svc', Capability.MINTER)).toBe(true);
    expect(access.paused).toBe(false);
  });
});

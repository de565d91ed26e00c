import { createTopics, LedgerTopics } from '@messaging/topics';

describe('createTopics', () => {
  let topics: LedgerTopics;

  beforeEach(() => {
    topics = createTopics('main-ledger');
  });

  it('prefixes money-movement topics with ledger.{ledgerId}.*', () => {
    expect(topics.DEPOSIT).toBe('ledger.main-ledger.deposit');
    expect(topics.WITHDRAWAL).toBe('ledger.main-ledger.withdrawal');
    expect(topics.SETTLEMENT).toBe('ledger.main-ledger.settlement');
    expect(topics.FEE_COLLECTED).toBe('ledger.main-ledger.fee.collected');
  });

  it('prefixes administrative topics', () => {
    expect(topics.CONFIG_UPDATED).toBe('ledger.main-ledger.config.updated');
    expect(topics.TREASURY_UPDATED).toBe('ledger.main-ledger.treasury.updated');
    expect(topics.LINKED).toBe('ledger.main-ledger.linked');
    expect(topics.PAUSED).toBe('ledger.main-ledger.paused');
    expect(topics.UNPAUSED).toBe('ledger.main-ledger.unpaused');
    expect(topics.CAPABILITY_GRANTED).toBe('ledger.main-ledger.capability.granted');
    expect(topics.CAPABILITY_REVOKED).toBe('ledger.main-ledger.capability.revoked');
    expect(topics.OWNERSHIP_TRANSFERRED).toBe('ledger.main-ledger.ownership.transferred');
  });

  it('prefixes command and rejection topics', () => {
    expect(topics.CMD_DEPOSIT).toBe('ledger.main-ledger.cmd.deposit');
    expect(topics.CMD_WITHDRAW).toBe('ledger.main-ledger.cmd.withdraw');
    expect(topics.CMD_PLAY).toBe('ledger.main-ledger.cmd.play');
    expect(topics.REQUEST_REJECTED).toBe('ledger.main-ledger.request.rejected');
  });

  it('prefixes owner command subjects', () => {
    expect(topics.CMD_FUND).toBe('ledger.main-ledger.cmd.fund');
    expect(topics.CMD_IDENTITY).toBe('ledger.main-ledger.cmd.identity');
    expect(topics.CMD_GAME_CONFIG).toBe('ledger.main-ledger.cmd.game.config');
    expect(topics.CMD_CAPABILITY).toBe('ledger.main-ledger.cmd.capability');
    expect(topics.CMD_PAUSE).toBe('ledger.main-ledger.cmd.pause');
    expect(topics.CMD_TRANSFER_OWNERSHIP).toBe('ledger.main-ledger.cmd.ownership');
    expect(topics.CMD_TREASURY).toBe('ledger.main-ledger.cmd.treasury');
    expect(topics.CMD_WITHDRAW_FEES).toBe('ledger.main-ledger.cmd.fees.withdraw');
  });

  it('prefixes request/reply query subjects', () => {
    expect(topics.QUERY_BALANCE).toBe('ledger.main-ledger.query.balance');
    expect(topics.QUERY_GAME_CONFIG).toBe('ledger.main-ledger.query.games');
    expect(topics.QUERY_STATS).toBe('ledger.main-ledger.query.stats');
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(topics)).toBe(true);
  });

  it('throws on ledgerId with NATS special characters', () => {
    expect(() => createTopics('a.b')).toThrow('Invalid ledgerId');
    expect(() => createTopics('a*')).toThrow('Invalid ledgerId');
    expect(() => createTopics('a>')).toThrow('Invalid ledgerId');
  });
});

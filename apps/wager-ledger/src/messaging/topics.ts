/**
 * NATS subject constants for the wager ledger.
 *
 * Subjects are scoped per ledger instance: `ledger.{ledgerId}.*`. The
 * prefix is resolved once at boot via {@link createTopics}. `cmd.*`
 * subjects are fire-and-forget; `query.*` subjects are request/reply.
 */

export interface LedgerTopics {
  readonly DEPOSIT: string;
  readonly WITHDRAWAL: string;
  readonly SETTLEMENT: string;
  readonly FEE_COLLECTED: string;
  readonly CONFIG_UPDATED: string;
  readonly TREASURY_UPDATED: string;
  readonly LINKED: string;
  readonly PAUSED: string;
  readonly UNPAUSED: string;
  readonly CAPABILITY_GRANTED: string;
  readonly CAPABILITY_REVOKED: string;
  readonly OWNERSHIP_TRANSFERRED: string;
  readonly REQUEST_REJECTED: string;
  readonly CMD_DEPOSIT: string;
  readonly CMD_WITHDRAW: string;
  readonly CMD_PLAY: string;
  readonly CMD_FUND: string;
  readonly CMD_IDENTITY: string;
  readonly CMD_GAME_CONFIG: string;
  readonly CMD_CAPABILITY: string;
  readonly CMD_PAUSE: string;
  readonly CMD_TRANSFER_OWNERSHIP: string;
  readonly CMD_TREASURY: string;
  readonly CMD_WITHDRAW_FEES: string;
  readonly QUERY_BALANCE: string;
  readonly QUERY_GAME_CONFIG: string;
  readonly QUERY_STATS: string;
}

/**
 * @example
 * const TOPICS = createTopics('main-ledger');
 * // TOPICS.SETTLEMENT === 'ledger.main-ledger.settlement'
 */
export function createTopics(ledgerId: string): LedgerTopics {
  if (!/^[\w-]+$/.test(ledgerId)) {
    throw new Error(`Invalid ledgerId for NATS topics: "${ledgerId}"`);
  }

  const prefix = `ledger.${ledgerId}`;

  return Object.freeze({
    DEPOSIT: `${prefix}.deposit`,
    WITHDRAWAL: `${prefix}.withdrawal`,
    SETTLEMENT: `${prefix}.settlement`,
    FEE_COLLECTED: `${prefix}.fee.collected`,
    CONFIG_UPDATED: `${prefix}.config.updated`,
    TREASURY_UPDATED: `${prefix}.treasury.updated`,
    LINKED: `${prefix}.linked`,
    PAUSED: `${prefix}.paused`,
    UNPAUSED: `${prefix}.unpaused`,
    CAPABILITY_GRANTED: `${prefix}.capability.granted`,
    CAPABILITY_REVOKED: `${prefix}.capability.revoked`,
    OWNERSHIP_TRANSFERRED: `${prefix}.ownership.transferred`,
    REQUEST_REJECTED: `${prefix}.request.rejected`,
    CMD_DEPOSIT: `${prefix}.cmd.deposit`,
    CMD_WITHDRAW: `${prefix}.cmd.withdraw`,
    CMD_PLAY: `${prefix}.cmd.play`,
    CMD_FUND: `${prefix}.cmd.fund`,
    CMD_IDENTITY: `${prefix}.cmd.identity`,
    CMD_GAME_CONFIG: `${prefix}.cmd.game.config`,
    CMD_CAPABILITY: `${prefix}.cmd.capability`,
    CMD_PAUSE: `${prefix}.cmd.pause`,
    CMD_TRANSFER_OWNERSHIP: `${prefix}.cmd.ownership`,
    CMD_TREASURY: `${prefix}.cmd.treasury`,
    CMD_WITHDRAW_FEES: `${prefix}.cmd.fees.withdraw`,
    QUERY_BALANCE: `${prefix}.query.balance`,
    QUERY_GAME_CONFIG: `${prefix}.query.games`,
    QUERY_STATS: `${prefix}.query.stats`,
  });
}

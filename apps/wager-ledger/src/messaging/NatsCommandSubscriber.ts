import { Injectable, Inject } from '@nestjs/common';
import { Msg, NatsConnection, Subscription } from 'nats';
import { z } from 'zod';
import { Logger } from '@shared/ports/Logger';
import {
  CommandHandler,
  CommandSubscriber,
  LedgerCommandMap,
  LedgerCommandName,
  LedgerQueryMap,
  LedgerQueryName,
  QueryHandler,
} from '@ledger/application/ports/CommandSubscriber';
import { LedgerTopics } from './topics';
import { WireValue, toWireValue } from './wire';
import {
  depositSchema,
  withdrawSchema,
  playGameSchema,
  fundWalletSchema,
  setIdentityStatusSchema,
  setGameConfigSchema,
  setCapabilitySchema,
  setPausedSchema,
  transferOwnershipSchema,
  setTreasurySchema,
  withdrawFeesSchema,
  balanceQuerySchema,
  gameConfigQuerySchema,
  statsQuerySchema,
} from './schemas';
import { NATS_CONNECTION, LEDGER_TOPICS, LOGGER } from './tokens';

interface Route<T> {
  subject: keyof LedgerTopics;
  schema: z.ZodType<T>;
}

const COMMAND_ROUTES: { [K in LedgerCommandName]: Route<LedgerCommandMap[K]> } = {
  deposit: { subject: 'CMD_DEPOSIT', schema: depositSchema },
  withdraw: { subject: 'CMD_WITHDRAW', schema: withdrawSchema },
  playGame: { subject: 'CMD_PLAY', schema: playGameSchema },
  fundWallet: { subject: 'CMD_FUND', schema: fundWalletSchema },
  setIdentityStatus: { subject: 'CMD_IDENTITY', schema: setIdentityStatusSchema },
  setGameConfig: { subject: 'CMD_GAME_CONFIG', schema: setGameConfigSchema },
  setCapability: { subject: 'CMD_CAPABILITY', schema: setCapabilitySchema },
  setPaused: { subject: 'CMD_PAUSE', schema: setPausedSchema },
  transferOwnership: { subject: 'CMD_TRANSFER_OWNERSHIP', schema: transferOwnershipSchema },
  setTreasury: { subject: 'CMD_TREASURY', schema: setTreasurySchema },
  withdrawFees: { subject: 'CMD_WITHDRAW_FEES', schema: withdrawFeesSchema },
};

const QUERY_ROUTES: { [K in LedgerQueryName]: Route<LedgerQueryMap[K]['request']> } = {
  balance: { subject: 'QUERY_BALANCE', schema: balanceQuerySchema },
  gameConfig: { subject: 'QUERY_GAME_CONFIG', schema: gameConfigQuerySchema },
  stats: { subject: 'QUERY_STATS', schema: statsQuerySchema },
};

type IssueSummary = { path: string; message: string };

/**
 * `caller` inside a command is taken as already authenticated by the
 * transport (NATS account permissions on the cmd subjects).
 *
 * Query replies carry the view with amounts as decimal strings, or
 * `{ error }` when the request was invalid or the lookup failed.
 */
@Injectable()
export class NatsCommandSubscriber implements CommandSubscriber {
  private readonly subscriptions: Subscription[] = [];
  private readonly encoder = new TextEncoder();

  constructor(
    @Inject(NATS_CONNECTION) private readonly nats: NatsConnection,
    @Inject(LEDGER_TOPICS) private readonly topics: LedgerTopics,
    @Inject(LOGGER) private readonly logger: Logger,
  ) {}

  onCommand<K extends LedgerCommandName>(command: K, handler: CommandHandler<K>): void {
    const route = COMMAND_ROUTES[command];
    this.safeSubscribe(this.topics[route.subject], route.schema, (cmd) => handler(cmd));
  }

  onQuery<K extends LedgerQueryName>(query: K, handler: QueryHandler<K>): void {
    const route = QUERY_ROUTES[query];
    const subject = this.topics[route.subject];
    this.safeSubscribe(
      subject,
      route.schema,
      (request, msg) => {
        this.answer(subject, msg, () => handler(request)).catch((err: unknown) => {
          this.logger.error('NATS query failed', {
            subject,
            error: err instanceof Error ? err.message : String(err),
          });
        });
      },
      (msg, issues) => this.reply(subject, msg, { error: 'INVALID_REQUEST', issues }),
    );
  }

  async close(): Promise<void> {
    await Promise.all(this.subscriptions.map((s) => s.drain()));
    this.subscriptions.length = 0;
  }

  private async answer(
    subject: string,
    msg: Msg,
    lookup: () => Promise<unknown>,
  ): Promise<void> {
    let payload: WireValue;
    try {
      payload = toWireValue(await lookup());
    } catch (err) {
      this.logger.error('NATS query failed', {
        subject,
        error: err instanceof Error ? err.message : String(err),
      });
      payload = { error: 'QUERY_FAILED' };
    }
    this.reply(subject, msg, payload);
  }

  private reply(subject: string, msg: Msg, payload: WireValue): void {
    try {
      if (!msg.respond(this.encoder.encode(JSON.stringify(payload)))) {
        this.logger.warn('NATS query without reply subject', { subject });
      }
    } catch (err) {
      this.logger.error('NATS reply failed', {
        subject,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private safeSubscribe<T>(
    subject: string,
    schema: z.ZodType<T>,
    handler: (data: T, msg: Msg) => void,
    onInvalid?: (msg: Msg, issues: IssueSummary[]) => void,
  ): void {
    const sub = this.nats.subscribe(subject, {
      callback: (err, msg) => {
        if (err) {
          this.logger.error('NATS subscription error', {
            subject,
            error: err.message,
          });
          return;
        }
        try {
          const raw: unknown = msg.json();
          const result = schema.safeParse(raw);
          if (!result.success) {
            const issues = result.error.issues.map(
              (i): IssueSummary => ({ path: i.path.join('.'), message: i.message }),
            );
            this.logger.warn('Invalid NATS command payload', { subject, issues });
            onInvalid?.(msg, issues);
            return;
          }
          handler(result.data, msg);
        } catch (parseErr) {
          this.logger.error('Failed to process NATS message', {
            subject,
            error: parseErr instanceof Error ? parseErr.message : String(parseErr),
          });
          onInvalid?.(msg, []);
        }
      },
    });
    this.subscriptions.push(sub);
  }
}

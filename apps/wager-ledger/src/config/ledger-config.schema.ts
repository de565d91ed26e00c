import { z } from 'zod';

const identitySchema = (name: string) =>
  z
    .string({ error: `${name} is required` })
    .trim()
    .min(1, `${name} must not be empty`);

export const ledgerConfigSchema = z.object({
  LEDGER_ID: z
    .string({ error: 'LEDGER_ID is required' })
    .min(3, 'LEDGER_ID must be at least 3 characters')
    .max(64, 'LEDGER_ID must be at most 64 characters')
    .regex(
      /^[a-z][a-z0-9]+(-[a-z0-9]+)*$/,
      'LEDGER_ID must be a lowercase slug (e.g. "main-ledger")',
    ),

  OWNER_ID: identitySchema('OWNER_ID'),

  ENGINE_ADDRESS: identitySchema('ENGINE_ADDRESS'),

  TREASURY_ID: z.string().trim().min(1).optional(),

  GAMES_FILE: z.string().min(1).default('config/games.json'),

  NATS_URL: z
    .string({ error: 'NATS_URL is required' })
    .regex(/^(nats|tls):\/\/[^\s]+$/, 'NATS_URL must use nats:// or tls:// scheme'),

  REQUIRE_REGISTRATION: z
    .enum(['true', 'false'], {
      error: 'REQUIRE_REGISTRATION must be "true" or "false"',
    })
    .default('false')
    .transform((value) => value === 'true'),
});

export type RawLedgerConfig = z.infer<typeof ledgerConfigSchema>;

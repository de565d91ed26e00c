import { z } from 'zod';
import { Amount, MAX_AMOUNT } from '@shared/kernel/Amount';
import { Capability } from '@shared/kernel/Capability';

/**
 * Zod schemas for inbound NATS command payloads. They form the
 * anti-corruption layer: malformed JSON never reaches a use case.
 * Amounts travel as decimal strings.
 */

export const amountSchema = z
  .string()
  .regex(/^\d+$/, 'amount must be an unsigned integer string')
  .refine(
    (value) => !/^\d+$/.test(value) || BigInt(value) <= MAX_AMOUNT,
    'amount must not exceed 2^256 - 1',
  )
  .transform((value) => Amount.parse(value));

const callerSchema = z.string().trim().min(1);

export const depositSchema = z.object({
  caller: callerSchema,
  nativeAmount: amountSchema,
});

export const withdrawSchema = z.object({
  caller: callerSchema,
  peggedAmount: amountSchema,
});

export const playGameSchema = z.object({
  caller: callerSchema,
  gameType: z.string().min(1),
  betAmount: amountSchema,
  won: z.boolean(),
});

export const bpsSchema = z
  .string()
  .regex(/^\d+$/, 'payoutMultiplierBps must be an unsigned integer string')
  .transform((value) => BigInt(value));

const identitySchema = z.string().trim().min(1);

export const fundWalletSchema = z.object({
  caller: callerSchema,
  identity: identitySchema,
  nativeAmount: amountSchema,
});

export const setIdentityStatusSchema = z.object({
  caller: callerSchema,
  identity: identitySchema,
  action: z.enum(['register', 'ban', 'unban']),
});

export const setGameConfigSchema = z.object({
  caller: callerSchema,
  gameType: z.string().trim().min(1),
  minBet: amountSchema,
  maxBet: amountSchema,
  payoutMultiplierBps: bpsSchema,
  isActive: z.boolean(),
  displayName: z.string(),
});

export const setCapabilitySchema = z.object({
  caller: callerSchema,
  capability: z.enum(Capability),
  identity: identitySchema,
  granted: z.boolean(),
});

export const setPausedSchema = z.object({
  caller: callerSchema,
  paused: z.boolean(),
});

export const transferOwnershipSchema = z.object({
  caller: callerSchema,
  newOwner: identitySchema,
});

export const setTreasurySchema = z.object({
  caller: callerSchema,
  treasury: identitySchema,
});

export const withdrawFeesSchema = z.object({
  caller: callerSchema,
});

// ── Queries ─────────────────────────────────────────

export const balanceQuerySchema = z.object({
  identity: identitySchema,
});

export const gameConfigQuerySchema = z.object({
  gameType: z.string().trim().min(1).optional(),
});

export const statsQuerySchema = z.object({});

export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type ErrorCategory =
  | 'PRECONDITION'
  | 'AUTHORIZATION'
  | 'SOLVENCY'
  | 'ARITHMETIC';

export type LedgerErrorCode =
  | 'ENGINE_PAUSED'
  | 'ZERO_AMOUNT'
  | 'NOT_CONVERTIBLE'
  | 'UNKNOWN_GAME'
  | 'GAME_INACTIVE'
  | 'BET_BELOW_MIN'
  | 'BET_ABOVE_MAX'
  | 'INSUFFICIENT_BALANCE'
  | 'MINTER_NOT_LINKED'
  | 'NO_FEES_ACCRUED'
  | 'TREASURY_NOT_SET'
  | 'REENTRANT_CALL'
  | 'INSUFFICIENT_NATIVE_FUNDS'
  | 'NOT_OWNER'
  | 'MISSING_CAPABILITY'
  | 'INELIGIBLE_IDENTITY'
  | 'INSUFFICIENT_CUSTODY'
  | 'INSUFFICIENT_RESERVE'
  | 'AMOUNT_OVERFLOW'
  | 'AMOUNT_UNDERFLOW'
  | 'INVALID_AMOUNT';

/**
 * Base of every failure the ledger reports to a caller. A request that
 * throws one of these is rolled back in full.
 */
export abstract class LedgerError extends DomainError {
  abstract readonly code: LedgerErrorCode;
  abstract readonly category: ErrorCategory;
}

export abstract class PreconditionError extends LedgerError {
  readonly category = 'PRECONDITION';
}

export abstract class AuthorizationError extends LedgerError {
  readonly category = 'AUTHORIZATION';
}

export abstract class SolvencyError extends LedgerError {
  readonly category = 'SOLVENCY';
}

export abstract class ArithmeticDomainError extends LedgerError {
  readonly category = 'ARITHMETIC';
}

// --- Preconditions ---
export class EnginePausedError extends PreconditionError {
  readonly code = 'ENGINE_PAUSED';
}
export class ZeroAmountError extends PreconditionError {
  readonly code = 'ZERO_AMOUNT';
}
export class NotConvertibleError extends PreconditionError {
  readonly code = 'NOT_CONVERTIBLE';
}
export class UnknownGameError extends PreconditionError {
  readonly code = 'UNKNOWN_GAME';
}
export class GameInactiveError extends PreconditionError {
  readonly code = 'GAME_INACTIVE';
}
export class BetBelowMinError extends PreconditionError {
  readonly code = 'BET_BELOW_MIN';
}
export class BetAboveMaxError extends PreconditionError {
  readonly code = 'BET_ABOVE_MAX';
}
export class InsufficientBalanceError extends PreconditionError {
  readonly code = 'INSUFFICIENT_BALANCE';
}
export class MinterNotLinkedError extends PreconditionError {
  readonly code = 'MINTER_NOT_LINKED';
}
export class NoFeesAccruedError extends PreconditionError {
  readonly code = 'NO_FEES_ACCRUED';
}
export class TreasuryNotSetError extends PreconditionError {
  readonly code = 'TREASURY_NOT_SET';
}
export class ReentrantCallError extends PreconditionError {
  readonly code = 'REENTRANT_CALL';
}
export class InsufficientNativeFundsError extends PreconditionError {
  readonly code = 'INSUFFICIENT_NATIVE_FUNDS';
}

// --- Authorization ---
export class NotOwnerError extends AuthorizationError {
  readonly code = 'NOT_OWNER';
}
export class MissingCapabilityError extends AuthorizationError {
  readonly code = 'MISSING_CAPABILITY';
}
export class IneligibleIdentityError extends AuthorizationError {
  readonly code = 'INELIGIBLE_IDENTITY';
}

// --- Solvency ---
export class InsufficientCustodyError extends SolvencyError {
  readonly code = 'INSUFFICIENT_CUSTODY';
}
export class InsufficientReserveError extends SolvencyError {
  readonly code = 'INSUFFICIENT_RESERVE';
}

// --- Arithmetic ---
export class AmountOverflowError extends ArithmeticDomainError {
  readonly code = 'AMOUNT_OVERFLOW';
}
export class AmountUnderflowError extends ArithmeticDomainError {
  readonly code = 'AMOUNT_UNDERFLOW';
}
export class InvalidAmountError extends ArithmeticDomainError {
  readonly code = 'INVALID_AMOUNT';
}

import {
  DomainError,
  LedgerError,
  EnginePausedError,
  BetBelowMinError,
  NotOwnerError,
  MissingCapabilityError,
  InsufficientCustodyError,
  InsufficientReserveError,
  AmountOverflowError,
  ReentrantCallError,
} from '@shared/kernel/DomainError';

describe('DomainError', () => {
  it('extends Error', () => {
    const err = new DomainError('test');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(DomainError);
  });

  it('sets name to class name', () => {
    expect(new DomainError('msg').name).toBe('DomainError');
    expect(new EnginePausedError('msg').name).toBe('EnginePausedError');
    expect(new InsufficientCustodyError('msg').name).toBe('InsufficientCustodyError');
  });

  it('ledger errors are instances of DomainError and LedgerError', () => {
    const err = new BetBelowMinError('msg');
    expect(err).toBeInstanceOf(DomainError);
    expect(err).toBeInstanceOf(LedgerError);
    expect(err.message).toBe('msg');
  });

  it.each([
    [new EnginePausedError('x'), 'ENGINE_PAUSED', 'PRECONDITION'],
    [new BetBelowMinError('x'), 'BET_BELOW_MIN', 'PRECONDITION'],
    [new ReentrantCallError('x'), 'REENTRANT_CALL', 'PRECONDITION'],
    [new NotOwnerError('x'), 'NOT_OWNER', 'AUTHORIZATION'],
    [new MissingCapabilityError('x'), 'MISSING_CAPABILITY', 'AUTHORIZATION'],
    [new InsufficientCustodyError('x'), 'INSUFFICIENT_CUSTODY', 'SOLVENCY'],
    [new InsufficientReserveError('x'), 'INSUFFICIENT_RESERVE', 'SOLVENCY'],
    [new AmountOverflowError('x'), 'AMOUNT_OVERFLOW', 'ARITHMETIC'],
  ])('%s carries code %s in category %s', (err, code, category) => {
    expect(err.code).toBe(code);
    expect(err.category).toBe(category);
  });
});

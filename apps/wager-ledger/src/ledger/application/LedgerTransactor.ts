import { AsyncLocalStorage } from 'async_hooks';
import { LedgerRecord } from '@shared/kernel/LedgerRecord';
import { LedgerError, ReentrantCallError } from '@shared/kernel/DomainError';
import { Logger } from '@shared/ports/Logger';
import { LedgerState } from '@ledger/domain/LedgerState';
import { LedgerEventPublisher } from '@ledger/application/ports/LedgerEventPublisher';

export interface LedgerTransaction {
  /** Draft copy; discarded unless the request succeeds. */
  readonly state: LedgerState;
  /**
   * Registers the inverse of a collaborator effect that already happened.
   * Undo steps run in reverse registration order when the request fails.
   */
  onRollback(step: string, undo: () => Promise<void>): void;
  emit(record: LedgerRecord): void;
}

interface RequestContext {
  operation: string;
  /** Cleared once the request settles; timers it scheduled keep the store. */
  active: boolean;
}

interface RollbackStep {
  step: string;
  undo: () => Promise<void>;
}

/**
 * Admits state-mutating requests one at a time and applies each one in
 * full or not at all.
 *
 * - Requests queue in arrival order; each runs only after the previous
 *   one settled.
 * - A request runs inside an async context. A call made from inside that
 *   context while the request is still running (a collaborator calling
 *   back into the ledger) is rejected at once instead of queueing behind
 *   the request it would deadlock on. Work the request scheduled to run
 *   after it settled queues normally.
 * - Work runs against a cloned state; the clone is committed only when
 *   the work resolves, then the emitted records are published.
 */
export class LedgerTransactor {
  private committed: LedgerState;
  private tail: Promise<void> = Promise.resolve();
  private readonly inFlight = new AsyncLocalStorage<RequestContext>();

  constructor(
    initial: LedgerState,
    private readonly publisher: LedgerEventPublisher,
    private readonly logger: Logger,
  ) {
    this.committed = initial;
  }

  /** Last committed state. Callers must treat it as read-only. */
  get state(): LedgerState {
    return this.committed;
  }

  execute<T>(
    operation: string,
    work: (tx: LedgerTransaction) => Promise<T>,
  ): Promise<T> {
    const current = this.inFlight.getStore();
    if (current?.active) {
      const err = new ReentrantCallError(
        `"${operation}" called while "${current.operation}" is in progress`,
      );
      this.logRejection(operation, err);
      return Promise.reject(err);
    }

    const run = this.tail.then(() => {
      const context: RequestContext = { operation, active: true };
      return this.inFlight
        .run(context, () => this.apply(operation, work))
        .finally(() => {
          context.active = false;
        });
    });
    // The queue advances whether or not this request failed; the failure
    // itself is delivered through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async apply<T>(
    operation: string,
    work: (tx: LedgerTransaction) => Promise<T>,
  ): Promise<T> {
    const draft = this.committed.clone();
    const rollback: RollbackStep[] = [];
    const records: LedgerRecord[] = [];

    const tx: LedgerTransaction = {
      state: draft,
      onRollback: (step, undo) => {
        rollback.push({ step, undo });
      },
      emit: (record) => {
        records.push(record);
      },
    };

    let result: T;
    try {
      result = await work(tx);
    } catch (err) {
      this.logRejection(operation, err);
      await this.compensate(operation, rollback);
      throw err;
    }

    this.committed = draft;
    await this.publish(operation, records);
    return result;
  }

  private async compensate(operation: string, steps: RollbackStep[]): Promise<void> {
    for (let i = steps.length - 1; i >= 0; i--) {
      const { step, undo } = steps[i];
      try {
        await undo();
      } catch (err) {
        this.logger.error('Compensation step failed', {
          operation,
          step,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  private async publish(operation: string, records: LedgerRecord[]): Promise<void> {
    if (records.length === 0) return;
    try {
      await this.publisher.publish(records);
    } catch (err) {
      this.logger.error('Publishing committed records failed', {
        operation,
        records: records.map((r) => r.type),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private logRejection(operation: string, err: unknown): void {
    if (err instanceof LedgerError) {
      this.logger.warn('Ledger request rejected', {
        operation,
        code: err.code,
        category: err.category,
        reason: err.message,
      });
      return;
    }
    this.logger.error('Ledger request failed', {
      operation,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

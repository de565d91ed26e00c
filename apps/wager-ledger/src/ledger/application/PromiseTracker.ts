import { Logger } from '@shared/ports/Logger';

/**
 * Keeps handles on fire-and-forget request promises so shutdown can wait
 * for them. Tracked promises must handle their own rejections.
 */
export class PromiseTracker {
  private readonly pending = new Set<Promise<unknown>>();

  constructor(
    private readonly label: string,
    private readonly highWaterMark: number,
    private readonly logger: Logger,
  ) {}

  track(promise: Promise<unknown>): void {
    const settled = promise.finally(() => {
      this.pending.delete(settled);
    });
    this.pending.add(settled);

    if (this.pending.size > this.highWaterMark) {
      this.logger.warn(`Pending ${this.label} above high water mark`, {
        label: this.label,
        pending: this.pending.size,
        highWaterMark: this.highWaterMark,
      });
    }
  }

  get size(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }
}

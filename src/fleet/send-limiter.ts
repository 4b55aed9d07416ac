/**
 * SendLimiter — caps concurrent transport calls for one device.
 * Queued sends start in submission order, so retained messages reach
 * the wire in the order the flush produced them. Sends still waiting
 * for a slot can be abandoned; sends already started always run out.
 */

export type LimitedRun<T> = { status: 'done'; value: T } | { status: 'abandoned' };

interface Waiter<M> {
  item: M;
  grant: (granted: boolean) => void;
}

export class SendLimiter<M> {
  private active = 0;
  private waiters: Array<Waiter<M>> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Send limit must be a positive integer, got ${limit}`);
    }
  }

  /**
   * Run task once a slot is free. Resolves `abandoned` without calling
   * task when abandonQueued() clears the item first.
   */
  async run<T>(item: M, task: () => Promise<T>): Promise<LimitedRun<T>> {
    if (this.active < this.limit) {
      this.active++;
    } else {
      const granted = await new Promise<boolean>((grant) => this.waiters.push({ item, grant }));
      if (!granted) return { status: 'abandoned' };
    }

    try {
      return { status: 'done', value: await task() };
    } finally {
      this.release();
    }
  }

  /**
   * Abandon every send still waiting for a slot; returns their items in queue order.
   */
  abandonQueued(): M[] {
    const abandoned = this.waiters;
    this.waiters = [];
    for (const waiter of abandoned) {
      waiter.grant(false);
    }
    return abandoned.map((waiter) => waiter.item);
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  private release(): void {
    const next = this.waiters.shift();
    // The slot passes straight to the next waiter
    if (next) next.grant(true);
    else this.active--;
  }
}

/**
 * Drains inbound events one at a time, in arrival order. A handler that
 * returns a promise finishes before the next event is handled.
 */
export class SerialQueue<T> {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(
    private readonly handler: (event: T) => void | Promise<void>,
    private readonly onError: (error: unknown, event: T) => void,
  ) {}

  push(event: T): void {
    this.pending++;
    this.tail = this.tail.then(async () => {
      try {
        await this.handler(event);
      } catch (error) {
        this.onError(error, event);
      } finally {
        this.pending--;
      }
    });
  }

  /** Number of events pushed but not yet handled. */
  get size(): number {
    return this.pending;
  }

  /**
   * Resolves once the queue is empty, including events pushed by handlers
   * while draining.
   */
  async drain(): Promise<void> {
    while (this.pending > 0) await this.tail;
  }
}

/**
 * Single-consumer queue of frames received from one socket. Iteration ends when
 * the producer calls `end()` or when the consumer's signal aborts, whichever
 * comes first; frames still buffered at that point are discarded.
 */
export class FrameChannel<T extends object> {
  private readonly buffer: T[] = [];
  private ended = false;
  private notify: (() => void) | null = null;

  get isEnded(): boolean {
    return this.ended;
  }

  push(frame: T): void {
    if (this.ended) {
      return;
    }
    this.buffer.push(frame);
    this.wake();
  }

  end(): void {
    this.ended = true;
    this.wake();
  }

  async *iterate(signal: AbortSignal): AsyncGenerator<T, void, undefined> {
    const onAbort = () => this.wake();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      while (!signal.aborted) {
        const frame = this.buffer.shift();
        if (frame !== undefined) {
          yield frame;
          continue;
        }
        if (this.ended) {
          return;
        }
        await new Promise<void>((resolve) => {
          this.notify = resolve;
        });
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private wake(): void {
    const notify = this.notify;
    this.notify = null;
    notify?.();
  }
}

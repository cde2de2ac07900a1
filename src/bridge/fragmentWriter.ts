import type { FastifyBaseLogger } from 'fastify';
import type { SpeakerRole } from '../repositories/contracts.js';
import type { FragmentInput } from '../services/callPersistence.js';

export type AppendFragment = (callId: string, fragment: FragmentInput) => Promise<boolean>;

export type FragmentWriterStats = {
  queued: number;
  written: number;
  failed: number;
  abandoned: number;
};

/**
 * Serializes transcript appends for one call. Each append starts only after the
 * previous one settled, so fragments land in the order they were queued even
 * when individual writes are slow.
 */
export class FragmentWriter {
  private tail: Promise<void> = Promise.resolve();
  private nextSeq = 0;
  private pending = 0;
  private abandoned = false;
  private readonly stats: FragmentWriterStats = { queued: 0, written: 0, failed: 0, abandoned: 0 };

  constructor(
    private readonly callId: string,
    private readonly append: AppendFragment,
    private readonly log: FastifyBaseLogger
  ) {}

  enqueue(role: SpeakerRole, text: string, timestamp: string = new Date().toISOString()): number {
    const fragment: FragmentInput = { seq: this.nextSeq++, role, text, timestamp };
    this.stats.queued += 1;
    this.pending += 1;

    this.tail = this.tail
      .then(async () => {
        if (this.abandoned) {
          this.stats.abandoned += 1;
          return;
        }
        const written = await this.append(this.callId, fragment);
        if (written) {
          this.stats.written += 1;
        } else {
          this.stats.failed += 1;
        }
      })
      .catch((error: unknown) => {
        this.stats.failed += 1;
        this.log.warn(
          { callId: this.callId, seq: fragment.seq, error: error instanceof Error ? error.message : String(error) },
          'fragments.append_rejected'
        );
      })
      .finally(() => {
        this.pending -= 1;
      });

    return fragment.seq;
  }

  /**
   * Waits for queued appends up to `timeoutMs`. Appends that have not started
   * when the bound expires are abandoned.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    const drained = await Promise.race([this.tail.then(() => true as const), expired]);
    clearTimeout(timer);

    if (!drained) {
      this.abandoned = true;
      this.log.warn({ callId: this.callId, pending: this.pending, timeoutMs }, 'fragments.drain_timed_out');
    }
    return drained;
  }

  snapshot(): FragmentWriterStats {
    return { ...this.stats };
  }
}

import { Queue, Worker } from 'bullmq';
import type { FastifyBaseLogger } from 'fastify';
import type { CallCompletionResult } from '../repositories/contracts.js';

export type CallCompletionTrigger = 'bridge' | 'api';

export type CallCompletionJob = {
  callId: string;
  trigger: CallCompletionTrigger;
};

export type CallCompletionProcessor = (job: CallCompletionJob) => Promise<CallCompletionResult>;

export type EnqueueResult = {
  jobId: string;
  /** Set when the job ran in-process; BullMQ jobs finish later on the worker. */
  result: CallCompletionResult | null;
};

export interface CallCompletionQueue {
  readonly mode: 'bullmq' | 'in_memory';
  registerProcessor(processor: CallCompletionProcessor): void;
  enqueue(job: CallCompletionJob): Promise<EnqueueResult>;
  close(): Promise<void>;
}

const QUEUE_NAME = 'call-completion';

/** BullMQ rejects custom ids that contain `:` or look like integers. */
export function completionJobId(callId: string): string {
  return `complete-${encodeURIComponent(callId)}`;
}

class InMemoryCallCompletionQueue implements CallCompletionQueue {
  readonly mode = 'in_memory' as const;
  private processor?: CallCompletionProcessor;
  private readonly running = new Map<string, Promise<CallCompletionResult>>();

  registerProcessor(processor: CallCompletionProcessor) {
    this.processor = processor;
  }

  async enqueue(job: CallCompletionJob) {
    const processor = this.processor;
    if (!processor) {
      throw new Error('call completion processor is not registered');
    }

    const jobId = completionJobId(job.callId);
    const inFlight = this.running.get(jobId);
    if (inFlight) {
      return { jobId, result: await inFlight };
    }

    const run = processor(job).finally(() => {
      this.running.delete(jobId);
    });
    this.running.set(jobId, run);
    return { jobId, result: await run };
  }

  async close() {
    await Promise.allSettled(this.running.values());
  }
}

class BullCallCompletionQueue implements CallCompletionQueue {
  readonly mode = 'bullmq' as const;
  private readonly queue: Queue<CallCompletionJob>;
  private readonly fallbackQueue: InMemoryCallCompletionQueue;
  private processor?: CallCompletionProcessor;
  private worker: Worker<CallCompletionJob, CallCompletionResult> | null = null;

  constructor(
    private readonly redisUrl: string,
    private readonly log: FastifyBaseLogger
  ) {
    this.queue = new Queue<CallCompletionJob>(QUEUE_NAME, {
      connection: { url: redisUrl }
    });
    this.fallbackQueue = new InMemoryCallCompletionQueue();
  }

  registerProcessor(processor: CallCompletionProcessor) {
    this.processor = processor;
    this.fallbackQueue.registerProcessor(processor);
  }

  private ensureWorker() {
    const processor = this.processor;
    if (!processor || this.worker) {
      return;
    }

    this.worker = new Worker<CallCompletionJob, CallCompletionResult>(
      QUEUE_NAME,
      async (job) => processor(job.data),
      {
        connection: { url: this.redisUrl }
      }
    );
  }

  async enqueue(job: CallCompletionJob) {
    try {
      const added = await this.queue.add('complete', job, {
        jobId: completionJobId(job.callId),
        attempts: 3,
        backoff: { type: 'exponential', delay: 2_000 },
        removeOnComplete: true,
        removeOnFail: true
      });

      this.ensureWorker();

      return {
        jobId: String(added.id),
        result: null
      };
    } catch (error) {
      this.log.warn(
        { callId: job.callId, error: error instanceof Error ? error.message : String(error) },
        'completion_queue.enqueue_failed_running_in_process'
      );
      return this.fallbackQueue.enqueue(job);
    }
  }

  async close() {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }
    await this.queue.close();
    await this.fallbackQueue.close();
  }
}

export function createCallCompletionQueue(options: {
  redisUrl: string;
  forceInMemory?: boolean;
  log: FastifyBaseLogger;
}): CallCompletionQueue {
  if (!options.redisUrl || options.forceInMemory) {
    return new InMemoryCallCompletionQueue();
  }

  return new BullCallCompletionQueue(options.redisUrl, options.log);
}

import { Job } from 'bullmq';
import { pino } from 'pino';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { completionJobId, createCallCompletionQueue } from '../src/queue/callCompletionQueue.js';
import type { CallCompletionResult } from '../src/repositories/contracts.js';

const bull = vi.hoisted(() => ({
  added: [] as Array<{ name: string; data: unknown; opts: Record<string, unknown> }>,
  addFailure: null as Error | null,
  workers: 0
}));

vi.mock('bullmq', async (importOriginal) => {
  const actual = await importOriginal<typeof import('bullmq')>();

  class Queue {
    async add(name: string, data: unknown, opts: Record<string, unknown>) {
      if (bull.addFailure) {
        throw bull.addFailure;
      }
      bull.added.push({ name, data, opts });
      return { id: opts.jobId };
    }

    async close() {}
  }

  class Worker {
    constructor() {
      bull.workers += 1;
    }

    async close() {}
  }

  return { ...actual, Queue, Worker };
});

function validateJobOptions(opts: Record<string, unknown>, data: unknown = {}) {
  Job.prototype['validateOptions'].call({ id: opts.jobId, opts }, data);
}

const completed: CallCompletionResult = { outcome: 'completed', callId: 'call-42', readingsStored: 1 };

describe('call completion queue on BullMQ', () => {
  beforeEach(() => {
    bull.added.length = 0;
    bull.addFailure = null;
    bull.workers = 0;
  });

  it('adds a job with options BullMQ accepts and reports it as queued', async () => {
    const queue = createCallCompletionQueue({ redisUrl: 'redis://test-redis:6379', log: pino({ level: 'silent' }) });
    const processor = vi.fn(async () => completed);
    queue.registerProcessor(processor);

    expect(queue.mode).toBe('bullmq');
    await expect(queue.enqueue({ callId: 'call-42', trigger: 'bridge' })).resolves.toEqual({
      jobId: 'complete-call-42',
      result: null
    });

    expect(bull.added).toHaveLength(1);
    const [added] = bull.added;
    expect(added.name).toBe('complete');
    expect(added.data).toEqual({ callId: 'call-42', trigger: 'bridge' });
    expect(added.opts).toMatchObject({ jobId: 'complete-call-42', attempts: 3, removeOnComplete: true, removeOnFail: true });
    expect(() => validateJobOptions(added.opts, added.data)).not.toThrow();
    expect(processor).not.toHaveBeenCalled();
    expect(bull.workers).toBe(1);
    await queue.close();
  });

  it('produces ids BullMQ accepts even when the call id has colons or is numeric', () => {
    expect(() => validateJobOptions({ jobId: 'call-42:complete' })).toThrow();

    for (const callId of ['42', 'org:7:call', 'a:b']) {
      expect(() => validateJobOptions({ jobId: completionJobId(callId) })).not.toThrow();
    }
  });

  it('logs and runs in process when the job cannot be added', async () => {
    bull.addFailure = new Error('connection is closed');
    const log = pino({ level: 'silent' });
    const warn = vi.spyOn(log, 'warn');
    const queue = createCallCompletionQueue({ redisUrl: 'redis://test-redis:6379', log });
    const processor = vi.fn(async () => completed);
    queue.registerProcessor(processor);

    await expect(queue.enqueue({ callId: 'call-42', trigger: 'api' })).resolves.toEqual({
      jobId: 'complete-call-42',
      result: completed
    });

    expect(processor).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { callId: 'call-42', error: 'connection is closed' },
      'completion_queue.enqueue_failed_running_in_process'
    );
    expect(bull.workers).toBe(0);
    await queue.close();
  });
});

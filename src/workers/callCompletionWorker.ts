import type { FastifyBaseLogger } from 'fastify';
import type { CallCompletionJob } from '../queue/callCompletionQueue.js';
import type { CallCompletionResult, CallRecord, CallsRepository } from '../repositories/contracts.js';
import { CompletionError, type CallPersistence } from '../services/callPersistence.js';
import type { ReadingsExtractor } from '../services/readingsExtractor.js';

export function createCallCompletionWorker(deps: {
  calls: Pick<CallsRepository, 'getById'>;
  persistence: Pick<CallPersistence, 'completeCall'>;
  extractor: ReadingsExtractor;
  log: FastifyBaseLogger;
}) {
  return async (job: CallCompletionJob): Promise<CallCompletionResult> => {
    const log = deps.log.child({ callId: job.callId, trigger: job.trigger });

    let call: CallRecord | null;
    try {
      call = await deps.calls.getById(job.callId);
    } catch (error) {
      throw new CompletionError(job.callId, error);
    }

    if (!call) {
      log.warn('completion.call_not_found');
      return { outcome: 'not_found', callId: job.callId };
    }
    if (call.status === 'completed') {
      log.info('completion.already_completed');
      return { outcome: 'already_completed', callId: job.callId };
    }

    const extraction = await deps.extractor.extract(call.transcript ?? '', { callId: job.callId });
    const result = await deps.persistence.completeCall(job.callId, extraction);

    log.info(
      {
        outcome: result.outcome,
        readingsStored: result.outcome === 'completed' ? result.readingsStored : 0
      },
      'completion.finished'
    );
    return result;
  };
}

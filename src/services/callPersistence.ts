import type { FastifyBaseLogger } from 'fastify';
import type {
  CallCompletionInput,
  CallCompletionResult,
  CallRecord,
  CallsRepository,
  TranscriptFragment
} from '../repositories/contracts.js';

export class CompletionError extends Error {
  readonly callId: string;

  constructor(callId: string, cause: unknown) {
    super(`failed to complete call ${callId}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause
    });
    this.name = 'CompletionError';
    this.callId = callId;
  }
}

export type FragmentInput = Omit<TranscriptFragment, 'callId'>;

export interface CallPersistence {
  lookupCall(callId: string): Promise<CallRecord | null>;
  appendFragment(callId: string, fragment: FragmentInput): Promise<boolean>;
  completeCall(callId: string, input: CallCompletionInput): Promise<CallCompletionResult>;
  markCallActive(callId: string, providerCallSid: string | null): Promise<void>;
  markCallFailed(callId: string): Promise<void>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createCallPersistence(deps: { calls: CallsRepository; log: FastifyBaseLogger }): CallPersistence {
  const { calls, log } = deps;

  return {
    async lookupCall(callId) {
      try {
        return await calls.getById(callId);
      } catch (error) {
        log.warn({ callId, error: errorMessage(error) }, 'persistence.lookup_failed');
        return null;
      }
    },

    async appendFragment(callId, fragment) {
      try {
        await calls.appendFragment({ ...fragment, callId });
        return true;
      } catch (error) {
        log.warn({ callId, seq: fragment.seq, error: errorMessage(error) }, 'persistence.fragment_append_failed');
        return false;
      }
    },

    async completeCall(callId, input) {
      try {
        return await calls.complete(callId, input);
      } catch (error) {
        throw new CompletionError(callId, error);
      }
    },

    async markCallActive(callId, providerCallSid) {
      try {
        await calls.markActive(callId, providerCallSid);
      } catch (error) {
        log.warn({ callId, error: errorMessage(error) }, 'persistence.mark_active_failed');
      }
    },

    async markCallFailed(callId) {
      try {
        await calls.updateStatus(callId, 'failed');
      } catch (error) {
        log.warn({ callId, error: errorMessage(error) }, 'persistence.mark_failed_failed');
      }
    }
  };
}

import type { DbExecutor, DbRow } from './db.js';
import { mapTimestamps } from './db.js';
import type { MemoryStore } from './memoryStore.js';
import type { FragmentsRepository, SpeakerRole, TranscriptFragment } from './contracts.js';

function toRole(value: unknown): SpeakerRole {
  return value === 'assistant' ? 'assistant' : 'user';
}

function toFragment(row: DbRow): TranscriptFragment {
  const value = mapTimestamps(row);
  return {
    callId: String(value.call_id),
    seq: Number(value.seq),
    role: toRole(value.role),
    text: String(value.text),
    timestamp: String(value.spoken_at)
  };
}

export function createFragmentsRepository(db: DbExecutor | null, store: MemoryStore): FragmentsRepository {
  return {
    async listByCall(callId) {
      if (!db) {
        return [...(store.fragments.get(callId) ?? [])];
      }

      const result = await db.query<DbRow>(
        `
          SELECT call_id, seq, role, text, spoken_at
          FROM transcript_fragments
          WHERE call_id = $1
          ORDER BY seq ASC
        `,
        [callId]
      );

      return result.rows.map(toFragment);
    },

    async countByCall(callId) {
      if (!db) {
        return store.fragments.get(callId)?.length ?? 0;
      }

      const result = await db.query<{ count: string }>(
        'SELECT COUNT(*)::text AS count FROM transcript_fragments WHERE call_id = $1',
        [callId]
      );

      return Number(result.rows[0].count);
    }
  };
}

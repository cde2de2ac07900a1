import type { DbExecutor, DbRow } from './db.js';
import { mapTimestamps, nullableNumber, nullableString } from './db.js';
import type { MemoryStore } from './memoryStore.js';
import type {
  CallCompletionResult,
  CallRecord,
  CallStatus,
  CallsRepository,
  Reading
} from './contracts.js';

const CALL_COLUMNS = `
  call_id, org_id, patient_id, agent, provider_call_sid, status, start_time, end_time,
  duration_seconds, transcript, summary, created_at, updated_at
`;

function toCallStatus(value: unknown): CallStatus {
  const status = String(value);
  if (status === 'pending' || status === 'active' || status === 'completed' || status === 'failed') {
    return status;
  }
  throw new Error(`unexpected call status in storage: ${status}`);
}

function toCall(row: DbRow): CallRecord {
  const value = mapTimestamps(row);
  return {
    callId: String(value.call_id),
    orgId: String(value.org_id),
    patientId: nullableString(value.patient_id),
    agent: nullableString(value.agent),
    providerCallSid: nullableString(value.provider_call_sid),
    status: toCallStatus(value.status),
    startTime: nullableString(value.start_time),
    endTime: nullableString(value.end_time),
    durationSeconds: nullableNumber(value.duration_seconds),
    transcript: nullableString(value.transcript),
    summary: nullableString(value.summary),
    createdAt: String(value.created_at),
    updatedAt: String(value.updated_at)
  };
}

export function formatTranscriptLine(role: string, text: string): string {
  return `\n[${role}] ${text}`;
}

function elapsedSeconds(startIso: string | null, endIso: string): number | null {
  if (!startIso) {
    return null;
  }
  return Math.max(0, Math.round((Date.parse(endIso) - Date.parse(startIso)) / 1000));
}

export function createCallsRepository(db: DbExecutor | null, store: MemoryStore): CallsRepository {
  function touch(callId: string, patch: (call: CallRecord, now: string) => Partial<CallRecord>) {
    const existing = store.calls.get(callId);
    if (!existing) {
      return;
    }
    const now = new Date().toISOString();
    store.calls.set(callId, { ...existing, ...patch(existing, now), updatedAt: now });
  }

  return {
    async insert(input) {
      if (!db) {
        const now = new Date().toISOString();
        const created: CallRecord = {
          ...input,
          providerCallSid: null,
          status: 'pending',
          startTime: null,
          endTime: null,
          durationSeconds: null,
          transcript: null,
          summary: null,
          createdAt: now,
          updatedAt: now
        };
        store.calls.set(input.callId, created);
        return created;
      }

      const result = await db.query<DbRow>(
        `
          INSERT INTO calls(call_id, org_id, patient_id, agent, status)
          VALUES ($1, $2, $3, $4, 'pending')
          RETURNING ${CALL_COLUMNS}
        `,
        [input.callId, input.orgId, input.patientId, input.agent]
      );
      return toCall(result.rows[0]);
    },

    async getById(callId) {
      if (!db) {
        return store.calls.get(callId) ?? null;
      }

      const result = await db.query<DbRow>(`SELECT ${CALL_COLUMNS} FROM calls WHERE call_id = $1`, [callId]);
      if (result.rows.length === 0) {
        return null;
      }
      return toCall(result.rows[0]);
    },

    async markActive(callId, providerCallSid) {
      if (!db) {
        touch(callId, (call, now) => ({
          status: call.status === 'pending' ? 'active' : call.status,
          startTime: call.startTime ?? now,
          providerCallSid: providerCallSid ?? call.providerCallSid
        }));
        return;
      }

      await db.query(
        `
          UPDATE calls
          SET status = CASE WHEN status = 'pending' THEN 'active' ELSE status END,
              start_time = COALESCE(start_time, NOW()),
              provider_call_sid = COALESCE($2, provider_call_sid),
              updated_at = NOW()
          WHERE call_id = $1
        `,
        [callId, providerCallSid]
      );
    },

    async updateStatus(callId, status) {
      if (!db) {
        touch(callId, () => ({ status }));
        return;
      }

      await db.query(`UPDATE calls SET status = $2, updated_at = NOW() WHERE call_id = $1`, [callId, status]);
    },

    async appendFragment(fragment) {
      if (!db) {
        const call = store.calls.get(fragment.callId);
        if (!call) {
          throw new Error(`call not found: ${fragment.callId}`);
        }
        const fragments = store.fragments.get(fragment.callId) ?? [];
        fragments.push(fragment);
        store.fragments.set(fragment.callId, fragments);
        touch(fragment.callId, (existing) => ({
          transcript: (existing.transcript ?? '') + formatTranscriptLine(fragment.role, fragment.text)
        }));
        return;
      }

      await db.query(
        `
          WITH inserted AS (
            INSERT INTO transcript_fragments(call_id, seq, role, text, spoken_at)
            VALUES ($1, $2, $3, $4, $5)
            RETURNING call_id
          )
          UPDATE calls
          SET transcript = COALESCE(calls.transcript, '') || $6,
              updated_at = NOW()
          FROM inserted
          WHERE calls.call_id = inserted.call_id
        `,
        [
          fragment.callId,
          fragment.seq,
          fragment.role,
          fragment.text,
          fragment.timestamp,
          formatTranscriptLine(fragment.role, fragment.text)
        ]
      );
    },

    async complete(callId, input) {
      if (!db) {
        const call = store.calls.get(callId);
        if (!call) {
          return { outcome: 'not_found', callId } satisfies CallCompletionResult;
        }
        if (call.status === 'completed') {
          return { outcome: 'already_completed', callId } satisfies CallCompletionResult;
        }

        const now = new Date().toISOString();
        const endTime = call.endTime ?? now;
        const readings: Reading[] = input.readings.map((reading) => ({
          ...reading,
          callId,
          patientId: call.patientId,
          createdAt: now
        }));

        store.calls.set(callId, {
          ...call,
          status: 'completed',
          endTime,
          durationSeconds: elapsedSeconds(call.startTime, endTime),
          summary: input.summary ?? call.summary,
          updatedAt: now
        });
        for (const reading of readings) {
          store.readings.set(reading.readingId, reading);
        }

        return { outcome: 'completed', callId, readingsStored: readings.length } satisfies CallCompletionResult;
      }

      const result = await db.query<DbRow>(
        `
          WITH existing AS (
            SELECT call_id, status
            FROM calls
            WHERE call_id = $1
          ),
          target AS (
            UPDATE calls
            SET status = 'completed',
                end_time = COALESCE(end_time, NOW()),
                duration_seconds = CASE
                  WHEN start_time IS NULL THEN NULL
                  ELSE GREATEST(0, ROUND(EXTRACT(EPOCH FROM (COALESCE(end_time, NOW()) - start_time))))::int
                END,
                summary = COALESCE($2, summary),
                updated_at = NOW()
            WHERE call_id = $1
              AND status <> 'completed'
            RETURNING call_id, patient_id
          ),
          inserted AS (
            INSERT INTO readings(reading_id, call_id, patient_id, reading_type, value, units, recorded_at, raw_text)
            SELECT r.reading_id, target.call_id, target.patient_id, r.reading_type, r.value, r.units, r.recorded_at, r.raw_text
            FROM target
            CROSS JOIN jsonb_to_recordset($3::jsonb) AS r(
              reading_id TEXT,
              reading_type TEXT,
              value TEXT,
              units TEXT,
              recorded_at TIMESTAMPTZ,
              raw_text TEXT
            )
            RETURNING reading_id
          )
          SELECT
            (SELECT COUNT(*)::int FROM existing) AS existing_count,
            (SELECT COUNT(*)::int FROM target) AS completed_count,
            (SELECT COUNT(*)::int FROM inserted) AS inserted_count
        `,
        [
          callId,
          input.summary,
          JSON.stringify(
            input.readings.map((reading) => ({
              reading_id: reading.readingId,
              reading_type: reading.readingType,
              value: reading.value,
              units: reading.units,
              recorded_at: reading.recordedAt,
              raw_text: reading.rawText
            }))
          )
        ]
      );

      const row = result.rows[0];
      if (Number(row.existing_count) === 0) {
        return { outcome: 'not_found', callId } satisfies CallCompletionResult;
      }
      if (Number(row.completed_count) === 0) {
        return { outcome: 'already_completed', callId } satisfies CallCompletionResult;
      }

      return {
        outcome: 'completed',
        callId,
        readingsStored: Number(row.inserted_count)
      } satisfies CallCompletionResult;
    }
  };
}

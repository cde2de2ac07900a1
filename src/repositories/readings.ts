import type { DbExecutor, DbRow } from './db.js';
import { mapTimestamps, nullableString } from './db.js';
import type { MemoryStore } from './memoryStore.js';
import type { Reading, ReadingsRepository } from './contracts.js';

function toReading(row: DbRow): Reading {
  const value = mapTimestamps(row);
  return {
    readingId: String(value.reading_id),
    callId: String(value.call_id),
    patientId: nullableString(value.patient_id),
    readingType: String(value.reading_type),
    value: String(value.value),
    units: nullableString(value.units),
    recordedAt: nullableString(value.recorded_at),
    rawText: nullableString(value.raw_text),
    createdAt: String(value.created_at)
  };
}

export function createReadingsRepository(db: DbExecutor | null, store: MemoryStore): ReadingsRepository {
  return {
    async listByCall(callId) {
      if (!db) {
        return Array.from(store.readings.values()).filter((reading) => reading.callId === callId);
      }

      const result = await db.query<DbRow>(
        `
          SELECT reading_id, call_id, patient_id, reading_type, value, units, recorded_at, raw_text, created_at
          FROM readings
          WHERE call_id = $1
          ORDER BY created_at ASC, reading_id ASC
        `,
        [callId]
      );

      return result.rows.map(toReading);
    }
  };
}

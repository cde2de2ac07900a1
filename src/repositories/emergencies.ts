import type { DbExecutor, DbRow } from './db.js';
import { mapTimestamps, nullableString } from './db.js';
import type { MemoryStore } from './memoryStore.js';
import type {
  EmergenciesRepository,
  EmergencyEvent,
  EmergencyRecordResult,
  EmergencySeverity
} from './contracts.js';

function toSeverity(value: unknown): EmergencySeverity {
  return value === 'critical' || value === 'medium' ? value : 'high';
}

function toDetectorInfo(value: unknown): Record<string, unknown> {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

function toEmergencyEvent(row: DbRow): EmergencyEvent {
  const value = mapTimestamps(row);
  return {
    eventId: String(value.event_id),
    callId: nullableString(value.call_id),
    patientId: String(value.patient_id),
    orgId: nullableString(value.org_id),
    severity: toSeverity(value.severity),
    signalText: String(value.signal_text),
    detectorInfo: toDetectorInfo(value.detector_info),
    detectedAt: String(value.detected_at)
  };
}

export function createEmergenciesRepository(db: DbExecutor | null, store: MemoryStore): EmergenciesRepository {
  return {
    async record(input) {
      if (!db) {
        const patient = store.patients.get(input.patientId);
        if (!patient) {
          return { outcome: 'patient_not_found', patientId: input.patientId } satisfies EmergencyRecordResult;
        }

        const detectedAt = new Date().toISOString();
        const event: EmergencyEvent = { ...input, orgId: patient.orgId, detectedAt };
        store.emergencies.set(event.eventId, event);
        store.patients.set(patient.patientId, {
          ...patient,
          emergencyFlag: true,
          lastEmergencyAt: detectedAt
        });
        return { outcome: 'recorded', event } satisfies EmergencyRecordResult;
      }

      const result = await db.query<DbRow>(
        `
          WITH flagged AS (
            UPDATE patients
            SET emergency_flag = TRUE,
                last_emergency_at = NOW()
            WHERE patient_id = $3
            RETURNING patient_id, org_id
          )
          INSERT INTO emergency_events(event_id, call_id, patient_id, org_id, severity, signal_text, detector_info)
          SELECT $1, $2, flagged.patient_id, flagged.org_id, $4, $5, $6::jsonb
          FROM flagged
          RETURNING event_id, call_id, patient_id, org_id, severity, signal_text, detector_info, detected_at
        `,
        [
          input.eventId,
          input.callId,
          input.patientId,
          input.severity,
          input.signalText,
          JSON.stringify(input.detectorInfo)
        ]
      );

      if (result.rows.length === 0) {
        return { outcome: 'patient_not_found', patientId: input.patientId } satisfies EmergencyRecordResult;
      }

      return { outcome: 'recorded', event: toEmergencyEvent(result.rows[0]) } satisfies EmergencyRecordResult;
    },

    async listByPatient(patientId) {
      if (!db) {
        return Array.from(store.emergencies.values()).filter((event) => event.patientId === patientId);
      }

      const result = await db.query<DbRow>(
        `
          SELECT event_id, call_id, patient_id, org_id, severity, signal_text, detector_info, detected_at
          FROM emergency_events
          WHERE patient_id = $1
          ORDER BY detected_at ASC
        `,
        [patientId]
      );

      return result.rows.map(toEmergencyEvent);
    }
  };
}

import type { DbExecutor, DbRow } from './db.js';
import { mapTimestamps, nullableString } from './db.js';
import type { MemoryStore } from './memoryStore.js';
import type { Patient, PatientsRepository } from './contracts.js';

const PATIENT_COLUMNS = `
  patient_id, org_id, external_id, name, first_name, last_name, to_char(dob, 'YYYY-MM-DD') AS dob, phone,
  emergency_flag, last_emergency_at
`;

function toPatient(row: DbRow): Patient {
  const value = mapTimestamps(row);
  return {
    patientId: String(value.patient_id),
    orgId: String(value.org_id),
    externalId: String(value.external_id),
    name: String(value.name),
    firstName: nullableString(value.first_name),
    lastName: nullableString(value.last_name),
    dob: nullableString(value.dob),
    phone: nullableString(value.phone),
    emergencyFlag: Boolean(value.emergency_flag),
    lastEmergencyAt: nullableString(value.last_emergency_at)
  };
}

export function createPatientsRepository(db: DbExecutor | null, store: MemoryStore): PatientsRepository {
  return {
    async insert(input) {
      if (!db) {
        const created: Patient = { ...input, emergencyFlag: false, lastEmergencyAt: null };
        store.patients.set(input.patientId, created);
        return created;
      }

      const result = await db.query<DbRow>(
        `
          INSERT INTO patients(patient_id, org_id, external_id, name, first_name, last_name, dob, phone)
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
          RETURNING ${PATIENT_COLUMNS}
        `,
        [
          input.patientId,
          input.orgId,
          input.externalId,
          input.name,
          input.firstName,
          input.lastName,
          input.dob,
          input.phone
        ]
      );
      return toPatient(result.rows[0]);
    },

    async getById(patientId) {
      if (!db) {
        return store.patients.get(patientId) ?? null;
      }

      const result = await db.query<DbRow>(
        `SELECT ${PATIENT_COLUMNS} FROM patients WHERE patient_id = $1`,
        [patientId]
      );
      if (result.rows.length === 0) {
        return null;
      }
      return toPatient(result.rows[0]);
    }
  };
}

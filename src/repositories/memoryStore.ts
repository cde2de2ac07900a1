import type {
  CallRecord,
  EmergencyEvent,
  Organization,
  Patient,
  Reading,
  TranscriptFragment
} from './contracts.js';

export type MemoryStore = {
  calls: Map<string, CallRecord>;
  fragments: Map<string, TranscriptFragment[]>;
  patients: Map<string, Patient>;
  organizations: Map<string, Organization>;
  readings: Map<string, Reading>;
  emergencies: Map<string, EmergencyEvent>;
};

export function createMemoryStore(): MemoryStore {
  return {
    calls: new Map(),
    fragments: new Map(),
    patients: new Map(),
    organizations: new Map(),
    readings: new Map(),
    emergencies: new Map()
  };
}

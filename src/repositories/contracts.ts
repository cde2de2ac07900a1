export type CallStatus = 'pending' | 'active' | 'completed' | 'failed';
export type SpeakerRole = 'user' | 'assistant';
export type EmergencySeverity = 'critical' | 'high' | 'medium';

export type CallRecord = {
  callId: string;
  orgId: string;
  patientId: string | null;
  agent: string | null;
  providerCallSid: string | null;
  status: CallStatus;
  startTime: string | null;
  endTime: string | null;
  durationSeconds: number | null;
  transcript: string | null;
  summary: string | null;
  createdAt: string;
  updatedAt: string;
};

export type Patient = {
  patientId: string;
  orgId: string;
  externalId: string;
  name: string;
  firstName: string | null;
  lastName: string | null;
  dob: string | null;
  phone: string | null;
  emergencyFlag: boolean;
  lastEmergencyAt: string | null;
};

export type Organization = {
  orgId: string;
  name: string;
};

export type TranscriptFragment = {
  callId: string;
  seq: number;
  role: SpeakerRole;
  text: string;
  timestamp: string;
};

export type Reading = {
  readingId: string;
  callId: string;
  patientId: string | null;
  readingType: string;
  value: string;
  units: string | null;
  recordedAt: string | null;
  rawText: string | null;
  createdAt: string;
};

export type ReadingInput = Omit<Reading, 'callId' | 'patientId' | 'createdAt'>;

export type EmergencyEvent = {
  eventId: string;
  callId: string | null;
  patientId: string;
  orgId: string | null;
  severity: EmergencySeverity;
  signalText: string;
  detectorInfo: Record<string, unknown>;
  detectedAt: string;
};

export type CallCompletionInput = {
  summary: string | null;
  readings: ReadingInput[];
};

export type CallCompletionResult =
  | { outcome: 'completed'; callId: string; readingsStored: number }
  | { outcome: 'already_completed'; callId: string }
  | { outcome: 'not_found'; callId: string };

export type EmergencyRecordResult =
  | { outcome: 'recorded'; event: EmergencyEvent }
  | { outcome: 'patient_not_found'; patientId: string };

export interface CallsRepository {
  insert(call: Pick<CallRecord, 'callId' | 'orgId' | 'patientId' | 'agent'>): Promise<CallRecord>;
  getById(callId: string): Promise<CallRecord | null>;
  markActive(callId: string, providerCallSid: string | null): Promise<void>;
  updateStatus(callId: string, status: CallStatus): Promise<void>;
  appendFragment(fragment: TranscriptFragment): Promise<void>;
  complete(callId: string, input: CallCompletionInput): Promise<CallCompletionResult>;
}

export interface FragmentsRepository {
  listByCall(callId: string): Promise<TranscriptFragment[]>;
  countByCall(callId: string): Promise<number>;
}

export interface PatientsRepository {
  insert(patient: Omit<Patient, 'emergencyFlag' | 'lastEmergencyAt'>): Promise<Patient>;
  getById(patientId: string): Promise<Patient | null>;
}

export interface OrganizationsRepository {
  insert(org: Organization): Promise<Organization>;
  getById(orgId: string): Promise<Organization | null>;
}

export interface ReadingsRepository {
  listByCall(callId: string): Promise<Reading[]>;
}

export interface EmergenciesRepository {
  record(event: Omit<EmergencyEvent, 'orgId' | 'detectedAt'>): Promise<EmergencyRecordResult>;
  listByPatient(patientId: string): Promise<EmergencyEvent[]>;
}

export interface RepositoryBundle {
  calls: CallsRepository;
  fragments: FragmentsRepository;
  patients: PatientsRepository;
  organizations: OrganizationsRepository;
  readings: ReadingsRepository;
  emergencies: EmergenciesRepository;
}

import type { FastifyBaseLogger } from 'fastify';
import { resolveAgentName } from '../lib/agentPrecedence.js';
import type {
  CallRecord,
  Organization,
  OrganizationsRepository,
  Patient,
  PatientsRepository
} from '../repositories/contracts.js';
import type { CallPersistence } from './callPersistence.js';
import type { PromptResolver, PromptSource } from './promptResolver.js';

export type SessionContext = {
  callId: string;
  call: CallRecord | null;
  agentName: string;
  promptSource: PromptSource;
  prompt: string;
  personalized: boolean;
};

export interface SessionContextBuilder {
  build(callId: string, queryAgent: string | null): Promise<SessionContext>;
}

export function renderPatientContext(patient: Patient, organization: Organization | null): string {
  const firstName = patient.firstName ?? patient.name.split(/\s+/)[0] ?? null;

  return [
    '### PATIENT CONTEXT (do not reveal confidential details):',
    `- patient_legal_name: ${patient.name || 'unknown'}`,
    `- patient_first_name: ${firstName || 'unknown'}`,
    `- patient_id_internal: ${patient.externalId}`,
    `- patient_dob: ${patient.dob ?? 'unknown'}`,
    `- organization_name: ${organization?.name ?? 'unknown'}`,
    '',
    '### VOICE & TONE:',
    '- Greet the patient by first name once at the start.',
    '- Be clear, empathetic and professional; avoid repeating their name unnecessarily.',
    '',
    '### TASK:',
    '- Collect vitals: BP (systolic/diastolic), pulse, glucose, weight.',
    '- Confirm understanding and provide a brief summary.',
    '',
    ''
  ].join('\n');
}

export function createSessionContextBuilder(deps: {
  persistence: Pick<CallPersistence, 'lookupCall'>;
  patients: PatientsRepository;
  organizations: OrganizationsRepository;
  promptResolver: PromptResolver;
  personalize: boolean;
  log: FastifyBaseLogger;
}): SessionContextBuilder {
  const { log } = deps;

  async function loadPatientContext(call: CallRecord): Promise<string | null> {
    if (!call.patientId) {
      return null;
    }

    try {
      const patient = await deps.patients.getById(call.patientId);
      if (!patient) {
        return null;
      }
      const organization = await deps.organizations.getById(call.orgId);
      return renderPatientContext(patient, organization);
    } catch (error) {
      log.warn(
        { callId: call.callId, error: error instanceof Error ? error.message : String(error) },
        'context.personalization_skipped'
      );
      return null;
    }
  }

  return {
    async build(callId, queryAgent) {
      const call = await deps.persistence.lookupCall(callId);
      const resolved = await deps.promptResolver.resolve(resolveAgentName(call?.agent, queryAgent));

      const patientContext = deps.personalize && call ? await loadPatientContext(call) : null;

      log.info(
        {
          callId,
          callFound: call !== null,
          agentName: resolved.agentName,
          promptSource: resolved.source,
          personalized: patientContext !== null
        },
        'context.built'
      );

      return {
        callId,
        call,
        agentName: resolved.agentName,
        promptSource: resolved.source,
        prompt: patientContext ? `${patientContext}${resolved.text}` : resolved.text,
        personalized: patientContext !== null
      };
    }
  };
}

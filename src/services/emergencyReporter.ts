import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { EmergenciesRepository } from '../repositories/contracts.js';

export const DETECT_EMERGENCY_FUNCTION = 'detect_emergency';

const emergencyArgumentsSchema = z.object({
  severity: z.enum(['critical', 'high', 'medium']).catch('high'),
  reason: z.string().trim().min(1).catch('Emergency detected during call')
});

export type FunctionCallReply = {
  success: boolean;
  message: string;
  eventId?: string;
};

export interface EmergencyReporter {
  report(input: { callId: string; patientId: string | null; rawArguments: string }): Promise<FunctionCallReply>;
}

function parseArguments(rawArguments: string): unknown {
  try {
    return JSON.parse(rawArguments);
  } catch {
    return {};
  }
}

export function createEmergencyReporter(deps: {
  emergencies: EmergenciesRepository;
  log: FastifyBaseLogger;
}): EmergencyReporter {
  return {
    async report({ callId, patientId, rawArguments }) {
      const args = emergencyArgumentsSchema.parse(parseArguments(rawArguments));

      if (!patientId) {
        deps.log.warn({ callId, severity: args.severity }, 'emergency.no_patient_for_call');
        return { success: false, message: 'Patient not found' };
      }

      try {
        const result = await deps.emergencies.record({
          eventId: randomUUID(),
          callId,
          patientId,
          severity: args.severity,
          signalText: args.reason,
          detectorInfo: {
            model: 'agent_function_call',
            function: DETECT_EMERGENCY_FUNCTION,
            severity: args.severity
          }
        });

        if (result.outcome === 'patient_not_found') {
          deps.log.warn({ callId, patientId }, 'emergency.patient_not_found');
          return { success: false, message: 'Patient not found' };
        }

        deps.log.warn(
          { callId, patientId, severity: args.severity, eventId: result.event.eventId },
          'emergency.recorded'
        );
        return {
          success: true,
          message: `Emergency logged with severity ${args.severity}. Medical staff will be notified.`,
          eventId: result.event.eventId
        };
      } catch (error) {
        deps.log.error(
          { callId, patientId, error: error instanceof Error ? error.message : String(error) },
          'emergency.record_failed'
        );
        return { success: false, message: 'Failed to log emergency' };
      }
    }
  };
}

import { DETECT_EMERGENCY_FUNCTION } from '../services/emergencyReporter.js';

export interface AgentFunctionDefinition {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, { type: string; description?: string; enum?: string[] }>;
    required?: string[];
  };
}

export interface AgentSettings {
  type: 'Settings';
  audio: {
    input: { encoding: 'mulaw'; sample_rate: number };
    output: { encoding: 'mulaw'; sample_rate: number; container: 'none' };
  };
  agent: {
    language: string;
    listen: { provider: { type: 'deepgram'; model: string } };
    think: {
      provider: { type: string; model: string; temperature: number };
      prompt: string;
      functions: AgentFunctionDefinition[];
    };
    speak: { provider: { type: 'deepgram'; model: string } };
    greeting?: string;
  };
}

export type AgentModelOptions = {
  language: string;
  listenModel: string;
  thinkProvider: string;
  thinkModel: string;
  thinkTemperature: number;
  speakModel: string;
};

export const DEFAULT_AGENT_MODELS: AgentModelOptions = {
  language: 'en',
  listenModel: 'nova-3',
  thinkProvider: 'open_ai',
  thinkModel: 'gpt-4o-mini',
  thinkTemperature: 0.3,
  speakModel: 'aura-2-thalia-en'
};

/** Twilio media streams carry 8 kHz mu-law in both directions. */
const TELEPHONY_SAMPLE_RATE = 8000;

const EMERGENCY_INSTRUCTIONS = [
  '',
  `IMPORTANT: If the patient mentions ANY of the following, you MUST immediately call the ${DETECT_EMERGENCY_FUNCTION} function:`,
  '- Chest pain, severe chest pain, pressure in chest',
  "- Can't breathe, difficulty breathing, shortness of breath",
  '- Calling 911, need emergency help, need ambulance',
  '- Heart attack, stroke symptoms',
  '- Severe pain anywhere in the body',
  '- Feeling dizzy, lightheaded, or faint',
  '- Any life-threatening situation',
  '',
  `Call ${DETECT_EMERGENCY_FUNCTION} BEFORE responding to the patient.`
].join('\n');

export const detectEmergencyFunction: AgentFunctionDefinition = {
  name: DETECT_EMERGENCY_FUNCTION,
  description:
    'MUST be called immediately when the patient reports chest pain, difficulty breathing, mentions 911, or any life-threatening symptom.',
  parameters: {
    type: 'object',
    properties: {
      severity: {
        type: 'string',
        enum: ['critical', 'high', 'medium'],
        description: "critical=chest pain/can't breathe/911/stroke, high=severe pain/dizziness, medium=concerning symptoms"
      },
      reason: {
        type: 'string',
        description: "Exact quote of what the patient said (e.g., 'severe pain in my chest')"
      }
    },
    required: ['severity', 'reason']
  }
};

export function buildAgentSettings(prompt: string, models: AgentModelOptions = DEFAULT_AGENT_MODELS): AgentSettings {
  return {
    type: 'Settings',
    audio: {
      input: { encoding: 'mulaw', sample_rate: TELEPHONY_SAMPLE_RATE },
      output: { encoding: 'mulaw', sample_rate: TELEPHONY_SAMPLE_RATE, container: 'none' }
    },
    agent: {
      language: models.language,
      listen: { provider: { type: 'deepgram', model: models.listenModel } },
      think: {
        provider: { type: models.thinkProvider, model: models.thinkModel, temperature: models.thinkTemperature },
        prompt: `${prompt.trim()}\n${EMERGENCY_INSTRUCTIONS}`,
        functions: [detectEmergencyFunction]
      },
      speak: { provider: { type: 'deepgram', model: models.speakModel } }
    }
  };
}

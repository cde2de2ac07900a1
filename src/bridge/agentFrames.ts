import { z } from 'zod';
import { parseJsonText, type ParseResult } from './telephonyFrames.js';

const conversationTextSchema = z.object({
  type: z.literal('ConversationText'),
  role: z.enum(['user', 'assistant']),
  content: z.string()
});

const functionCallRequestSchema = z.object({
  type: z.literal('FunctionCallRequest'),
  functions: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      arguments: z.string().default('{}'),
      client_side: z.boolean().default(true)
    })
  )
});

const errorEventSchema = z.object({
  type: z.literal('Error'),
  description: z.string().optional(),
  code: z.string().optional()
});

const warningEventSchema = z.object({
  type: z.literal('Warning'),
  description: z.string().optional(),
  code: z.string().optional()
});

const signalEventSchema = z.object({
  type: z.enum([
    'Welcome',
    'SettingsApplied',
    'UserStartedSpeaking',
    'AgentStartedSpeaking',
    'AgentThinking',
    'AgentAudioDone',
    'PromptUpdated',
    'SpeakUpdated',
    'InjectionRefused',
    'History'
  ])
});

const envelopeSchema = z.object({ type: z.string().min(1) });

export type AgentEvent =
  | z.infer<typeof conversationTextSchema>
  | z.infer<typeof functionCallRequestSchema>
  | z.infer<typeof errorEventSchema>
  | z.infer<typeof warningEventSchema>
  | z.infer<typeof signalEventSchema>
  | { type: 'Unrecognized'; name: string };

export type AgentFunctionCall = z.infer<typeof functionCallRequestSchema>['functions'][number];

const schemasByType = new Map<string, z.ZodType<AgentEvent, z.ZodTypeDef, unknown>>([
  ['ConversationText', conversationTextSchema],
  ['FunctionCallRequest', functionCallRequestSchema],
  ['Error', errorEventSchema],
  ['Warning', warningEventSchema]
]);

/**
 * Parses a JSON server event from the voice agent. Event types this bridge
 * does not act on come back as `Unrecognized` rather than as errors.
 */
export function parseAgentEvent(text: string): ParseResult<AgentEvent> {
  const json = parseJsonText(text);
  if (!json.ok) {
    return json;
  }

  const envelope = envelopeSchema.safeParse(json.value);
  if (!envelope.success) {
    return { ok: false, error: 'agent event without type' };
  }

  const schema =
    schemasByType.get(envelope.data.type) ??
    (signalEventSchema.shape.type.safeParse(envelope.data.type).success ? signalEventSchema : null);
  if (!schema) {
    return { ok: true, value: { type: 'Unrecognized', name: envelope.data.type } };
  }

  const parsed = schema.safeParse(json.value);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0]?.message ?? `invalid ${envelope.data.type} event` };
  }
  return { ok: true, value: parsed.data };
}

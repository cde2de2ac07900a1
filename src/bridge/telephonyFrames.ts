import { z } from 'zod';

const streamSidField = z.string().optional();

const connectedFrameSchema = z.object({
  event: z.literal('connected'),
  protocol: z.string().optional(),
  version: z.string().optional()
});

const startFrameSchema = z.object({
  event: z.literal('start'),
  sequenceNumber: z.string().optional(),
  streamSid: streamSidField,
  start: z.object({
    streamSid: z.string().min(1),
    callSid: z.string().optional(),
    accountSid: z.string().optional(),
    tracks: z.array(z.string()).optional(),
    customParameters: z.record(z.string()).optional(),
    mediaFormat: z
      .object({
        encoding: z.string(),
        sampleRate: z.number(),
        channels: z.number()
      })
      .partial()
      .optional()
  })
});

const mediaFrameSchema = z.object({
  event: z.literal('media'),
  sequenceNumber: z.string().optional(),
  streamSid: streamSidField,
  media: z.object({
    track: z.string().optional(),
    chunk: z.string().optional(),
    timestamp: z.string().optional(),
    payload: z.string()
  })
});

const stopFrameSchema = z.object({
  event: z.literal('stop'),
  sequenceNumber: z.string().optional(),
  streamSid: streamSidField,
  stop: z.object({ callSid: z.string().optional() }).optional()
});

const markFrameSchema = z.object({
  event: z.literal('mark'),
  streamSid: streamSidField,
  mark: z.object({ name: z.string() })
});

const dtmfFrameSchema = z.object({
  event: z.literal('dtmf'),
  streamSid: streamSidField,
  dtmf: z.object({ digit: z.string(), track: z.string().optional() })
});

export const telephonyFrameSchema = z.discriminatedUnion('event', [
  connectedFrameSchema,
  startFrameSchema,
  mediaFrameSchema,
  stopFrameSchema,
  markFrameSchema,
  dtmfFrameSchema
]);

export type TelephonyFrame = z.infer<typeof telephonyFrameSchema>;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function parseJsonText(text: string): ParseResult<unknown> {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : 'invalid JSON' };
  }
}

export function parseTelephonyFrame(text: string): ParseResult<TelephonyFrame> {
  const json = parseJsonText(text);
  if (!json.ok) {
    return json;
  }

  const parsed = telephonyFrameSchema.safeParse(json.value);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0]?.message ?? 'invalid telephony frame' };
  }
  return { ok: true, value: parsed.data };
}

export function encodeMediaFrame(streamSid: string, audio: Buffer): string {
  return JSON.stringify({
    event: 'media',
    streamSid,
    media: { payload: audio.toString('base64') }
  });
}

export function encodeClearFrame(streamSid: string): string {
  return JSON.stringify({ event: 'clear', streamSid });
}

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import OpenAI from 'openai';
import { z } from 'zod';
import type { CallCompletionInput, ReadingInput } from '../repositories/contracts.js';

const EXTRACTION_PROMPT = `You are given a medical call transcript between an AI nurse and a patient. Produce:
1) A concise call summary (1-3 sentences).
2) A "readings" array using these shapes:
   - Blood pressure: {"BP": {"systolic": 120, "diastolic": 80, "units": "mmHg"}}
   - Anything else: {"type": "pulse", "value": 80, "units": "bpm"}
   Supported types: BP, pulse (bpm), glucose (mg/dL or mmol/L), weight (kg or lb).
3) A "questionnaire" array of {"question", "response", "rating"?} for any questions asked.
If the transcript gives a time for a reading, include recorded_at (ISO 8601); otherwise omit it.
Return only JSON with keys summary, readings and questionnaire.
Transcript:
---
{transcript}
---`;

export type ChatCompletion = (prompt: string) => Promise<string>;

export interface ReadingsExtractor {
  extract(transcript: string, context: { callId: string }): Promise<CallCompletionInput>;
}

const replySchema = z.object({
  summary: z.string().nullish(),
  readings: z.array(z.unknown()).catch([]),
  questionnaire: z.array(z.unknown()).catch([])
});

const recordedAtSchema = z.string().nullish();

const bloodPressureSchema = z.object({
  BP: z.object({
    systolic: z.coerce.number().finite(),
    diastolic: z.coerce.number().finite(),
    units: z.string().nullish()
  }),
  recorded_at: recordedAtSchema
});

const typedReadingSchema = z.object({
  type: z.string().trim().min(1),
  value: z.union([z.number(), z.string()]),
  units: z.string().nullish(),
  recorded_at: recordedAtSchema
});

const questionnaireAnswerSchema = z.object({
  question: z.string().trim().min(1),
  response: z.union([z.string(), z.number()]).nullish(),
  rating: z.number().nullish()
});

function emptyExtraction(): CallCompletionInput {
  return { summary: null, readings: [] };
}

function toRecordedAt(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : new Date(parsed).toISOString();
}

function toReading(item: unknown): ReadingInput | null {
  const bp = bloodPressureSchema.safeParse(item);
  if (bp.success) {
    return {
      readingId: randomUUID(),
      readingType: 'BP',
      value: JSON.stringify({ systolic: bp.data.BP.systolic, diastolic: bp.data.BP.diastolic }),
      units: bp.data.BP.units ?? 'mmHg',
      recordedAt: toRecordedAt(bp.data.recorded_at),
      rawText: JSON.stringify(item)
    };
  }

  const typed = typedReadingSchema.safeParse(item);
  if (typed.success) {
    return {
      readingId: randomUUID(),
      readingType: typed.data.type,
      value: JSON.stringify(typed.data.value),
      units: typed.data.units ?? null,
      recordedAt: toRecordedAt(typed.data.recorded_at),
      rawText: JSON.stringify(item)
    };
  }

  return null;
}

function toQuestionnaireReading(item: unknown): ReadingInput | null {
  const answer = questionnaireAnswerSchema.safeParse(item);
  if (!answer.success) {
    return null;
  }

  return {
    readingId: randomUUID(),
    readingType: 'questionnaire',
    value: JSON.stringify({
      question: answer.data.question,
      response: answer.data.response ?? null,
      rating: answer.data.rating ?? null
    }),
    units: null,
    recordedAt: null,
    rawText: JSON.stringify(item)
  };
}

function sliceJsonObject(text: string): string {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  return start !== -1 && end > start ? text.slice(start, end + 1) : text;
}

/**
 * Turns a model reply into completion input. Items that match neither the
 * blood pressure nor the typed reading shape are dropped.
 */
export function parseExtractionReply(text: string): CallCompletionInput {
  let json: unknown;
  try {
    json = JSON.parse(sliceJsonObject(text.trim()));
  } catch {
    return emptyExtraction();
  }

  const reply = replySchema.safeParse(json);
  if (!reply.success) {
    return emptyExtraction();
  }

  const readings = [
    ...reply.data.readings.map(toReading),
    ...reply.data.questionnaire.map(toQuestionnaireReading)
  ].filter((reading): reading is ReadingInput => reading !== null);

  const summary = reply.data.summary?.trim();
  return { summary: summary ? summary : null, readings };
}

export function createReadingsExtractor(deps: { complete: ChatCompletion; log: FastifyBaseLogger }): ReadingsExtractor {
  return {
    async extract(transcript, context) {
      if (!transcript.trim()) {
        return emptyExtraction();
      }

      try {
        const reply = await deps.complete(EXTRACTION_PROMPT.replace('{transcript}', () => transcript));
        const extraction = parseExtractionReply(reply);
        deps.log.info(
          { callId: context.callId, readings: extraction.readings.length },
          'extraction.completed'
        );
        return extraction;
      } catch (error) {
        deps.log.error(
          { callId: context.callId, error: error instanceof Error ? error.message : String(error) },
          'extraction.failed'
        );
        return emptyExtraction();
      }
    }
  };
}

export function createOpenAiCompletion(options: { apiKey: string; model: string }): ChatCompletion {
  const client = new OpenAI({ apiKey: options.apiKey });

  return async (prompt) => {
    const completion = await client.chat.completions.create({
      model: options.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: 0,
      max_tokens: 800,
      response_format: { type: 'json_object' }
    });
    return completion.choices[0]?.message?.content ?? '';
  };
}

export const noopReadingsExtractor: ReadingsExtractor = {
  async extract() {
    return emptyExtraction();
  }
};

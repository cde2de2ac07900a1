import 'dotenv/config';
import path from 'node:path';

const DISABLED_FLAG_VALUES = new Set(['0', 'false', 'no']);

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  return !DISABLED_FLAG_VALUES.has(raw.trim().toLowerCase());
}

export const env = {
  get PORT() {
    return Number(process.env.PORT ?? 3000);
  },
  get HOST() {
    return process.env.HOST ?? '0.0.0.0';
  },
  get NODE_ENV() {
    return process.env.NODE_ENV ?? 'development';
  },
  get LOG_LEVEL() {
    return process.env.LOG_LEVEL ?? 'info';
  },
  get API_KEY() {
    return process.env.API_KEY ?? '';
  },
  get DATABASE_URL() {
    return process.env.DATABASE_URL ?? '';
  },
  get REDIS_URL() {
    return process.env.REDIS_URL ?? '';
  },
  get DEEPGRAM_API_KEY() {
    return process.env.DEEPGRAM_API_KEY ?? '';
  },
  get DEEPGRAM_AGENT_URL() {
    return process.env.DEEPGRAM_AGENT_URL ?? 'wss://agent.deepgram.com/v1/agent/converse';
  },
  get DEEPGRAM_LISTEN_MODEL() {
    return process.env.DEEPGRAM_LISTEN_MODEL ?? 'nova-3';
  },
  get DEEPGRAM_THINK_MODEL() {
    return process.env.DEEPGRAM_THINK_MODEL ?? 'gpt-4o-mini';
  },
  get DEEPGRAM_SPEAK_MODEL() {
    return process.env.DEEPGRAM_SPEAK_MODEL ?? 'aura-2-thalia-en';
  },
  get OPENAI_API_KEY() {
    return process.env.OPENAI_API_KEY ?? '';
  },
  get OPENAI_MODEL() {
    return process.env.OPENAI_MODEL ?? 'gpt-4o-mini';
  },
  get PUBLIC_HOST() {
    return process.env.PUBLIC_HOST ?? '';
  },
  get PROMPTS_DIR() {
    return path.resolve(process.env.PROMPTS_DIR ?? 'prompts');
  },
  get DEFAULT_AGENT() {
    return process.env.DEFAULT_AGENT ?? 'rpm_checkin';
  },
  get PERSONALIZED_GREETING() {
    return readFlag('PERSONALIZED_GREETING', true);
  },
  get BRIDGE_IDLE_TIMEOUT_MS() {
    return readInt('BRIDGE_IDLE_TIMEOUT_MS', 60_000);
  },
  get AGENT_CONNECT_TIMEOUT_MS() {
    return readInt('AGENT_CONNECT_TIMEOUT_MS', 10_000);
  },
  get AGENT_KEEPALIVE_MS() {
    return readInt('AGENT_KEEPALIVE_MS', 5_000);
  },
  get FRAGMENT_FLUSH_TIMEOUT_MS() {
    return readInt('FRAGMENT_FLUSH_TIMEOUT_MS', 5_000);
  },
  get PROTOCOL_ERROR_THRESHOLD() {
    return readInt('PROTOCOL_ERROR_THRESHOLD', 10);
  }
};

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';

export const BUILTIN_PROMPT = 'You are a helpful AI nurse assisting a patient.';

const UNSAFE_AGENT_PATTERN = /[\\/]|\.\./;
const DISALLOWED_CHARS = /[^A-Za-z0-9_-]/g;

export type PromptSource = 'agent' | 'default' | 'builtin';

export type ResolvedPrompt = {
  agentName: string;
  source: PromptSource;
  text: string;
};

export interface PromptResolver {
  resolve(agentName: string | null): Promise<ResolvedPrompt>;
}

/**
 * Reduces an agent name to the characters allowed in a template file name.
 * Names that carry a path separator or a parent reference are rejected outright
 * rather than stripped, so they can never alias another template.
 */
export function sanitizeAgentName(agentName: string | null | undefined): string | null {
  if (!agentName || UNSAFE_AGENT_PATTERN.test(agentName)) {
    return null;
  }

  const safe = agentName.replace(DISALLOWED_CHARS, '');
  return safe.length > 0 ? safe : null;
}

export function createPromptResolver(options: {
  promptsDir: string;
  defaultAgent: string;
  log: FastifyBaseLogger;
}): PromptResolver {
  const { promptsDir, log } = options;
  const defaultAgent = sanitizeAgentName(options.defaultAgent);

  async function readTemplate(agentName: string): Promise<string | null> {
    const file = path.join(promptsDir, `${agentName}.txt`);
    try {
      const text = (await readFile(file, 'utf8')).trim();
      return text.length > 0 ? text : null;
    } catch (error) {
      log.debug({ file, error: error instanceof Error ? error.message : String(error) }, 'prompt.template_unavailable');
      return null;
    }
  }

  return {
    async resolve(agentName) {
      const safe = sanitizeAgentName(agentName);
      if (safe && safe !== defaultAgent) {
        const text = await readTemplate(safe);
        if (text) {
          return { agentName: safe, source: 'agent', text };
        }
      }

      if (defaultAgent) {
        const text = await readTemplate(defaultAgent);
        if (text) {
          return { agentName: defaultAgent, source: 'default', text };
        }
      }

      log.warn({ promptsDir, defaultAgent }, 'prompt.default_template_missing');
      return { agentName: defaultAgent ?? 'default', source: 'builtin', text: BUILTIN_PROMPT };
    }
  };
}

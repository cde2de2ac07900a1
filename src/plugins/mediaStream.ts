import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { WebSocketServer } from 'ws';
import { env } from '../config/env.js';
import { buildAgentSettings, type AgentModelOptions, DEFAULT_AGENT_MODELS } from '../bridge/agentSettings.js';
import { BridgeSession, toCompletionReport, type BridgeSessionDeps } from '../bridge/bridgeSession.js';
import { DeepgramAgentConnector, type AgentConnector } from '../bridge/deepgramAgent.js';
import { wrapWebSocket } from '../bridge/transport.js';
import { createEmergencyReporter } from '../services/emergencyReporter.js';
import { createPromptResolver, type PromptResolver } from '../services/promptResolver.js';
import { createSessionContextBuilder } from '../services/sessionContext.js';

export type MediaStreamOptions = {
  agentConnector?: AgentConnector;
  promptResolver?: PromptResolver;
};

const STREAM_PATH = /^\/ws(?:[/?]|$)/;

export function isStreamPath(url: string): boolean {
  return STREAM_PATH.test(url);
}

function agentModels(): AgentModelOptions {
  return {
    ...DEFAULT_AGENT_MODELS,
    listenModel: env.DEEPGRAM_LISTEN_MODEL,
    thinkModel: env.DEEPGRAM_THINK_MODEL,
    speakModel: env.DEEPGRAM_SPEAK_MODEL
  };
}

const mediaStream: FastifyPluginAsync<MediaStreamOptions> = async (app, options) => {
  const log = app.log.child({ component: 'media-stream' });
  const promptResolver =
    options.promptResolver ??
    createPromptResolver({ promptsDir: env.PROMPTS_DIR, defaultAgent: env.DEFAULT_AGENT, log });
  const agentConnector =
    options.agentConnector ??
    new DeepgramAgentConnector({
      url: env.DEEPGRAM_AGENT_URL,
      apiKey: env.DEEPGRAM_API_KEY,
      connectTimeoutMs: env.AGENT_CONNECT_TIMEOUT_MS,
      keepAliveMs: env.AGENT_KEEPALIVE_MS
    });
  const models = agentModels();

  const deps: BridgeSessionDeps = {
    contextBuilder: createSessionContextBuilder({
      persistence: app.callPersistence,
      patients: app.repositories.patients,
      organizations: app.repositories.organizations,
      promptResolver,
      personalize: env.PERSONALIZED_GREETING,
      log
    }),
    persistence: app.callPersistence,
    agentConnector,
    emergencyReporter: createEmergencyReporter({ emergencies: app.repositories.emergencies, log }),
    buildSettings: (context) => buildAgentSettings(context.prompt, models),
    completeCall: async (callId) =>
      toCompletionReport((await app.callCompletionQueue.enqueue({ callId, trigger: 'bridge' })).result),
    timings: {
      idleTimeoutMs: env.BRIDGE_IDLE_TIMEOUT_MS,
      fragmentFlushTimeoutMs: env.FRAGMENT_FLUSH_TIMEOUT_MS,
      protocolErrorThreshold: env.PROTOCOL_ERROR_THRESHOLD
    },
    log
  };

  const wss = new WebSocketServer({ noServer: true });
  const sessions = new Map<BridgeSession, Promise<void>>();

  const onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = request.url ?? '';
    if (!isStreamPath(url)) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      const session = new BridgeSession(wrapWebSocket(ws, log, 'telephony'), url, deps);
      const done = session
        .run()
        .then((outcome) => {
          log.info(
            {
              callId: outcome.callId,
              state: outcome.state,
              reason: outcome.reason,
              completion: outcome.completion.status
            },
            'media_stream.session_finished'
          );
        })
        .catch((error: unknown) => {
          log.error({ error: error instanceof Error ? error.message : String(error) }, 'media_stream.session_crashed');
        })
        .finally(() => {
          sessions.delete(session);
        });
      sessions.set(session, done);
    });
  };

  app.server.on('upgrade', onUpgrade);

  app.addHook('preClose', async () => {
    app.server.off('upgrade', onUpgrade);
    for (const session of sessions.keys()) {
      session.release();
    }
    await Promise.allSettled(sessions.values());
    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
  });
};

export const mediaStreamPlugin = fp(mediaStream);

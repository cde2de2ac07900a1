import type { FastifyBaseLogger } from 'fastify';
import WebSocket from 'ws';
import type { AgentSettings } from './agentSettings.js';
import { wrapWebSocket, type FrameTransport } from './transport.js';

export interface AgentConnector {
  connect(settings: AgentSettings, options: { signal: AbortSignal; log: FastifyBaseLogger }): Promise<FrameTransport>;
}

export type DeepgramAgentOptions = {
  url: string;
  apiKey: string;
  connectTimeoutMs: number;
  keepAliveMs: number;
};

const KEEP_ALIVE_MESSAGE = JSON.stringify({ type: 'KeepAlive' });

/**
 * Opens one voice agent conversation per call. The Settings message is sent
 * as soon as the socket opens, and a KeepAlive runs until it closes. There is
 * no reconnect: a dropped agent socket ends the conversation.
 */
export class DeepgramAgentConnector implements AgentConnector {
  constructor(private readonly options: DeepgramAgentOptions) {}

  connect(settings: AgentSettings, { signal, log }: { signal: AbortSignal; log: FastifyBaseLogger }): Promise<FrameTransport> {
    const { url, apiKey, connectTimeoutMs, keepAliveMs } = this.options;
    if (!apiKey) {
      return Promise.reject(new Error('DEEPGRAM_API_KEY is not configured'));
    }
    if (signal.aborted) {
      return Promise.reject(new Error('agent connection aborted'));
    }

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url, { headers: { Authorization: `Token ${apiKey}` } });
      const transport = wrapWebSocket(ws, log, 'agent');
      let settled = false;

      const settle = (error: Error | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        if (error) {
          ws.terminate();
          reject(error);
          return;
        }
        resolve(transport);
      };

      const onAbort = () => settle(new Error('agent connection aborted'));
      const timer = setTimeout(
        () => settle(new Error(`agent connection timed out after ${connectTimeoutMs}ms`)),
        connectTimeoutMs
      );
      signal.addEventListener('abort', onAbort, { once: true });

      ws.once('error', (error) => settle(error));
      ws.once('close', (code) => settle(new Error(`agent connection closed during setup (code ${code})`)));
      ws.once('open', () => {
        transport.sendText(JSON.stringify(settings));
        if (keepAliveMs > 0) {
          const keepAlive = setInterval(() => transport.sendText(KEEP_ALIVE_MESSAGE), keepAliveMs);
          ws.once('close', () => clearInterval(keepAlive));
        }
        log.info({ url }, 'agent.connected');
        settle(null);
      });
    });
  }
}

import type { FastifyBaseLogger } from 'fastify';
import WebSocket from 'ws';
import { FrameChannel } from './frameChannel.js';

export type TransportFrame = { kind: 'text'; data: string } | { kind: 'binary'; data: Buffer };

export interface FrameTransport {
  readonly frames: FrameChannel<TransportFrame>;
  readonly isOpen: boolean;
  sendText(data: string): boolean;
  sendBinary(data: Buffer): boolean;
  close(code: number, reason: string): void;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

export function wrapWebSocket(ws: WebSocket, log: FastifyBaseLogger, label: string): FrameTransport {
  const frames = new FrameChannel<TransportFrame>();

  ws.on('message', (data, isBinary) => {
    const buffer = toBuffer(data);
    frames.push(isBinary ? { kind: 'binary', data: buffer } : { kind: 'text', data: buffer.toString('utf8') });
  });
  ws.on('close', (code, reason) => {
    log.debug({ transport: label, code, reason: reason.toString('utf8') }, 'transport.closed');
    frames.end();
  });
  ws.on('error', (error) => {
    log.warn({ transport: label, error: error.message }, 'transport.error');
    frames.end();
  });

  function send(data: string | Buffer): boolean {
    if (ws.readyState !== WebSocket.OPEN) {
      return false;
    }
    ws.send(data, (error) => {
      if (error) {
        log.warn({ transport: label, error: error.message }, 'transport.send_failed');
      }
    });
    return true;
  }

  return {
    frames,
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    sendText: (data) => send(data),
    sendBinary: (data) => send(data),
    close(code, reason) {
      if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) {
        return;
      }
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
        return;
      }
      ws.close(code, reason);
    }
  };
}

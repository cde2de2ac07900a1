import type { FastifyBaseLogger } from 'fastify';
import { canTransitionBridgeState, isTerminalBridgeState, type BridgeState } from '../lib/bridgeStateMachine.js';
import { parseStreamPath } from '../lib/streamPath.js';
import type { CallCompletionResult } from '../repositories/contracts.js';
import type { CallPersistence } from '../services/callPersistence.js';
import { DETECT_EMERGENCY_FUNCTION, type EmergencyReporter, type FunctionCallReply } from '../services/emergencyReporter.js';
import type { SessionContext, SessionContextBuilder } from '../services/sessionContext.js';
import { parseAgentEvent, type AgentFunctionCall } from './agentFrames.js';
import type { AgentSettings } from './agentSettings.js';
import type { AgentConnector } from './deepgramAgent.js';
import { FragmentWriter } from './fragmentWriter.js';
import { encodeClearFrame, encodeMediaFrame, parseTelephonyFrame } from './telephonyFrames.js';
import { TranscriptAssembler } from './transcriptAssembler.js';
import type { FrameTransport } from './transport.js';

export type SetupErrorCode = 'CALL_ID_MISSING' | 'AGENT_UNAVAILABLE';

export class SetupError extends Error {
  constructor(
    readonly code: SetupErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SetupError';
  }
}

export type TerminationReason =
  | 'telephony_stop'
  | 'telephony_closed'
  | 'agent_closed'
  | 'idle_timeout'
  | 'protocol_errors'
  | 'relay_error'
  | 'released'
  | 'setup_failed';

const NORMAL_TERMINATIONS = new Set<TerminationReason>(['telephony_stop', 'telephony_closed', 'agent_closed']);

export type CompletionStatus = 'completed' | 'already_completed' | 'not_found' | 'queued' | 'skipped' | 'failed';

export type CompletionReport = {
  status: CompletionStatus;
  readingsStored?: number;
  error?: string;
};

export type BridgeCounters = {
  telephonyFrames: number;
  agentFrames: number;
  audioToAgent: number;
  audioToTelephony: number;
  audioDropped: number;
  protocolErrors: number;
  fragmentsQueued: number;
  fragmentsWritten: number;
  fragmentsFailed: number;
};

export type BridgeOutcome = {
  callId: string | null;
  state: Extract<BridgeState, 'CLOSED' | 'FAILED'>;
  reason: TerminationReason;
  setupError: { code: SetupErrorCode; message: string } | null;
  completion: CompletionReport;
  counters: BridgeCounters;
  transitions: BridgeState[];
};

export type BridgeTimings = {
  idleTimeoutMs: number;
  fragmentFlushTimeoutMs: number;
  protocolErrorThreshold: number;
};

export type BridgeSessionDeps = {
  contextBuilder: SessionContextBuilder;
  persistence: CallPersistence;
  agentConnector: AgentConnector;
  emergencyReporter: EmergencyReporter;
  buildSettings: (context: SessionContext) => AgentSettings;
  completeCall: (callId: string) => Promise<CompletionReport>;
  timings: BridgeTimings;
  log: FastifyBaseLogger;
};

/** Agent audio held before the stream id is known; older frames are dropped first. */
export const MAX_PENDING_AGENT_AUDIO = 50;

const NORMAL_CLOSE = 1000;
const SERVER_ERROR_CLOSE = 1011;

export function toCompletionReport(result: CallCompletionResult | null): CompletionReport {
  if (!result) {
    return { status: 'queued' };
  }
  if (result.outcome === 'completed') {
    return { status: 'completed', readingsStored: result.readingsStored };
  }
  return { status: result.outcome };
}

/**
 * Relays one phone call between the telephony media stream and the voice
 * agent. `run()` drives the whole lifecycle and resolves once both sockets
 * are released; it never rejects.
 */
export class BridgeSession {
  private currentState: BridgeState = 'CONNECTING';
  private readonly transitions: BridgeState[] = ['CONNECTING'];
  private readonly controller = new AbortController();
  private reason: TerminationReason | null = null;
  private log: FastifyBaseLogger;

  private callId: string | null = null;
  private context: SessionContext | null = null;
  private agent: FrameTransport | null = null;
  private streamSid: string | null = null;
  private readonly pendingAudio: Buffer[] = [];

  private writer: FragmentWriter | null = null;
  private readonly assembler = new TranscriptAssembler((role, text, timestamp) => {
    this.writeFragment(role, text, timestamp);
  });
  private readonly background = new Set<Promise<void>>();

  private idleTimer: NodeJS.Timeout | null = null;
  private telephonyReleased = false;
  private agentReleased = false;
  private runPromise: Promise<BridgeOutcome> | null = null;

  private readonly counters: BridgeCounters = {
    telephonyFrames: 0,
    agentFrames: 0,
    audioToAgent: 0,
    audioToTelephony: 0,
    audioDropped: 0,
    protocolErrors: 0,
    fragmentsQueued: 0,
    fragmentsWritten: 0,
    fragmentsFailed: 0
  };

  constructor(
    private readonly telephony: FrameTransport,
    private readonly requestUrl: string,
    private readonly deps: BridgeSessionDeps
  ) {
    this.log = deps.log;
  }

  get state(): BridgeState {
    return this.currentState;
  }

  run(): Promise<BridgeOutcome> {
    if (!this.runPromise) {
      this.runPromise = this.execute();
    }
    return this.runPromise;
  }

  /** Ends the session from outside, e.g. on server shutdown. Safe to call repeatedly. */
  release(): void {
    if (isTerminalBridgeState(this.currentState)) {
      return;
    }
    this.finish('released');
    this.releaseTransports(NORMAL_CLOSE, 'session released');
  }

  private async execute(): Promise<BridgeOutcome> {
    const signal = this.controller.signal;
    this.armIdleTimer();

    const { callId, queryAgent } = parseStreamPath(this.requestUrl);
    if (!callId) {
      return this.fail(new SetupError('CALL_ID_MISSING', 'no call id in stream path'));
    }
    this.callId = callId;
    this.log = this.deps.log.child({ callId });

    const context = await this.deps.contextBuilder.build(callId, queryAgent);
    this.context = context;

    try {
      this.agent = await this.deps.agentConnector.connect(this.deps.buildSettings(context), {
        signal,
        log: this.log
      });
    } catch (error) {
      if (signal.aborted) {
        return this.fail(null);
      }
      return this.fail(
        new SetupError('AGENT_UNAVAILABLE', error instanceof Error ? error.message : String(error), { cause: error })
      );
    }

    if (signal.aborted) {
      return this.fail(null);
    }

    if (context.call) {
      this.writer = new FragmentWriter(
        callId,
        (id, fragment) => this.deps.persistence.appendFragment(id, fragment),
        this.log
      );
    }

    this.transition('ACTIVE');
    await Promise.all([
      this.guardRelay('inbound', () => this.relayInbound(signal)),
      this.guardRelay('outbound', () => this.relayOutbound(signal))
    ]);

    return this.close();
  }

  private async guardRelay(direction: 'inbound' | 'outbound', relay: () => Promise<void>): Promise<void> {
    try {
      await relay();
    } catch (error) {
      this.log.error(
        { direction, error: error instanceof Error ? error.message : String(error) },
        'bridge.relay_failed'
      );
      this.finish('relay_error');
    }
  }

  private async relayInbound(signal: AbortSignal): Promise<void> {
    for await (const frame of this.telephony.frames.iterate(signal)) {
      this.counters.telephonyFrames += 1;
      this.touch();

      if (frame.kind !== 'text') {
        this.protocolError('telephony', 'unexpected binary frame');
        continue;
      }

      const parsed = parseTelephonyFrame(frame.data);
      if (!parsed.ok) {
        this.protocolError('telephony', parsed.error);
        continue;
      }

      const message = parsed.value;
      switch (message.event) {
        case 'connected':
          this.log.debug({ protocol: message.protocol }, 'telephony.connected');
          break;
        case 'start':
          this.onStreamStart(message.start.streamSid, message.start.callSid ?? null);
          break;
        case 'media': {
          if (message.media.track === 'outbound') {
            break;
          }
          const audio = Buffer.from(message.media.payload, 'base64');
          if (this.agent?.sendBinary(audio)) {
            this.counters.audioToAgent += 1;
          }
          break;
        }
        case 'stop':
          this.log.info('telephony.stop_received');
          this.finish('telephony_stop');
          return;
        case 'mark':
          this.log.debug({ mark: message.mark.name }, 'telephony.mark');
          break;
        case 'dtmf':
          this.log.info({ digit: message.dtmf.digit }, 'telephony.dtmf');
          break;
      }
    }

    this.finish('telephony_closed');
  }

  private async relayOutbound(signal: AbortSignal): Promise<void> {
    const agent = this.agent;
    if (!agent) {
      return;
    }

    for await (const frame of agent.frames.iterate(signal)) {
      this.counters.agentFrames += 1;
      this.touch();

      if (frame.kind === 'binary') {
        this.forwardAudio(frame.data);
        continue;
      }

      const parsed = parseAgentEvent(frame.data);
      if (!parsed.ok) {
        this.protocolError('agent', parsed.error);
        continue;
      }

      const event = parsed.value;
      switch (event.type) {
        case 'ConversationText':
          this.assembler.add(event.role, event.content);
          break;
        case 'UserStartedSpeaking':
          this.assembler.flush();
          if (this.streamSid) {
            this.telephony.sendText(encodeClearFrame(this.streamSid));
          }
          break;
        case 'AgentAudioDone':
          this.assembler.flush();
          break;
        case 'FunctionCallRequest':
          for (const call of event.functions) {
            if (call.client_side) {
              this.track(this.answerFunctionCall(agent, call));
            }
          }
          break;
        case 'Error':
          this.log.error({ code: event.code, description: event.description }, 'agent.error');
          break;
        case 'Warning':
          this.log.warn({ code: event.code, description: event.description }, 'agent.warning');
          break;
        default:
          this.log.debug({ type: event.type }, 'agent.event');
      }
    }

    this.finish('agent_closed');
  }

  private onStreamStart(streamSid: string, providerCallSid: string | null): void {
    this.streamSid = streamSid;
    this.log.info({ streamSid, providerCallSid }, 'telephony.stream_started');

    for (const audio of this.pendingAudio.splice(0)) {
      this.forwardAudio(audio);
    }

    const callId = this.callId;
    if (callId && this.context?.call) {
      this.track(this.deps.persistence.markCallActive(callId, providerCallSid));
    }
  }

  private forwardAudio(audio: Buffer): void {
    if (!this.streamSid) {
      if (this.pendingAudio.length >= MAX_PENDING_AGENT_AUDIO) {
        this.pendingAudio.shift();
        this.counters.audioDropped += 1;
      }
      this.pendingAudio.push(audio);
      return;
    }
    if (this.telephony.sendText(encodeMediaFrame(this.streamSid, audio))) {
      this.counters.audioToTelephony += 1;
    }
  }

  private async answerFunctionCall(agent: FrameTransport, call: AgentFunctionCall): Promise<void> {
    let reply: FunctionCallReply;
    if (call.name === DETECT_EMERGENCY_FUNCTION && this.callId) {
      reply = await this.deps.emergencyReporter.report({
        callId: this.callId,
        patientId: this.context?.call?.patientId ?? null,
        rawArguments: call.arguments
      });
    } else {
      this.log.warn({ function: call.name }, 'agent.unknown_function');
      reply = { success: false, message: `Unknown function: ${call.name}` };
    }

    agent.sendText(
      JSON.stringify({
        type: 'FunctionCallResponse',
        id: call.id,
        name: call.name,
        content: JSON.stringify(reply)
      })
    );
  }

  private writeFragment(role: 'user' | 'assistant', text: string, timestamp: string): void {
    if (!this.writer) {
      this.log.debug({ role }, 'fragments.no_call_row');
      return;
    }
    this.writer.enqueue(role, text, timestamp);
    this.counters.fragmentsQueued += 1;
  }

  private protocolError(source: 'telephony' | 'agent', detail: string): void {
    this.counters.protocolErrors += 1;
    this.log.warn({ source, detail, count: this.counters.protocolErrors }, 'bridge.protocol_error');
    if (this.counters.protocolErrors > this.deps.timings.protocolErrorThreshold) {
      this.finish('protocol_errors');
    }
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch((error: unknown) => {
        this.log.warn({ error: error instanceof Error ? error.message : String(error) }, 'bridge.background_task_failed');
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }

  private finish(reason: TerminationReason): void {
    if (this.reason === null) {
      this.reason = reason;
      this.log.info({ reason }, 'bridge.terminating');
    }
    this.clearIdleTimer();
    this.controller.abort();
  }

  private armIdleTimer(): void {
    const { idleTimeoutMs } = this.deps.timings;
    if (idleTimeoutMs <= 0 || this.controller.signal.aborted) {
      return;
    }
    this.idleTimer = setTimeout(() => this.finish('idle_timeout'), idleTimeoutMs);
  }

  private touch(): void {
    this.clearIdleTimer();
    this.armIdleTimer();
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private transition(to: BridgeState): void {
    const from = this.currentState;
    if (!canTransitionBridgeState(from, to)) {
      throw new Error(`invalid bridge state transition: ${from} -> ${to}`);
    }
    this.currentState = to;
    this.transitions.push(to);
    this.log.info({ from, to }, 'bridge.state_changed');
  }

  private releaseTransports(code: number, reason: string): void {
    if (!this.telephonyReleased) {
      this.telephonyReleased = true;
      this.telephony.close(code, reason);
    }
    if (this.agent && !this.agentReleased) {
      this.agentReleased = true;
      this.agent.close(code, reason);
    }
  }

  private async settleBackground(): Promise<void> {
    const timeoutMs = this.deps.timings.fragmentFlushTimeoutMs;
    const drained = this.writer ? await this.writer.drain(timeoutMs) : true;

    if (this.background.size > 0) {
      let timer: NodeJS.Timeout | undefined;
      const expired = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs);
      });
      await Promise.race([Promise.allSettled(this.background), expired]);
      clearTimeout(timer);
    }

    if (this.writer) {
      const stats = this.writer.snapshot();
      this.counters.fragmentsWritten = stats.written;
      this.counters.fragmentsFailed = stats.failed;
    }
    if (!drained) {
      this.log.warn({ counters: this.counters }, 'bridge.fragments_abandoned');
    }
  }

  private async close(): Promise<BridgeOutcome> {
    this.transition('CLOSING');
    this.clearIdleTimer();
    this.assembler.flush();
    this.releaseTransports(NORMAL_CLOSE, 'call ended');
    await this.settleBackground();

    const reason = this.reason ?? 'released';
    const call = this.context?.call ?? null;
    let completion: CompletionReport = { status: 'skipped' };

    if (call && NORMAL_TERMINATIONS.has(reason)) {
      try {
        completion = await this.deps.completeCall(call.callId);
      } catch (error) {
        completion = { status: 'failed', error: error instanceof Error ? error.message : String(error) };
        this.log.error({ error: completion.error }, 'bridge.completion_failed');
      }
    } else if (call) {
      await this.deps.persistence.markCallFailed(call.callId);
    }

    this.transition('CLOSED');
    this.log.info({ reason, completion: completion.status, counters: this.counters }, 'bridge.closed');
    return this.outcome('CLOSED', reason, null, completion);
  }

  private async fail(setupError: SetupError | null): Promise<BridgeOutcome> {
    const reason: TerminationReason = setupError ? 'setup_failed' : (this.reason ?? 'released');
    this.reason = this.reason ?? reason;
    this.clearIdleTimer();
    this.controller.abort();
    this.transition('FAILED');
    this.releaseTransports(SERVER_ERROR_CLOSE, setupError ? setupError.code : 'session aborted');

    if (setupError) {
      this.log.error({ code: setupError.code, error: setupError.message }, 'bridge.setup_failed');
    }
    return this.outcome(
      'FAILED',
      reason,
      setupError ? { code: setupError.code, message: setupError.message } : null,
      { status: 'skipped' }
    );
  }

  private outcome(
    state: BridgeOutcome['state'],
    reason: TerminationReason,
    setupError: BridgeOutcome['setupError'],
    completion: CompletionReport
  ): BridgeOutcome {
    return {
      callId: this.callId,
      state,
      reason,
      setupError,
      completion,
      counters: { ...this.counters },
      transitions: [...this.transitions]
    };
  }
}

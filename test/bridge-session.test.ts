import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  BridgeSession,
  MAX_PENDING_AGENT_AUDIO,
  type BridgeSessionDeps,
  type BridgeTimings
} from '../src/bridge/bridgeSession.js';
import { buildAgentSettings } from '../src/bridge/agentSettings.js';
import type { CallRecord, RepositoryBundle } from '../src/repositories/contracts.js';
import { createCallPersistence, type CallPersistence } from '../src/services/callPersistence.js';
import { createEmergencyReporter } from '../src/services/emergencyReporter.js';
import { createSessionContextBuilder } from '../src/services/sessionContext.js';
import {
  FakeAgentConnector,
  FakeTransport,
  mediaFrame,
  seedRepositories,
  silentLogger,
  startFrame,
  stopFrame,
  stubPromptResolver
} from './helpers/fakes.js';

const DEFAULT_TIMINGS: BridgeTimings = {
  idleTimeoutMs: 0,
  fragmentFlushTimeoutMs: 1_000,
  protocolErrorThreshold: 10
};

function buildDeps(options: {
  repositories: RepositoryBundle;
  connector: FakeAgentConnector;
  persistence?: CallPersistence;
  timings?: Partial<BridgeTimings>;
  personalize?: boolean;
}) {
  const persistence = options.persistence ?? createCallPersistence({ calls: options.repositories.calls, log: silentLogger });
  const completeCall = vi.fn(async (_callId: string) => ({ status: 'completed' as const, readingsStored: 0 }));

  const deps: BridgeSessionDeps = {
    contextBuilder: createSessionContextBuilder({
      persistence,
      patients: options.repositories.patients,
      organizations: options.repositories.organizations,
      promptResolver: stubPromptResolver,
      personalize: options.personalize ?? false,
      log: silentLogger
    }),
    persistence,
    agentConnector: options.connector,
    emergencyReporter: createEmergencyReporter({ emergencies: options.repositories.emergencies, log: silentLogger }),
    buildSettings: (context) => buildAgentSettings(context.prompt),
    completeCall,
    timings: { ...DEFAULT_TIMINGS, ...options.timings },
    log: silentLogger
  };

  return { deps, completeCall };
}

const flushIo = () => new Promise<void>((resolve) => setImmediate(resolve));

afterEach(() => {
  vi.useRealTimers();
});

describe('BridgeSession lifecycle', () => {
  it('forwards three media frames in order and completes the call once on stop', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps, completeCall } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();

    telephony.receiveJson({ event: 'connected', protocol: 'Call', version: '1.0.0' });
    telephony.receiveJson(startFrame);
    telephony.receiveJson(mediaFrame('one', 1));
    telephony.receiveJson(mediaFrame('two', 2));
    telephony.receiveJson(mediaFrame('three', 3));
    telephony.receiveJson(stopFrame);

    const outcome = await new BridgeSession(telephony, '/ws/call-42', deps).run();

    expect(outcome.transitions).toEqual(['CONNECTING', 'ACTIVE', 'CLOSING', 'CLOSED']);
    expect(outcome.state).toBe('CLOSED');
    expect(outcome.reason).toBe('telephony_stop');
    expect(connector.transport.sentBinary.map((chunk) => chunk.toString())).toEqual(['one', 'two', 'three']);
    expect(outcome.counters.audioToAgent).toBe(3);
    expect(completeCall).toHaveBeenCalledTimes(1);
    expect(completeCall).toHaveBeenCalledWith('call-42');
    expect(outcome.completion).toEqual({ status: 'completed', readingsStored: 0 });
    expect(telephony.closeCalls).toEqual([{ code: 1000, reason: 'call ended' }]);
    expect(connector.transport.closeCalls).toEqual([{ code: 1000, reason: 'call ended' }]);

    const call = await repositories.calls.getById('call-42');
    expect(call?.status).toBe('active');
    expect(call?.providerCallSid).toBe('CA-test');
  });

  it('fails setup without persistence writes when the agent connection is refused', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector(new Error('connection refused'));
    const call = await repositories.calls.getById('call-42');
    const persistence = {
      lookupCall: vi.fn(async (): Promise<CallRecord | null> => call),
      appendFragment: vi.fn(async () => true),
      completeCall: vi.fn(async () => ({ outcome: 'completed' as const, callId: 'call-42', readingsStored: 0 })),
      markCallActive: vi.fn(async () => undefined),
      markCallFailed: vi.fn(async () => undefined)
    };
    const { deps, completeCall } = buildDeps({ repositories, connector, persistence });
    const telephony = new FakeTransport();
    telephony.receiveJson(startFrame);

    const outcome = await new BridgeSession(telephony, '/ws/call-42', deps).run();

    expect(outcome.transitions).toEqual(['CONNECTING', 'FAILED']);
    expect(outcome.setupError).toEqual({ code: 'AGENT_UNAVAILABLE', message: 'connection refused' });
    expect(telephony.closeCalls).toEqual([{ code: 1011, reason: 'AGENT_UNAVAILABLE' }]);
    expect(persistence.appendFragment).not.toHaveBeenCalled();
    expect(persistence.completeCall).not.toHaveBeenCalled();
    expect(persistence.markCallActive).not.toHaveBeenCalled();
    expect(persistence.markCallFailed).not.toHaveBeenCalled();
    expect(completeCall).not.toHaveBeenCalled();
  });

  it('fails with CALL_ID_MISSING before contacting the agent when the path has no call id', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();

    const outcome = await new BridgeSession(telephony, '/ws', deps).run();

    expect(outcome.state).toBe('FAILED');
    expect(outcome.callId).toBeNull();
    expect(outcome.setupError?.code).toBe('CALL_ID_MISSING');
    expect(connector.settings).toHaveLength(0);
    expect(telephony.closeCalls).toEqual([{ code: 1011, reason: 'CALL_ID_MISSING' }]);
  });

  it('releases each transport once even when release is invoked repeatedly', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps, completeCall } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();
    const session = new BridgeSession(telephony, '/ws/call-42', deps);

    const running = session.run();
    await vi.waitFor(() => expect(session.state).toBe('ACTIVE'));

    session.release();
    session.release();
    const outcome = await running;
    session.release();

    expect(outcome.state).toBe('CLOSED');
    expect(outcome.reason).toBe('released');
    expect(telephony.closeCalls).toEqual([{ code: 1000, reason: 'session released' }]);
    expect(connector.transport.closeCalls).toEqual([{ code: 1000, reason: 'session released' }]);
    expect(completeCall).not.toHaveBeenCalled();
    expect(outcome.completion).toEqual({ status: 'skipped' });
    expect((await repositories.calls.getById('call-42'))?.status).toBe('failed');
  });

  it('treats an agent disconnect as a normal end and still completes the call', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps, completeCall } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();

    connector.transport.disconnect();
    const outcome = await new BridgeSession(telephony, '/ws/call-42', deps).run();

    expect(outcome.reason).toBe('agent_closed');
    expect(completeCall).toHaveBeenCalledTimes(1);
    expect(telephony.closeCalls).toHaveLength(1);
  });

  it('reports a completion failure distinctly from a normal close', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps, completeCall } = buildDeps({ repositories, connector });
    completeCall.mockRejectedValueOnce(new Error('readings insert failed'));
    const telephony = new FakeTransport();
    telephony.receiveJson(stopFrame);

    const outcome = await new BridgeSession(telephony, '/ws/call-42', deps).run();

    expect(outcome.state).toBe('CLOSED');
    expect(outcome.completion).toEqual({ status: 'failed', error: 'readings insert failed' });
  });

  it('skips completion when no call row exists for the stream', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps, completeCall } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();
    telephony.receiveJson(startFrame);
    telephony.receiveJson(stopFrame);

    const outcome = await new BridgeSession(telephony, '/ws/unknown-call?agent=medication_followup', deps).run();

    expect(outcome.state).toBe('CLOSED');
    expect(outcome.completion).toEqual({ status: 'skipped' });
    expect(completeCall).not.toHaveBeenCalled();
  });
});

describe('BridgeSession relays', () => {
  it('persists transcript fragments in receipt order under uneven write latency', async () => {
    const repositories = await seedRepositories();
    const base = createCallPersistence({ calls: repositories.calls, log: silentLogger });
    const persistence: CallPersistence = {
      ...base,
      appendFragment: async (callId, fragment) => {
        await new Promise((resolve) => setTimeout(resolve, fragment.seq === 0 ? 30 : 1));
        return base.appendFragment(callId, fragment);
      }
    };
    const connector = new FakeAgentConnector();
    const { deps } = buildDeps({ repositories, connector, persistence });
    const telephony = new FakeTransport();

    connector.transport.receiveJson({ type: 'ConversationText', role: 'assistant', content: 'Hello Alex.' });
    connector.transport.receiveJson({ type: 'ConversationText', role: 'user', content: 'Hi there.' });
    connector.transport.receiveJson({ type: 'ConversationText', role: 'assistant', content: 'What is your blood pressure?' });
    connector.transport.receiveJson({ type: 'ConversationText', role: 'user', content: '120 over 80.' });
    connector.transport.disconnect();

    const outcome = await new BridgeSession(telephony, '/ws/call-42', deps).run();

    const fragments = await repositories.fragments.listByCall('call-42');
    expect(fragments.map((fragment) => [fragment.seq, fragment.role, fragment.text])).toEqual([
      [0, 'assistant', 'Hello Alex.'],
      [1, 'user', 'Hi there.'],
      [2, 'assistant', 'What is your blood pressure?'],
      [3, 'user', '120 over 80.']
    ]);
    expect((await repositories.calls.getById('call-42'))?.transcript).toBe(
      '\n[assistant] Hello Alex.\n[user] Hi there.\n[assistant] What is your blood pressure?\n[user] 120 over 80.'
    );
    expect(outcome.counters.fragmentsQueued).toBe(4);
    expect(outcome.counters.fragmentsWritten).toBe(4);
  });

  it('joins consecutive updates from one speaker into a single fragment', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();

    connector.transport.receiveJson({ type: 'ConversationText', role: 'assistant', content: 'Good morning.' });
    connector.transport.receiveJson({ type: 'ConversationText', role: 'assistant', content: 'How are you today?' });
    connector.transport.receiveJson({ type: 'AgentAudioDone' });
    connector.transport.receiveJson({ type: 'ConversationText', role: 'assistant', content: 'Ready?' });
    connector.transport.disconnect();

    await new BridgeSession(telephony, '/ws/call-42', deps).run();

    const fragments = await repositories.fragments.listByCall('call-42');
    expect(fragments.map((fragment) => fragment.text)).toEqual(['Good morning. How are you today?', 'Ready?']);
  });

  it('holds agent audio until the stream id is known and clears playback on barge-in', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();
    const session = new BridgeSession(telephony, '/ws/call-42', deps);

    connector.transport.receiveBinary(Buffer.from('a1'));
    connector.transport.receiveBinary(Buffer.from('a2'));
    const running = session.run();
    await vi.waitFor(() => expect(session.state).toBe('ACTIVE'));
    await flushIo();
    expect(telephony.sentText).toHaveLength(0);

    telephony.receiveJson(startFrame);
    await vi.waitFor(() => expect(telephony.sentText).toHaveLength(2));

    connector.transport.receiveJson({ type: 'UserStartedSpeaking' });
    await vi.waitFor(() => expect(telephony.sentText).toHaveLength(3));

    telephony.receiveJson(stopFrame);
    const outcome = await running;

    expect(telephony.sentJson()).toEqual([
      { event: 'media', streamSid: 'MZ-test', media: { payload: Buffer.from('a1').toString('base64') } },
      { event: 'media', streamSid: 'MZ-test', media: { payload: Buffer.from('a2').toString('base64') } },
      { event: 'clear', streamSid: 'MZ-test' }
    ]);
    expect(outcome.counters.audioToTelephony).toBe(2);
  });

  it('keeps only the newest agent audio while waiting for the stream id', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();
    const session = new BridgeSession(telephony, '/ws/call-42', deps);
    const overflow = 5;

    for (let index = 0; index < MAX_PENDING_AGENT_AUDIO + overflow; index += 1) {
      connector.transport.receiveBinary(Buffer.from(`a${index}`));
    }
    const running = session.run();
    await vi.waitFor(() => expect(session.state).toBe('ACTIVE'));
    await flushIo();

    telephony.receiveJson(startFrame);
    await vi.waitFor(() => expect(telephony.sentText).toHaveLength(MAX_PENDING_AGENT_AUDIO));
    telephony.receiveJson(stopFrame);
    const outcome = await running;

    const payloads = telephony.sentJson().map((frame) => JSON.stringify(frame));
    expect(payloads[0]).toBe(
      JSON.stringify({ event: 'media', streamSid: 'MZ-test', media: { payload: Buffer.from(`a${overflow}`).toString('base64') } })
    );
    expect(outcome.counters.audioDropped).toBe(overflow);
    expect(outcome.counters.audioToTelephony).toBe(MAX_PENDING_AGENT_AUDIO);
  });

  it('ignores agent events named like object built-ins and keeps relaying', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps, completeCall } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();
    const session = new BridgeSession(telephony, '/ws/call-42', deps);

    telephony.receiveJson(startFrame);
    connector.transport.receiveJson({ type: 'constructor' });
    connector.transport.receiveJson({ type: 'toString' });
    connector.transport.receiveBinary(Buffer.from('after'));
    const running = session.run();
    await vi.waitFor(() => expect(telephony.sentText).toHaveLength(1));

    telephony.receiveJson(stopFrame);
    const outcome = await running;

    expect(outcome.reason).toBe('telephony_stop');
    expect(outcome.counters.protocolErrors).toBe(0);
    expect(completeCall).toHaveBeenCalledTimes(1);
    expect((await repositories.calls.getById('call-42'))?.status).toBe('active');
  });

  it('drops outbound-track media instead of echoing it to the agent', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();

    telephony.receiveJson(startFrame);
    telephony.receiveJson({ ...mediaFrame('echo', 1), media: { track: 'outbound', payload: 'ZWNobw==' } });
    telephony.receiveJson(mediaFrame('voice', 2));
    telephony.receiveJson(stopFrame);

    await new BridgeSession(telephony, '/ws/call-42', deps).run();

    expect(connector.transport.sentBinary.map((chunk) => chunk.toString())).toEqual(['voice']);
  });

  it('records an emergency through the detect_emergency function and answers the agent', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps } = buildDeps({ repositories, connector });
    const telephony = new FakeTransport();
    const session = new BridgeSession(telephony, '/ws/call-42', deps);

    connector.transport.receiveJson({
      type: 'FunctionCallRequest',
      functions: [
        {
          id: 'fn-1',
          name: 'detect_emergency',
          arguments: JSON.stringify({ severity: 'critical', reason: 'my chest hurts' }),
          client_side: true
        },
        { id: 'fn-2', name: 'lookup_weather', arguments: '{}', client_side: true }
      ]
    });
    const running = session.run();
    await vi.waitFor(() => expect(connector.transport.sentText).toHaveLength(2));
    telephony.receiveJson(stopFrame);
    await running;

    const responses = connector.transport.sentJson();
    expect(responses).toContainEqual({
      type: 'FunctionCallResponse',
      id: 'fn-2',
      name: 'lookup_weather',
      content: JSON.stringify({ success: false, message: 'Unknown function: lookup_weather' })
    });

    const events = await repositories.emergencies.listByPatient('pat-1');
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ callId: 'call-42', orgId: 'org-1', severity: 'critical', signalText: 'my chest hurts' });
    expect(responses).toContainEqual({
      type: 'FunctionCallResponse',
      id: 'fn-1',
      name: 'detect_emergency',
      content: JSON.stringify({
        success: true,
        message: 'Emergency logged with severity critical. Medical staff will be notified.',
        eventId: events[0].eventId
      })
    });
    expect((await repositories.patients.getById('pat-1'))?.emergencyFlag).toBe(true);
  });

  it('closes with protocol_errors once malformed frames exceed the threshold', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps, completeCall } = buildDeps({ repositories, connector, timings: { protocolErrorThreshold: 2 } });
    const telephony = new FakeTransport();

    telephony.receiveText('not json');
    telephony.receiveJson({ event: 'media' });
    telephony.receiveBinary(Buffer.from([1, 2, 3]));

    const outcome = await new BridgeSession(telephony, '/ws/call-42', deps).run();

    expect(outcome.reason).toBe('protocol_errors');
    expect(outcome.counters.protocolErrors).toBe(3);
    expect(completeCall).not.toHaveBeenCalled();
    expect((await repositories.calls.getById('call-42'))?.status).toBe('failed');
  });

  it('sends personalized settings with the emergency function to the agent', async () => {
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps } = buildDeps({ repositories, connector, personalize: true });
    const telephony = new FakeTransport();
    telephony.receiveJson(stopFrame);

    await new BridgeSession(telephony, '/ws/call-42', deps).run();

    const [settings] = connector.settings;
    expect(settings.audio.input).toEqual({ encoding: 'mulaw', sample_rate: 8000 });
    expect(settings.agent.think.prompt.startsWith('### PATIENT CONTEXT (do not reveal confidential details):\n')).toBe(true);
    expect(settings.agent.think.prompt).toContain('- patient_first_name: Alex\n');
    expect(settings.agent.think.prompt).toContain('Base prompt.\n\nIMPORTANT:');
    expect(settings.agent.think.functions.map((fn) => fn.name)).toEqual(['detect_emergency']);
  });
});

describe('BridgeSession idle timeout', () => {
  it('closes an idle session and restarts the clock on every frame', async () => {
    vi.useFakeTimers();
    const repositories = await seedRepositories();
    const connector = new FakeAgentConnector();
    const { deps, completeCall } = buildDeps({ repositories, connector, timings: { idleTimeoutMs: 1_000 } });
    const telephony = new FakeTransport();
    const session = new BridgeSession(telephony, '/ws/call-42', deps);

    const running = session.run();
    await vi.advanceTimersByTimeAsync(600);
    telephony.receiveJson({ event: 'connected', protocol: 'Call', version: '1.0.0' });
    await vi.advanceTimersByTimeAsync(600);
    expect(session.state).toBe('ACTIVE');

    await vi.advanceTimersByTimeAsync(400);
    const outcome = await running;

    expect(outcome.reason).toBe('idle_timeout');
    expect(outcome.state).toBe('CLOSED');
    expect(completeCall).not.toHaveBeenCalled();
    expect(telephony.closeCalls).toHaveLength(1);
  });
});

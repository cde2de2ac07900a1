import { describe, expect, it, vi } from 'vitest';
import { FragmentWriter } from '../src/bridge/fragmentWriter.js';
import { TranscriptAssembler } from '../src/bridge/transcriptAssembler.js';
import type { FragmentInput } from '../src/services/callPersistence.js';
import { silentLogger } from './helpers/fakes.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('FragmentWriter', () => {
  it('assigns sequence numbers and writes in queue order', async () => {
    const written: number[] = [];
    const writer = new FragmentWriter(
      'call-42',
      async (_callId, fragment) => {
        await delay(fragment.seq === 0 ? 20 : 0);
        written.push(fragment.seq);
        return true;
      },
      silentLogger
    );

    expect(writer.enqueue('assistant', 'Hello.', '2026-10-18T09:00:00.000Z')).toBe(0);
    expect(writer.enqueue('user', 'Hi.', '2026-10-18T09:00:01.000Z')).toBe(1);
    expect(writer.enqueue('assistant', 'How are you?', '2026-10-18T09:00:02.000Z')).toBe(2);

    await expect(writer.drain(1_000)).resolves.toBe(true);
    expect(written).toEqual([0, 1, 2]);
    expect(writer.snapshot()).toEqual({ queued: 3, written: 3, failed: 0, abandoned: 0 });
  });

  it('counts failed and rejected appends without stopping the queue', async () => {
    const append = vi
      .fn<(callId: string, fragment: FragmentInput) => Promise<boolean>>()
      .mockResolvedValueOnce(false)
      .mockRejectedValueOnce(new Error('connection reset'))
      .mockResolvedValueOnce(true);
    const writer = new FragmentWriter('call-42', append, silentLogger);

    writer.enqueue('user', 'one');
    writer.enqueue('user', 'two');
    writer.enqueue('user', 'three');
    await writer.drain(1_000);

    expect(append).toHaveBeenCalledTimes(3);
    expect(append.mock.calls[2][1]).toMatchObject({ seq: 2, role: 'user', text: 'three' });
    expect(writer.snapshot()).toEqual({ queued: 3, written: 1, failed: 2, abandoned: 0 });
  });

  it('abandons appends that have not started when the drain bound expires', async () => {
    const writer = new FragmentWriter(
      'call-42',
      async () => {
        await delay(40);
        return true;
      },
      silentLogger
    );

    writer.enqueue('assistant', 'slow write');
    writer.enqueue('user', 'never written');

    await expect(writer.drain(5)).resolves.toBe(false);
    await expect(writer.drain(1_000)).resolves.toBe(true);
    expect(writer.snapshot()).toEqual({ queued: 2, written: 1, failed: 0, abandoned: 1 });
  });
});

describe('TranscriptAssembler', () => {
  it('emits one turn per speaker change and on flush', () => {
    const emitted: Array<[string, string, string]> = [];
    const assembler = new TranscriptAssembler((role, text, timestamp) => {
      emitted.push([role, text, timestamp]);
    });

    assembler.add('assistant', 'Good morning.', 't1');
    assembler.add('assistant', '  How are you?  ', 't2');
    assembler.add('user', '   ', 't3');
    assembler.add('user', 'Fine.', 't4');
    expect(emitted).toEqual([['assistant', 'Good morning. How are you?', 't1']]);

    assembler.flush();
    assembler.flush();
    expect(emitted).toEqual([
      ['assistant', 'Good morning. How are you?', 't1'],
      ['user', 'Fine.', 't4']
    ]);
  });
});

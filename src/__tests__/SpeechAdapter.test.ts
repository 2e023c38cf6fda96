import { describe, it, expect, vi } from 'vitest';
import type { ISTTService } from '../ai/stt';
import type { ITTSService } from '../ai/tts';
import { AsyncQueue } from '../services/interview/channel';
import type { AudioInput } from '../services/interview/channel';
import { ManualClock } from '../services/interview/Clock';
import { SpeechTimeoutError } from '../services/interview/errors';
import { SpeechAdapter } from '../services/interview/SpeechAdapter';
import type { SynthesisEvent } from '../services/interview/SpeechAdapter';
import { SPEECH, pcm } from './fakes';

const never = <T>(): Promise<T> => new Promise<T>(() => undefined);

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

async function collect(events: AsyncIterable<SynthesisEvent>): Promise<SynthesisEvent[]> {
  const out: SynthesisEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

function setup(stt: Partial<ISTTService> = {}, tts: Partial<ITTSService> = {}) {
  const clock = new ManualClock();
  const sttEngine: ISTTService = { transcribe: stt.transcribe ?? vi.fn(async () => 'hello there') };
  const ttsEngine: ITTSService = { synthesize: tts.synthesize ?? vi.fn(async () => Buffer.alloc(10, 1)) };
  const adapter = new SpeechAdapter(sttEngine, ttsEngine, clock, SPEECH);
  const audio = new AsyncQueue<AudioInput>();
  return { clock, adapter, audio, sttEngine, ttsEngine };
}

const voiced = (): AudioInput => ({ kind: 'chunk', data: pcm(1000) });
const quiet = (): AudioInput => ({ kind: 'chunk', data: pcm(10) });

describe('SpeechAdapter.synthesize', () => {
  it('streams the audio in chunks', async () => {
    const { adapter } = setup();
    const events = await collect(adapter.synthesize('Hello', { timeoutMs: 1000, signal: new AbortController().signal }));

    expect(events.map((e) => (e.kind === 'audio' ? e.chunk.length : e.kind))).toEqual([4, 4, 2]);
  });

  it('does not call the engine until iterated', async () => {
    const { adapter, ttsEngine } = setup();
    const stream = adapter.synthesize('Hello', { timeoutMs: 1000, signal: new AbortController().signal });

    expect(ttsEngine.synthesize).not.toHaveBeenCalled();
    await collect(stream);
    expect(ttsEngine.synthesize).toHaveBeenCalledTimes(1);
  });

  it('ends with one failed event when the engine throws', async () => {
    const { adapter } = setup({}, { synthesize: async () => Promise.reject(new Error('quota exceeded')) });
    const events = await collect(adapter.synthesize('Hello', { timeoutMs: 1000, signal: new AbortController().signal }));

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ kind: 'failed', reason: 'error' });
  });

  it('times out a slow engine', async () => {
    const { adapter, clock } = setup({}, { synthesize: () => never<Buffer>() });
    const pending = collect(adapter.synthesize('Hello', { timeoutMs: 1000, signal: new AbortController().signal }));
    await flush();
    clock.advance(1000);

    const events = await pending;
    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event.kind === 'failed' && event.error).toBeInstanceOf(SpeechTimeoutError);
  });

  it('stops when cancelled', async () => {
    const { adapter } = setup({}, { synthesize: () => never<Buffer>() });
    const controller = new AbortController();
    const pending = collect(adapter.synthesize('Hello', { timeoutMs: 1000, signal: controller.signal }));
    await flush();
    controller.abort();

    expect(await pending).toEqual([{ kind: 'failed', reason: 'cancelled' }]);
  });
});

describe('SpeechAdapter.transcribe', () => {
  const options = (signal = new AbortController().signal) => ({ timeoutMs: 5000, cutoffMs: 60_000, signal });

  it('ends the turn after trailing silence', async () => {
    const { adapter, audio, clock, sttEngine } = setup();
    audio.push(voiced());
    const pending = adapter.transcribe(audio, options());
    await flush();
    clock.advance(SPEECH.silenceMs);

    expect(await pending).toEqual({ status: 'ok', text: 'hello there', endOfTurn: 'silence', capturedBytes: 320 });
    expect(sttEngine.transcribe).toHaveBeenCalledWith(expect.any(Buffer), expect.objectContaining({ sampleRate: 16000 }));
  });

  it('restarts the silence window on new speech', async () => {
    const { adapter, audio, clock } = setup();
    audio.push(voiced());
    const pending = adapter.transcribe(audio, options());
    await flush();
    clock.advance(SPEECH.silenceMs - 100);
    audio.push(voiced());
    await flush();
    clock.advance(SPEECH.silenceMs - 100);

    let settled = false;
    void pending.then(() => {
      settled = true;
    });
    await flush();
    expect(settled).toBe(false);

    clock.advance(100);
    expect(await pending).toMatchObject({ status: 'ok', endOfTurn: 'silence', capturedBytes: 640 });
  });

  it('ends the turn on an explicit signal', async () => {
    const { adapter, audio } = setup();
    audio.push(voiced());
    audio.push({ kind: 'end_of_turn' });

    expect(await adapter.transcribe(audio, options())).toMatchObject({ status: 'ok', endOfTurn: 'explicit' });
  });

  it('cuts the turn off at the caller cutoff', async () => {
    const { adapter, audio, clock } = setup();
    audio.push(voiced());
    const pending = adapter.transcribe(audio, { ...options(), cutoffMs: 1000 });
    await flush();
    clock.advance(1000);

    expect(await pending).toMatchObject({ status: 'ok', endOfTurn: 'cutoff' });
  });

  it('returns empty text for a silent turn without calling the engine', async () => {
    const { adapter, audio, sttEngine } = setup();
    audio.push(quiet());
    audio.close();

    expect(await adapter.transcribe(audio, options())).toEqual({
      status: 'ok',
      text: '',
      endOfTurn: 'stream_end',
      capturedBytes: 320,
    });
    expect(sttEngine.transcribe).not.toHaveBeenCalled();
  });

  it('reports an engine timeout', async () => {
    const { adapter, audio, clock } = setup({ transcribe: () => never<string>() });
    audio.push(voiced());
    audio.push({ kind: 'end_of_turn' });
    const pending = adapter.transcribe(audio, options());
    await flush();
    clock.advance(5000);

    const outcome = await pending;
    expect(outcome.status).toBe('timeout');
    expect(outcome.status === 'timeout' && outcome.error.operation).toBe('transcribe');
  });

  it('reports an engine failure', async () => {
    const { adapter, audio } = setup({ transcribe: async () => Promise.reject(new Error('bad audio')) });
    audio.push(voiced());
    audio.push({ kind: 'end_of_turn' });

    const outcome = await adapter.transcribe(audio, options());
    expect(outcome.status === 'failed' && outcome.error.message).toBe('bad audio');
  });

  it('is cancelled while waiting for speech', async () => {
    const { adapter, audio, clock } = setup();
    const controller = new AbortController();
    const pending = adapter.transcribe(audio, options(controller.signal));
    await flush();
    controller.abort();

    expect(await pending).toEqual({ status: 'cancelled' });
    expect(clock.pendingTimers()).toBe(0);
  });
});

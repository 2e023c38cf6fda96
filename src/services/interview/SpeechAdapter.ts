/**
 * Speech I/O Adapter: uniform, cancellable front for the STT and TTS engines.
 * Owns end-of-turn detection (trailing silence, explicit signal, caller
 * cutoff) and per-call timeouts. Engine failures come back as outcomes, never
 * as exceptions.
 */

import type { ISTTService } from '../../ai/stt';
import type { ITTSService } from '../../ai/tts';
import { meanAmplitude, splitIntoChunks } from '../../ai/audio';
import { logger } from '../../config/logger';
import type { Clock, Timer } from './Clock';
import type { AudioInput } from './channel';
import { runCancellable } from './cancellation';
import { SpeechTimeoutError } from './errors';

export interface SpeechSettings {
  silenceMs: number;
  voiceAmplitudeThreshold: number;
  sampleRate: number;
  chunkBytes: number;
}

export type EndOfTurn = 'silence' | 'explicit' | 'cutoff' | 'stream_end';

export type TranscriptionOutcome =
  | { status: 'ok'; text: string; endOfTurn: EndOfTurn; capturedBytes: number }
  | { status: 'timeout'; error: SpeechTimeoutError }
  | { status: 'failed'; error: Error }
  | { status: 'cancelled' };

export type SynthesisEvent =
  | { kind: 'audio'; chunk: Buffer }
  | { kind: 'failed'; reason: 'timeout' | 'error' | 'cancelled'; error?: Error };

export interface TranscribeOptions {
  /** Budget for the engine call once the turn has ended. */
  timeoutMs: number;
  /** Caller-issued cutoff: stop listening after this long even mid-speech. */
  cutoffMs: number;
  signal: AbortSignal;
}

export interface SynthesizeOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

interface CapturedTurn {
  pcm: Buffer;
  voiced: boolean;
  endOfTurn: EndOfTurn;
}

export class SpeechAdapter {
  constructor(
    private readonly stt: ISTTService,
    private readonly tts: ITTSService,
    private readonly clock: Clock,
    private readonly settings: SpeechSettings
  ) {}

  /**
   * Lazy audio for `text`. Nothing is requested until iteration starts, and
   * every iteration makes its own engine call. A failed call ends the stream
   * with a single `failed` event.
   */
  synthesize(text: string, options: SynthesizeOptions): AsyncIterable<SynthesisEvent> {
    return {
      [Symbol.asyncIterator]: () => this.synthesisEvents(text, options),
    };
  }

  private async *synthesisEvents(text: string, options: SynthesizeOptions): AsyncGenerator<SynthesisEvent> {
    const outcome = await runCancellable(this.clock, options, (signal) => this.tts.synthesize(text, { signal }));
    switch (outcome.status) {
      case 'ok':
        for (const chunk of splitIntoChunks(outcome.value, this.settings.chunkBytes)) {
          yield { kind: 'audio', chunk };
        }
        return;
      case 'timeout':
        logger.warn('Speech synthesis timed out', { timeoutMs: outcome.timeoutMs, chars: text.length });
        yield { kind: 'failed', reason: 'timeout', error: new SpeechTimeoutError('synthesize', outcome.timeoutMs) };
        return;
      case 'failed':
        logger.warn('Speech synthesis failed', { error: outcome.error.message });
        yield { kind: 'failed', reason: 'error', error: outcome.error };
        return;
      case 'cancelled':
        yield { kind: 'failed', reason: 'cancelled' };
        return;
    }
  }

  /**
   * Listen for one candidate turn and transcribe it. Listening ends on
   * trailing silence, an explicit end-of-turn, the end of the stream, or the
   * caller cutoff; the engine call then runs under `timeoutMs`.
   */
  async transcribe(audio: AsyncIterable<AudioInput>, options: TranscribeOptions): Promise<TranscriptionOutcome> {
    const turn = await this.captureTurn(audio, options.cutoffMs, options.signal);
    if (!turn) return { status: 'cancelled' };

    if (!turn.voiced) {
      return { status: 'ok', text: '', endOfTurn: turn.endOfTurn, capturedBytes: turn.pcm.length };
    }

    const outcome = await runCancellable(this.clock, options, (signal) =>
      this.stt.transcribe(turn.pcm, { sampleRate: this.settings.sampleRate, signal })
    );
    switch (outcome.status) {
      case 'ok':
        return { status: 'ok', text: outcome.value.trim(), endOfTurn: turn.endOfTurn, capturedBytes: turn.pcm.length };
      case 'timeout':
        logger.warn('Transcription timed out', { timeoutMs: outcome.timeoutMs, bytes: turn.pcm.length });
        return { status: 'timeout', error: new SpeechTimeoutError('transcribe', outcome.timeoutMs) };
      case 'failed':
        logger.warn('Transcription failed', { error: outcome.error.message });
        return { status: 'failed', error: outcome.error };
      case 'cancelled':
        return { status: 'cancelled' };
    }
  }

  /** Resolves null when the signal aborts before the turn ends. */
  private captureTurn(audio: AsyncIterable<AudioInput>, cutoffMs: number, signal: AbortSignal): Promise<CapturedTurn | null> {
    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      const iterator = audio[Symbol.asyncIterator]();
      let voiced = false;
      let done = false;
      let silenceTimer: Timer | null = null;
      let cutoffTimer: Timer | null = null;

      const onAbort = (): void => finish(null);

      const finish = (endOfTurn: EndOfTurn | null): void => {
        if (done) return;
        done = true;
        silenceTimer?.cancel();
        cutoffTimer?.cancel();
        signal.removeEventListener('abort', onAbort);
        iterator.return?.().catch((error: unknown) => logger.debug('Audio stream did not close cleanly', { error }));
        resolve(endOfTurn ? { pcm: Buffer.concat(chunks), voiced, endOfTurn } : null);
      };

      if (signal.aborted) {
        finish(null);
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      cutoffTimer = this.clock.setTimer(cutoffMs, () => finish('cutoff'));

      const pump = async (): Promise<void> => {
        while (!done) {
          const next = await iterator.next();
          if (done) return;
          if (next.done) {
            finish('stream_end');
            return;
          }
          const input = next.value;
          if (input.kind === 'end_of_turn') {
            finish('explicit');
            return;
          }
          chunks.push(input.data);
          if (meanAmplitude(input.data) >= this.settings.voiceAmplitudeThreshold) {
            voiced = true;
            silenceTimer?.cancel();
            silenceTimer = this.clock.setTimer(this.settings.silenceMs, () => finish('silence'));
          }
        }
      };

      pump().catch((error: unknown) => {
        logger.warn('Candidate audio stream failed', { error });
        finish('stream_end');
      });
    });
  }
}

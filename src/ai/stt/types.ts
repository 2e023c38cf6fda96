/**
 * Speech-to-Text engine abstraction. Implement with OpenAI Whisper or another
 * provider; the speech adapter owns turn detection and timeouts.
 */

export interface STTOptions {
  /** Sample rate of the PCM16 mono audio. */
  sampleRate: number;
  signal?: AbortSignal;
}

export interface ISTTService {
  /** One-shot transcription of one candidate turn (PCM16 mono). */
  transcribe(pcm: Buffer, options: STTOptions): Promise<string>;
}

/**
 * Text-to-Speech engine abstraction for the interviewer voice.
 */

export interface TTSOptions {
  signal?: AbortSignal;
}

export interface ITTSService {
  /** Whole utterance as encoded audio. */
  synthesize(text: string, options?: TTSOptions): Promise<Buffer>;
}

import OpenAI from 'openai';
import type { SpeechCreateParams } from 'openai/resources/audio/speech';
import { config } from '../../config';
import type { ITTSService, TTSOptions } from './types';

type Voice = SpeechCreateParams['voice'];

const VOICES: readonly Voice[] = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'];

function toVoice(name: string): Voice {
  return VOICES.find((v) => v === name) ?? 'nova';
}

export class OpenAITTSService implements ITTSService {
  private openai: OpenAI;
  private voice: Voice;

  constructor(apiKey: string = config.ai.openaiApiKey, voice: string = config.ai.ttsVoice) {
    this.openai = new OpenAI({ apiKey, maxRetries: 0 });
    this.voice = toVoice(voice);
  }

  async synthesize(text: string, options?: TTSOptions): Promise<Buffer> {
    const speech = await this.openai.audio.speech.create(
      {
        model: config.ai.ttsModel,
        voice: this.voice,
        input: text,
        response_format: 'mp3',
      },
      { signal: options?.signal }
    );
    return Buffer.from(await speech.arrayBuffer());
  }
}

/**
 * TTS engine export. OpenAI TTS when OPENAI_API_KEY is set; otherwise the
 * browser speaks the question text itself and the server sends no audio.
 */
import { config } from '../../config';
import { OpenAITTSService } from './OpenAITTSService';
import type { ITTSService } from './types';

class TextOnlyTTSService implements ITTSService {
  async synthesize(): Promise<Buffer> {
    return Buffer.alloc(0);
  }
}

let instance: ITTSService | null = null;

export function getTTSService(): ITTSService {
  if (!instance) {
    instance = config.ai.openaiApiKey ? new OpenAITTSService() : new TextOnlyTTSService();
  }
  return instance;
}

export type { ITTSService, TTSOptions } from './types';

/**
 * STT engine export. OpenAI Whisper when OPENAI_API_KEY is set; otherwise an
 * engine that always fails, which the speech adapter turns into a no-answer turn.
 */
import { config } from '../../config';
import { OpenAISTTService } from './OpenAISTTService';
import type { ISTTService } from './types';

class UnavailableSTTService implements ISTTService {
  async transcribe(): Promise<string> {
    throw new Error('No speech-to-text engine configured (set OPENAI_API_KEY)');
  }
}

let instance: ISTTService | null = null;

export function getSTTService(): ISTTService {
  if (!instance) {
    instance = config.ai.openaiApiKey ? new OpenAISTTService() : new UnavailableSTTService();
  }
  return instance;
}

export type { ISTTService, STTOptions } from './types';

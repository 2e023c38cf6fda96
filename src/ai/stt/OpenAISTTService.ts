import OpenAI, { toFile } from 'openai';
import { config } from '../../config';
import { encodeWav } from '../audio';
import type { ISTTService, STTOptions } from './types';

export class OpenAISTTService implements ISTTService {
  private openai: OpenAI;

  constructor(apiKey: string = config.ai.openaiApiKey) {
    this.openai = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async transcribe(pcm: Buffer, options: STTOptions): Promise<string> {
    const wav = encodeWav(pcm, options.sampleRate);
    const transcription = await this.openai.audio.transcriptions.create(
      {
        file: await toFile(wav, 'answer.wav'),
        model: config.ai.sttModel,
      },
      { signal: options.signal }
    );
    return transcription.text;
  }
}

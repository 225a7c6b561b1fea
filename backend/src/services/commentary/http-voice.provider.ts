import axios from 'axios';
import fs from 'fs';
import { logger } from '../../config/logger';
import type { IVoiceProvider } from './voice-provider.interface';

const MIN_AUDIO_BYTES = 256;

/**
 * Speech service reached over HTTP: POST `{ text, voice }` as JSON, receive
 * the audio bytes (MP3) in the response body.
 */
class HttpVoiceProvider implements IVoiceProvider {
  readonly name = 'http';

  constructor(
    private readonly apiUrl?: string,
    private readonly apiKey?: string,
    private readonly timeoutMs = 60000
  ) {}

  isConfigured(): boolean {
    return Boolean(this.apiUrl);
  }

  async synthesize(text: string, voice: string, outputPath: string): Promise<string> {
    if (!this.apiUrl) {
      throw new Error('Voice API URL not configured');
    }

    logger.info('Generating voice clip', { provider: this.name, voice, textLength: text.length });

    try {
      const response = await axios.post<ArrayBuffer>(
        this.apiUrl,
        { text, voice },
        {
          headers: {
            'Content-Type': 'application/json',
            Accept: 'audio/mpeg',
            ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
          },
          responseType: 'arraybuffer',
          timeout: this.timeoutMs,
        }
      );

      const audio = Buffer.from(response.data);
      if (audio.length < MIN_AUDIO_BYTES) {
        throw new Error(`Voice API returned ${audio.length} bytes`);
      }
      await fs.promises.writeFile(outputPath, audio);
      return outputPath;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 401 || status === 403) throw new Error('Invalid voice API key');
        if (status === 429) throw new Error('Voice API rate limit exceeded');
        throw new Error(`Voice API request failed${status ? ` (${status})` : ''}: ${error.message}`);
      }
      throw error;
    }
  }
}

export { HttpVoiceProvider };

import { request } from 'undici';
import { logger } from '../../utils/logger.js';
import { decodeWav, type PcmAudio } from '../../utils/audio.js';
import type { TTSProvider, TTSConfig, SynthesizeOptions } from './interface.js';

interface GoogleSynthesizeResponse {
  audioContent?: string;
}

const SAMPLE_RATE = 24000;

/**
 * Google Cloud Text-to-Speech provider (REST, API key auth)
 */
export class GoogleTTSProvider implements TTSProvider {
  readonly name = 'google-tts';
  private config: TTSConfig;

  constructor(config: TTSConfig) {
    this.config = config;
  }

  async synthesize(text: string, options: SynthesizeOptions = {}): Promise<PcmAudio> {
    const url = `${this.config.apiUrl}/text:synthesize`;
    // Voice names carry their locale: bn-IN-Wavenet-A -> bn-IN
    const languageCode = this.config.voice.split('-').slice(0, 2).join('-');

    try {
      const response = await request(url, {
        method: 'POST',
        headers: {
          'x-goog-api-key': this.config.apiKey ?? '',
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          input: { text },
          voice: { languageCode, name: this.config.voice },
          audioConfig: {
            audioEncoding: 'LINEAR16',
            sampleRateHertz: SAMPLE_RATE,
            speakingRate: this.config.speed ?? 1.0,
          },
        }),
        signal: options.signal,
      });

      if (response.statusCode !== 200) {
        const errorBody = await response.body.text();
        throw new Error(`Google TTS error (${response.statusCode}): ${errorBody}`);
      }

      const data = (await response.body.json()) as GoogleSynthesizeResponse;
      if (!data.audioContent) {
        throw new Error('No audio content from Google TTS');
      }

      // LINEAR16 responses come wrapped in a WAV header
      const audio = decodeWav(Buffer.from(data.audioContent, 'base64'));
      logger.debug(`Google TTS synthesized ${text.length} chars`);
      return audio;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Google TTS synthesis failed: ${message}`);
      throw error;
    }
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey);
  }
}

import FormData from 'form-data';
import { request } from 'undici';
import { logger } from '../../utils/logger.js';
import { encodeWav, type PcmAudio } from '../../utils/audio.js';
import type { STTProvider, TranscribeOptions } from './interface.js';

export interface WhisperAPIConfig {
  apiUrl: string;
  apiKey: string;
  model: string;
  language: string;
}

/**
 * OpenAI Whisper API provider for Speech-to-Text
 * Compatible with OpenAI API and self-hosted alternatives
 */
export class WhisperAPIProvider implements STTProvider {
  readonly name = 'whisper-api';
  private config: WhisperAPIConfig;

  constructor(config: WhisperAPIConfig) {
    this.config = config;
  }

  async transcribe(audio: PcmAudio, options: TranscribeOptions = {}): Promise<string> {
    const formData = new FormData();
    formData.append('model', this.config.model);
    formData.append('file', encodeWav(audio), {
      filename: 'audio.wav',
      contentType: 'audio/wav',
    });
    formData.append('language', options.language ?? this.config.language);
    formData.append('response_format', 'json');

    try {
      const response = await request(this.config.apiUrl, {
        method: 'POST',
        headers: {
          ...formData.getHeaders(),
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: formData.getBuffer(),
        signal: options.signal,
      });

      if (response.statusCode !== 200) {
        const errorBody = await response.body.text();
        throw new Error(`STT API error (${response.statusCode}): ${errorBody}`);
      }

      const data = (await response.body.json()) as { text?: string };
      const text = (data.text ?? '').trim();
      logger.debug(`Whisper API transcription: "${text}"`);
      return text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Whisper API transcription failed: ${message}`);
      throw error;
    }
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiUrl && this.config.apiKey);
  }
}

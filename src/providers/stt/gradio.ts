import { Client, handle_file } from '@gradio/client';
import { logger } from '../../utils/logger.js';
import { encodeWav, durationMs, type PcmAudio } from '../../utils/audio.js';
import { abortable, abortError } from '../../errors.js';
import type { STTProvider, TranscribeOptions } from './interface.js';

export interface GradioSTTConfig {
  apiUrl: string;
  username?: string;
  password?: string;
  language: string;
  applyCorrection: boolean;
  maxRetries: number;
  retryDelayMs?: number;
  endpoint?: string;
}

/**
 * The part of a connected Gradio client this provider uses
 */
export interface GradioApp {
  predict(endpoint: string, data: unknown[]): Promise<{ data: unknown }>;
  close?(): void;
}

export type GradioConnect = (
  url: string,
  options: { auth?: [string, string]; events?: Array<'data' | 'status'> },
) => Promise<GradioApp>;

const connectGradio: GradioConnect = (url, options) => Client.connect(url, options);

/**
 * Bangla speech recognition served by a Gradio app.
 * The app exposes `/transcribe(audio_file, apply_correction) -> text`.
 */
export class GradioSTTProvider implements STTProvider {
  readonly name = 'gradio';
  private config: GradioSTTConfig;
  private client: Promise<GradioApp> | null = null;
  private connect: GradioConnect;

  constructor(config: GradioSTTConfig, connect: GradioConnect = connectGradio) {
    this.config = config;
    this.connect = connect;
    logger.info(`Initialized Gradio STT with API: ${config.apiUrl}`);
  }

  async transcribe(audio: PcmAudio, options: TranscribeOptions = {}): Promise<string> {
    if (audio.samples.length === 0) {
      logger.warn('Empty audio buffer, skipping transcription');
      return '';
    }

    const wav = encodeWav(audio);
    const file = new Blob([new Uint8Array(wav)], { type: 'audio/wav' });
    const endpoint = this.config.endpoint ?? '/transcribe';
    const retryDelay = this.config.retryDelayMs ?? 1000;

    logger.debug(`Transcribing ${Math.round(durationMs(audio))}ms of audio`, {
      sampleRate: audio.sampleRate,
      channels: audio.channels,
    });

    let lastError: unknown;

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      if (options.signal?.aborted) throw abortError();

      try {
        logger.debug(`Sending audio (attempt ${attempt}/${this.config.maxRetries})`);
        const client = await abortable(this.getClient(), options.signal);
        const result = await abortable(
          client.predict(endpoint, [handle_file(file), this.config.applyCorrection]),
          options.signal,
        );

        const text = this.extractText(result.data);
        logger.info(`Transcription received: "${text}"`);
        return text;
      } catch (error) {
        if (options.signal?.aborted) throw error;

        lastError = error;
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Attempt ${attempt} failed: ${message}`);

        // Reconnect on the next attempt
        await this.releaseClient();

        if (attempt < this.config.maxRetries) {
          await this.sleep(retryDelay, options.signal);
        }
      }
    }

    const detail = lastError instanceof Error ? `: ${lastError.message}` : '';
    throw new Error(`Failed after ${this.config.maxRetries} attempts${detail}`, { cause: lastError });
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.getClient();
      return true;
    } catch {
      return false;
    }
  }

  async dispose(): Promise<void> {
    await this.releaseClient();
  }

  /**
   * Drop the cached client, closing it if it ever connected
   */
  private async releaseClient(): Promise<void> {
    const pending = this.client;
    this.client = null;
    if (!pending) return;

    try {
      const client = await pending;
      client.close?.();
      logger.debug('Closed Gradio STT client');
    } catch (error) {
      logger.debug(`Gradio client was never connected: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private getClient(): Promise<GradioApp> {
    if (!this.client) {
      logger.debug('Creating Gradio client');
      const { username, password } = this.config;
      this.client = this.connect(this.config.apiUrl, {
        auth: username && password ? [username, password] : undefined,
        events: ['data', 'status'],
      });
    }
    return this.client;
  }

  private extractText(data: unknown): string {
    const value = Array.isArray(data) ? data[0] : data;
    return typeof value === 'string' ? value.trim() : '';
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return abortable(new Promise((resolve) => setTimeout(resolve, ms)), signal);
  }
}

import { MsEdgeTTS, OUTPUT_FORMAT } from 'msedge-tts';
import type { Readable } from 'node:stream';
import { logger } from '../../utils/logger.js';
import { decodeToPcm, type PcmAudio } from '../../utils/audio.js';
import { abortError } from '../../errors.js';
import type { TTSProvider, SynthesizeOptions } from './interface.js';

/**
 * Bangla voices offered by the Edge read-aloud service
 */
export const BANGLA_VOICES = [
  'bn-IN-BashkarNeural',
  'bn-IN-TanishaaNeural',
  'bn-BD-NabanitaNeural',
  'bn-BD-PradeepNeural',
] as const;

const SAMPLE_RATE = 24000;

export interface EdgeTTSConfig {
  voice: string;
  rate: string;
  pitch: string;
  volume: string;
}

/**
 * The part of an msedge-tts client this provider uses
 */
export interface EdgeSpeechClient {
  setMetadata(voice: string, format: OUTPUT_FORMAT): Promise<void>;
  toStream(text: string, options?: { rate?: string; pitch?: string; volume?: string }): { audioStream: Readable };
  close(): void;
}

export interface EdgeTTSDeps {
  createClient?: () => EdgeSpeechClient;
  decode?: (encoded: Buffer, sampleRate: number, signal?: AbortSignal) => Promise<PcmAudio>;
}

/**
 * Microsoft Edge neural voices. The service streams 24kHz MP3, which is
 * decoded to PCM before playback.
 */
export class EdgeTTSProvider implements TTSProvider {
  readonly name = 'edge';
  private config: EdgeTTSConfig;
  private createClient: () => EdgeSpeechClient;
  private decode: NonNullable<EdgeTTSDeps['decode']>;

  constructor(config: EdgeTTSConfig, deps: EdgeTTSDeps = {}) {
    this.config = config;
    this.createClient = deps.createClient ?? (() => new MsEdgeTTS());
    this.decode = deps.decode ?? decodeToPcm;

    if (!(BANGLA_VOICES as readonly string[]).includes(config.voice)) {
      logger.warn(`Edge TTS voice ${config.voice} is not one of the Bangla voices`, { voices: BANGLA_VOICES });
    }
    logger.info(`Initialized Edge TTS with voice: ${config.voice}`);
  }

  async synthesize(text: string, options: SynthesizeOptions = {}): Promise<PcmAudio> {
    const { signal } = options;
    if (signal?.aborted) throw abortError();

    const client = this.createClient();
    try {
      logger.debug(`Synthesizing text: ${text.substring(0, 50)}...`);

      await client.setMetadata(this.config.voice, OUTPUT_FORMAT.AUDIO_24KHZ_48KBITRATE_MONO_MP3);
      const { audioStream } = client.toStream(text, {
        rate: this.config.rate,
        pitch: this.config.pitch,
        volume: this.config.volume,
      });

      const mp3 = await this.collect(audioStream, signal);
      if (mp3.length === 0) {
        throw new Error('No audio data generated');
      }

      logger.debug(`Generated audio: ${mp3.length} bytes`);
      return await this.decode(mp3, SAMPLE_RATE, signal);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Edge TTS synthesis failed: ${message}`);
      throw error;
    } finally {
      client.close();
    }
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.voice);
  }

  private collect(stream: Readable, signal?: AbortSignal): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];

      const onAbort = () => {
        stream.destroy();
        reject(abortError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.once('error', (error) => {
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      });
      stream.once('close', () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(Buffer.concat(chunks));
      });
    });
  }
}

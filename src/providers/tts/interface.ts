import type { PcmAudio } from '../../utils/audio.js';

export interface SynthesizeOptions {
  signal?: AbortSignal;
}

/**
 * TTS provider interface
 */
export interface TTSProvider {
  /**
   * Provider name for logging and identification
   */
  readonly name: string;

  /**
   * Convert text to speech audio
   * @param text Text to synthesize
   * @returns 16-bit PCM ready for playback
   */
  synthesize(text: string, options?: SynthesizeOptions): Promise<PcmAudio>;

  /**
   * Check if the provider is properly configured and available
   */
  isAvailable(): Promise<boolean>;

  /**
   * Release clients and connections
   */
  dispose?(): Promise<void>;
}

/**
 * Common TTS configuration options
 */
export interface TTSConfig {
  apiUrl: string;
  apiKey?: string;
  model?: string;
  voice: string;
  speed?: number;
}

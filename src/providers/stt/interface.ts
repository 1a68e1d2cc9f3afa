import type { PcmAudio } from '../../utils/audio.js';

export interface TranscribeOptions {
  /**
   * Language code, e.g. 'bn'
   */
  language?: string;
  signal?: AbortSignal;
}

/**
 * Speech-to-Text provider interface
 */
export interface STTProvider {
  /**
   * Provider name for logging and identification
   */
  readonly name: string;

  /**
   * Transcribe one complete utterance.
   * Resolves with an empty string when nothing intelligible was said.
   */
  transcribe(audio: PcmAudio, options?: TranscribeOptions): Promise<string>;

  /**
   * Check if the provider is properly configured and available
   */
  isAvailable(): Promise<boolean>;

  /**
   * Release clients and connections
   */
  dispose?(): Promise<void>;
}

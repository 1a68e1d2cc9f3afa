import type { STTSettings } from '../../config.js';
import logger from '../../utils/logger.js';
import type { STTProvider } from './interface.js';
import { GradioSTTProvider } from './gradio.js';
import { WhisperAPIProvider } from './whisper-api.js';

export type { STTProvider, TranscribeOptions } from './interface.js';
export { GradioSTTProvider } from './gradio.js';
export type { GradioApp, GradioConnect, GradioSTTConfig } from './gradio.js';
export { WhisperAPIProvider } from './whisper-api.js';
export type { WhisperAPIConfig } from './whisper-api.js';

/**
 * Create and return the configured STT provider
 */
export function createSTTProvider(settings: STTSettings): STTProvider {
  logger.info(`Initializing STT provider: ${settings.provider}`);

  switch (settings.provider) {
    case 'gradio':
      return new GradioSTTProvider({
        apiUrl: settings.apiUrl,
        username: settings.username,
        password: settings.password,
        language: settings.language,
        applyCorrection: settings.applyCorrection,
        maxRetries: settings.maxRetries,
      });

    case 'whisper-api':
      return new WhisperAPIProvider({
        apiUrl: settings.apiUrl,
        apiKey: settings.apiKey,
        model: settings.model,
        language: settings.language,
      });
  }
}

import type { TTSSettings } from '../../config.js';
import { logger } from '../../utils/logger.js';
import type { TTSProvider } from './interface.js';
import { EdgeTTSProvider } from './edge.js';
import { GoogleTTSProvider } from './google.js';
import { OpenAITTSProvider } from './openai-tts.js';

export type { TTSProvider, TTSConfig, SynthesizeOptions } from './interface.js';
export { EdgeTTSProvider, BANGLA_VOICES } from './edge.js';
export { GoogleTTSProvider } from './google.js';
export { OpenAITTSProvider } from './openai-tts.js';

/**
 * Create and return the configured TTS provider
 */
export function createTTSProvider(settings: TTSSettings): TTSProvider {
  const { provider, apiKey, model, voice } = settings;

  logger.info(`Initializing TTS provider: ${provider} (${voice})`);

  switch (provider) {
    case 'edge':
      return new EdgeTTSProvider({
        voice,
        rate: settings.rate,
        pitch: settings.pitch,
        volume: settings.volume,
      });

    case 'google':
      return new GoogleTTSProvider({
        apiUrl: settings.apiUrl ?? 'https://texttospeech.googleapis.com/v1',
        apiKey,
        voice,
        speed: settings.speed,
      });

    case 'openai':
      return new OpenAITTSProvider({
        apiUrl: settings.apiUrl ?? 'https://api.openai.com/v1/audio/speech',
        apiKey,
        model,
        voice,
        speed: settings.speed,
      });
  }
}

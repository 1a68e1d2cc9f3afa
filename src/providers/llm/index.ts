import type { LLMSettings } from '../../config.js';
import { logger } from '../../utils/logger.js';
import type { LLMProvider } from './interface.js';
import { OpenAIProvider } from './openai.js';
import { GeminiProvider } from './gemini.js';

export type { LLMProvider, LLMConfig, ChatMessage, ChatOptions } from './interface.js';
export { OpenAIProvider } from './openai.js';
export { GeminiProvider } from './gemini.js';

const DEFAULT_API_URLS = {
  gemini: 'https://generativelanguage.googleapis.com/v1beta',
  openai: 'https://api.openai.com/v1',
} as const;

/**
 * Create and return the configured LLM provider
 */
export function createLLMProvider(settings: LLMSettings): LLMProvider {
  const { provider, apiKey, model, maxTokens, temperature } = settings;
  const apiUrl = settings.apiUrl ?? DEFAULT_API_URLS[provider];

  logger.info(`Initializing LLM provider: ${provider} (${model})`);

  switch (provider) {
    case 'gemini':
      return new GeminiProvider({ apiUrl, apiKey, model, maxTokens, temperature });

    case 'openai':
      return new OpenAIProvider({ apiUrl, apiKey, model, maxTokens, temperature });
  }
}

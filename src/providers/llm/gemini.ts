import { request } from 'undici';
import { logger } from '../../utils/logger.js';
import type { LLMProvider, LLMConfig, ChatMessage, ChatOptions } from './interface.js';

interface GeminiContent {
  role: 'user' | 'model';
  parts: Array<{ text: string }>;
}

interface GeminiResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
    finishReason?: string;
  }>;
  promptFeedback?: {
    blockReason?: string;
  };
}

/**
 * Google Gemini provider (Generative Language API, generateContent)
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini';
  private config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const url = `${this.config.apiUrl}/models/${encodeURIComponent(this.config.model)}:generateContent`;

    // Gemini takes the system prompt separately and calls the assistant "model"
    const systemText = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const contents: GeminiContent[] = messages
      .filter((m) => m.role !== 'system')
      .map((m): GeminiContent => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      }));

    try {
      const response = await request(url, {
        method: 'POST',
        headers: {
          'x-goog-api-key': this.config.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          systemInstruction: systemText ? { parts: [{ text: systemText }] } : undefined,
          contents,
          generationConfig: {
            temperature: this.config.temperature ?? 0.7,
            maxOutputTokens: this.config.maxTokens,
          },
        }),
        signal: options.signal,
      });

      if (response.statusCode !== 200) {
        const errorBody = await response.body.text();
        throw new Error(`Gemini API error (${response.statusCode}): ${errorBody}`);
      }

      const data = (await response.body.json()) as GeminiResponse;

      if (data.promptFeedback?.blockReason) {
        throw new Error(`Gemini blocked the prompt: ${data.promptFeedback.blockReason}`);
      }

      const text = (data.candidates?.[0]?.content?.parts ?? [])
        .map((part) => part.text ?? '')
        .join('')
        .trim();

      if (!text) {
        throw new Error('No response content from Gemini');
      }

      logger.debug(`Gemini response: "${text.substring(0, 100)}..."`);
      return text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Gemini chat failed: ${message}`);
      throw error;
    }
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey);
  }
}

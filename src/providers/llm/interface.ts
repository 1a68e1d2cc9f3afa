/**
 * Chat message structure
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  signal?: AbortSignal;
}

/**
 * LLM provider interface
 */
export interface LLMProvider {
  /**
   * Provider name for logging and identification
   */
  readonly name: string;

  /**
   * Generate a response from the language model
   * @param messages Conversation history, system prompt first
   * @returns Generated response text
   */
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;

  /**
   * Check if the provider is properly configured and available
   */
  isAvailable(): Promise<boolean>;
}

/**
 * Common LLM configuration options
 */
export interface LLMConfig {
  apiUrl: string;
  apiKey: string;
  model: string;
  maxTokens?: number;
  temperature?: number;
}

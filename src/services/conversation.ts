import { logger } from '../utils/logger.js';
import { abortError } from '../errors.js';
import type { LLMProvider, ChatMessage } from '../providers/llm/index.js';

export interface ConversationOptions {
  instructions: string;
  /**
   * Non-system messages kept as context
   */
  memorySize: number;
}

export interface ReplyOptions {
  signal?: AbortSignal;
  /**
   * Wraps the provider call, e.g. with a deadline
   */
  run?: (call: (signal?: AbortSignal) => Promise<string>) => Promise<string>;
}

/**
 * Conversation history of one session and the LLM calls made with it
 */
export class ConversationService {
  private messages: ChatMessage[];
  private llmProvider: LLMProvider;
  private options: ConversationOptions;

  constructor(llmProvider: LLMProvider, options: ConversationOptions) {
    this.llmProvider = llmProvider;
    this.options = options;
    this.messages = [{ role: 'system', content: options.instructions }];
  }

  get providerName(): string {
    return this.llmProvider.name;
  }

  /**
   * Send a user message and get the assistant's reply.
   * The user message is dropped again when generation fails or is cancelled.
   */
  async reply(userMessage: string, options: ReplyOptions = {}): Promise<string> {
    const userEntry: ChatMessage = { role: 'user', content: userMessage };
    this.messages.push(userEntry);
    this.trim();

    const call = (signal?: AbortSignal) =>
      this.llmProvider.chat([...this.messages], { signal: signal ?? options.signal });

    try {
      const response = options.run ? await options.run(call) : await call(options.signal);

      if (options.signal?.aborted) {
        throw abortError();
      }

      this.messages.push({ role: 'assistant', content: response });
      this.trim();

      logger.info(`LLM response: "${response.substring(0, 100)}..."`);
      return response;
    } catch (error) {
      this.remove(userEntry);
      throw error;
    }
  }

  /**
   * Record something the agent said without a user prompt (e.g. the greeting)
   */
  addAssistantMessage(content: string): void {
    this.messages.push({ role: 'assistant', content });
    this.trim();
  }

  /**
   * Conversation history, system prompt first
   */
  getHistory(): ChatMessage[] {
    return [...this.messages];
  }

  private remove(entry: ChatMessage): void {
    const index = this.messages.lastIndexOf(entry);
    if (index !== -1) {
      this.messages.splice(index, 1);
    }
  }

  private trim(): void {
    // Keep the system message, drop the oldest of the rest
    while (this.messages.length > this.options.memorySize + 1) {
      this.messages.splice(1, 1);
    }
  }
}

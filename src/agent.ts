import type { Config } from './config.js';
import { logger, errorMessage } from './utils/logger.js';
import { withTimeout, type ProviderStage } from './errors.js';
import { RoomConnection, type RoomTransport } from './voice/index.js';
import { createSTTProvider, type STTProvider } from './providers/stt/index.js';
import { createLLMProvider, type LLMProvider } from './providers/llm/index.js';
import { createTTSProvider, type TTSProvider } from './providers/tts/index.js';
import { ConversationService, Session, VoiceAssistant } from './services/index.js';

export interface AgentDeps {
  room?: RoomTransport;
  stt?: STTProvider;
  llm?: LLMProvider;
  tts?: TTSProvider;
}

interface StageProvider {
  stage: ProviderStage;
  provider: STTProvider | LLMProvider | TTSProvider;
}

/**
 * Bangla Voice Agent
 * Joins one LiveKit room and talks with the first participant in it
 */
export class Agent {
  private readonly config: Config;
  private readonly room: RoomTransport;
  private readonly voiceAssistant: VoiceAssistant;
  private readonly providers: StageProvider[];
  private session: Session | null = null;
  private stopping: Promise<void> | null = null;
  private resolveStopped: () => void = () => undefined;
  private readonly stopped: Promise<void>;

  constructor(config: Config, deps: AgentDeps = {}) {
    this.config = config;

    this.room = deps.room ?? new RoomConnection(config.room, config.audio);

    // Initialize providers
    const stt = deps.stt ?? createSTTProvider(config.stt);
    const llm = deps.llm ?? createLLMProvider(config.llm);
    const tts = deps.tts ?? createTTSProvider(config.tts);
    this.providers = [
      { stage: 'stt', provider: stt },
      { stage: 'llm', provider: llm },
      { stage: 'tts', provider: tts },
    ];

    const conversation = new ConversationService(llm, {
      instructions: config.llm.instructions,
      memorySize: config.llm.memorySize,
    });

    this.voiceAssistant = new VoiceAssistant(
      { stt, tts, conversation, output: this.room },
      {
        vad: config.vad,
        allowInterruptions: config.agent.allowInterruptions,
        providerTimeout: config.agent.providerTimeout,
        errorReply: config.agent.errorReply,
        frameDuration: config.audio.frameDuration,
      },
    );

    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  get assistant(): VoiceAssistant {
    return this.voiceAssistant;
  }

  get currentSession(): Session | null {
    return this.session;
  }

  /**
   * Join the room, wait for a participant and greet them
   */
  async start(): Promise<void> {
    await this.checkProviders();
    await this.room.connect();

    this.room.onDisconnected((reason) => {
      logger.info(`Ending session: ${reason}`);
      this.stop().catch((error: unknown) => {
        logger.error(`Failed to stop agent: ${errorMessage(error)}`);
      });
    });

    const participant = await this.room.waitForParticipant(this.config.room.participantTimeout);
    if (this.stopping) return;

    this.session = new Session(this.room.roomName, participant, this.config.stt.language);
    this.voiceAssistant.start(this.session);
    this.room.onAudioFrame((frame) => this.voiceAssistant.handleAudioFrame(frame));

    const { greeting, allowInterruptions } = this.config.agent;
    if (greeting) {
      // Greeting plays in the background; the user may talk over it
      this.voiceAssistant.say(greeting, { allowInterruptions }).catch((error: unknown) => {
        logger.error(`Failed to greet: ${errorMessage(error)}`);
      });
    }
  }

  /**
   * Start and block until the session ends
   */
  async run(): Promise<void> {
    // The room may close while still waiting for a participant
    await Promise.race([this.start(), this.stopped]);
    await this.stopped;
  }

  /**
   * Stop the agent gracefully. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.teardown();
    }
    return this.stopping;
  }

  /**
   * Report providers that are not usable. The agent still joins; turns that
   * need a missing provider fail and get the error reply.
   */
  private async checkProviders(): Promise<void> {
    const { providerTimeout } = this.config.agent;
    const signal = new AbortController().signal;

    await Promise.all(
      this.providers.map(async ({ stage, provider }) => {
        try {
          const available = await withTimeout(stage, provider.name, providerTimeout, signal, () =>
            provider.isAvailable(),
          );
          if (!available) {
            logger.warn(`${stage.toUpperCase()} provider ${provider.name} is not available`);
          }
        } catch (error) {
          logger.warn(`${stage.toUpperCase()} provider ${provider.name} check failed: ${errorMessage(error)}`);
        }
      }),
    );
  }

  private async teardown(): Promise<void> {
    logger.info('Shutting down...');

    try {
      await this.voiceAssistant.stop();
    } catch (error) {
      logger.error(`Failed to stop voice assistant: ${errorMessage(error)}`);
    }

    try {
      await this.room.disconnect();
    } catch (error) {
      logger.error(`Failed to leave room: ${errorMessage(error)}`);
    }

    logger.info('Shutdown complete');
    this.resolveStopped();
  }
}

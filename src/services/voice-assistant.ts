import { logger, errorMessage } from '../utils/logger.js';
import { splitSentences, durationMs, type PcmAudio } from '../utils/audio.js';
import { ProviderError, isAbortError, withTimeout } from '../errors.js';
import { VoiceActivityDetector, type VADOptions } from '../voice/vad.js';
import { VoicePlayer, type AudioOutput } from '../voice/player.js';
import type { STTProvider } from '../providers/stt/index.js';
import type { TTSProvider } from '../providers/tts/index.js';
import type { ConversationService } from './conversation.js';
import type { Session, SessionState, Turn } from './session.js';

export interface VoiceAssistantOptions {
  vad: VADOptions;
  /**
   * Whether user speech may cut the agent off
   */
  allowInterruptions: boolean;
  /**
   * Deadline for each STT / LLM / TTS call (ms)
   */
  providerTimeout: number;
  /**
   * Spoken after a failed turn; empty disables it
   */
  errorReply: string;
  /**
   * Playback frame size (ms), which is also how fast a barge-in takes effect
   */
  frameDuration: number;
}

export interface VoiceAssistantDeps {
  stt: STTProvider;
  tts: TTSProvider;
  conversation: ConversationService;
  output: AudioOutput;
}

export interface SayOptions {
  allowInterruptions?: boolean;
}

interface ActiveTurn {
  /**
   * null for announcements such as the greeting
   */
  turn: Turn | null;
  controller: AbortController;
  interruptible: boolean;
  done: Promise<void>;
}

/**
 * Voice Assistant orchestrates the turn loop of one session:
 * VAD -> STT -> LLM -> TTS -> Playback
 *
 * Only one turn is active at a time. Speech from the user while a turn is
 * thinking or speaking cancels it (barge-in), and the new utterance starts
 * the next turn. Provider failures end the turn, never the session.
 */
export class VoiceAssistant {
  private readonly stt: STTProvider;
  private readonly tts: TTSProvider;
  private readonly conversation: ConversationService;
  private readonly player: VoicePlayer;
  private readonly vad: VoiceActivityDetector;
  private readonly options: VoiceAssistantOptions;
  private session: Session | null = null;
  private active: ActiveTurn | null = null;

  constructor(deps: VoiceAssistantDeps, options: VoiceAssistantOptions) {
    this.stt = deps.stt;
    this.tts = deps.tts;
    this.conversation = deps.conversation;
    this.player = new VoicePlayer(deps.output, options.frameDuration);
    this.vad = new VoiceActivityDetector(options.vad);
    this.options = options;

    this.vad.onSpeechStart(() => this.handleSpeechStart());
    this.vad.onSpeechEnd((utterance) => this.handleUtterance(utterance));
  }

  /**
   * Start listening for the given session
   */
  start(session: Session): void {
    if (this.session && !this.session.closed) {
      throw new Error(`Voice assistant already running session ${this.session.id}`);
    }

    this.session = session;
    session.setState('listening');

    logger.info(`Voice assistant started`, {
      sessionId: session.id,
      room: session.roomName,
      participant: session.participant,
      language: session.language,
      stt: this.stt.name,
      llm: this.conversation.providerName,
      tts: this.tts.name,
    });
  }

  /**
   * Feed one inbound audio frame from the room
   */
  handleAudioFrame(frame: PcmAudio): void {
    if (!this.session || this.session.closed) return;
    this.vad.push(frame);
  }

  /**
   * Speak text without a user prompt. Resolves true when it was spoken in full.
   */
  say(text: string, options: SayOptions = {}): Promise<boolean> {
    const session = this.session;
    if (!session || session.closed) {
      return Promise.resolve(false);
    }

    const interruptible = (options.allowInterruptions ?? true) && this.options.allowInterruptions;
    let spoken = false;

    const active = this.begin(null, interruptible, async (signal) => {
      try {
        spoken = await this.speak(text, signal);
        if (spoken) {
          this.conversation.addAssistantMessage(text);
        }
      } catch (error) {
        if (!signal.aborted && !isAbortError(error)) {
          logger.error(`Failed to speak announcement: ${errorMessage(error)}`, { sessionId: session.id });
        }
      }
    });

    return active.done.then(() => spoken);
  }

  /**
   * Cancel the active turn and stop playback
   */
  interrupt(reason = 'interrupted'): void {
    const active = this.active;
    if (!active) return;

    logger.info(`Voice assistant interrupted: ${reason}`, {
      sessionId: this.session?.id,
      turnId: active.turn?.id,
    });
    active.controller.abort();
    this.player.stop();
  }

  /**
   * Resolves once inbound audio is classified and no turn is active
   */
  async waitForIdle(): Promise<void> {
    await this.vad.flush();
    while (this.active) {
      await this.active.done;
    }
  }

  get state(): SessionState {
    return this.session?.state ?? 'idle';
  }

  /**
   * Tear the session down: cancel the active turn, stop audio,
   * release provider clients. Nothing is played after this resolves.
   */
  async stop(): Promise<void> {
    const session = this.session;
    if (!session || session.closed) return;

    session.close();
    this.vad.reset();

    const active = this.active;
    active?.controller.abort();
    this.player.close();
    if (active) {
      await active.done;
    }

    const disposals = [this.stt.dispose?.(), this.tts.dispose?.()];
    const results = await Promise.allSettled(disposals);
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.warn(`Failed to release provider: ${errorMessage(result.reason)}`);
      }
    }

    logger.info(`Voice assistant stopped`, session.summary());
  }

  private handleSpeechStart(): void {
    const active = this.active;
    if (!active) return;

    if (!active.interruptible) {
      logger.debug('User speaking during a non-interruptible reply');
      return;
    }

    this.interrupt('barge-in');
  }

  private handleUtterance(utterance: PcmAudio): void {
    const session = this.session;
    if (!session || session.closed) return;

    if (this.active && !this.active.interruptible) {
      logger.debug(`Dropping ${Math.round(durationMs(utterance))}ms utterance during a non-interruptible reply`);
      return;
    }

    // A newer utterance supersedes whatever is still running
    if (this.active) {
      this.interrupt('superseded by a new utterance');
    }

    const turn = session.beginTurn();
    logger.debug(`Turn started with ${Math.round(durationMs(utterance))}ms of speech`, {
      sessionId: session.id,
      turnId: turn.id,
    });

    this.begin(turn, this.options.allowInterruptions, (signal) => this.runTurn(session, turn, utterance, signal));
  }

  /**
   * Register a new active turn. It waits for the previous one to unwind first,
   * so two turns never overlap.
   */
  private begin(
    turn: Turn | null,
    interruptible: boolean,
    body: (signal: AbortSignal) => Promise<void>,
  ): ActiveTurn {
    const previous = this.active;
    if (previous) {
      previous.controller.abort();
      this.player.stop();
    }

    const controller = new AbortController();
    const active: ActiveTurn = { turn, controller, interruptible, done: Promise.resolve() };

    active.done = (async () => {
      if (previous) {
        await previous.done;
      }
      try {
        await body(controller.signal);
      } finally {
        if (this.active === active) {
          this.active = null;
          this.session?.setState('listening');
        }
      }
    })();

    this.active = active;
    return active;
  }

  private async runTurn(session: Session, turn: Turn, utterance: PcmAudio, signal: AbortSignal): Promise<void> {
    const timeout = this.options.providerTimeout;
    const log = { sessionId: session.id, turnId: turn.id };

    try {
      signal.throwIfAborted();
      session.setState('thinking');

      // ── STT ──
      const transcript = await withTimeout('stt', this.stt.name, timeout, signal, (callSignal) =>
        this.stt.transcribe(utterance, { language: session.language, signal: callSignal }),
      );
      turn.transcribedAt = Date.now();
      turn.userText = transcript.trim();
      signal.throwIfAborted();

      logger.info(`Transcription: "${turn.userText}"`, log);

      if (this.shouldIgnore(turn.userText)) {
        logger.debug('Empty transcription, back to listening', log);
        session.finishTurn(turn, 'skipped');
        return;
      }

      // ── LLM ──
      const reply = await this.conversation.reply(turn.userText, {
        signal,
        run: (call) => withTimeout('llm', this.conversation.providerName, timeout, signal, call),
      });
      turn.respondedAt = Date.now();
      turn.replyText = reply;
      signal.throwIfAborted();

      // ── TTS + playback ──
      const completed = await this.speak(reply, signal);
      session.finishTurn(turn, completed ? 'completed' : 'interrupted');

      if (completed) {
        logger.info(`Turn completed in ${Date.now() - turn.startedAt}ms`, log);
      }
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        session.finishTurn(turn, 'interrupted');
        logger.debug('Turn cancelled', log);
        return;
      }

      session.finishTurn(turn, 'failed', errorMessage(error));
      logger.error(`Voice processing error: ${errorMessage(error)}`, log);

      const stage = error instanceof ProviderError ? error.stage : undefined;
      await this.apologize(stage, signal);
    }
  }

  /**
   * Synthesize a reply sentence by sentence and play each in order.
   * Resolves false when the signal stopped it.
   */
  private async speak(text: string, signal: AbortSignal): Promise<boolean> {
    const sentences = splitSentences(text);

    for (const sentence of sentences) {
      const audio = await withTimeout('tts', this.tts.name, this.options.providerTimeout, signal, (callSignal) =>
        this.tts.synthesize(sentence, { signal: callSignal }),
      );
      if (signal.aborted) return false;

      this.session?.setState('speaking');
      const played = await this.player.play(audio, signal);
      if (!played) return false;
    }

    return true;
  }

  private async apologize(failedStage: ProviderError['stage'] | undefined, signal: AbortSignal): Promise<void> {
    const { errorReply } = this.options;
    if (!errorReply || failedStage === 'tts' || signal.aborted || this.session?.closed) {
      return;
    }

    try {
      await this.speak(errorReply, signal);
    } catch (error) {
      if (!isAbortError(error)) {
        logger.warn(`Failed to speak error reply: ${errorMessage(error)}`);
      }
    }
  }

  private shouldIgnore(text: string): boolean {
    // Strip punctuation and whitespace; nothing left means nothing was said
    return text.replace(/[\s\p{P}]/gu, '').length === 0;
  }
}

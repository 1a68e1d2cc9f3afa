import VAD from 'node-vad';
import { logger, errorMessage } from '../utils/logger.js';
import { concatPcm, durationMs, samplesToBuffer, type PcmAudio } from '../utils/audio.js';

export type VADMode = 'normal' | 'low-bitrate' | 'aggressive' | 'very-aggressive';

export interface VADOptions {
  /**
   * Trailing silence that ends an utterance (ms)
   */
  silenceDuration: number;
  /**
   * Voiced audio needed before speech counts as started (ms)
   */
  minSpeechDuration: number;
  /**
   * WebRTC VAD aggressiveness; higher modes reject more noise
   */
  mode: VADMode;
}

export type SpeechStartCallback = () => void;
export type SpeechEndCallback = (utterance: PcmAudio) => void;

type VADState = 'silence' | 'speech';

const MODES = {
  normal: VAD.Mode.NORMAL,
  'low-bitrate': VAD.Mode.LOW_BITRATE,
  aggressive: VAD.Mode.AGGRESSIVE,
  'very-aggressive': VAD.Mode.VERY_AGGRESSIVE,
} satisfies Record<VADMode, unknown>;

// WebRTC VAD classifies 10, 20 or 30 ms of 8/16/32/48 kHz mono audio at a time
const WINDOW_MS = 20;

/**
 * Voice activity detection over inbound room audio, backed by WebRTC VAD.
 *
 * silence --(minSpeechDuration of voiced audio)--> speech  : speech-start
 * speech  --(silenceDuration of unvoiced audio)--> silence : speech-end(utterance)
 *
 * Frames are classified in arrival order; push() never blocks the caller.
 */
export class VoiceActivityDetector {
  private readonly options: VADOptions;
  private readonly vad: VAD;
  private queue: Promise<void> = Promise.resolve();
  private generation = 0;
  private carry: PcmAudio | null = null;
  private state: VADState = 'silence';
  private pending: PcmAudio[] = [];
  private voicedMs = 0;
  private utterance: PcmAudio[] = [];
  private silenceMs = 0;
  private rejected = false;
  private startCallback: SpeechStartCallback | null = null;
  private endCallback: SpeechEndCallback | null = null;

  constructor(options: VADOptions) {
    this.options = options;
    this.vad = new VAD(MODES[options.mode]);
    logger.debug(`VAD initialized: mode=${options.mode}, silence=${options.silenceDuration}ms`);
  }

  onSpeechStart(callback: SpeechStartCallback): void {
    this.startCallback = callback;
  }

  onSpeechEnd(callback: SpeechEndCallback): void {
    this.endCallback = callback;
  }

  /**
   * Queue one inbound frame for classification
   */
  push(frame: PcmAudio): void {
    const generation = this.generation;
    this.queue = this.queue
      .then(() => this.process(frame, generation))
      .catch((error: unknown) => {
        logger.error(`Voice activity detection failed: ${errorMessage(error)}`);
      });
  }

  /**
   * Resolves once every frame pushed so far has been classified
   */
  flush(): Promise<void> {
    return this.queue;
  }

  /**
   * Drop any partial utterance, including frames still queued
   */
  reset(): void {
    this.generation++;
    this.carry = null;
    this.clearUtterance();
  }

  private async process(frame: PcmAudio, generation: number): Promise<void> {
    if (generation !== this.generation) return;

    for (const window of this.windows(frame)) {
      const voiced = await this.classify(window);
      if (generation !== this.generation) return;
      this.advance(window, voiced);
    }
  }

  /**
   * Cut the frame, plus any remainder of the previous one, into whole windows
   */
  private windows(frame: PcmAudio): PcmAudio[] {
    const carry = this.carry;
    const joined =
      carry && carry.sampleRate === frame.sampleRate && carry.channels === frame.channels
        ? concatPcm([carry, frame])
        : frame;

    const size = Math.round((joined.sampleRate * WINDOW_MS) / 1000) * joined.channels;
    const windows: PcmAudio[] = [];
    let start = 0;
    for (; start + size <= joined.samples.length; start += size) {
      windows.push({
        samples: joined.samples.slice(start, start + size),
        sampleRate: joined.sampleRate,
        channels: joined.channels,
      });
    }

    this.carry =
      start < joined.samples.length
        ? { samples: joined.samples.slice(start), sampleRate: joined.sampleRate, channels: joined.channels }
        : null;
    return windows;
  }

  private async classify(window: PcmAudio): Promise<boolean> {
    const event = await this.vad.processAudio(samplesToBuffer(window.samples), window.sampleRate);

    if (event === VAD.Event.ERROR) {
      if (!this.rejected) {
        this.rejected = true;
        logger.warn(`VAD rejected ${window.sampleRate}Hz/${window.channels}ch audio, treating it as silence`);
      }
      return false;
    }

    return event === VAD.Event.VOICE;
  }

  private advance(window: PcmAudio, voiced: boolean): void {
    const windowMs = durationMs(window);

    if (this.state === 'silence') {
      if (!voiced) {
        // Bursts shorter than minSpeechDuration are noise
        this.pending = [];
        this.voicedMs = 0;
        return;
      }

      this.pending.push(window);
      this.voicedMs += windowMs;

      if (this.voicedMs >= this.options.minSpeechDuration) {
        this.state = 'speech';
        this.utterance = this.pending;
        this.pending = [];
        this.voicedMs = 0;
        this.silenceMs = 0;
        logger.debug('Speech started');
        this.startCallback?.();
      }
      return;
    }

    this.utterance.push(window);
    this.silenceMs = voiced ? 0 : this.silenceMs + windowMs;

    if (this.silenceMs >= this.options.silenceDuration) {
      const utterance = concatPcm(this.utterance);
      this.clearUtterance();
      logger.debug(`Speech ended after ${Math.round(durationMs(utterance))}ms`);
      this.endCallback?.(utterance);
    }
  }

  private clearUtterance(): void {
    this.state = 'silence';
    this.pending = [];
    this.voicedMs = 0;
    this.utterance = [];
    this.silenceMs = 0;
  }
}

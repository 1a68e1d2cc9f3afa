import { logger } from '../utils/logger.js';
import { durationMs, splitIntoFrames, type PcmAudio } from '../utils/audio.js';
import { abortable, isAbortError } from '../errors.js';

/**
 * Where agent speech goes. Implemented by the room connection.
 */
export interface AudioOutput {
  /**
   * Queue one frame. Resolves once the frame is accepted.
   */
  captureFrame(frame: PcmAudio): Promise<void>;

  /**
   * Drop audio queued but not yet sent
   */
  clearQueue(): void;

  /**
   * Resolves once all queued audio has been sent
   */
  waitForPlayout?(): Promise<void>;
}

interface ActivePlayback {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Plays PCM audio to an AudioOutput in fixed-size frames.
 * Only one playback runs at a time; stopping takes effect at the next frame.
 */
export class VoicePlayer {
  private output: AudioOutput;
  private frameMs: number;
  private current: ActivePlayback | null = null;
  private closed = false;

  constructor(output: AudioOutput, frameMs = 20) {
    this.output = output;
    this.frameMs = frameMs;
  }

  /**
   * Play a clip. Resolves true when it played to the end,
   * false when it was stopped, aborted, or the player is closed.
   */
  async play(audio: PcmAudio, signal?: AbortSignal): Promise<boolean> {
    // Starting a new playback stops the previous one first
    while (this.current) {
      const previous = this.current;
      previous.controller.abort();
      await previous.done;
    }

    if (this.closed || signal?.aborted) {
      return false;
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const run = this.run(audio, controller.signal);
    const playback: ActivePlayback = {
      controller,
      done: run.then(
        () => undefined,
        () => undefined,
      ),
    };
    this.current = playback;

    try {
      return await run;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (this.current === playback) {
        this.current = null;
      }
    }
  }

  /**
   * Stop the current playback and drop queued audio
   */
  stop(): void {
    if (this.current) {
      this.current.controller.abort();
      logger.debug('Audio playback stopped');
    }
    this.output.clearQueue();
  }

  /**
   * Stop playback and refuse any further playback
   */
  close(): void {
    this.closed = true;
    this.stop();
  }

  private async run(audio: PcmAudio, signal: AbortSignal): Promise<boolean> {
    const frames = splitIntoFrames(audio, this.frameMs);
    logger.debug(`Playing ${Math.round(durationMs(audio))}ms of audio in ${frames.length} frames`);

    for (const frame of frames) {
      if (signal.aborted || this.closed) {
        this.output.clearQueue();
        return false;
      }
      await this.output.captureFrame(frame);
    }

    if (this.output.waitForPlayout) {
      try {
        await abortable(this.output.waitForPlayout(), signal);
      } catch (error) {
        if (!isAbortError(error)) throw error;
      }
    }

    if (signal.aborted || this.closed) {
      this.output.clearQueue();
      return false;
    }

    return true;
  }
}

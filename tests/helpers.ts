import { vi } from 'vitest';
import { abortError } from '../src/errors.js';
import type { PcmAudio } from '../src/utils/audio.js';
import type { AudioOutput } from '../src/voice/player.js';
import type { AudioFrameHandler, DisconnectHandler, RoomTransport } from '../src/voice/connection.js';
import type { STTProvider, TranscribeOptions } from '../src/providers/stt/index.js';
import type { ChatMessage, ChatOptions, LLMProvider } from '../src/providers/llm/index.js';
import type { SynthesizeOptions, TTSProvider } from '../src/providers/tts/index.js';

export const SAMPLE_RATE = 16000;
export const FRAME_MS = 20;

/**
 * Constant-level audio. The VAD stand-in hears 1000 and above as voice.
 */
export function tone(ms: number, level = 8000, sampleRate = SAMPLE_RATE): PcmAudio {
  const samples = new Int16Array(Math.round((sampleRate * ms) / 1000)).fill(level);
  return { samples, sampleRate, channels: 1 };
}

export function silence(ms: number, sampleRate = SAMPLE_RATE): PcmAudio {
  return tone(ms, 0, sampleRate);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Never settles unless the signal fires
 */
export function hang<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(abortError()), { once: true });
  });
}

/**
 * In-process stand-in for the room's outbound audio track
 */
export class FakeOutput implements AudioOutput {
  readonly frames: PcmAudio[] = [];
  clears = 0;
  maxInFlight = 0;
  private inFlight = 0;
  private readonly frameDelayMs: number;

  constructor(frameDelayMs = 0) {
    this.frameDelayMs = frameDelayMs;
  }

  async captureFrame(frame: PcmAudio): Promise<void> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    this.frames.push(frame);
    try {
      await delay(this.frameDelayMs);
    } finally {
      this.inFlight--;
    }
  }

  clearQueue(): void {
    this.clears++;
  }
}

export function createFakeSTT(transcript = 'আজকে আবহাওয়া কেমন?') {
  return {
    name: 'fake-stt',
    transcribe: vi
      .fn<(audio: PcmAudio, options?: TranscribeOptions) => Promise<string>>()
      .mockResolvedValue(transcript),
    isAvailable: vi.fn<() => Promise<boolean>>().mockResolvedValue(true),
    dispose: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
  } satisfies STTProvider;
}

export function createFakeLLM(reply = 'আজ আকাশ পরিষ্কার। তাপমাত্রা প্রায় ত্রিশ ডিগ্রি।') {
  return {
    name: 'fake-llm',
    chat: vi.fn<(messages: ChatMessage[], options?: ChatOptions) => Promise<string>>().mockResolvedValue(reply),
    isAvailable: vi.fn<() => Promise<boolean>>().mockResolvedValue(true),
  } satisfies LLMProvider;
}

/**
 * Every sentence synthesizes to `ms` of tone
 */
export function createFakeTTS(ms = 100) {
  return {
    name: 'fake-tts',
    synthesize: vi
      .fn<(text: string, options?: SynthesizeOptions) => Promise<PcmAudio>>()
      .mockImplementation(() => Promise.resolve(tone(ms, 1000))),
    isAvailable: vi.fn<() => Promise<boolean>>().mockResolvedValue(true),
    dispose: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
  } satisfies TTSProvider;
}

/**
 * In-process room: records outbound audio, lets tests push inbound frames
 */
export class FakeRoom extends FakeOutput implements RoomTransport {
  readonly roomName = 'test-room';
  readonly connect = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
  readonly waitForParticipant = vi.fn<(timeoutMs?: number) => Promise<string>>().mockResolvedValue('user-1');
  readonly disconnect = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
  private frameHandler: AudioFrameHandler | null = null;
  private disconnectHandler: DisconnectHandler | null = null;

  onAudioFrame(handler: AudioFrameHandler): void {
    this.frameHandler = handler;
  }

  onDisconnected(handler: DisconnectHandler): void {
    this.disconnectHandler = handler;
  }

  emitFrame(frame: PcmAudio): void {
    this.frameHandler?.(frame);
  }

  emitDisconnect(reason: string): void {
    this.disconnectHandler?.(reason);
  }
}

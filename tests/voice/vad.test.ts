import { describe, it, expect, vi, beforeEach } from 'vitest';
import VAD from '../fakes/node-vad.js';
import { VoiceActivityDetector, type VADOptions } from '../../src/voice/vad.js';
import type { PcmAudio } from '../../src/utils/audio.js';
import { logger } from '../../src/utils/logger.js';
import { FRAME_MS, silence, tone } from '../helpers.js';

function createDetector(overrides: Partial<VADOptions> = {}) {
  const vad = new VoiceActivityDetector({ silenceDuration: 60, minSpeechDuration: 40, mode: 'normal', ...overrides });
  const onStart = vi.fn();
  const onEnd = vi.fn<(utterance: PcmAudio) => void>();
  vad.onSpeechStart(onStart);
  vad.onSpeechEnd(onEnd);
  return { vad, onStart, onEnd };
}

describe('VoiceActivityDetector', () => {
  beforeEach(() => {
    VAD.instances = [];
  });

  it('should start speech once voiced audio reaches the minimum duration', async () => {
    const { vad, onStart } = createDetector();

    vad.push(tone(FRAME_MS));
    await vad.flush();
    expect(onStart).not.toHaveBeenCalled();

    vad.push(tone(FRAME_MS));
    await vad.flush();
    expect(onStart).toHaveBeenCalledTimes(1);
  });

  it('should emit the whole utterance after trailing silence', async () => {
    const { vad, onEnd } = createDetector();

    vad.push(tone(FRAME_MS, 4000));
    vad.push(tone(FRAME_MS, 4000));
    vad.push(silence(FRAME_MS));
    vad.push(tone(FRAME_MS, 4000));
    vad.push(silence(FRAME_MS));
    vad.push(silence(FRAME_MS));
    await vad.flush();
    expect(onEnd).not.toHaveBeenCalled();

    vad.push(silence(FRAME_MS));
    await vad.flush();
    expect(onEnd).toHaveBeenCalledTimes(1);

    const [utterance] = onEnd.mock.calls[0];
    expect(utterance.samples).toHaveLength(7 * 320);
    expect(utterance.samples[0]).toBe(4000);
    expect(utterance.samples[3 * 320]).toBe(4000);
  });

  it('should drop bursts shorter than the minimum duration', async () => {
    const { vad, onStart, onEnd } = createDetector();

    vad.push(tone(FRAME_MS));
    vad.push(silence(FRAME_MS));
    vad.push(tone(FRAME_MS));
    for (let i = 0; i < 5; i++) vad.push(silence(FRAME_MS));
    await vad.flush();

    expect(onStart).not.toHaveBeenCalled();
    expect(onEnd).not.toHaveBeenCalled();
  });

  it('should treat audio classified as noise as silence', async () => {
    const { vad, onStart } = createDetector();

    for (let i = 0; i < 10; i++) vad.push(tone(FRAME_MS, 300));
    await vad.flush();

    expect(onStart).not.toHaveBeenCalled();
  });

  it('should classify 20ms windows across short frames', async () => {
    const { vad, onStart } = createDetector();

    for (let i = 0; i < 4; i++) vad.push(tone(10));
    await vad.flush();

    expect(onStart).toHaveBeenCalledTimes(1);
    expect(VAD.instances[0].calls).toEqual([
      { bytes: 640, sampleRate: 16000 },
      { bytes: 640, sampleRate: 16000 },
    ]);
  });

  it('should create the detector with the configured mode', () => {
    createDetector({ mode: 'aggressive' });

    expect(VAD.instances[0].mode).toBe(VAD.Mode.AGGRESSIVE);
  });

  it('should treat audio the detector rejects as silence and warn once', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const { vad, onStart } = createDetector();

    for (let i = 0; i < 5; i++) vad.push(tone(FRAME_MS, 8000, 22050));
    await vad.flush();

    expect(onStart).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('VAD rejected 22050Hz/1ch audio, treating it as silence');
  });

  it('should discard a partial utterance on reset', async () => {
    const { vad, onEnd } = createDetector();

    vad.push(tone(FRAME_MS));
    vad.push(tone(FRAME_MS));
    await vad.flush();
    vad.reset();
    for (let i = 0; i < 5; i++) vad.push(silence(FRAME_MS));
    await vad.flush();

    expect(onEnd).not.toHaveBeenCalled();
  });

  it('should drop frames still queued when reset', async () => {
    const { vad, onStart } = createDetector();

    vad.push(tone(FRAME_MS));
    vad.push(tone(FRAME_MS));
    vad.reset();
    await vad.flush();

    expect(onStart).not.toHaveBeenCalled();
    expect(VAD.instances[0].calls).toHaveLength(0);
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PassThrough, Readable } from 'node:stream';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import { OUTPUT_FORMAT } from 'msedge-tts';
import {
  EdgeTTSProvider,
  GoogleTTSProvider,
  OpenAITTSProvider,
  createTTSProvider,
} from '../../src/providers/tts/index.js';
import type { EdgeSpeechClient } from '../../src/providers/tts/edge.js';
import { encodeWav, samplesToBuffer, type PcmAudio } from '../../src/utils/audio.js';
import { tone } from '../helpers.js';

describe('REST TTS providers', () => {
  let mockAgent: MockAgent;
  let originalDispatcher: Dispatcher;

  beforeEach(() => {
    originalDispatcher = getGlobalDispatcher();
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    setGlobalDispatcher(mockAgent);
  });

  afterEach(async () => {
    setGlobalDispatcher(originalDispatcher);
    await mockAgent.close();
  });

  describe('GoogleTTSProvider', () => {
    const provider = new GoogleTTSProvider({
      apiUrl: 'https://tts.example.test/v1',
      apiKey: 'test-secret',
      voice: 'bn-IN-Wavenet-A',
    });

    it('should request LINEAR16 Bangla speech and strip the WAV header', async () => {
      let sent: unknown;
      mockAgent
        .get('https://tts.example.test')
        .intercept({ path: '/v1/text:synthesize', method: 'POST' })
        .reply(200, (opts) => {
          sent = JSON.parse(String(opts.body));
          return { audioContent: encodeWav(tone(20, 500, 24000)).toString('base64') };
        });

      const audio = await provider.synthesize('নমস্কার');

      expect(audio.sampleRate).toBe(24000);
      expect(audio.channels).toBe(1);
      expect(audio.samples).toHaveLength(480);
      expect(audio.samples[0]).toBe(500);
      expect(sent).toEqual({
        input: { text: 'নমস্কার' },
        voice: { languageCode: 'bn-IN', name: 'bn-IN-Wavenet-A' },
        audioConfig: { audioEncoding: 'LINEAR16', sampleRateHertz: 24000, speakingRate: 1 },
      });
    });

    it('should reject a response without audio', async () => {
      mockAgent
        .get('https://tts.example.test')
        .intercept({ path: '/v1/text:synthesize', method: 'POST' })
        .reply(200, {});

      await expect(provider.synthesize('নমস্কার')).rejects.toThrow('No audio content from Google TTS');
    });
  });

  describe('OpenAITTSProvider', () => {
    const provider = new OpenAITTSProvider({
      apiUrl: 'https://tts.example.test/v1/audio/speech',
      apiKey: 'test-secret',
      voice: 'nova',
    });

    it('should return raw 24kHz PCM', async () => {
      let sent: unknown;
      mockAgent
        .get('https://tts.example.test')
        .intercept({ path: '/v1/audio/speech', method: 'POST' })
        .reply(200, (opts) => {
          sent = JSON.parse(String(opts.body));
          return samplesToBuffer(Int16Array.from([100, -100, 200]));
        });

      const audio = await provider.synthesize('ধন্যবাদ');

      expect(audio).toEqual({ samples: Int16Array.from([100, -100, 200]), sampleRate: 24000, channels: 1 });
      expect(sent).toEqual({ model: 'tts-1', input: 'ধন্যবাদ', voice: 'nova', response_format: 'pcm', speed: 1 });
    });

    it('should send the speed configured in the settings', async () => {
      let sent: unknown;
      mockAgent
        .get('https://tts.example.test')
        .intercept({ path: '/v1/audio/speech', method: 'POST' })
        .reply(200, (opts) => {
          sent = JSON.parse(String(opts.body));
          return samplesToBuffer(Int16Array.from([100]));
        });
      const configured = createTTSProvider({
        provider: 'openai',
        voice: 'nova',
        apiKey: 'test-secret',
        apiUrl: 'https://tts.example.test/v1/audio/speech',
        rate: '+0%',
        pitch: '+0Hz',
        volume: '+0%',
        speed: 1.25,
      });

      await configured.synthesize('ধন্যবাদ');

      expect(sent).toMatchObject({ voice: 'nova', speed: 1.25 });
    });

    it('should report HTTP errors with the response body', async () => {
      mockAgent
        .get('https://tts.example.test')
        .intercept({ path: '/v1/audio/speech', method: 'POST' })
        .reply(429, 'rate limited');

      await expect(provider.synthesize('ধন্যবাদ')).rejects.toThrow('OpenAI TTS error (429): rate limited');
    });
  });
});

describe('EdgeTTSProvider', () => {
  const config = { voice: 'bn-IN-TanishaaNeural', rate: '+10%', pitch: '+0Hz', volume: '+0%' };

  function fakeClient(stream: Readable) {
    return {
      setMetadata: vi.fn<EdgeSpeechClient['setMetadata']>().mockResolvedValue(undefined),
      toStream: vi.fn<EdgeSpeechClient['toStream']>().mockReturnValue({ audioStream: stream }),
      close: vi.fn(),
    } satisfies EdgeSpeechClient;
  }

  function fakeDecode() {
    return vi
      .fn<(encoded: Buffer, sampleRate: number, signal?: AbortSignal) => Promise<PcmAudio>>()
      .mockResolvedValue(tone(20, 700, 24000));
  }

  it('should stream MP3 for the Bangla voice and decode it', async () => {
    const client = fakeClient(Readable.from([Buffer.from('mp3-a'), Buffer.from('mp3-b')]));
    const decode = fakeDecode();
    const provider = new EdgeTTSProvider(config, { createClient: () => client, decode });

    const audio = await provider.synthesize('আজ আকাশ পরিষ্কার।');

    expect(audio.sampleRate).toBe(24000);
    expect(client.setMetadata).toHaveBeenCalledWith(
      'bn-IN-TanishaaNeural',
      OUTPUT_FORMAT.AUDIO_24KHZ_48KBITRATE_MONO_MP3,
    );
    expect(client.toStream).toHaveBeenCalledWith('আজ আকাশ পরিষ্কার।', {
      rate: '+10%',
      pitch: '+0Hz',
      volume: '+0%',
    });
    const [encoded, sampleRate] = decode.mock.calls[0];
    expect(encoded.toString()).toBe('mp3-amp3-b');
    expect(sampleRate).toBe(24000);
    expect(client.close).toHaveBeenCalledTimes(1);
  });

  it('should fail when the service returns no audio', async () => {
    const client = fakeClient(Readable.from([]));
    const decode = fakeDecode();
    const provider = new EdgeTTSProvider(config, { createClient: () => client, decode });

    await expect(provider.synthesize('হ্যালো')).rejects.toThrow('No audio data generated');
    expect(decode).not.toHaveBeenCalled();
    expect(client.close).toHaveBeenCalledTimes(1);
  });

  it('should stop reading the stream when aborted', async () => {
    const stream = new PassThrough();
    const client = fakeClient(stream);
    const provider = new EdgeTTSProvider(config, { createClient: () => client, decode: fakeDecode() });
    const controller = new AbortController();

    const pending = provider.synthesize('হ্যালো', { signal: controller.signal });
    await vi.waitFor(() => expect(client.toStream).toHaveBeenCalled(), { interval: 5 });
    stream.write(Buffer.from('partial'));
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
    expect(stream.destroyed).toBe(true);
    expect(client.close).toHaveBeenCalledTimes(1);
  });
});

describe('createTTSProvider', () => {
  it('should build the configured provider', () => {
    const prosody = { rate: '+0%', pitch: '+0Hz', volume: '+0%', speed: 1 };

    expect(createTTSProvider({ ...prosody, provider: 'edge', voice: 'bn-BD-NabanitaNeural' })).toBeInstanceOf(
      EdgeTTSProvider,
    );
    expect(
      createTTSProvider({ ...prosody, provider: 'google', voice: 'bn-IN-Wavenet-A', apiKey: 'test-secret' }),
    ).toBeInstanceOf(GoogleTTSProvider);
    expect(createTTSProvider({ ...prosody, provider: 'openai', voice: 'nova', apiKey: 'test-secret' })).toBeInstanceOf(
      OpenAITTSProvider,
    );
  });
});

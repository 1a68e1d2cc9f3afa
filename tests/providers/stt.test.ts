import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import {
  GradioSTTProvider,
  WhisperAPIProvider,
  createSTTProvider,
  type GradioApp,
  type GradioConnect,
  type GradioSTTConfig,
} from '../../src/providers/stt/index.js';
import { silence, tone } from '../helpers.js';

describe('WhisperAPIProvider', () => {
  let mockAgent: MockAgent;
  let originalDispatcher: Dispatcher;

  const provider = new WhisperAPIProvider({
    apiUrl: 'https://stt.example.test/v1/audio/transcriptions',
    apiKey: 'test-secret',
    model: 'whisper-1',
    language: 'bn',
  });

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

  it('should upload the utterance as WAV and return the trimmed text', async () => {
    let form = '';
    mockAgent
      .get('https://stt.example.test')
      .intercept({ path: '/v1/audio/transcriptions', method: 'POST' })
      .reply(200, (opts) => {
        form = String(opts.body);
        return { text: ' আজকে আবহাওয়া কেমন? ' };
      });

    const text = await provider.transcribe(tone(100));

    expect(text).toBe('আজকে আবহাওয়া কেমন?');
    expect(form).toContain('filename="audio.wav"');
    expect(form).toContain('name="language"\r\n\r\nbn\r\n');
    expect(form).toContain('name="model"\r\n\r\nwhisper-1\r\n');
  });

  it('should report HTTP errors with the response body', async () => {
    mockAgent
      .get('https://stt.example.test')
      .intercept({ path: '/v1/audio/transcriptions', method: 'POST' })
      .reply(401, 'unauthorized');

    await expect(provider.transcribe(tone(100))).rejects.toThrow('STT API error (401): unauthorized');
  });
});

describe('GradioSTTProvider', () => {
  const config: GradioSTTConfig = {
    apiUrl: 'https://stt.example.test/',
    username: 'test-user',
    password: 'test-secret',
    language: 'bn',
    applyCorrection: true,
    maxRetries: 3,
    retryDelayMs: 0,
  };

  function fakeApp(predict: GradioApp['predict']) {
    return { predict: vi.fn(predict), close: vi.fn() };
  }

  it('should call /transcribe with correction enabled and trim the text', async () => {
    const app = fakeApp(() => Promise.resolve({ data: ['  আজকে আবহাওয়া কেমন? '] }));
    const connect = vi.fn<GradioConnect>().mockResolvedValue(app);
    const provider = new GradioSTTProvider(config, connect);

    await expect(provider.transcribe(tone(100))).resolves.toBe('আজকে আবহাওয়া কেমন?');

    expect(connect).toHaveBeenCalledWith('https://stt.example.test/', {
      auth: ['test-user', 'test-secret'],
      events: ['data', 'status'],
    });
    const [endpoint, data] = app.predict.mock.calls[0];
    expect(endpoint).toBe('/transcribe');
    expect(data[1]).toBe(true);
  });

  it('should connect without auth when no credentials are set', async () => {
    const app = fakeApp(() => Promise.resolve({ data: 'হ্যাঁ' }));
    const connect = vi.fn<GradioConnect>().mockResolvedValue(app);
    const provider = new GradioSTTProvider({ ...config, username: undefined, password: undefined }, connect);

    await expect(provider.transcribe(tone(100))).resolves.toBe('হ্যাঁ');
    expect(connect.mock.calls[0][1].auth).toBeUndefined();
  });

  it('should reuse the connected client across utterances', async () => {
    const app = fakeApp(() => Promise.resolve({ data: ['ঠিক আছে'] }));
    const connect = vi.fn<GradioConnect>().mockResolvedValue(app);
    const provider = new GradioSTTProvider(config, connect);

    await provider.transcribe(tone(100));
    await provider.transcribe(tone(100));

    expect(connect).toHaveBeenCalledTimes(1);
    expect(app.predict).toHaveBeenCalledTimes(2);
  });

  it('should retry failed attempts with a fresh client', async () => {
    const predict = vi
      .fn<GradioApp['predict']>()
      .mockRejectedValueOnce(new Error('queue full'))
      .mockRejectedValueOnce(new Error('queue full'))
      .mockResolvedValueOnce({ data: ['তৃতীয়বারে হলো'] });
    const connect = vi.fn<GradioConnect>().mockResolvedValue({ predict });
    const provider = new GradioSTTProvider(config, connect);

    await expect(provider.transcribe(tone(100))).resolves.toBe('তৃতীয়বারে হলো');
    expect(predict).toHaveBeenCalledTimes(3);
    expect(connect).toHaveBeenCalledTimes(3);
  });

  it('should give up after the configured number of attempts', async () => {
    const app = fakeApp(() => Promise.reject(new Error('502 Bad Gateway')));
    const provider = new GradioSTTProvider({ ...config, maxRetries: 2 }, () => Promise.resolve(app));

    await expect(provider.transcribe(tone(100))).rejects.toThrow('Failed after 2 attempts: 502 Bad Gateway');
    expect(app.predict).toHaveBeenCalledTimes(2);
  });

  it('should close every client it connected when attempts keep failing', async () => {
    const apps: Array<ReturnType<typeof fakeApp>> = [];
    const connect = vi.fn<GradioConnect>(() => {
      const app = fakeApp(() => Promise.reject(new Error('queue full')));
      apps.push(app);
      return Promise.resolve(app);
    });
    const provider = new GradioSTTProvider({ ...config, maxRetries: 3 }, connect);

    await expect(provider.transcribe(tone(100))).rejects.toThrow('Failed after 3 attempts: queue full');
    await provider.dispose();

    expect(connect).toHaveBeenCalledTimes(3);
    expect(apps).toHaveLength(3);
    for (const app of apps) {
      expect(app.close).toHaveBeenCalledTimes(1);
    }
  });

  it('should return an empty transcript for empty audio without calling the app', async () => {
    const connect = vi.fn<GradioConnect>();
    const provider = new GradioSTTProvider(config, connect);

    await expect(provider.transcribe(silence(0))).resolves.toBe('');
    expect(connect).not.toHaveBeenCalled();
  });

  it('should not try again once aborted', async () => {
    const connect = vi.fn<GradioConnect>();
    const provider = new GradioSTTProvider(config, connect);
    const controller = new AbortController();
    controller.abort();

    await expect(provider.transcribe(tone(100), { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(connect).not.toHaveBeenCalled();
  });

  it('should close the client on dispose', async () => {
    const app = fakeApp(() => Promise.resolve({ data: ['ঠিক আছে'] }));
    const provider = new GradioSTTProvider(config, () => Promise.resolve(app));

    await provider.transcribe(tone(100));
    await provider.dispose();

    expect(app.close).toHaveBeenCalledTimes(1);
  });
});

describe('createSTTProvider', () => {
  it('should build the configured provider', () => {
    expect(
      createSTTProvider({
        provider: 'gradio',
        apiUrl: 'https://stt.example.test/',
        applyCorrection: true,
        maxRetries: 3,
        language: 'bn',
      }),
    ).toBeInstanceOf(GradioSTTProvider);

    expect(
      createSTTProvider({
        provider: 'whisper-api',
        apiUrl: 'https://stt.example.test/v1/audio/transcriptions',
        apiKey: 'test-secret',
        model: 'whisper-1',
        language: 'bn',
      }),
    ).toBeInstanceOf(WhisperAPIProvider);
  });
});

import { z } from 'zod';
import { ConfigError } from './errors.js';

const DEFAULT_INSTRUCTIONS =
  'আপনি একটি সহায়ক ভয়েস অ্যাসিস্ট্যান্ট। ' +
  'আপনি বাংলা ভাষা খুব ভালোভাবে বুঝতে ও বলতে পারেন। ' +
  'সবসময় বাংলা ভাষায় উত্তর দেবেন, যদি ভিন্ন ভাষায় উত্তর দিতে বিশেষভাবে বলা না হয়। ' +
  'উত্তরগুলো সংক্ষিপ্ত, স্বাভাবিক ও কথোপকথনধর্মী রাখবেন।';

const DEFAULT_GREETING = 'আসসালামু আলাইকুম! আমি কীভাবে আপনাকে সাহায্য করতে পারি?';

const DEFAULT_ERROR_REPLY = 'দুঃখিত, একটু সমস্যা হয়েছে। আবার বলবেন কি?';

const DEFAULT_VOICES = {
  edge: 'bn-IN-TanishaaNeural',
  google: 'bn-IN-Wavenet-A',
  openai: 'nova',
} as const;

const DEFAULT_LLM_MODELS = {
  gemini: 'gemini-2.5-flash',
  openai: 'gpt-4o-mini',
} as const;

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
  // LiveKit room
  room: z.object({
    url: z
      .string({ required_error: 'LIVEKIT_URL is required' })
      .url('LIVEKIT_URL must be a URL')
      .refine((url) => /^(wss?|https?):\/\//.test(url), 'LIVEKIT_URL must be a ws(s) or http(s) URL'),
    apiKey: z.string({ required_error: 'LIVEKIT_API_KEY is required' }).min(1, 'LIVEKIT_API_KEY is required'),
    apiSecret: z
      .string({ required_error: 'LIVEKIT_API_SECRET is required' })
      .min(1, 'LIVEKIT_API_SECRET is required'),
    name: z.string().min(1).default('bangla-voice'),
    identity: z.string().min(1).default('bangla-voice-agent'),
    participantTimeout: z.coerce.number().int().nonnegative().default(0),
  }),

  // STT
  stt: z.discriminatedUnion('provider', [
    z.object({
      provider: z.literal('gradio'),
      apiUrl: z.string({ required_error: 'STT_API_URL is required' }).url('STT_API_URL must be a URL'),
      username: z.string().optional(),
      password: z.string().optional(),
      applyCorrection: booleanFromEnv.default('true'),
      maxRetries: z.coerce.number().int().min(1).default(3),
      language: z.string().default('bn'),
    }),
    z.object({
      provider: z.literal('whisper-api'),
      apiUrl: z.string().url('STT_API_URL must be a URL').default('https://api.openai.com/v1/audio/transcriptions'),
      apiKey: z.string({ required_error: 'STT_API_KEY is required' }).min(1, 'STT_API_KEY is required'),
      model: z.string().default('whisper-1'),
      language: z.string().default('bn'),
    }),
  ]),

  // LLM
  llm: z.object({
    provider: z.enum(['gemini', 'openai']),
    apiKey: z.string().min(1),
    apiUrl: z.string().url().optional(),
    model: z.string().min(1),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
    maxTokens: z.coerce.number().int().positive().optional(),
    memorySize: z.coerce.number().int().positive().default(20),
    instructions: z.string().min(1).default(DEFAULT_INSTRUCTIONS),
  }),

  // TTS
  tts: z.object({
    provider: z.enum(['edge', 'google', 'openai']),
    voice: z.string().min(1),
    apiKey: z.string().optional(),
    apiUrl: z.string().url().optional(),
    model: z.string().optional(),
    rate: z.string().default('+0%'),
    pitch: z.string().default('+0Hz'),
    volume: z.string().default('+0%'),
    speed: z.coerce.number().min(0.25).max(4).default(1),
  }),

  // VAD
  vad: z.object({
    silenceDuration: z.coerce.number().int().positive().default(700),
    minSpeechDuration: z.coerce.number().int().positive().default(250),
    mode: z.enum(['normal', 'low-bitrate', 'aggressive', 'very-aggressive']).default('normal'),
  }),

  // Turn handling
  agent: z.object({
    greeting: z.string().default(DEFAULT_GREETING),
    errorReply: z.string().default(DEFAULT_ERROR_REPLY),
    allowInterruptions: booleanFromEnv.default('true'),
    providerTimeout: z.coerce.number().int().positive().default(30_000),
  }),

  // Audio
  audio: z.object({
    sampleRate: z.literal(16000).default(16000),
    channels: z.literal(1).default(1),
    frameDuration: z.literal(20).default(20),
  }),

  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export type Config = z.infer<typeof configSchema>;
export type STTSettings = Config['stt'];
export type LLMSettings = Config['llm'];
export type TTSSettings = Config['tts'];

type Env = Record<string, string | undefined>;

// Zod paths → env var names, so errors point at what the user has to set.
const ENV_NAMES: Record<string, string> = {
  'room.url': 'LIVEKIT_URL',
  'room.apiKey': 'LIVEKIT_API_KEY',
  'room.apiSecret': 'LIVEKIT_API_SECRET',
  'room.name': 'LIVEKIT_ROOM',
  'room.identity': 'AGENT_IDENTITY',
  'room.participantTimeout': 'PARTICIPANT_WAIT_TIMEOUT',
  'stt.provider': 'STT_PROVIDER',
  'stt.apiUrl': 'STT_API_URL',
  'stt.apiKey': 'STT_API_KEY',
  'stt.applyCorrection': 'STT_APPLY_CORRECTION',
  'stt.maxRetries': 'STT_MAX_RETRIES',
  'llm.provider': 'LLM_PROVIDER',
  'llm.model': 'LLM_MODEL',
  'llm.temperature': 'LLM_TEMPERATURE',
  'llm.maxTokens': 'LLM_MAX_TOKENS',
  'llm.memorySize': 'LLM_MEMORY_SIZE',
  'tts.provider': 'TTS_PROVIDER',
  'tts.voice': 'TTS_VOICE',
  'tts.speed': 'TTS_SPEED',
  'vad.silenceDuration': 'VAD_SILENCE_DURATION',
  'vad.minSpeechDuration': 'VAD_MIN_SPEECH_DURATION',
  'vad.mode': 'VAD_MODE',
  'agent.allowInterruptions': 'AGENT_ALLOW_INTERRUPTIONS',
  'agent.providerTimeout': 'PROVIDER_TIMEOUT',
  logLevel: 'LOG_LEVEL',
};

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function llmApiKey(provider: string | undefined, env: Env): { key: string | undefined; envName: string } {
  return provider === 'openai'
    ? { key: nonEmpty(env.OPENAI_API_KEY), envName: 'OPENAI_API_KEY' }
    : { key: nonEmpty(env.GOOGLE_API_KEY), envName: 'GOOGLE_API_KEY' };
}

function ttsApiKey(provider: string, env: Env): string | undefined {
  switch (provider) {
    case 'google':
      return nonEmpty(env.GOOGLE_TTS_API_KEY) ?? nonEmpty(env.GOOGLE_API_KEY);
    case 'openai':
      return nonEmpty(env.OPENAI_API_KEY);
    default:
      return undefined;
  }
}

/**
 * Build and validate the configuration from an environment map.
 * Throws a ConfigError naming every missing or invalid variable.
 */
export function loadConfig(env: Env = process.env): Config {
  const sttProvider = nonEmpty(env.STT_PROVIDER) ?? 'gradio';
  const llmProvider = nonEmpty(env.LLM_PROVIDER) ?? 'gemini';
  const ttsProvider = nonEmpty(env.TTS_PROVIDER) ?? 'edge';
  const llmKey = llmApiKey(llmProvider, env);

  const rawConfig = {
    room: {
      url: nonEmpty(env.LIVEKIT_URL),
      apiKey: nonEmpty(env.LIVEKIT_API_KEY),
      apiSecret: nonEmpty(env.LIVEKIT_API_SECRET),
      name: nonEmpty(env.LIVEKIT_ROOM),
      identity: nonEmpty(env.AGENT_IDENTITY),
      participantTimeout: nonEmpty(env.PARTICIPANT_WAIT_TIMEOUT),
    },
    stt: {
      provider: sttProvider,
      apiUrl: nonEmpty(env.STT_API_URL),
      apiKey: nonEmpty(env.STT_API_KEY),
      username: nonEmpty(env.STT_USERNAME),
      password: nonEmpty(env.STT_PASSWORD),
      applyCorrection: nonEmpty(env.STT_APPLY_CORRECTION),
      maxRetries: nonEmpty(env.STT_MAX_RETRIES),
      model: nonEmpty(env.STT_MODEL),
      language: nonEmpty(env.STT_LANGUAGE),
    },
    llm: {
      provider: llmProvider,
      apiKey: llmKey.key,
      apiUrl: nonEmpty(env.LLM_API_URL),
      model:
        nonEmpty(env.LLM_MODEL) ??
        (llmProvider === 'openai' ? DEFAULT_LLM_MODELS.openai : DEFAULT_LLM_MODELS.gemini),
      temperature: nonEmpty(env.LLM_TEMPERATURE),
      maxTokens: nonEmpty(env.LLM_MAX_TOKENS),
      memorySize: nonEmpty(env.LLM_MEMORY_SIZE),
      instructions: nonEmpty(env.AGENT_INSTRUCTIONS),
    },
    tts: {
      provider: ttsProvider,
      voice:
        nonEmpty(env.TTS_VOICE) ??
        (ttsProvider === 'google'
          ? DEFAULT_VOICES.google
          : ttsProvider === 'openai'
            ? DEFAULT_VOICES.openai
            : DEFAULT_VOICES.edge),
      apiKey: ttsApiKey(ttsProvider, env),
      apiUrl: nonEmpty(env.TTS_API_URL),
      model: nonEmpty(env.TTS_MODEL),
      rate: nonEmpty(env.TTS_RATE),
      pitch: nonEmpty(env.TTS_PITCH),
      volume: nonEmpty(env.TTS_VOLUME),
      speed: nonEmpty(env.TTS_SPEED),
    },
    vad: {
      silenceDuration: nonEmpty(env.VAD_SILENCE_DURATION),
      minSpeechDuration: nonEmpty(env.VAD_MIN_SPEECH_DURATION),
      mode: nonEmpty(env.VAD_MODE),
    },
    agent: {
      greeting: env.AGENT_GREETING,
      errorReply: env.AGENT_ERROR_REPLY,
      allowInterruptions: nonEmpty(env.AGENT_ALLOW_INTERRUPTIONS),
      providerTimeout: nonEmpty(env.PROVIDER_TIMEOUT),
    },
    audio: {},
    logLevel: nonEmpty(env.LOG_LEVEL),
  };

  const issues: string[] = [];

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    for (const issue of result.error.issues) {
      const path = issue.path.join('.');
      const envName = ENV_NAMES[path];
      if (path === 'llm.apiKey') {
        issues.push(`${llmKey.envName} is required for LLM_PROVIDER=${llmProvider}`);
      } else if (issue.code === 'invalid_union_discriminator') {
        issues.push(`STT_PROVIDER must be one of: gradio, whisper-api (got "${sttProvider}")`);
      } else if (envName && issue.message.startsWith(envName)) {
        issues.push(issue.message);
      } else {
        issues.push(envName ? `${envName}: ${issue.message}` : `${path}: ${issue.message}`);
      }
    }
  }

  if (ttsProvider === 'google' && !rawConfig.tts.apiKey) {
    issues.push('GOOGLE_TTS_API_KEY (or GOOGLE_API_KEY) is required for TTS_PROVIDER=google');
  }
  if (ttsProvider === 'openai' && !rawConfig.tts.apiKey) {
    issues.push('OPENAI_API_KEY is required for TTS_PROVIDER=openai');
  }

  if (!result.success || issues.length > 0) {
    throw new ConfigError(issues);
  }

  return deepFreeze(result.data);
}

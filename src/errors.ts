export type ProviderStage = 'stt' | 'llm' | 'tts';

/**
 * Raised at startup when required environment variables are missing or invalid.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Raised when the agent cannot join the LiveKit room.
 */
export class RoomConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RoomConnectionError';
  }
}

/**
 * A failed call to one of the hosted STT / LLM / TTS services.
 * Recovered within a turn: the turn is abandoned, the session keeps listening.
 */
export class ProviderError extends Error {
  readonly provider: string;
  readonly stage: ProviderStage;

  constructor(stage: ProviderStage, provider: string, message: string, options?: { cause?: unknown }) {
    super(`${provider} ${stage} failed: ${message}`, options);
    this.name = 'ProviderError';
    this.stage = stage;
    this.provider = provider;
  }
}

export class ProviderTimeoutError extends ProviderError {
  readonly timeoutMs: number;

  constructor(stage: ProviderStage, provider: string, timeoutMs: number) {
    super(stage, provider, `timed out after ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');
}

export function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Rejects with an AbortError once the signal fires. Used for SDK calls that
 * take no signal of their own.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError());
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Run a provider call under the turn's signal plus a per-call deadline.
 * The call sees a single signal that fires on either. A deadline hit becomes
 * a ProviderTimeoutError; a turn abort stays an AbortError.
 */
export async function withTimeout<T>(
  stage: ProviderStage,
  provider: string,
  timeoutMs: number,
  signal: AbortSignal,
  call: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;

  const onAbort = () => controller.abort();
  signal.addEventListener('abort', onAbort, { once: true });
  if (signal.aborted) controller.abort();

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    return await abortable(call(controller.signal), controller.signal);
  } catch (error) {
    if (timedOut && !signal.aborted) {
      throw new ProviderTimeoutError(stage, provider, timeoutMs);
    }
    if (signal.aborted || isAbortError(error)) {
      throw error instanceof Error && isAbortError(error) ? error : abortError();
    }
    if (error instanceof ProviderError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ProviderError(stage, provider, message, { cause: error });
  } finally {
    clearTimeout(timer);
    signal.removeEventListener('abort', onAbort);
  }
}

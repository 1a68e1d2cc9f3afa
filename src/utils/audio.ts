import ffmpeg from 'fluent-ffmpeg';
import { PassThrough, Readable } from 'node:stream';
import { logger } from './logger.js';

/**
 * Signed 16-bit PCM, interleaved when channels > 1.
 */
export interface PcmAudio {
  samples: Int16Array;
  sampleRate: number;
  channels: number;
}

/**
 * Duration of a PCM clip in milliseconds
 */
export function durationMs(audio: PcmAudio): number {
  return (audio.samples.length / audio.channels / audio.sampleRate) * 1000;
}

/**
 * Join consecutive frames of the same format into one clip
 */
export function concatPcm(frames: PcmAudio[]): PcmAudio {
  if (frames.length === 0) {
    throw new Error('No audio frames to combine');
  }

  const [first] = frames;
  if (frames.length === 1) {
    return first;
  }

  const total = frames.reduce((sum, frame) => sum + frame.samples.length, 0);
  const samples = new Int16Array(total);
  let offset = 0;
  for (const frame of frames) {
    if (frame.sampleRate !== first.sampleRate || frame.channels !== first.channels) {
      throw new Error(
        `Cannot combine ${frame.sampleRate}Hz/${frame.channels}ch frame with ${first.sampleRate}Hz/${first.channels}ch audio`,
      );
    }
    samples.set(frame.samples, offset);
    offset += frame.samples.length;
  }

  return { samples, sampleRate: first.sampleRate, channels: first.channels };
}

/**
 * Cut a clip into fixed-duration frames. The last frame may be shorter.
 * Each frame owns its samples, so consumers that read through `.buffer` see only that frame.
 */
export function splitIntoFrames(audio: PcmAudio, frameMs: number): PcmAudio[] {
  const samplesPerFrame = Math.max(1, Math.round((audio.sampleRate * frameMs) / 1000)) * audio.channels;
  const frames: PcmAudio[] = [];

  for (let start = 0; start < audio.samples.length; start += samplesPerFrame) {
    frames.push({
      samples: audio.samples.slice(start, Math.min(start + samplesPerFrame, audio.samples.length)),
      sampleRate: audio.sampleRate,
      channels: audio.channels,
    });
  }

  return frames;
}

/**
 * Reinterpret little-endian s16 bytes as samples. A trailing odd byte is dropped.
 */
export function bufferToSamples(buffer: Buffer): Int16Array {
  const sampleCount = Math.floor(buffer.length / 2);
  const samples = new Int16Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    samples[i] = buffer.readInt16LE(i * 2);
  }
  return samples;
}

export function samplesToBuffer(samples: Int16Array): Buffer {
  const buffer = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    buffer.writeInt16LE(samples[i], i * 2);
  }
  return buffer;
}

/**
 * Wrap PCM audio in a 44-byte RIFF/WAVE header
 */
export function encodeWav(audio: PcmAudio): Buffer {
  const bitsPerSample = 16;
  const pcm = samplesToBuffer(audio.samples);
  const byteRate = (audio.sampleRate * audio.channels * bitsPerSample) / 8;
  const blockAlign = (audio.channels * bitsPerSample) / 8;

  const header = Buffer.alloc(44);

  // RIFF header
  header.write('RIFF', 0);
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8);

  // fmt sub-chunk
  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(audio.channels, 22);
  header.writeUInt32LE(audio.sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);

  // data sub-chunk
  header.write('data', 36);
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

/**
 * Parse a 16-bit PCM WAV file. Chunks other than `fmt ` and `data` are skipped.
 */
export function decodeWav(wav: Buffer): PcmAudio {
  if (wav.length < 12 || wav.toString('ascii', 0, 4) !== 'RIFF' || wav.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('Not a RIFF/WAVE buffer');
  }

  let offset = 12;
  let sampleRate: number | undefined;
  let channels: number | undefined;

  while (offset + 8 <= wav.length) {
    const chunkId = wav.toString('ascii', offset, offset + 4);
    const chunkSize = wav.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ') {
      const format = wav.readUInt16LE(body);
      const bitsPerSample = wav.readUInt16LE(body + 14);
      if (format !== 1 || bitsPerSample !== 16) {
        throw new Error(`Unsupported WAV encoding (format ${format}, ${bitsPerSample} bits)`);
      }
      channels = wav.readUInt16LE(body + 2);
      sampleRate = wav.readUInt32LE(body + 4);
    } else if (chunkId === 'data') {
      if (sampleRate === undefined || channels === undefined) {
        throw new Error('WAV data chunk before fmt chunk');
      }
      const end = Math.min(body + chunkSize, wav.length);
      return { samples: bufferToSamples(wav.subarray(body, end)), sampleRate, channels };
    }

    offset = body + chunkSize + (chunkSize % 2);
  }

  throw new Error('WAV buffer has no data chunk');
}

/**
 * Decode a compressed audio buffer (MP3, Ogg, ...) to mono s16le PCM with ffmpeg
 */
export function decodeToPcm(encoded: Buffer, sampleRate: number, signal?: AbortSignal): Promise<PcmAudio> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const output = new PassThrough();
    output.on('data', (chunk: Buffer) => chunks.push(chunk));

    const command = ffmpeg(Readable.from([encoded]))
      .audioChannels(1)
      .audioFrequency(sampleRate)
      .audioCodec('pcm_s16le')
      .format('s16le')
      .on('error', (err: Error) => {
        signal?.removeEventListener('abort', onAbort);
        logger.error(`FFmpeg decode error: ${err.message}`);
        reject(err);
      })
      .on('end', () => {
        signal?.removeEventListener('abort', onAbort);
        const pcm = Buffer.concat(chunks);
        logger.debug(`Decoded ${encoded.length} bytes to ${pcm.length} bytes of PCM`);
        resolve({ samples: bufferToSamples(pcm), sampleRate, channels: 1 });
      });

    const onAbort = () => command.kill('SIGKILL');
    signal?.addEventListener('abort', onAbort, { once: true });

    command.pipe(output, { end: true });
  });
}

const SENTENCE_END = /([.!?।]+)(?=\s|$)/u;

/**
 * Split a reply into sentences for incremental synthesis.
 * Sentences shorter than `minLength` are merged into the next one;
 * sentences longer than `maxLength` are cut at the last space before the limit.
 */
export function splitSentences(text: string, minLength = 8, maxLength = 300): string[] {
  const parts: string[] = [];
  let rest = text.replace(/\s+/g, ' ').trim();

  while (rest.length > 0) {
    const match = SENTENCE_END.exec(rest);
    const end = match ? match.index + match[0].length : rest.length;
    parts.push(rest.slice(0, end).trim());
    rest = rest.slice(end).trim();
  }

  const merged: string[] = [];
  let pending = '';
  for (const part of parts) {
    pending = pending ? `${pending} ${part}` : part;
    if (pending.length >= minLength) {
      merged.push(pending);
      pending = '';
    }
  }
  if (pending) {
    if (merged.length > 0) {
      merged[merged.length - 1] = `${merged[merged.length - 1]} ${pending}`;
    } else {
      merged.push(pending);
    }
  }

  const chunks: string[] = [];
  for (const sentence of merged) {
    let remaining = sentence;
    while (remaining.length > maxLength) {
      const cut = remaining.lastIndexOf(' ', maxLength);
      const at = cut > 0 ? cut : maxLength;
      chunks.push(remaining.slice(0, at).trim());
      remaining = remaining.slice(at).trim();
    }
    if (remaining) chunks.push(remaining);
  }

  return chunks;
}

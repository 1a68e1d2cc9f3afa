import {
  AudioFrame,
  AudioResampler,
  AudioSource,
  AudioStream,
  LocalAudioTrack,
  Room,
  RoomEvent,
  TrackKind,
  TrackPublishOptions,
  TrackSource,
  type RemoteParticipant,
  type RemoteTrack,
  type RemoteTrackPublication,
} from '@livekit/rtc-node';
import { AccessToken } from 'livekit-server-sdk';
import { logger } from '../utils/logger.js';
import type { PcmAudio } from '../utils/audio.js';
import { RoomConnectionError } from '../errors.js';
import type { AudioOutput } from './player.js';

export interface RoomSettings {
  url: string;
  apiKey: string;
  apiSecret: string;
  name: string;
  identity: string;
}

export interface CaptureFormat {
  sampleRate: number;
  channels: number;
}

export type AudioFrameHandler = (frame: PcmAudio) => void;
export type DisconnectHandler = (reason: string) => void;

/**
 * A joined real-time room: inbound audio from one participant,
 * outbound audio for the agent's voice.
 */
export interface RoomTransport extends AudioOutput {
  readonly roomName: string;
  connect(): Promise<void>;
  waitForParticipant(timeoutMs?: number): Promise<string>;
  onAudioFrame(handler: AudioFrameHandler): void;
  onDisconnected(handler: DisconnectHandler): void;
  disconnect(): Promise<void>;
}

type AudioReader = ReturnType<AudioStream['getReader']>;

interface OutputResampler {
  sampleRate: number;
  channels: number;
  resampler: AudioResampler;
}

// All TTS providers emit 24kHz; other rates are resampled
const OUTPUT_SAMPLE_RATE = 24000;
const OUTPUT_CHANNELS = 1;

/**
 * LiveKit room connection for the agent
 */
export class RoomConnection implements RoomTransport {
  private readonly settings: RoomSettings;
  private readonly capture: CaptureFormat;
  private readonly room: Room;
  private source: AudioSource | null = null;
  private resampler: OutputResampler | null = null;
  private targetIdentity: string | null = null;
  private frameHandler: AudioFrameHandler | null = null;
  private disconnectHandler: DisconnectHandler | null = null;
  private readers = new Map<string, AudioReader>();
  private connected = false;
  private closed = false;

  constructor(settings: RoomSettings, capture: CaptureFormat, room: Room = new Room()) {
    this.settings = settings;
    this.capture = capture;
    this.room = room;
  }

  get roomName(): string {
    return this.settings.name;
  }

  /**
   * Join the room and publish the agent's microphone track
   */
  async connect(): Promise<void> {
    if (this.connected) {
      logger.debug(`Already connected to room ${this.settings.name}`);
      return;
    }

    logger.info(`Connecting to room ${this.settings.name}`, { url: this.settings.url });

    try {
      const token = await this.createToken();
      this.setupRoomHandlers();

      // Audio-only: tracks are subscribed selectively in subscribeAudio()
      await this.room.connect(this.settings.url, token, { autoSubscribe: false, dynacast: false });

      this.source = new AudioSource(OUTPUT_SAMPLE_RATE, OUTPUT_CHANNELS);
      const track = LocalAudioTrack.createAudioTrack('agent-voice', this.source);
      const participant = this.room.localParticipant;
      if (!participant) {
        throw new Error('Room has no local participant after connect');
      }
      await participant.publishTrack(track, new TrackPublishOptions({ source: TrackSource.SOURCE_MICROPHONE }));

      for (const remote of this.room.remoteParticipants.values()) {
        this.subscribeAudio(remote);
      }

      this.connected = true;
      logger.info(`Connected to room ${this.settings.name}`, { identity: this.settings.identity });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await this.room.disconnect().catch((disconnectError: unknown) => {
        logger.debug(`Cleanup after failed connect: ${String(disconnectError)}`);
      });
      throw new RoomConnectionError(`Failed to connect to room ${this.settings.name}: ${message}`, {
        cause: error,
      });
    }
  }

  /**
   * Resolve with the identity of the participant the agent talks to:
   * the first one already in the room, or the next to join.
   */
  waitForParticipant(timeoutMs = 0): Promise<string> {
    const existing = this.room.remoteParticipants.values().next();
    if (!existing.done) {
      return Promise.resolve(this.setTarget(existing.value));
    }

    logger.info('Waiting for a participant to join');

    return new Promise((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onJoin = (participant: RemoteParticipant) => {
        if (timer) clearTimeout(timer);
        resolve(this.setTarget(participant));
      };
      this.room.once(RoomEvent.ParticipantConnected, onJoin);

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.room.off(RoomEvent.ParticipantConnected, onJoin);
          reject(new RoomConnectionError(`No participant joined within ${timeoutMs}ms`));
        }, timeoutMs);
      }
    });
  }

  onAudioFrame(handler: AudioFrameHandler): void {
    this.frameHandler = handler;
  }

  onDisconnected(handler: DisconnectHandler): void {
    this.disconnectHandler = handler;
  }

  async captureFrame(frame: PcmAudio): Promise<void> {
    if (!this.source || this.closed) return;

    const audioFrame = toAudioFrame(frame);
    const frames =
      frame.sampleRate === OUTPUT_SAMPLE_RATE ? [audioFrame] : this.resamplerFor(frame).push(audioFrame);

    for (const out of frames) {
      await this.source.captureFrame(out);
    }
  }

  clearQueue(): void {
    this.source?.clearQueue();
    // Input still buffered in the resampler belongs to the dropped clip
    this.resampler = null;
  }

  async waitForPlayout(): Promise<void> {
    const pending = this.resampler;
    this.resampler = null;
    if (pending && this.source) {
      for (const out of pending.resampler.flush()) {
        await this.source.captureFrame(out);
      }
    }
    await this.source?.waitForPlayout();
  }

  /**
   * Leave the room. Safe to call more than once.
   */
  async disconnect(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    logger.info(`Leaving room ${this.settings.name}`);

    const readers = [...this.readers.values()];
    this.readers.clear();
    const cancelled = await Promise.allSettled(readers.map((reader) => reader.cancel()));
    for (const result of cancelled) {
      if (result.status === 'rejected') {
        logger.debug(`Failed to cancel audio stream: ${String(result.reason)}`);
      }
    }

    this.resampler = null;
    try {
      await this.source?.close();
    } catch (error) {
      logger.warn(`Failed to close audio source: ${error instanceof Error ? error.message : String(error)}`);
    }
    this.source = null;

    await this.room.disconnect();
    this.connected = false;
  }

  private async createToken(): Promise<string> {
    const token = new AccessToken(this.settings.apiKey, this.settings.apiSecret, {
      identity: this.settings.identity,
      name: this.settings.identity,
    });
    token.addGrant({
      roomJoin: true,
      room: this.settings.name,
      canPublish: true,
      canSubscribe: true,
    });
    return token.toJwt();
  }

  private resamplerFor(frame: PcmAudio): AudioResampler {
    const current = this.resampler;
    if (current && current.sampleRate === frame.sampleRate && current.channels === frame.channels) {
      return current.resampler;
    }

    logger.debug(`Resampling agent audio from ${frame.sampleRate}Hz to ${OUTPUT_SAMPLE_RATE}Hz`);
    const resampler = new AudioResampler(frame.sampleRate, OUTPUT_SAMPLE_RATE, frame.channels);
    this.resampler = { sampleRate: frame.sampleRate, channels: frame.channels, resampler };
    return resampler;
  }

  private setTarget(participant: RemoteParticipant): string {
    this.targetIdentity = participant.identity;
    logger.info(`Starting voice assistant for participant ${participant.identity}`);
    return participant.identity;
  }

  private setupRoomHandlers(): void {
    this.room.on(RoomEvent.ParticipantConnected, (participant: RemoteParticipant) => {
      logger.debug(`Participant joined: ${participant.identity}`);
      this.subscribeAudio(participant);
    });

    this.room.on(
      RoomEvent.TrackPublished,
      (publication: RemoteTrackPublication, participant: RemoteParticipant) => {
        if (publication.kind === TrackKind.KIND_AUDIO) {
          logger.debug(`Audio track published by ${participant.identity}`);
          publication.setSubscribed(true);
        }
      },
    );

    this.room.on(
      RoomEvent.TrackSubscribed,
      (track: RemoteTrack, publication: RemoteTrackPublication, participant: RemoteParticipant) => {
        if (track.kind !== TrackKind.KIND_AUDIO) return;
        const sid = publication.sid ?? participant.identity;
        void this.readAudio(track, sid, participant.identity);
      },
    );

    this.room.on(RoomEvent.ParticipantDisconnected, (participant: RemoteParticipant) => {
      logger.info(`Participant left: ${participant.identity}`);
      if (participant.identity === this.targetIdentity) {
        this.disconnectHandler?.(`participant ${participant.identity} left`);
      }
    });

    this.room.on(RoomEvent.Disconnected, (reason: unknown) => {
      logger.warn(`Room disconnected`, { room: this.settings.name, reason: String(reason) });
      this.connected = false;
      this.disconnectHandler?.('room disconnected');
    });
  }

  private subscribeAudio(participant: RemoteParticipant): void {
    for (const publication of participant.trackPublications.values()) {
      if (publication.kind === TrackKind.KIND_AUDIO) {
        publication.setSubscribed(true);
      }
    }
  }

  private async readAudio(track: RemoteTrack, sid: string, identity: string): Promise<void> {
    if (this.readers.has(sid) || this.closed) return;
    logger.debug(`Reading audio from ${identity}`, { sid });

    const stream = new AudioStream(track, this.capture.sampleRate, this.capture.channels);
    const reader = stream.getReader();
    this.readers.set(sid, reader);

    try {
      for (;;) {
        const { done, value: frame } = await reader.read();
        if (done || this.closed) break;
        // Only the participant the session belongs to is heard
        if (identity !== this.targetIdentity) continue;

        this.frameHandler?.({
          samples: frame.data,
          sampleRate: frame.sampleRate,
          channels: frame.channels,
        });
      }
    } catch (error) {
      logger.error(`Audio stream error: ${error instanceof Error ? error.message : String(error)}`, { identity });
    } finally {
      if (this.readers.get(sid) === reader) {
        this.readers.delete(sid);
      }
      logger.debug(`Stopped reading audio from ${identity}`, { sid });
    }
  }
}

/**
 * The native layer reads an AudioFrame's whole backing buffer from offset 0,
 * so views into a larger clip are copied first.
 */
function toAudioFrame(pcm: PcmAudio): AudioFrame {
  const { samples } = pcm;
  const data =
    samples.byteOffset === 0 && samples.byteLength === samples.buffer.byteLength ? samples : samples.slice();
  return new AudioFrame(data, pcm.sampleRate, pcm.channels, data.length / pcm.channels);
}

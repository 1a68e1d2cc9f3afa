export { RoomConnection } from './connection.js';
export type { RoomTransport, RoomSettings, CaptureFormat, AudioFrameHandler, DisconnectHandler } from './connection.js';
export { VoicePlayer } from './player.js';
export type { AudioOutput } from './player.js';
export { VoiceActivityDetector } from './vad.js';
export type { VADOptions, SpeechStartCallback, SpeechEndCallback } from './vad.js';

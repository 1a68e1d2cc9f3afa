export { ConversationService } from './conversation.js';
export type { ConversationOptions, ReplyOptions } from './conversation.js';
export { Session } from './session.js';
export type { SessionState, SessionSummary, Turn, TurnStatus } from './session.js';
export { VoiceAssistant } from './voice-assistant.js';
export type { VoiceAssistantDeps, VoiceAssistantOptions, SayOptions } from './voice-assistant.js';

import { randomUUID } from 'node:crypto';

export type SessionState = 'idle' | 'listening' | 'thinking' | 'speaking' | 'closed';

export type TurnStatus = 'pending' | 'completed' | 'skipped' | 'interrupted' | 'failed';

/**
 * One user utterance and the agent's reply to it. Never persisted.
 */
export interface Turn {
  id: string;
  userText: string;
  replyText: string;
  status: TurnStatus;
  error?: string;
  startedAt: number;
  transcribedAt?: number;
  respondedAt?: number;
  completedAt?: number;
}

export interface SessionSummary {
  id: string;
  roomName: string;
  participant: string;
  durationMs: number;
  turns: Record<TurnStatus, number>;
}

/**
 * One voice conversation with one participant.
 * The language is fixed for the lifetime of the session.
 */
export class Session {
  readonly id: string;
  readonly roomName: string;
  readonly participant: string;
  readonly language: string;
  readonly createdAt: number;
  closedAt?: number;
  private _state: SessionState = 'idle';
  private readonly _turns: Turn[] = [];

  constructor(roomName: string, participant: string, language = 'bn', id: string = randomUUID()) {
    this.id = id;
    this.roomName = roomName;
    this.participant = participant;
    this.language = language;
    this.createdAt = Date.now();
  }

  get state(): SessionState {
    return this._state;
  }

  get closed(): boolean {
    return this._state === 'closed';
  }

  get turns(): readonly Turn[] {
    return this._turns;
  }

  /**
   * Move to a new state. A closed session stays closed.
   */
  setState(state: SessionState): void {
    if (this._state === 'closed') return;
    this._state = state;
  }

  beginTurn(): Turn {
    const turn: Turn = {
      id: randomUUID(),
      userText: '',
      replyText: '',
      status: 'pending',
      startedAt: Date.now(),
    };
    this._turns.push(turn);
    return turn;
  }

  /**
   * Settle a pending turn. Settled turns are not changed again.
   */
  finishTurn(turn: Turn, status: Exclude<TurnStatus, 'pending'>, error?: string): void {
    if (turn.status !== 'pending') return;
    turn.status = status;
    turn.completedAt = Date.now();
    if (error) turn.error = error;
  }

  close(): void {
    if (this._state === 'closed') return;
    this._state = 'closed';
    this.closedAt = Date.now();
  }

  summary(): SessionSummary {
    const turns: Record<TurnStatus, number> = { pending: 0, completed: 0, skipped: 0, interrupted: 0, failed: 0 };
    for (const turn of this._turns) {
      turns[turn.status]++;
    }

    return {
      id: this.id,
      roomName: this.roomName,
      participant: this.participant,
      durationMs: (this.closedAt ?? Date.now()) - this.createdAt,
      turns,
    };
  }
}

/**
 * Per-query grounding state machine:
 *   Idle → AgentReady → ThreadOpen → MessageSubmitted → Running → Completed
 * Any non-terminal state may fall through to Failed.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { GroundingState } from '../types/models.js';

const TRANSITIONS: Record<GroundingState, readonly GroundingState[]> = {
  Idle: ['AgentReady', 'Failed'],
  AgentReady: ['ThreadOpen', 'Failed'],
  ThreadOpen: ['MessageSubmitted', 'Failed'],
  MessageSubmitted: ['Running', 'Failed'],
  Running: ['Completed', 'Failed'],
  Completed: [],
  Failed: [],
};

export class GroundingSession {
  private current: GroundingState = 'Idle';
  readonly history: GroundingState[] = ['Idle'];

  constructor(private readonly logProvider: ILogProvider) {}

  get state(): GroundingState {
    return this.current;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(to: GroundingState, fields?: Record<string, unknown>): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new Error(`Invalid grounding transition ${this.current} → ${to}`);
    }
    this.logProvider.debug(`Grounding ${this.current} → ${to}`, fields);
    this.current = to;
    this.history.push(to);
  }

  /** Move to Failed unless already terminal. */
  fail(err: unknown): void {
    if (this.isTerminal) return;
    this.transition('Failed', {
      error: err instanceof Error ? err.name : 'UnknownError',
      message: err instanceof Error ? err.message : String(err),
    });
  }
}

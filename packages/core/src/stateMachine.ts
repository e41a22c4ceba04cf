/**
 * Job State Machine
 * 
 * Strict state machine for acquisition job lifecycle management.
 * 
 * State Flow:
 * QUEUED → RUNNING → COMPLETE
 *     ↘        ↘ FAILED
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Terminal states are final; a retry is a new job
 */

import { StateTransitionError } from './errors/index.js';

export const JobState = {
  QUEUED: 'QUEUED',
  RUNNING: 'RUNNING',
  COMPLETE: 'COMPLETE',
  FAILED: 'FAILED',
} as const;

export type JobState = typeof JobState[keyof typeof JobState];

/**
 * Represents a state transition with metadata
 */
export interface JobStateTransition {
  from: JobState;
  to: JobState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobState, ReadonlySet<JobState>> = {
  QUEUED: new Set<JobState>(['RUNNING', 'FAILED']),
  RUNNING: new Set<JobState>(['COMPLETE', 'FAILED']),
  COMPLETE: new Set<JobState>([]),
  FAILED: new Set<JobState>([]),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobState, to: JobState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: JobState): JobState[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalState(state: JobState): boolean {
  return state === 'COMPLETE' || state === 'FAILED';
}

/**
 * Job State Machine class
 * Manages state transitions with validation
 */
export class JobStateMachine {
  private currentState: JobState;
  private history: JobStateTransition[];
  private readonly jobId: string;

  constructor(jobId: string, initialState: JobState = 'QUEUED') {
    this.jobId = jobId;
    this.currentState = initialState;
    this.history = [];
  }

  getState(): JobState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: JobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: JobState, reason?: string): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  fail(reason: string): JobStateTransition {
    return this.transitionTo('FAILED', reason);
  }
}

/**
 * Watch Lifecycle State Machine
 * 
 * Strict state machine for a single watched cache file.
 * 
 * State Flow:
 * WATCHING → MODIFIED_UPLOADING → WATCHING (upload succeeded)
 *          ↘ DELETED_DEFERRED  → WATCHING (file recreated)
 *                              ↘ REMOVED  (still missing after the recheck)
 * MODIFIED_UPLOADING → REMOVED (upload failed)
 * WATCHING → REMOVED (unwatched, or dropped with its account)
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - REMOVED is terminal; a new watch starts a new machine
 */

import { StateTransitionError } from './errors/index.js';

export const WATCH_STATES = [
  'WATCHING',
  'MODIFIED_UPLOADING',
  'DELETED_DEFERRED',
  'REMOVED',
] as const;

export type WatchState = typeof WATCH_STATES[number];

/**
 * Represents a state transition with metadata
 */
export interface WatchStateTransition {
  from: WatchState;
  to: WatchState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<WatchState, Set<WatchState>> = {
  WATCHING: new Set<WatchState>([
    'MODIFIED_UPLOADING',
    'DELETED_DEFERRED',
    'REMOVED',
  ]),
  MODIFIED_UPLOADING: new Set<WatchState>([
    'WATCHING',
    'REMOVED',
  ]),
  DELETED_DEFERRED: new Set<WatchState>([
    'WATCHING',
    'REMOVED',
  ]),
  REMOVED: new Set<WatchState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: WatchState, to: WatchState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: WatchState): WatchState[] {
  return Array.from(validTransitions[current]);
}

/**
 * Watch State Machine class
 * Manages state transitions of one cache file with validation
 */
export class WatchStateMachine {
  private currentState: WatchState;
  private history: WatchStateTransition[];
  private readonly localPath: string;

  constructor(localPath: string, initialState: WatchState = 'WATCHING') {
    this.localPath = localPath;
    this.currentState = initialState;
    this.history = [];
  }

  getState(): WatchState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<WatchStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: WatchState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: WatchState, reason?: string): WatchStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.localPath, this.currentState, targetState);
    }

    const transition: WatchStateTransition = {
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
    return this.currentState === 'REMOVED';
  }
}

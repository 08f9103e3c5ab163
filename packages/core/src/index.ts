/**
 * @cache-mirror/core
 * 
 * Core domain package containing:
 * - Watch lifecycle state machine
 * - Error handling
 * - Shared types
 */

// State machine
export {
  WATCH_STATES,
  WatchStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type {
  WatchState,
  WatchStateTransition,
} from './stateMachine.js';

// Types
export {
  isSameAccount,
  describeAccount,
} from './types/account.js';

export type { Account } from './types/account.js';

export type {
  WatchRecord,
  DeferredEntry,
} from './types/watch.js';

// Errors
export {
  CacheMirrorError,
  ValidationError,
  StateTransitionError,
  NotFoundError,
  UploadError,
} from './errors/index.js';

/**
 * Custom Error Classes
 */

import type { WatchState } from '../stateMachine.js';

/**
 * Base error class for all cache-mirror errors
 */
export class CacheMirrorError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CacheMirrorError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends CacheMirrorError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid watch lifecycle changes
 */
export class StateTransitionError extends CacheMirrorError {
  constructor(
    localPath: string,
    fromState: WatchState,
    toState: WatchState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { localPath, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends CacheMirrorError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * Remote upload error, carried on a failed upload outcome
 */
export class UploadError extends CacheMirrorError {
  constructor(
    repoId: string,
    remotePath: string,
    cause: string
  ) {
    super(
      `Upload of ${remotePath} to repo ${repoId} failed: ${cause}`,
      'UPLOAD_ERROR',
      { repoId, remotePath, cause }
    );
    this.name = 'UploadError';
  }
}

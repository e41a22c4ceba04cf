/**
 * Custom Error Classes
 */

import type { JobState } from '../stateMachine.js';

/**
 * Base error class for all reelvault errors
 */
export class ReelVaultError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReelVaultError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends ReelVaultError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      400,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends ReelVaultError {
  constructor(
    jobId: string,
    fromState: JobState,
    toState: JobState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      409,
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends ReelVaultError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

// ============================================
// Acquisition errors
// ============================================

/**
 * Errors raised while acquiring a source. `retryable` tells the orchestrator
 * whether the ladder may move on to another strategy.
 */
export abstract class AcquisitionError extends ReelVaultError {
  abstract readonly retryable: boolean;
}

export class InvalidSourceError extends AcquisitionError {
  readonly retryable = false;

  constructor(source: string, reason: string) {
    super(`Invalid source: ${reason}`, 'INVALID_SOURCE', 400, { source, reason });
    this.name = 'InvalidSourceError';
  }
}

export class SourceUnavailableError extends AcquisitionError {
  readonly retryable = false;

  constructor(source: string, upstreamMessage: string) {
    super(`Source unavailable: ${upstreamMessage}`, 'SOURCE_UNAVAILABLE', 422, { source });
    this.name = 'SourceUnavailableError';
  }
}

export class UpstreamBlockedError extends AcquisitionError {
  readonly retryable = true;

  constructor(reason: string, upstreamMessage: string) {
    super(`Upstream blocked the request (${reason}): ${upstreamMessage}`, 'UPSTREAM_BLOCKED', 502, { reason });
    this.name = 'UpstreamBlockedError';
  }
}

export class ToolUnavailableError extends AcquisitionError {
  readonly retryable = true;

  constructor(tool: string, detail: string) {
    super(`Extraction tool unavailable (${tool}): ${detail}`, 'TOOL_UNAVAILABLE', 503, { tool });
    this.name = 'ToolUnavailableError';
  }
}

export class ArtifactMissingError extends AcquisitionError {
  readonly retryable = true;

  constructor(expectedPath: string) {
    super('Artifact missing after reported success', 'ARTIFACT_MISSING', 500, { expectedPath });
    this.name = 'ArtifactMissingError';
  }
}

/**
 * A registration resolved to a row that belongs to another source, or a
 * conflicting row disappeared before it could be re-read
 */
export class RegistrationConflictError extends AcquisitionError {
  readonly retryable = false;

  constructor(storageKey: string, sourceIdentity: string | null) {
    super(`Could not resolve registration conflict for ${storageKey}`, 'REGISTRATION_CONFLICT', 409, {
      storageKey,
      sourceIdentity,
    });
    this.name = 'RegistrationConflictError';
  }
}

export class StorageFailureError extends AcquisitionError {
  readonly retryable = false;

  constructor(operation: 'put' | 'delete' | 'stat', storageKey: string, detail: string) {
    super(`Blob store ${operation} failed for ${storageKey}: ${detail}`, 'STORAGE_FAILURE', 502, {
      operation,
      storageKey,
    });
    this.name = 'StorageFailureError';
  }
}

/**
 * Job Types
 * 
 * Jobs live in process memory only and are lost on restart.
 */

import type { JobState } from '../stateMachine.js';
import type { SourceIdentity } from './asset.js';

export interface Job {
  id: string;
  tenantId: string;
  source: SourceIdentity;
  state: JobState;
  /** 0-100, never decreases */
  progress: number;
  title: string | null;
  /** Storage key reserved for this job's artifact */
  storageKey: string;
  /** Storage key of the registered asset once the job completes */
  filename: string | null;
  error: string | null;
  warning: string | null;
  /** Index of the ladder rung currently (or last) attempted */
  attempt: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * What a polling caller sees
 */
export interface JobStatus {
  id: string;
  state: JobState;
  progress: number;
  title: string | null;
  filename: string | null;
  error: string | null;
  warning: string | null;
  attempt: number;
}

export type JobUpdate = Partial<Pick<Job, 'title' | 'filename' | 'error' | 'warning' | 'attempt'>>;

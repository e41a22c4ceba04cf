/**
 * Job Registry
 * 
 * In-memory store of acquisition jobs, injected into the orchestrator and the
 * HTTP layer. Every state change goes through the job's state machine;
 * progress only moves forward. Readers get copies, never the live record.
 */

import { randomUUID } from 'node:crypto';
import { JobStateMachine, isTerminalState, type JobState, type JobStateTransition } from '../stateMachine.js';
import type { Job, JobStatus, JobUpdate } from '../types/job.js';
import type { SourceIdentity } from '../types/asset.js';
import { NotFoundError } from '../errors/index.js';
import { logger } from '../logger.js';

export interface CreateJobInput {
  tenantId: string;
  source: SourceIdentity;
  title?: string | null;
}

/**
 * Storage key reserved for a job's artifact: the hex digits of its id
 */
export function deriveStorageKey(jobId: string): string {
  return `${jobId.replace(/-/g, '')}.mp4`;
}

function toStatus(job: Job): JobStatus {
  return {
    id: job.id,
    state: job.state,
    progress: job.progress,
    title: job.title,
    filename: job.filename,
    error: job.error,
    warning: job.warning,
    attempt: job.attempt,
  };
}

interface TrackedJob {
  job: Job;
  machine: JobStateMachine;
  /** Extra storage keys the job is about to attach */
  pins: Set<string>;
}

export class JobRegistry {
  private readonly jobs = new Map<string, TrackedJob>();

  create(input: CreateJobInput): Job {
    const id = randomUUID();
    const now = new Date();
    const job: Job = {
      id,
      tenantId: input.tenantId,
      source: input.source,
      state: 'QUEUED',
      progress: 0,
      title: input.title ?? null,
      storageKey: deriveStorageKey(id),
      filename: null,
      error: null,
      warning: null,
      attempt: 0,
      createdAt: now,
      updatedAt: now,
    };

    this.jobs.set(id, { job, machine: new JobStateMachine(id), pins: new Set() });
    logger.info({ jobId: id, tenantId: input.tenantId, source: input.source }, 'Job queued');
    return { ...job };
  }

  get(jobId: string): Job | null {
    const tracked = this.jobs.get(jobId);
    return tracked ? { ...tracked.job } : null;
  }

  /**
   * A job as seen by one tenant; other tenants' jobs do not exist for it
   */
  getForTenant(tenantId: string, jobId: string): Job | null {
    const job = this.get(jobId);
    return job && job.tenantId === tenantId ? job : null;
  }

  status(jobId: string): JobStatus | null {
    const tracked = this.jobs.get(jobId);
    return tracked ? toStatus(tracked.job) : null;
  }

  listForTenant(tenantId: string): JobStatus[] {
    return Array.from(this.jobs.values())
      .filter(({ job }) => job.tenantId === tenantId)
      .sort((a, b) => b.job.createdAt.getTime() - a.job.createdAt.getTime())
      .map(({ job }) => toStatus(job));
  }

  /**
   * The tenant's unfinished job for a source, if any
   */
  findActive(tenantId: string, source: SourceIdentity): Job | null {
    for (const { job } of this.jobs.values()) {
      if (job.tenantId === tenantId && job.source === source && !isTerminalState(job.state)) {
        return { ...job };
      }
    }
    return null;
  }

  history(jobId: string): ReadonlyArray<JobStateTransition> {
    return this.require(jobId).machine.getHistory();
  }

  /**
   * @throws StateTransitionError when the lifecycle does not allow the move
   */
  transition(jobId: string, target: JobState, reason?: string): Job {
    const tracked = this.require(jobId);
    const transition = tracked.machine.transitionTo(target, reason);
    tracked.job.state = transition.to;
    tracked.job.updatedAt = transition.timestamp;

    logger.info({ jobId, from: transition.from, to: transition.to, reason }, 'Job state transition');
    return { ...tracked.job };
  }

  /**
   * Raise progress to `value` (clamped to 0-100). Lower values are ignored.
   * 
   * @returns the progress now recorded
   */
  reportProgress(jobId: string, value: number): number {
    const tracked = this.require(jobId);
    const clamped = Math.min(100, Math.max(0, value));
    if (clamped > tracked.job.progress) {
      tracked.job.progress = clamped;
      tracked.job.updatedAt = new Date();
    }
    return tracked.job.progress;
  }

  update(jobId: string, patch: JobUpdate): Job {
    const tracked = this.require(jobId);
    Object.assign(tracked.job, patch, { updatedAt: new Date() });
    return { ...tracked.job };
  }

  /**
   * Protect a storage key from collection until the job finishes
   */
  pin(jobId: string, storageKey: string): void {
    this.require(jobId).pins.add(storageKey);
  }

  /**
   * Storage keys that unfinished jobs have reserved or pinned.
   * The collector must not release these.
   */
  inFlightStorageKeys(): Set<string> {
    const keys = new Set<string>();
    for (const { job, pins } of this.jobs.values()) {
      if (isTerminalState(job.state)) continue;
      keys.add(job.storageKey);
      for (const key of pins) keys.add(key);
    }
    return keys;
  }

  private require(jobId: string): TrackedJob {
    const tracked = this.jobs.get(jobId);
    if (!tracked) {
      throw new NotFoundError('Job', jobId);
    }
    return tracked;
  }
}

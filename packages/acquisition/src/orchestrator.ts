/**
 * Job Orchestrator
 * 
 * Entry point for acquisition requests. A source that is already registered
 * with its bytes present is attached to the tenant at once; anything else
 * becomes a job that walks the strategy ladder in the background.
 * 
 * Job flow:
 * QUEUED → RUNNING → (ladder) → register → attach → COMPLETE
 *                  ↘ FAILED (fatal outcome, ladder exhausted, missing artifact, attach failure)
 */

import {
  parseSourceIdentity,
  isTerminalState,
  ArtifactMissingError,
  InvalidSourceError,
  NotFoundError,
  RegistrationConflictError,
  ReelVaultError,
  SourceUnavailableError,
  StorageFailureError,
  ToolUnavailableError,
  UpstreamBlockedError,
  type AcquisitionError,
  type AssetRepository,
  type BlobStore,
  type CredentialStore,
  type Job,
  type JobRegistry,
  type SourceIdentity,
  type TenantLibrary,
} from '@reelvault/core';
import { ensureDir, errorMessage, getFileSizeBytes, removeFile, resolveInside } from '@reelvault/utils';
import { COMPLETE_PROGRESS } from './progress.js';
import { describeRung, type Ladder, type StrategySelector } from './ladder.js';
import type { AttemptRunner } from './runner.js';
import { logger } from './logger.js';

export type AcquireResult =
  | { kind: 'dedup'; filename: string; title: string | null }
  | { kind: 'queued'; jobId: string };

export interface JobOrchestratorDeps {
  assets: AssetRepository;
  library: TenantLibrary;
  credentials: CredentialStore;
  jobs: JobRegistry;
  blobs: BlobStore;
  selector: StrategySelector;
  runner: AttemptRunner;
  /** Directory the extractor writes artifacts into */
  videosDir: string;
  allowedHosts?: readonly string[];
}

/** Times a rung is re-run after a missing artifact or a tool failure */
const RUNG_RERUNS = 1;

interface Artifact {
  path: string;
  byteSize: number;
  title: string | null;
}

export class JobOrchestrator {
  private readonly deps: JobOrchestratorDeps;
  private readonly shutdown = new AbortController();
  private readonly running = new Set<Promise<void>>();

  constructor(deps: JobOrchestratorDeps) {
    this.deps = deps;
  }

  /**
   * Request a source for a tenant
   * 
   * @throws InvalidSourceError synchronously, before any job exists
   */
  acquire(tenantId: string, rawSource: string): Promise<AcquireResult> {
    const source = parseSourceIdentity(rawSource, { allowedHosts: this.deps.allowedHosts });
    return this.dispatch(tenantId, source);
  }

  /**
   * Abort running extractor processes and wait for their jobs to end FAILED.
   * No further rung is started once this is called.
   */
  async close(): Promise<void> {
    this.shutdown.abort();
    await Promise.allSettled([...this.running]);
  }

  private async dispatch(tenantId: string, source: SourceIdentity): Promise<AcquireResult> {
    const { assets, blobs, library, jobs } = this.deps;

    const existing = await assets.findBySource(source);
    if (existing) {
      const byteSize = await blobs.size(existing.storageKey);
      if (byteSize !== null) {
        const attached = await library.attach(tenantId, existing.id, {
          title: existing.title ?? existing.storageKey,
          url: source,
        });
        if (attached) {
          if (existing.byteSize === null) {
            await assets.backfillSize(existing.id, byteSize);
          }
          logger.info({ tenantId, source, storageKey: existing.storageKey }, 'Dedup hit, attached existing asset');
          return { kind: 'dedup', filename: existing.storageKey, title: existing.title };
        }
        logger.warn({ source, storageKey: existing.storageKey }, 'Asset was collected during dedup, acquiring again');
      } else {
        logger.warn({ source, storageKey: existing.storageKey }, 'Registered asset has no bytes, acquiring again');
      }
    }

    const active = jobs.findActive(tenantId, source);
    if (active) {
      return { kind: 'queued', jobId: active.id };
    }

    const job = jobs.create({ tenantId, source });
    const worker = this.runJob(job.id)
      .catch((error: unknown) => {
        logger.error({ jobId: job.id, error: errorMessage(error) }, 'Job worker crashed');
      })
      .finally(() => {
        this.running.delete(worker);
      });
    this.running.add(worker);
    return { kind: 'queued', jobId: job.id };
  }

  /**
   * Drive a queued job to a terminal state. Every failure ends up on the job.
   */
  async runJob(jobId: string): Promise<void> {
    try {
      await this.execute(jobId);
    } catch (error) {
      this.failJob(jobId, error);
    }
  }

  private async execute(jobId: string): Promise<void> {
    const { jobs, credentials, selector } = this.deps;

    const job = jobs.get(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }

    jobs.transition(jobId, 'RUNNING');

    const outputPath = resolveInside(this.deps.videosDir, job.storageKey);
    await ensureDir(this.deps.videosDir);

    const credential = await credentials.get(job.tenantId);
    const ladder = selector.buildLadder(credential !== null);

    let artifact: Artifact;
    try {
      artifact = await this.walkLadder(job, ladder, credential, outputPath);
    } catch (error) {
      await removeFile(outputPath);
      throw error;
    }

    await this.finalize(job, artifact);
  }

  /**
   * Try rungs in order until one produces the artifact
   */
  private async walkLadder(
    job: Job,
    ladder: Ladder,
    credential: string | null,
    outputPath: string
  ): Promise<Artifact> {
    const { jobs, runner } = this.deps;
    const log = logger.child({ jobId: job.id });

    let title = job.title;
    let probed = false;
    let lastError: AcquisitionError | null = null;

    for (let index = 0; index < ladder.length; index++) {
      this.throwIfClosed();
      const rung = ladder.at(index);
      if (!rung) break;

      jobs.update(job.id, { attempt: index + 1 });
      let reruns = 0;

      for (;;) {
        this.throwIfClosed();
        const outcome = await runner.run(job.source, rung, {
          jobId: job.id,
          attempt: index,
          outputPath,
          credential: rung.useCredential ? credential : null,
          probeTitle: title === null && !probed,
          initialProgress: jobs.status(job.id)?.progress ?? 0,
          onProgress: (percent) => jobs.reportProgress(job.id, percent),
          signal: this.shutdown.signal,
        });

        probed = true;
        if (outcome.title && title === null) {
          title = outcome.title;
          jobs.update(job.id, { title });
        }

        const result = outcome.classification;

        if (result.outcome === 'success') {
          const byteSize = await getFileSizeBytes(outputPath);
          if (byteSize !== null && byteSize > 0) {
            return { path: outputPath, byteSize, title };
          }
          lastError = new ArtifactMissingError(outputPath);
          if (reruns < RUNG_RERUNS) {
            reruns++;
            log.warn({ strategy: describeRung(rung) }, 'Extractor reported success without an artifact, re-running');
            continue;
          }
          throw lastError;
        }

        if (result.outcome === 'fatal') {
          throw result.reason === 'unsupported_source'
            ? new InvalidSourceError(job.source, result.message)
            : new SourceUnavailableError(job.source, result.message);
        }

        if (result.reason === 'tool_unavailable') {
          lastError = new ToolUnavailableError('extractor', result.message);
          if (reruns < RUNG_RERUNS) {
            reruns++;
            log.warn({ message: result.message }, 'Extractor unavailable, re-running rung once');
            continue;
          }
          throw lastError;
        }

        lastError = new UpstreamBlockedError(result.reason, result.message);
        if (result.scope === 'identity') {
          const inserted = ladder.rewriteForIdentityBlock(index);
          if (inserted) {
            log.info({ strategy: describeRung(inserted) }, 'Client identity blocked, trying an alternate next');
          }
        }
        break;
      }
    }

    throw lastError ?? new UpstreamBlockedError('exhausted', 'no acquisition strategies available');
  }

  /**
   * Register, store and attach. The job only completes once the tenant's
   * library entry exists; bytes registered before a failed attach stay registered.
   */
  private async finalize(job: Job, artifact: Artifact): Promise<void> {
    const { assets, blobs, library, jobs } = this.deps;
    const log = logger.child({ jobId: job.id });

    const asset = await assets.register({
      storageKey: job.storageKey,
      sourceIdentity: job.source,
      title: artifact.title,
      byteSize: artifact.byteSize,
    });
    if (asset.sourceIdentity !== null && asset.sourceIdentity !== job.source) {
      throw new RegistrationConflictError(job.storageKey, job.source);
    }
    jobs.pin(job.id, asset.storageKey);

    if (asset.storageKey !== job.storageKey && (await blobs.exists(asset.storageKey))) {
      await removeFile(artifact.path);
      log.info({ storageKey: asset.storageKey }, 'Source already registered by another job, discarded duplicate artifact');
    } else {
      await this.store(job.id, asset.storageKey, artifact.path);
    }

    if (asset.byteSize === null) {
      await assets.backfillSize(asset.id, artifact.byteSize);
    }

    const title = asset.title ?? artifact.title;
    const attached = await library.attach(job.tenantId, asset.id, {
      title: title ?? asset.storageKey,
      url: job.source,
    });
    if (!attached) {
      throw new ReelVaultError('Asset disappeared before it could be attached', 'ATTACH_FAILED', 500, {
        storageKey: asset.storageKey,
      });
    }

    jobs.update(job.id, { filename: asset.storageKey, title });
    jobs.reportProgress(job.id, COMPLETE_PROGRESS);
    jobs.transition(job.id, 'COMPLETE');
  }

  /**
   * Hand the artifact to the blob store. A failed remote upload only warns;
   * the local copy keeps serving.
   */
  private async store(jobId: string, storageKey: string, path: string): Promise<void> {
    try {
      await this.deps.blobs.put(storageKey, path);
    } catch (error) {
      if (!(error instanceof StorageFailureError)) {
        throw error;
      }
      logger.warn({ jobId, storageKey, error: error.message }, 'Upload failed, serving from local storage');
      this.deps.jobs.update(jobId, { warning: error.message });
    }
  }

  private throwIfClosed(): void {
    if (this.shutdown.signal.aborted) {
      throw new ReelVaultError('Acquisition stopped by shutdown', 'SHUTDOWN', 503);
    }
  }

  private failJob(jobId: string, error: unknown): void {
    const { jobs } = this.deps;
    const message = errorMessage(error);
    const job = jobs.get(jobId);

    if (!job || isTerminalState(job.state)) {
      logger.error({ jobId, error: message }, 'Job failed after reaching a terminal state');
      return;
    }

    jobs.update(jobId, { error: message });
    jobs.transition(jobId, 'FAILED', message);
    logger.warn({ jobId, source: job.source, error: message }, 'Job failed');
  }
}

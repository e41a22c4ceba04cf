/**
 * @reelvault/acquisition
 * 
 * Acquisition layer.
 * 
 * Responsibilities:
 * - Describe egress routes and client identities
 * - Build the bounded strategy ladder for a job
 * - Run yt-dlp per rung and classify the outcome
 * - Stream progress into the job registry
 * - Orchestrate jobs through registration and library attach
 */

// Routes & identities
export {
  directRoute,
  parseRoute,
  formatRoute,
  withSession,
  describeRoute,
  type RouteDescriptor,
  type RouteScheme,
  type ParseRouteOptions,
} from './routes.js';
export { CLIENT_IDENTITIES, findIdentity, resolveIdentities, type ClientIdentity } from './identities.js';

// Strategy selection
export {
  StrategySelector,
  Ladder,
  DEFAULT_MAX_RUNGS,
  describeRung,
  type Rung,
  type StrategySelectorOptions,
  type SessionTagFactory,
} from './ladder.js';

// Outcome classification & progress
export {
  classify,
  summarizeOutput,
  type Classification,
  type RetryScope,
  type RetryableReason,
  type FatalReason,
} from './classification.js';
export {
  parseProgressLine,
  ProgressTracker,
  MERGE_PROGRESS,
  DOWNLOAD_PROGRESS_CEILING,
  COMPLETE_PROGRESS,
  type ProgressEvent,
} from './progress.js';

// Extractor client
export {
  ExtractorClient,
  DEFAULT_FORMAT,
  parseProbeTitle,
  type ExtractorConfig,
  type ExtractorInvocation,
  type DownloadInvocation,
} from './clients/extractor.js';

// Runner & orchestrator
export {
  AcquisitionRunner,
  SPAWN_FAILURE_EXIT_CODE,
  type AttemptRunner,
  type AttemptContext,
  type AcquisitionOutcome,
  type AcquisitionRunnerOptions,
} from './runner.js';
export {
  JobOrchestrator,
  type AcquireResult,
  type JobOrchestratorDeps,
} from './orchestrator.js';

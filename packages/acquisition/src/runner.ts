/**
 * Acquisition Runner
 * 
 * Runs one ladder rung: writes the credential to a private temporary file if
 * the rung uses it, invokes the extractor, pushes progress to the caller as
 * lines arrive and classifies the result.
 */

import { join } from 'node:path';
import { errorMessage, isErrnoException, removeFile, writePrivateFile } from '@reelvault/utils';
import type { SourceIdentity } from '@reelvault/core';
import { classify, type Classification } from './classification.js';
import { ProgressTracker } from './progress.js';
import { describeRung, type Rung } from './ladder.js';
import type { ExtractorClient, ExtractorInvocation } from './clients/extractor.js';
import { logger } from './logger.js';

/** Exit code reported when the extractor binary cannot be spawned */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export interface AttemptContext {
  jobId: string;
  /** 0-based position of the rung in the ladder */
  attempt: number;
  outputPath: string;
  credential: string | null;
  /** Probe for a title before downloading */
  probeTitle: boolean;
  /** Progress already reported for the job */
  initialProgress: number;
  onProgress: (percent: number) => void;
  signal?: AbortSignal;
}

export interface AcquisitionOutcome {
  classification: Classification;
  title: string | null;
  exitCode: number;
  durationMs: number;
}

/**
 * What the orchestrator needs from a runner
 */
export interface AttemptRunner {
  run(source: SourceIdentity, rung: Rung, context: AttemptContext): Promise<AcquisitionOutcome>;
}

export interface AcquisitionRunnerOptions {
  /** Directory for temporary cookie files */
  tempDir: string;
}

export class AcquisitionRunner implements AttemptRunner {
  private readonly extractor: ExtractorClient;
  private readonly tempDir: string;

  constructor(extractor: ExtractorClient, options: AcquisitionRunnerOptions) {
    this.extractor = extractor;
    this.tempDir = options.tempDir;
  }

  async run(source: SourceIdentity, rung: Rung, context: AttemptContext): Promise<AcquisitionOutcome> {
    const log = logger.child({ jobId: context.jobId, attempt: context.attempt });
    const cookiesPath = rung.useCredential && context.credential
      ? join(this.tempDir, `cookies-${context.jobId}-${context.attempt}.txt`)
      : null;

    const invocation: ExtractorInvocation = {
      source,
      route: rung.route,
      identity: rung.identity,
      cookiesPath,
    };

    const startTime = Date.now();
    log.info({ strategy: describeRung(rung) }, 'Starting acquisition attempt');

    try {
      if (cookiesPath && context.credential) {
        await writePrivateFile(cookiesPath, context.credential);
      }

      const title = context.probeTitle ? await this.extractor.probeTitle(invocation) : null;

      const tracker = new ProgressTracker(context.onProgress, context.initialProgress);
      let exitCode: number;
      let output: string;

      try {
        const result = await this.extractor.download({
          ...invocation,
          outputPath: context.outputPath,
          signal: context.signal,
          onLine: (line) => tracker.feed(line),
        });
        exitCode = result.timedOut && result.exitCode === 0 ? 1 : result.exitCode;
        output = `${result.stdout}\n${result.stderr}`;
        if (result.timedOut) {
          output += '\nERROR: extractor timed out';
        }
      } catch (error) {
        if (!(isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EACCES'))) {
          throw error;
        }
        exitCode = SPAWN_FAILURE_EXIT_CODE;
        output = `ERROR: could not start ${this.extractor.binaryPath}: ${error.message}`;
      }

      const classification = classify(exitCode, output);
      const durationMs = Date.now() - startTime;

      if (classification.outcome === 'success') {
        log.info({ durationMs }, 'Acquisition attempt succeeded');
      } else {
        log.warn(
          { durationMs, exitCode, outcome: classification.outcome, reason: classification.reason, message: classification.message },
          'Acquisition attempt failed'
        );
      }

      return { classification, title, exitCode, durationMs };
    } finally {
      if (cookiesPath) {
        await removeFile(cookiesPath).catch((error: unknown) => {
          log.warn({ error: errorMessage(error) }, 'Could not remove temporary cookie file');
        });
      }
    }
  }
}

/**
 * Downloads Routes
 * 
 * Acquisition requests and job status polling. Jobs are visible to the
 * tenant that created them only.
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { NotFoundError, type JobRegistry, type JobStatus } from '@reelvault/core';
import type { JobOrchestrator } from '@reelvault/acquisition';

const createDownloadSchema = z.object({
  url: z.string().trim().min(1),
});

const jobParamsSchema = z.object({
  jobId: z.string().min(1),
});

export interface DownloadRoutesOptions {
  orchestrator: JobOrchestrator;
  jobs: JobRegistry;
}

function toResponse(status: JobStatus) {
  return {
    jobId: status.id,
    state: status.state,
    progress: status.progress,
    title: status.title,
    filename: status.filename,
    error: status.error,
    warning: status.warning,
    attempt: status.attempt,
  };
}

export const downloadRoutes: FastifyPluginAsync<DownloadRoutesOptions> = async (fastify, { orchestrator, jobs }) => {
  fastify.addHook('onRequest', fastify.authenticate);

  /**
   * Request a source; registered sources are attached at once
   */
  fastify.post('/', async (request, reply) => {
    const { url } = createDownloadSchema.parse(request.body);

    const result = await orchestrator.acquire(request.tenantId, url);

    if (result.kind === 'dedup') {
      return reply.status(200).send({ dedup: true, filename: result.filename, title: result.title });
    }
    return reply.status(202).send({ dedup: false, jobId: result.jobId });
  });

  /**
   * List the tenant's jobs, newest first
   */
  fastify.get('/', async (request) => {
    return { jobs: jobs.listForTenant(request.tenantId).map(toResponse) };
  });

  /**
   * Poll a job
   */
  fastify.get('/:jobId', async (request) => {
    const { jobId } = jobParamsSchema.parse(request.params);

    const job = jobs.getForTenant(request.tenantId, jobId);
    const status = job ? jobs.status(job.id) : null;
    if (!status) {
      throw new NotFoundError('Job', jobId);
    }

    return toResponse(status);
  });
};

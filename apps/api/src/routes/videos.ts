/**
 * Video Routes
 * 
 * Serves stored artifacts by storage key: a redirect to a presigned URL when
 * the object store has the file, else the local copy.
 */

import { createReadStream } from 'node:fs';
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { NotFoundError, type BlobStore } from '@reelvault/core';
import { getFileSizeBytes, isSafeStorageKey } from '@reelvault/utils';

const videoParamsSchema = z.object({
  filename: z.string().min(1).max(255),
});

export interface VideoRoutesOptions {
  blobs: BlobStore;
  presignedUrlTtlSeconds: number;
}

export const videoRoutes: FastifyPluginAsync<VideoRoutesOptions> = async (fastify, { blobs, presignedUrlTtlSeconds }) => {
  fastify.get('/:filename', async (request, reply) => {
    const { filename } = videoParamsSchema.parse(request.params);
    if (!isSafeStorageKey(filename)) {
      throw new NotFoundError('Video', filename);
    }

    const url = await blobs.urlFor(filename, presignedUrlTtlSeconds);
    if (url) {
      return reply.redirect(url);
    }

    const path = await blobs.localPath(filename);
    const size = path ? await getFileSizeBytes(path) : null;
    if (!path || size === null) {
      throw new NotFoundError('Video', filename);
    }

    return reply
      .type('video/mp4')
      .header('content-length', size)
      .send(createReadStream(path));
  });
};

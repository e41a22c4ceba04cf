import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StorageFailureError, type BlobStore } from '@reelvault/core';
import { LocalBlobStore } from './targets/local.js';
import { StorageRouter } from './router.js';

class FakeRemote implements BlobStore {
  readonly name = 'fake-remote';
  readonly objects = new Map<string, number>();
  failPuts = 0;
  putError: Error = new Error('connection reset');
  unreachable = false;
  putCalls = 0;

  async put(storageKey: string): Promise<void> {
    this.putCalls += 1;
    if (this.failPuts > 0) {
      this.failPuts -= 1;
      throw this.putError;
    }
    this.objects.set(storageKey, 100);
  }

  async delete(storageKey: string): Promise<void> {
    this.objects.delete(storageKey);
  }

  async exists(storageKey: string): Promise<boolean> {
    return (await this.size(storageKey)) !== null;
  }

  async size(storageKey: string): Promise<number | null> {
    if (this.unreachable) {
      throw new Error('connection refused');
    }
    return this.objects.get(storageKey) ?? null;
  }

  async urlFor(storageKey: string, ttlSeconds: number): Promise<string | null> {
    return this.objects.has(storageKey) ? `https://bucket.test/${storageKey}?ttl=${ttlSeconds}` : null;
  }

  async localPath(): Promise<string | null> {
    return null;
  }
}

describe('StorageRouter', () => {
  let dir: string;
  let local: LocalBlobStore;
  let remote: FakeRemote;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reelvault-router-'));
    local = new LocalBlobStore(join(dir, 'videos'));
    await local.init();
    remote = new FakeRemote();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function artifact(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  }

  it('stores locally and uploads, retrying transient failures', async () => {
    const router = new StorageRouter(local, remote, { retry: { maxAttempts: 3, initialDelay: 1 } });
    remote.failPuts = 1;

    await router.put('clip.mp4', await artifact('clip.mp4', 'abcd'));

    expect(remote.putCalls).toBe(2);
    expect(await local.size('clip.mp4')).toBe(4);
    expect(await router.size('clip.mp4')).toBe(100);
    expect(await router.urlFor('clip.mp4', 60)).toBe('https://bucket.test/clip.mp4?ttl=60');
  });

  it('keeps the local copy when the upload keeps failing', async () => {
    const router = new StorageRouter(local, remote, { retry: { maxAttempts: 2, initialDelay: 1 } });
    remote.failPuts = 5;

    await expect(router.put('clip.mp4', await artifact('clip.mp4', 'abcd'))).rejects.toThrow(StorageFailureError);
    expect(await router.exists('clip.mp4')).toBe(true);
    expect(await router.urlFor('clip.mp4', 60)).toBeNull();
  });

  it('does not retry an upload error flagged as permanent', async () => {
    const router = new StorageRouter(local, remote, { retry: { maxAttempts: 3, initialDelay: 1 } });
    remote.failPuts = 5;
    remote.putError = new StorageFailureError('stat', 'clip.mp4', 'access denied');

    await expect(router.put('clip.mp4', await artifact('clip.mp4', 'abcd'))).rejects.toThrow(
      'Blob store put failed for clip.mp4: Blob store stat failed for clip.mp4: access denied'
    );
    expect(remote.putCalls).toBe(1);
  });

  it('falls back to the local copy when the remote is unreachable', async () => {
    const router = new StorageRouter(local, remote);
    await router.put('clip.mp4', await artifact('clip.mp4', 'abc'));
    remote.unreachable = true;

    expect(await router.size('clip.mp4')).toBe(3);
  });

  it('deletes from both targets', async () => {
    const router = new StorageRouter(local, remote);
    await router.put('clip.mp4', await artifact('clip.mp4', 'abc'));

    await router.delete('clip.mp4');

    expect(remote.objects.has('clip.mp4')).toBe(false);
    expect(await router.exists('clip.mp4')).toBe(false);
  });

  it('works with the local directory alone', async () => {
    const router = new StorageRouter(local);
    await router.put('clip.mp4', await artifact('clip.mp4', 'abc'));

    expect(router.name).toBe('local');
    expect(await router.urlFor('clip.mp4', 60)).toBeNull();
    expect(await router.localPath('clip.mp4')).toBe(join(dir, 'videos', 'clip.mp4'));
  });
});

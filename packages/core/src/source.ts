/**
 * Source Identity
 * 
 * Turns a user supplied URL into the canonical string used as the
 * deduplication key. Rejections happen here, synchronously, before any job exists.
 */

import { InvalidSourceError } from './errors/index.js';
import type { SourceIdentity } from './types/asset.js';

export interface SourceIdentityOptions {
  /** Hosts (and their subdomains) that may be acquired; empty means any host */
  allowedHosts?: readonly string[];
}

const YOUTUBE_HOSTS = ['youtube.com', 'youtu.be', 'youtube-nocookie.com'];
const YOUTUBE_ID = /^[A-Za-z0-9_-]{11}$/;
const YOUTUBE_PATH_PREFIXES = ['shorts', 'embed', 'live', 'v'];

function hostMatches(host: string, candidate: string): boolean {
  return host === candidate || host.endsWith(`.${candidate}`);
}

function extractYoutubeId(url: URL): string | null {
  const host = url.hostname.toLowerCase();
  const segments = url.pathname.split('/').filter(Boolean);

  if (hostMatches(host, 'youtu.be')) {
    return segments[0] ?? null;
  }

  const fromQuery = url.searchParams.get('v');
  if (segments[0] === 'watch' && fromQuery) {
    return fromQuery;
  }

  const [prefix, id] = segments;
  if (prefix && YOUTUBE_PATH_PREFIXES.includes(prefix) && id) {
    return id;
  }

  return null;
}

/**
 * Parse and canonicalise a source URL
 * 
 * @throws InvalidSourceError for anything that is not an acquirable http(s) URL
 */
export function parseSourceIdentity(
  raw: string,
  options: SourceIdentityOptions = {}
): SourceIdentity {
  const trimmed = raw.trim();
  if (trimmed === '') {
    throw new InvalidSourceError(raw, 'a source URL is required');
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new InvalidSourceError(raw, 'not a valid URL');
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidSourceError(raw, `unsupported protocol ${url.protocol}`);
  }

  const host = url.hostname.toLowerCase();
  const allowed = options.allowedHosts ?? [];
  if (allowed.length > 0 && !allowed.some((candidate) => hostMatches(host, candidate.toLowerCase()))) {
    throw new InvalidSourceError(raw, `host ${host} is not supported`);
  }

  if (YOUTUBE_HOSTS.some((candidate) => hostMatches(host, candidate))) {
    const id = extractYoutubeId(url);
    if (!id || !YOUTUBE_ID.test(id)) {
      throw new InvalidSourceError(raw, 'no video id in URL');
    }
    return `https://www.youtube.com/watch?v=${id}`;
  }

  url.hash = '';
  return url.toString();
}

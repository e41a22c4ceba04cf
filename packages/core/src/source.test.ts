import { describe, it, expect } from 'vitest';
import { parseSourceIdentity } from './source.js';
import { InvalidSourceError } from './errors/index.js';

describe('parseSourceIdentity', () => {
  it('collapses the YouTube URL forms onto one identity', () => {
    const canonical = 'https://www.youtube.com/watch?v=abcdefghijk';
    expect(parseSourceIdentity('https://www.youtube.com/watch?v=abcdefghijk&t=42')).toBe(canonical);
    expect(parseSourceIdentity('https://youtu.be/abcdefghijk?si=xyz')).toBe(canonical);
    expect(parseSourceIdentity('https://m.youtube.com/shorts/abcdefghijk')).toBe(canonical);
    expect(parseSourceIdentity('  https://www.youtube.com/embed/abcdefghijk  ')).toBe(canonical);
  });

  it('drops the fragment of other URLs', () => {
    expect(parseSourceIdentity('https://media.example.org/clip/7#comments')).toBe(
      'https://media.example.org/clip/7'
    );
  });

  it('rejects text that is not a URL', () => {
    expect(() => parseSourceIdentity('not-a-url')).toThrow(InvalidSourceError);
    expect(() => parseSourceIdentity('not-a-url')).toThrow('Invalid source: not a valid URL');
  });

  it('rejects empty input and non-http protocols', () => {
    expect(() => parseSourceIdentity('   ')).toThrow('Invalid source: a source URL is required');
    expect(() => parseSourceIdentity('ftp://example.org/file')).toThrow(
      'Invalid source: unsupported protocol ftp:'
    );
  });

  it('rejects YouTube URLs without a video id', () => {
    expect(() => parseSourceIdentity('https://www.youtube.com/feed/trending')).toThrow(
      'Invalid source: no video id in URL'
    );
  });

  it('enforces the host allow-list including subdomains', () => {
    const options = { allowedHosts: ['youtube.com', 'youtu.be'] };
    expect(parseSourceIdentity('https://youtu.be/abcdefghijk', options)).toBe(
      'https://www.youtube.com/watch?v=abcdefghijk'
    );
    expect(() => parseSourceIdentity('https://example.org/a', options)).toThrow(
      'Invalid source: host example.org is not supported'
    );
  });
});

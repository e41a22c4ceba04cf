import { describe, it, expect } from 'vitest';
import { sanitizeFilename, isSafeStorageKey, resolveInside } from './path.js';

describe('sanitizeFilename', () => {
  it('replaces reserved characters and trims dots', () => {
    expect(sanitizeFilename('..my:clip?.mp4')).toBe('my_clip_.mp4');
  });

  it('limits length to 200 characters', () => {
    expect(sanitizeFilename('a'.repeat(300))).toHaveLength(200);
  });
});

describe('isSafeStorageKey', () => {
  it('accepts plain file names', () => {
    expect(isSafeStorageKey('3f9a1c2e.mp4')).toBe(true);
  });

  it('rejects traversal and separators', () => {
    expect(isSafeStorageKey('../etc/passwd')).toBe(false);
    expect(isSafeStorageKey('nested/clip.mp4')).toBe(false);
    expect(isSafeStorageKey('')).toBe(false);
  });
});

describe('resolveInside', () => {
  it('resolves keys under the root', () => {
    expect(resolveInside('/srv/videos', 'clip.mp4')).toBe('/srv/videos/clip.mp4');
  });

  it('throws when the key escapes the root', () => {
    expect(() => resolveInside('/srv/videos', '../secrets.txt')).toThrow('Path escapes storage root');
  });
});

import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTempDir, referenceFor, removeTempDir, writeVideo } from '../test/fixtures.ts';
import {
  createFileReference,
  decodeBookmarkText,
  encodeBookmark,
  resolveFileReference,
} from './fileReference.ts';

describe('fileReference', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('resolves an untouched file to its path without staleness', () => {
    const video = writeVideo(dir, 'holiday.mp4');
    const result = resolveFileReference(referenceFor(video));

    expect(result).toEqual({ ok: true, value: { path: video, isStale: false } });
  });

  it('mints references from relative paths as absolute ones', () => {
    const video = writeVideo(dir, 'relative.mp4');
    const relative = path.relative(process.cwd(), video);
    const result = resolveFileReference(referenceFor(relative));

    expect(result.ok && result.value.path).toBe(video);
  });

  it('refuses to reference a missing file', () => {
    const result = createFileReference(path.join(dir, 'missing.mp4'));

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('unsupported');
  });

  it('refuses to reference a directory', () => {
    const result = createFileReference(dir);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('unsupported');
      expect(result.error.message).toBe(`Cannot reference "${dir}": not a regular file`);
    }
  });

  it('follows a file renamed within its directory and reports it stale', () => {
    const video = writeVideo(dir, 'draft.mp4');
    const ref = referenceFor(video);
    const renamed = path.join(dir, 'final.mp4');
    fs.renameSync(video, renamed);

    expect(resolveFileReference(ref)).toEqual({ ok: true, value: { path: renamed, isStale: true } });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('reports a file replaced at the same path as stale', () => {
    const video = writeVideo(dir, 'episode.mkv');
    const ref = referenceFor(video);
    const replacement = writeVideo(dir, 'episode.mkv.tmp');
    fs.renameSync(replacement, video);

    expect(resolveFileReference(ref)).toEqual({ ok: true, value: { path: video, isStale: true } });
  });

  it('follows a renamed file rather than a newcomer at its old path', () => {
    const video = writeVideo(dir, 'movie.mp4');
    const ref = referenceFor(video);
    const backup = path.join(dir, 'movie.bak.mp4');
    fs.renameSync(video, backup);
    writeVideo(dir, 'movie.mp4');

    expect(resolveFileReference(ref)).toEqual({ ok: true, value: { path: backup, isStale: true } });
  });

  it('cannot resolve a deleted file', () => {
    const video = writeVideo(dir, 'gone.mp4');
    const ref = referenceFor(video);
    fs.unlinkSync(video);

    const result = resolveFileReference(ref);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('unresolvable');
      expect(result.error.message).toBe(`File "${video}" can no longer be located`);
    }
  });

  it('cannot resolve a file moved to another directory', () => {
    const video = writeVideo(dir, 'moved.mp4');
    const ref = referenceFor(video);
    fs.mkdirSync(path.join(dir, 'archive'));
    fs.renameSync(video, path.join(dir, 'archive', 'moved.mp4'));

    const result = resolveFileReference(ref);
    expect(result.ok).toBe(false);
  });

  it('cannot resolve corrupt bookmark bytes', () => {
    const result = resolveFileReference({ bookmarkBytes: Buffer.from('not a bookmark') });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('unresolvable');
      expect(result.error.message).toBe('Bookmark data is corrupt');
    }
  });

  it('keeps bookmark bytes intact through the text form', () => {
    const video = writeVideo(dir, 'clip.webm');
    const ref = referenceFor(video);
    const restored = decodeBookmarkText(encodeBookmark(ref));

    expect(restored.bookmarkBytes.equals(ref.bookmarkBytes)).toBe(true);
    expect(resolveFileReference(restored)).toEqual({ ok: true, value: { path: video, isStale: false } });
  });
});

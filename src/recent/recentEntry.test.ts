import { describe, expect, it } from 'vitest';
import { createRecentEntry, isSameRecentEntry, type RecentEntry } from './recentEntry.ts';

const fileRef = { bookmarkBytes: Buffer.from('placeholder') };

describe('createRecentEntry', () => {
  it('names the entry after the file and stamps it', () => {
    const lastWatched = new Date('2025-05-05T20:00:00.000Z');
    const entry = createRecentEntry(fileRef, '/media/shows/pilot.mkv', { lastWatched });

    expect(entry.displayName).toBe('pilot.mkv');
    expect(entry.lastWatched).toBe(lastWatched);
    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('gives every entry its own id', () => {
    const a = createRecentEntry(fileRef, '/media/a.mp4');
    const b = createRecentEntry(fileRef, '/media/a.mp4');

    expect(a.id).not.toBe(b.id);
  });
});

describe('isSameRecentEntry', () => {
  const a = createRecentEntry(fileRef, '/media/a.mp4', { displayName: 'A' });
  const b = createRecentEntry(fileRef, '/media/b.mp4', { displayName: 'B' });

  it('matches on id', () => {
    expect(isSameRecentEntry(a, { ...a, displayName: 'renamed' }, () => undefined)).toBe(true);
  });

  it('matches on resolved path', () => {
    expect(isSameRecentEntry(a, b, () => '/media/a.mp4')).toBe(true);
  });

  it('does not match unresolved entries', () => {
    const paths = new Map<RecentEntry, string>([[a, '/media/a.mp4']]);

    expect(isSameRecentEntry(a, b, (entry) => paths.get(entry))).toBe(false);
    expect(isSameRecentEntry(b, { ...b, id: 'other' }, () => undefined)).toBe(false);
  });
});

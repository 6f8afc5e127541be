import { randomUUID } from 'node:crypto';
import { getFileName } from '../utils/getFileName.ts';
import type { SecureFileReference } from './fileReference.ts';

export interface RecentEntry {
  readonly id: string;
  readonly fileRef: SecureFileReference;
  displayName: string;
  lastWatched: Date;
  /** Last known playback position, in seconds. */
  currentTime?: number;
  /** Media duration, in seconds. */
  duration?: number;
}

export interface RecentEntryOptions {
  displayName?: string;
  lastWatched?: Date;
}

export function createRecentEntry(
  fileRef: SecureFileReference,
  filePath: string,
  options: RecentEntryOptions = {},
): RecentEntry {
  return {
    id: randomUUID(),
    fileRef,
    displayName: options.displayName ?? getFileName(filePath),
    lastWatched: options.lastWatched ?? new Date(),
  };
}

/**
 * Two entries are the same recent item when they share an id, or when both
 * references resolve to the same file. Unresolved paths never match.
 */
export function isSameRecentEntry(
  a: RecentEntry,
  b: RecentEntry,
  resolvedPathOf: (entry: RecentEntry) => string | undefined,
): boolean {
  if (a.id === b.id) return true;
  const pathA = resolvedPathOf(a);
  return pathA !== undefined && pathA === resolvedPathOf(b);
}

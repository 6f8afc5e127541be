import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createFileReference, type SecureFileReference } from '../recent/fileReference.ts';

export function createTempDir(): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'recent-videos-')));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeVideo(dir: string, name: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, `fake video data for ${name}`);
  return filePath;
}

export function referenceFor(filePath: string): SecureFileReference {
  const result = createFileReference(filePath);
  if (!result.ok) throw result.error;
  return result.value;
}

import path from 'node:path';

export const UNKNOWN_FILE_NAME = 'Unknown file';

// Last path component, tolerating Windows separators on any platform.
export function getFileName(filePath: string | null | undefined): string {
    if (!filePath) return UNKNOWN_FILE_NAME;
    const name = filePath.includes('\\') ? path.win32.basename(filePath) : path.posix.basename(filePath);
    return name || filePath;
}

import { describe, expect, it } from 'vitest';
import { getFileName, UNKNOWN_FILE_NAME } from './getFileName.ts';

describe('getFileName', () => {
  it('takes the last path component', () => {
    expect(getFileName('/home/me/Videos/trip.mov')).toBe('trip.mov');
    expect(getFileName('C:\\Users\\me\\Videos\\trip.mov')).toBe('trip.mov');
  });

  it('falls back for empty input', () => {
    expect(getFileName(null)).toBe(UNKNOWN_FILE_NAME);
    expect(getFileName('')).toBe(UNKNOWN_FILE_NAME);
  });
});

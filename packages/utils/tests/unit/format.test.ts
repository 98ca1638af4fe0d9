import { describe, it, expect } from 'vitest';
import { formatElapsedTime, formatGigabytes, formatSizeColumn } from '../../src/format.js';

describe('format', () => {
  it('formats decimal gigabytes with one digit', () => {
    expect(formatGigabytes(4_300_000_000)).toBe('4.3');
    expect(formatGigabytes(0)).toBe('0.0');
    expect(formatGigabytes(23_802_958_000)).toBe('23.8');
  });

  it('right-aligns the size column', () => {
    expect(formatSizeColumn(4_300_000_000)).toBe('  4.3 GB');
    expect(formatSizeColumn(23_802_958_000)).toBe(' 23.8 GB');
  });

  it('formats elapsed time', () => {
    expect(formatElapsedTime(500)).toBe('500ms');
    expect(formatElapsedTime(1500)).toBe('1.5s');
    expect(formatElapsedTime(125_000)).toBe('2m 5s');
  });
});

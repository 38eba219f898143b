import { describe, it, expect } from 'vitest';
import { parseTimestamp, toInstant } from './time';

describe('parseTimestamp', () => {
  it('treats a bare date as UTC midnight', () => {
    expect(parseTimestamp('2024-03-01')).toBe('2024-03-01T00:00:00.000Z');
  });

  it('normalizes a trailing Z', () => {
    expect(parseTimestamp('2024-03-01T14:30:00Z')).toBe('2024-03-01T14:30:00.000Z');
  });

  it('applies explicit offsets', () => {
    expect(parseTimestamp('2024-03-01T14:30:00+02:00')).toBe('2024-03-01T12:30:00.000Z');
    expect(parseTimestamp('2024-03-01T14:30:00-0500')).toBe('2024-03-01T19:30:00.000Z');
  });

  it('accepts a space separator, missing seconds and fractions', () => {
    expect(parseTimestamp('2024-03-01 09:15')).toBe('2024-03-01T09:15:00.000Z');
    expect(parseTimestamp('2024-03-01T09:15:07.123456Z')).toBe('2024-03-01T09:15:07.123Z');
  });

  it('returns null for anything else', () => {
    expect(parseTimestamp('last Tuesday')).toBeNull();
    expect(parseTimestamp('2024-02-30')).toBeNull();
    expect(parseTimestamp('2024-03-01T25:00:00Z')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(20240301)).toBeNull();
  });
});

describe('toInstant', () => {
  it('parses timestamps and rejects junk', () => {
    expect(toInstant('2024-03-01T00:00:00.000Z')).toBe(Date.UTC(2024, 2, 1));
    expect(toInstant(null)).toBeNull();
    expect(toInstant('soon')).toBeNull();
  });
});

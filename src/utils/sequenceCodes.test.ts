import { describe, it, expect } from 'vitest';
import { sequenceCode } from './sequenceCodes.js';

describe('sequenceCode', () => {
  it('should combine prefix, UTC timestamp and a zero-padded serial', () => {
    expect(sequenceCode('HOLD', new Date('2024-06-01T09:05:07.123Z'), 42)).toBe('HOLD-20240601090507-0042');
  });

  it('should widen the serial past four digits instead of wrapping', () => {
    expect(sequenceCode('RECT', new Date('2024-06-01T00:00:00Z'), 12345)).toBe('RECT-20240601000000-12345');
  });

  it('should refuse a serial below one', () => {
    expect(() => sequenceCode('RECT', new Date('2024-06-01T00:00:00Z'), 0)).toThrow(
      'Sequence serial must be a positive integer, got 0',
    );
  });
});

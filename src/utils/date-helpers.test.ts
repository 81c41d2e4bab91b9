/**
 * Unit Tests for Date Helpers
 */

import { describe, it, expect } from 'vitest';
import { formatTimeBucket, parseTimeValue, toTimeBucket } from './date-helpers.js';

describe('date-helpers', () => {
  describe('parseTimeValue', () => {
    it('should parse dates and datetimes', () => {
      expect(parseTimeValue('2024-03-15')?.format('YYYY-MM-DD')).toBe('2024-03-15');
      expect(parseTimeValue('2024-03-15 10:30:00')?.format('HH:mm')).toBe('10:30');
      expect(parseTimeValue('2024/03/15')?.format('YYYY-MM-DD')).toBe('2024-03-15');
    });

    it('should reject values that are not dates', () => {
      expect(parseTimeValue('yesterday')).toBeNull();
      expect(parseTimeValue('2024-13-01')).toBeNull();
      expect(parseTimeValue('')).toBeNull();
      expect(parseTimeValue(42)).toBeNull();
      expect(parseTimeValue(null)).toBeNull();
    });
  });

  describe('toTimeBucket', () => {
    it('should bucket by day', () => {
      expect(toTimeBucket('2024-03-15 23:59:59', 'day')).toBe('2024-03-15');
    });

    it('should bucket by month', () => {
      expect(toTimeBucket('2024-03-15', 'month')).toBe('2024-03');
      expect(toTimeBucket('2024-03', 'month')).toBe('2024-03');
    });

    it('should convert offsets to UTC before bucketing', () => {
      expect(toTimeBucket('2024-03-16T01:00:00+02:00', 'day')).toBe('2024-03-15');
    });

    it('should return null for invalid values', () => {
      expect(toTimeBucket('soon', 'day')).toBeNull();
    });
  });

  describe('formatTimeBucket', () => {
    it('should format parsed values', () => {
      const parsed = parseTimeValue('2023-12-31T12:00:00Z');
      expect(parsed).not.toBeNull();
      if (parsed) {
        expect(formatTimeBucket(parsed, 'month')).toBe('2023-12');
      }
    });
  });
});

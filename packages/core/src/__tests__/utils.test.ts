import { describe, it, expect } from 'vitest';
import { addDays, daysInRange, eachDay, parseIsoDate, todayUtc } from '../utils/dates';
import {
  betTypesSchema,
  booleanQuerySchema,
  dateRangeSchema,
  isoDateSchema,
  leagueSchema,
  seasonSchema,
} from '../utils/validation';

describe('Date Utilities', () => {
  describe('parseIsoDate', () => {
    it('should parse calendar dates at UTC midnight', () => {
      expect(parseIsoDate('2025-01-15')).toBe(Date.UTC(2025, 0, 15));
    });

    it('should reject impossible and malformed dates', () => {
      expect(parseIsoDate('2025-02-30')).toBeNull();
      expect(parseIsoDate('2025-1-5')).toBeNull();
      expect(parseIsoDate('yesterday')).toBeNull();
    });
  });

  describe('addDays', () => {
    it('should cross month and year boundaries', () => {
      expect(addDays('2025-01-31', 1)).toBe('2025-02-01');
      expect(addDays('2025-01-01', -1)).toBe('2024-12-31');
      expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    });

    it('should throw on invalid dates', () => {
      expect(() => addDays('2025-13-01', 1)).toThrow(RangeError);
    });
  });

  describe('daysInRange', () => {
    it('should count both ends', () => {
      expect(daysInRange('2025-01-15', '2025-01-15')).toBe(1);
      expect(daysInRange('2025-01-01', '2025-03-03')).toBe(62);
    });

    it('should return 0 for reversed ranges', () => {
      expect(daysInRange('2025-01-16', '2025-01-15')).toBe(0);
    });
  });

  it('should list each day of a range', () => {
    expect(eachDay('2024-12-30', '2025-01-02')).toEqual([
      '2024-12-30',
      '2024-12-31',
      '2025-01-01',
      '2025-01-02',
    ]);
  });

  it('should format today in UTC', () => {
    expect(todayUtc(Date.parse('2025-03-01T23:59:00Z'))).toBe('2025-03-01');
  });
});

describe('Validation Schemas', () => {
  describe('leagueSchema', () => {
    it('should normalize case and whitespace', () => {
      expect(leagueSchema.parse(' NBA ')).toBe('nba');
    });

    it('should reject unknown leagues', () => {
      expect(leagueSchema.safeParse('mlb').success).toBe(false);
    });
  });

  describe('isoDateSchema', () => {
    it('should accept valid dates only', () => {
      expect(isoDateSchema.parse('2025-01-15')).toBe('2025-01-15');
      expect(isoDateSchema.safeParse('2025-02-30').success).toBe(false);
    });
  });

  describe('seasonSchema', () => {
    it('should accept single and split seasons', () => {
      expect(seasonSchema.parse('2024')).toBe('2024');
      expect(seasonSchema.parse('2024-2025')).toBe('2024-2025');
      expect(seasonSchema.safeParse('24').success).toBe(false);
    });
  });

  describe('betTypesSchema', () => {
    it('should split, lowercase and de-duplicate', () => {
      expect(betTypesSchema.parse('Moneyline, spread,moneyline,')).toEqual(['moneyline', 'spread']);
    });

    it('should reject unknown bet types', () => {
      const result = betTypesSchema.safeParse('moneyline,parlay');
      expect(result.success).toBe(false);
      expect(result.error?.issues[0]?.message).toBe(
        'Unknown bet type "parlay". Expected one of: moneyline, spread, total, half_total, quarter_total'
      );
    });
  });

  describe('dateRangeSchema', () => {
    it('should reject an end before the start', () => {
      expect(dateRangeSchema.safeParse({ start: '2025-01-02', end: '2025-01-01' }).success).toBe(false);
      expect(dateRangeSchema.safeParse({ start: '2025-01-01', end: '2025-01-01' }).success).toBe(true);
    });
  });

  describe('booleanQuerySchema', () => {
    it('should map flag strings to booleans', () => {
      expect(booleanQuerySchema.parse('1')).toBe(true);
      expect(booleanQuerySchema.parse('false')).toBe(false);
      expect(booleanQuerySchema.safeParse('yes').success).toBe(false);
    });
  });
});

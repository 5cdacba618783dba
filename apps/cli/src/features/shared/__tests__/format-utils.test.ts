import { describe, expect, it } from 'vitest';

import {
  formatFixed,
  formatGrouped,
  formatPlain,
  formatTimestamp,
  formatUsd,
  isNonZero,
  truncateId,
} from '../format-utils.js';

describe('format-utils', () => {
  describe('formatGrouped', () => {
    it('should group thousands and keep every digit', () => {
      expect(formatGrouped(1234567)).toBe('1,234,567');
      expect(formatGrouped(1234.5)).toBe('1,234.5');
      expect(formatGrouped(0.00001)).toBe('0.00001');
      expect(formatGrouped(-9876543.21)).toBe('-9,876,543.21');
    });

    it('should keep numeric strings beyond 2^53 exact', () => {
      expect(formatGrouped('123456789012345678901')).toBe('123,456,789,012,345,678,901');
      expect(formatGrouped('9007199254740993.5')).toBe('9,007,199,254,740,993.5');
    });

    it('should print missing values as 0', () => {
      expect(formatGrouped(undefined)).toBe('0');
      expect(formatGrouped(null)).toBe('0');
    });
  });

  describe('formatFixed', () => {
    it('should pad to the requested decimals', () => {
      expect(formatFixed(12.5, 8)).toBe('12.50000000');
      expect(formatFixed(1234567.123456789, 8)).toBe('1,234,567.12345679');
      expect(formatFixed(undefined, 8)).toBe('0.00000000');
    });
  });

  describe('formatUsd', () => {
    it('should prefix dollars and round to cents', () => {
      expect(formatUsd(1234.5)).toBe('$1,234.50');
      expect(formatUsd(0.005)).toBe('$0.01');
      expect(formatUsd(null)).toBe('$0.00');
    });
  });

  describe('isNonZero', () => {
    it('should treat zero in any form and missing values as zero', () => {
      expect(isNonZero(0)).toBe(false);
      expect(isNonZero('0')).toBe(false);
      expect(isNonZero('0.000')).toBe(false);
      expect(isNonZero(null)).toBe(false);
      expect(isNonZero(undefined)).toBe(false);
      expect(isNonZero('21000')).toBe(true);
      expect(isNonZero(1e-18)).toBe(true);
    });
  });

  describe('formatPlain', () => {
    it('should print values without grouping', () => {
      expect(formatPlain(1234567)).toBe('1234567');
      expect(formatPlain(1e-8)).toBe('0.00000001');
      expect(formatPlain('30000000000000000001')).toBe('30000000000000000001');
      expect(formatPlain(undefined)).toBe('N/A');
    });
  });

  describe('formatTimestamp', () => {
    it('should render unix seconds in UTC', () => {
      expect(formatTimestamp(1_700_000_000)).toBe('2023-11-14 22:13:20 UTC');
    });

    it('should treat zero and missing values as N/A', () => {
      expect(formatTimestamp(0)).toBe('N/A');
      expect(formatTimestamp(undefined)).toBe('N/A');
      expect(formatTimestamp(null)).toBe('N/A');
    });

    it('should fall back to the raw value when out of range', () => {
      expect(formatTimestamp(1e20)).toBe('100000000000000000000');
    });
  });

  describe('truncateId', () => {
    it('should keep the first 20 characters', () => {
      expect(truncateId('bc1qxy2kgdygjrsqtzq2n0yrf2493p83kkfjhx0wlh')).toBe('bc1qxy2kgdygjrsqtzq2...');
      expect(truncateId('short')).toBe('short...');
      expect(truncateId(undefined)).toBe('N/A...');
    });
  });
});

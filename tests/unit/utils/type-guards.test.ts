/**
 * Type Guards Tests
 *
 * Runtime checks used when reading server responses, config files and
 * stored snapshots.
 */

import { describe, expect, it } from 'vitest';

import {
  isHex,
  isNonNegativeInteger,
  isRecord,
  isTxid,
  parseInteger,
} from '../../../src/utils/type-guards.ts';

describe('Type Guards', () => {
  describe('isRecord', () => {
    it('should accept plain objects and reject arrays and null', () => {
      expect(isRecord({ height: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('object')).toBe(false);
    });
  });

  describe('isNonNegativeInteger', () => {
    it('should accept safe integers from zero up', () => {
      expect(isNonNegativeInteger(0)).toBe(true);
      expect(isNonNegativeInteger(2_100_000_000_000_000)).toBe(true);
      expect(isNonNegativeInteger(-1)).toBe(false);
      expect(isNonNegativeInteger(1.5)).toBe(false);
      expect(isNonNegativeInteger(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
      expect(isNonNegativeInteger('5')).toBe(false);
    });
  });

  describe('isHex and isTxid', () => {
    it('should require an even number of hex digits', () => {
      expect(isHex('')).toBe(true);
      expect(isHex('deadBEEF')).toBe(true);
      expect(isHex('abc')).toBe(false);
      expect(isHex('zz')).toBe(false);
    });

    it('should require exactly 64 hex digits for a txid', () => {
      expect(isTxid('a'.repeat(64))).toBe(true);
      expect(isTxid('a'.repeat(63))).toBe(false);
      expect(isTxid('g'.repeat(64))).toBe(false);
    });
  });

  describe('parseInteger', () => {
    it('should parse whole decimal strings', () => {
      expect(parseInteger('40000')).toBe(40000);
      expect(parseInteger(' 20 ')).toBe(20);
    });

    it('should reject anything else', () => {
      expect(parseInteger(undefined)).toBeUndefined();
      expect(parseInteger('')).toBeUndefined();
      expect(parseInteger('-1')).toBeUndefined();
      expect(parseInteger('1.5')).toBeUndefined();
      expect(parseInteger('1e3')).toBeUndefined();
      expect(parseInteger('99999999999999999999')).toBeUndefined();
    });
  });
});

import { describe, expect, it } from 'vitest';

import {
  entityTypeLabel,
  toDecimal,
  toFlag,
  toPensionRecords,
} from '@/modules/fiscal-data/shell/repo/row-mappers.js';

import { makeReferenceCodes } from '../../fixtures/builders.js';

describe('row mappers', () => {
  describe('toDecimal', () => {
    it('parses numbers and numeric strings exactly', () => {
      expect(toDecimal('1234.50')?.toString()).toBe('1234.5');
      expect(toDecimal(7)?.toString()).toBe('7');
      expect(toDecimal('0.1')?.plus('0.2').toString()).toBe('0.3');
    });

    it('treats empty cells as absent', () => {
      expect(toDecimal(null)).toBeNull();
      expect(toDecimal(undefined)).toBeNull();
      expect(toDecimal('  ')).toBeNull();
    });
  });

  describe('toFlag', () => {
    it('reads Y/N case-insensitively', () => {
      expect(toFlag('Y')).toBe(true);
      expect(toFlag(' n ')).toBe(false);
    });

    it('returns null for anything else', () => {
      expect(toFlag('X')).toBeNull();
      expect(toFlag(null)).toBeNull();
      expect(toFlag(undefined)).toBeNull();
    });
  });

  describe('entityTypeLabel', () => {
    const codes = makeReferenceCodes();

    it('prefers the unit description', () => {
      expect(
        entityTypeLabel({ code: 'x', unit_name: 'x', description: 'Village', unit_type: 12 }, codes)
      ).toBe('Village');
    });

    it('falls back to the label of the type code', () => {
      expect(
        entityTypeLabel({ code: 'x', unit_name: 'x', description: ' ', unit_type: 12 }, codes)
      ).toBe('Park District');
    });

    it('is null for an unknown type code', () => {
      expect(entityTypeLabel({ code: 'x', unit_name: 'x', unit_type: 999 }, codes)).toBeNull();
    });
  });

  describe('toPensionRecords', () => {
    it('emits one record per system with any value', () => {
      const records = toPensionRecords({
        imrf_t501_3: '100',
        imrf_t502_3: null,
        imrf_t504_3: null,
        fire_t504_3: 0,
      });

      expect(records.map((r) => r.system)).toEqual(['imrf', 'fire']);
      expect(records[0]?.planAssets).toBeNull();
      expect(records[1]?.fundedRatio?.isZero()).toBe(true);
    });
  });
});

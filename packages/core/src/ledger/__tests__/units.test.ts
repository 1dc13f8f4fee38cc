import { describe, it, expect } from 'vitest';
import {
  NATIVE_UNIT,
  convertNativeToReference,
  formatUnits,
  parseUnits,
  scaleReferenceUnits,
} from '../units.js';

describe('units', () => {
  describe('convertNativeToReference', () => {
    it('should return the rate for one whole native unit', () => {
      expect(convertNativeToReference(NATIVE_UNIT, 3934n * 10n ** 8n)).toBe(393400000000n);
    });

    it('should value 2.5 native units at 9835 reference units', () => {
      expect(convertNativeToReference(25n * 10n ** 17n, 3934n * 10n ** 8n)).toBe(
        9835n * 10n ** 8n
      );
    });

    it('should truncate fractional results', () => {
      // 3 wei * 3934e8 / 1e18 = 0.0000011802
      expect(convertNativeToReference(3n, 3934n * 10n ** 8n)).toBe(0n);
      expect(convertNativeToReference(10n ** 10n + 1n, 3934n * 10n ** 8n)).toBe(3934n);
    });
  });

  it('should scale whole reference units by the oracle decimals', () => {
    expect(scaleReferenceUnits(10000n, 8)).toBe(1000000000000n);
    expect(scaleReferenceUnits(7n, 0)).toBe(7n);
  });

  describe('parseUnits', () => {
    it('should parse whole and fractional amounts', () => {
      expect(parseUnits('2.5', 18)).toBe(2500000000000000000n);
      expect(parseUnits('3934', 8)).toBe(393400000000n);
      expect(parseUnits(' 0.00000001 ', 8)).toBe(1n);
    });

    it('should reject malformed input', () => {
      expect(() => parseUnits('-1', 8)).toThrow('Invalid decimal amount: "-1"');
      expect(() => parseUnits('1e5', 8)).toThrow('Invalid decimal amount: "1e5"');
    });

    it('should reject more fractional digits than the precision allows', () => {
      expect(() => parseUnits('0.123', 2)).toThrow('Too many decimal places in "0.123" (max 2)');
    });
  });

  describe('formatUnits', () => {
    it('should render base units as trimmed decimals', () => {
      expect(formatUnits(2500000000000000000n, 18)).toBe('2.5');
      expect(formatUnits(393400000000n, 8)).toBe('3934');
      expect(formatUnits(1n, 8)).toBe('0.00000001');
      expect(formatUnits(-150n, 2)).toBe('-1.5');
      expect(formatUnits(42n, 0)).toBe('42');
    });
  });
});

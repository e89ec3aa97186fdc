import {
  cleanResidue,
  isDigitTokenTooLong,
  isEquipmentSetting,
  normalizeSeparators,
  validateDigitToken,
} from '../grammar';
import type { ParseWarning } from '../types';

describe('digit token validation', () => {
  it('accepts up to three digits', () => {
    expect(isDigitTokenTooLong('0')).toBe(false);
    expect(isDigitTokenTooLong('225')).toBe(false);
    expect(isDigitTokenTooLong('1015')).toBe(true);
  });

  it('returns the value and records nothing for a short token', () => {
    const warnings: ParseWarning[] = [];
    expect(validateDigitToken('045', 'box', warnings)).toBe(45);
    expect(warnings).toEqual([]);
  });

  it('rejects a fused token with one warning', () => {
    const warnings: ParseWarning[] = [];
    expect(validateDigitToken('1008', '100 8', warnings)).toBeNull();
    expect(warnings).toEqual([{ box_text: '100 8', token: '1008', reason: 'digits_too_long' }]);
  });
});

describe('isEquipmentSetting', () => {
  it('flags a number written straight after the weight marker', () => {
    expect(isEquipmentSetting('#4 Hole', 1)).toBe(true);
  });

  it('does not flag a number separated by a space or at the start', () => {
    expect(isEquipmentSetting('# 4', 2)).toBe(false);
    expect(isEquipmentSetting('4 Hole', 0)).toBe(false);
  });
});

describe('normalizeSeparators', () => {
  it('rewrites the multiplication sign only', () => {
    expect(normalizeSeparators('20# × 10 XL')).toBe('20# x 10 XL');
  });
});

describe('cleanResidue', () => {
  it('drops stray markers, separators, commas and dashes', () => {
    expect(cleanResidue('  # , x - ,, ')).toBeUndefined();
  });

  it('keeps words and trims commas from their edges', () => {
    expect(cleanResidue('# Hole, x  pin')).toBe('Hole pin');
  });
});

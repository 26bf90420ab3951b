import { describe, expect, test } from 'vitest';

import {
  describeLimitType,
  LimitType,
  validateLimitCommand,
  type LimitValidation
} from '../../src/limit/limitSpec.js';

function reasonOf(result: LimitValidation): string | undefined {
  return result.valid ? undefined : result.error.reason;
}

const SAMPLE_VALUES = [-1, 0, 50, 100, 100.5, 800];

describe('validateLimitCommand', () => {
  test('rejects every limit type outside 0, 1, 256 and 257', () => {
    for (const limitType of [-1, 2, 3, 100, 255, 258, 512, 1.5]) {
      for (const value of SAMPLE_VALUES) {
        const result = validateLimitCommand({ serial: '114181800001', value, limitType });
        expect(result.valid).toBe(false);
        expect(reasonOf(result)).toBe('InvalidLimitType');
      }
    }
  });

  test('accepts relative limits only within 0-100 %', () => {
    for (const limitType of [LimitType.RelativeTemporary, LimitType.RelativePersistent]) {
      expect(validateLimitCommand({ serial: 'abc', value: 0, limitType }).valid).toBe(true);
      expect(validateLimitCommand({ serial: 'abc', value: 42.5, limitType }).valid).toBe(true);
      expect(validateLimitCommand({ serial: 'abc', value: 100, limitType }).valid).toBe(true);
      expect(reasonOf(validateLimitCommand({ serial: 'abc', value: -0.1, limitType }))).toBe('OutOfRange');
      expect(reasonOf(validateLimitCommand({ serial: 'abc', value: 100.1, limitType }))).toBe('OutOfRange');
      expect(reasonOf(validateLimitCommand({ serial: 'abc', value: 150, limitType }))).toBe('OutOfRange');
    }
  });

  test('accepts absolute limits of zero or more watts', () => {
    for (const limitType of [LimitType.AbsoluteTemporary, LimitType.AbsolutePersistent]) {
      expect(validateLimitCommand({ serial: 'abc', value: 0, limitType }).valid).toBe(true);
      expect(validateLimitCommand({ serial: 'abc', value: 2_000, limitType }).valid).toBe(true);
      expect(reasonOf(validateLimitCommand({ serial: 'abc', value: -5, limitType }))).toBe('OutOfRange');
    }
  });

  test('bounds absolute limits by the inverter maximum when it is known', () => {
    const input = { serial: 'abc', value: 700, limitType: LimitType.AbsoluteTemporary };

    expect(reasonOf(validateLimitCommand(input, { maxPowerW: 600 }))).toBe('OutOfRange');
    expect(validateLimitCommand(input, { maxPowerW: 800 }).valid).toBe(true);
    expect(validateLimitCommand(input, { maxPowerW: null }).valid).toBe(true);
  });

  test('does not apply the max power bound to relative limits', () => {
    const result = validateLimitCommand(
      { serial: 'abc', value: 90, limitType: LimitType.RelativeTemporary },
      { maxPowerW: 50 }
    );
    expect(result.valid).toBe(true);
  });

  test('rejects non-finite values and blank serials', () => {
    expect(reasonOf(validateLimitCommand({ serial: 'abc', value: Number.NaN, limitType: 0 }))).toBe('OutOfRange');
    expect(reasonOf(validateLimitCommand({ serial: 'abc', value: Number.POSITIVE_INFINITY, limitType: 0 }))).toBe(
      'OutOfRange'
    );
    expect(reasonOf(validateLimitCommand({ serial: '   ', value: 10, limitType: 1 }))).toBe('InvalidArgument');
  });

  test('trims the serial and returns an immutable command', () => {
    const result = validateLimitCommand({ serial: ' 114181800001 ', value: 70, limitType: 1 });

    expect(result).toEqual({
      valid: true,
      command: { serial: '114181800001', value: 70, limitType: 1 }
    });
    expect(result.valid && Object.isFrozen(result.command)).toBe(true);
  });

  test('reports the error as a ValidationError with the offending values', () => {
    const result = validateLimitCommand({ serial: 'x', value: 150, limitType: 1 });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.kind).toBe('ValidationError');
      expect(result.error.message).toBe('Relative limits must be between 0 and 100 %, got 150.');
      expect(result.error.details).toEqual({ value: 150, limitType: 1 });
    }
  });
});

describe('describeLimitType', () => {
  test('labels temporary types without an advisory', () => {
    expect(describeLimitType(LimitType.AbsoluteTemporary)).toEqual({
      label: 'Absolute, temporary (W)',
      unit: 'W',
      persistent: false
    });
    expect(describeLimitType(LimitType.RelativeTemporary)).toEqual({
      label: 'Relative, temporary (%)',
      unit: '%',
      persistent: false
    });
  });

  test('attaches the EEPROM advisory to persistent types', () => {
    const description = describeLimitType(LimitType.RelativePersistent);

    expect(description.label).toBe('Relative, persistent (%)');
    expect(description.persistent).toBe(true);
    expect(description.advisory).toContain('EEPROM');
    expect(describeLimitType(LimitType.AbsolutePersistent).unit).toBe('W');
  });
});

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SHOP_SETTINGS,
  ValidationError,
  isShopSettingKey,
  validateShopSetting,
  validateShopSettingsPatch,
} from '../../server/core/scheduling/shopSettings';

describe('Shop Settings - validation', () => {
  it('should ship defaults that pass their own rules', () => {
    for (const [key, value] of Object.entries(DEFAULT_SHOP_SETTINGS)) {
      expect(validateShopSetting(key, value)).toEqual({ key, value });
    }
  });

  it('should restrict the base grid to the allowed values', () => {
    expect(validateShopSetting('baseGridMinutes', 90)).toEqual({ key: 'baseGridMinutes', value: 90 });
    expect(() => validateShopSetting('baseGridMinutes', 45))
      .toThrow('baseGridMinutes must be one of: 30, 60, 90, 120');
  });

  it('should restrict the extra round step to the allowed values', () => {
    expect(() => validateShopSetting('extraRoundMinutes', 12))
      .toThrow('extraRoundMinutes must be one of: 5, 10, 15, 20, 30');
  });

  it('should enforce ranges', () => {
    expect(() => validateShopSetting('shortServiceThresholdMinutes', 4))
      .toThrow('shortServiceThresholdMinutes must be between 5 and 120');
    expect(() => validateShopSetting('restMinutesAfterShort', 61))
      .toThrow('restMinutesAfterShort must be between 0 and 60');
    expect(validateShopSetting('minLeadMinutes', 1440).value).toBe(1440);
  });

  it('should reject fractional values', () => {
    expect(() => validateShopSetting('restMinutesAfterShort', 2.5))
      .toThrow('restMinutesAfterShort must be an integer between 0 and 60');
  });

  it('should name the failing field on the error', () => {
    try {
      validateShopSetting('minLeadMinutes', -1);
      expect.unreachable();
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.field).toBe('minLeadMinutes');
    }
  });

  it('should reject unknown keys', () => {
    expect(isShopSettingKey('toString')).toBe(false);
    expect(() => validateShopSetting('openingHour', 9)).toThrow('Unknown shop setting key: openingHour');
  });
});

describe('Shop Settings - patches', () => {
  it('should keep only the provided fields', () => {
    expect(validateShopSettingsPatch({ baseGridMinutes: 30, minLeadMinutes: undefined }))
      .toEqual({ baseGridMinutes: 30 });
  });

  it('should reject the whole patch when one field fails', () => {
    expect(() => validateShopSettingsPatch({ baseGridMinutes: 30, extraRoundMinutes: 7 }))
      .toThrow('extraRoundMinutes must be one of: 5, 10, 15, 20, 30');
  });
});

import type { ShopSettingKey, ShopSettings } from './types';

export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export const DEFAULT_SHOP_SETTINGS: ShopSettings = {
  baseGridMinutes: 60,
  shortServiceThresholdMinutes: 40,
  restMinutesAfterShort: 5,
  extraRoundMinutes: 15,
  minLeadMinutes: 0,
};

type SettingRule =
  | { kind: 'oneOf'; values: readonly number[] }
  | { kind: 'range'; min: number; max: number };

export const SHOP_SETTING_RULES: Record<ShopSettingKey, SettingRule> = {
  baseGridMinutes: { kind: 'oneOf', values: [30, 60, 90, 120] },
  shortServiceThresholdMinutes: { kind: 'range', min: 5, max: 120 },
  restMinutesAfterShort: { kind: 'range', min: 0, max: 60 },
  extraRoundMinutes: { kind: 'oneOf', values: [5, 10, 15, 20, 30] },
  minLeadMinutes: { kind: 'range', min: 0, max: 24 * 60 },
};

export function isShopSettingKey(key: string): key is ShopSettingKey {
  return Object.prototype.hasOwnProperty.call(SHOP_SETTING_RULES, key);
}

function describeRule(rule: SettingRule): string {
  return rule.kind === 'oneOf'
    ? `one of: ${rule.values.join(', ')}`
    : `between ${rule.min} and ${rule.max}`;
}

/**
 * Checks a single setting value, throwing a ValidationError that names the failed constraint.
 */
export function validateShopSetting(key: string, value: number): { key: ShopSettingKey; value: number } {
  if (!isShopSettingKey(key)) {
    throw new ValidationError('key', `Unknown shop setting key: ${key}`);
  }
  const rule = SHOP_SETTING_RULES[key];
  if (!Number.isInteger(value)) {
    throw new ValidationError(key, `${key} must be an integer ${describeRule(rule)}`);
  }
  const ok = rule.kind === 'oneOf'
    ? rule.values.includes(value)
    : value >= rule.min && value <= rule.max;
  if (!ok) {
    throw new ValidationError(key, `${key} must be ${describeRule(rule)}`);
  }
  return { key, value };
}

export function validateShopSettingsPatch(patch: Partial<ShopSettings>): Partial<ShopSettings> {
  const validated: Partial<ShopSettings> = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const checked = validateShopSetting(key, value);
    validated[checked.key] = checked.value;
  }
  return validated;
}

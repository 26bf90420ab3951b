import { validationError, type OpenDtuError } from '../errors.js';

export const LimitType = {
  AbsoluteTemporary: 0,
  RelativeTemporary: 1,
  AbsolutePersistent: 256,
  RelativePersistent: 257
} as const;

export type LimitType = (typeof LimitType)[keyof typeof LimitType];

export const LIMIT_TYPES: readonly LimitType[] = [
  LimitType.AbsoluteTemporary,
  LimitType.RelativeTemporary,
  LimitType.AbsolutePersistent,
  LimitType.RelativePersistent
];

export const DEFAULT_LIMIT_TYPE: LimitType = LimitType.RelativeTemporary;

export interface LimitCommand {
  readonly serial: string;
  readonly value: number;
  readonly limitType: LimitType;
}

export interface LimitCommandInput {
  serial: string;
  value: number;
  limitType: number;
}

export interface LimitBounds {
  maxPowerW?: number | null;
}

export type LimitValidation = { valid: true; command: LimitCommand } | { valid: false; error: OpenDtuError };

export interface LimitTypeDescription {
  label: string;
  unit: 'W' | '%';
  persistent: boolean;
  advisory?: string;
}

const PERSISTENT_ADVISORY =
  'Persistent limits are written to the inverter EEPROM, which has a limited number of write cycles. ' +
  'Prefer temporary limits (limit_type 0 or 1) for frequent changes.';

export function isLimitType(value: number): value is LimitType {
  return LIMIT_TYPES.some((type) => type === value);
}

export function isRelativeLimit(type: LimitType): boolean {
  return type === LimitType.RelativeTemporary || type === LimitType.RelativePersistent;
}

export function isPersistentLimit(type: LimitType): boolean {
  return type === LimitType.AbsolutePersistent || type === LimitType.RelativePersistent;
}

export function describeLimitType(type: LimitType): LimitTypeDescription {
  const relative = isRelativeLimit(type);
  const persistent = isPersistentLimit(type);
  const label = `${relative ? 'Relative' : 'Absolute'}, ${persistent ? 'persistent' : 'temporary'} (${relative ? '%' : 'W'})`;

  return {
    label,
    unit: relative ? '%' : 'W',
    persistent,
    ...(persistent ? { advisory: PERSISTENT_ADVISORY } : {})
  };
}

/**
 * Checks a limit request without touching the network.
 *
 * Persistent types are accepted like temporary ones; the EEPROM caution is
 * carried by {@link describeLimitType} instead.
 */
export function validateLimitCommand(input: LimitCommandInput, bounds: LimitBounds = {}): LimitValidation {
  const serial = input.serial.trim();
  if (!serial) {
    return {
      valid: false,
      error: validationError('InvalidArgument', 'serial must be a non-empty inverter serial number.')
    };
  }

  const { value, limitType } = input;
  if (!isLimitType(limitType)) {
    return {
      valid: false,
      error: validationError(
        'InvalidLimitType',
        `Invalid limit_type '${limitType}'. Allowed: ${LIMIT_TYPES.join(', ')}.`,
        { limitType }
      )
    };
  }

  if (!Number.isFinite(value)) {
    return {
      valid: false,
      error: validationError('OutOfRange', `limit value must be a finite number, got ${value}.`, { value })
    };
  }

  if (isRelativeLimit(limitType)) {
    if (value < 0 || value > 100) {
      return {
        valid: false,
        error: validationError('OutOfRange', `Relative limits must be between 0 and 100 %, got ${value}.`, {
          value,
          limitType
        })
      };
    }
  } else {
    if (value < 0) {
      return {
        valid: false,
        error: validationError('OutOfRange', `Absolute limits must be >= 0 W, got ${value}.`, { value, limitType })
      };
    }

    const maxPowerW = bounds.maxPowerW;
    if (typeof maxPowerW === 'number' && maxPowerW > 0 && value > maxPowerW) {
      return {
        valid: false,
        error: validationError(
          'OutOfRange',
          `Absolute limit ${value} W exceeds the inverter maximum of ${maxPowerW} W.`,
          { value, limitType, maxPowerW }
        )
      };
    }
  }

  return {
    valid: true,
    command: Object.freeze({ serial, value, limitType })
  };
}

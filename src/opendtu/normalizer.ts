export interface InverterSnapshot {
  serial: string;
  name: string;
  powerW: number;
  reachable: boolean;
  producing: boolean;
  limitRelative: number | null;
  limitAbsolute: number | null;
}

export interface LiveDataTotals {
  powerW: number;
  yieldDayWh: number;
  yieldTotalKWh: number;
}

export interface LiveDataSummary {
  inverters: InverterSnapshot[];
  total: LiveDataTotals;
}

export interface LimitStatus {
  serial: string;
  limitValue: number | null;
  limitType: 'relative';
  lastUpdate: string | null;
  maxPowerW: number | null;
  limitAbsoluteW: number | null;
  setStatus: string | null;
}

export type LimitStatusMap = Record<string, LimitStatus>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function getPath(input: unknown, path: string[]): unknown {
  let current: unknown = input;
  for (const part of path) {
    if (Array.isArray(current)) {
      const index = Number(part);
      current = Number.isInteger(index) ? current[index] : undefined;
      continue;
    }
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toStringValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  return String(value);
}

// OpenDTU wraps measurements as { v, u, d }.
function readMeasurement(input: unknown, path: string[]): number | null {
  const raw = getPath(input, path);
  if (isRecord(raw)) {
    return toNumber(raw.v);
  }
  return toNumber(raw);
}

function readInverterPower(inverter: Record<string, unknown>): number | null {
  const candidates: string[][] = [
    ['AC', '0', 'Power'],
    ['INV', '0', 'Power'],
    ['Power']
  ];
  for (const path of candidates) {
    const value = readMeasurement(inverter, path);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

export function normalizeInverter(raw: unknown): InverterSnapshot | null {
  if (!isRecord(raw)) {
    return null;
  }

  const serial = toStringValue(raw.serial).trim();
  if (!serial) {
    return null;
  }

  const power = readInverterPower(raw);
  const limitAbsolute = toNumber(raw.limit_absolute);

  return {
    serial,
    name: toStringValue(raw.name),
    powerW: power === null ? 0 : Math.max(0, power),
    reachable: power === null ? false : raw.reachable === true,
    producing: raw.producing === true,
    limitRelative: toNumber(raw.limit_relative),
    limitAbsolute: limitAbsolute !== null && limitAbsolute >= 0 ? limitAbsolute : null
  };
}

export function normalizeLiveDataPayload(payload: unknown): LiveDataSummary {
  const rawInverters = getPath(payload, ['inverters']);
  const inverters: InverterSnapshot[] = [];
  if (Array.isArray(rawInverters)) {
    for (const item of rawInverters) {
      const normalized = normalizeInverter(item);
      if (normalized) {
        inverters.push(normalized);
      }
    }
  }

  return {
    inverters,
    total: {
      powerW: readMeasurement(payload, ['total', 'Power']) ?? 0,
      yieldDayWh: readMeasurement(payload, ['total', 'YieldDay']) ?? 0,
      yieldTotalKWh: readMeasurement(payload, ['total', 'YieldTotal']) ?? 0
    }
  };
}

function readLastUpdate(raw: Record<string, unknown>): string | null {
  const value = raw.last_update ?? raw.lastUpdate ?? raw.timestamp;
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    // Seconds since epoch on the appliance side.
    return new Date(value * 1000).toISOString();
  }
  return null;
}

export function normalizeLimitStatusEntry(serial: string, raw: unknown): LimitStatus {
  const record = isRecord(raw) ? raw : {};
  const limitValue = toNumber(record.limit_relative);
  const maxPower = toNumber(record.max_power);
  const maxPowerW = maxPower !== null && maxPower > 0 ? maxPower : null;
  const status = record.limit_set_status;

  return {
    serial,
    limitValue,
    limitType: 'relative',
    lastUpdate: readLastUpdate(record),
    maxPowerW,
    limitAbsoluteW:
      limitValue !== null && maxPowerW !== null ? Math.round((limitValue / 100) * maxPowerW * 10) / 10 : null,
    setStatus: typeof status === 'string' && status ? status : null
  };
}

export function normalizeLimitStatusPayload(payload: unknown): LimitStatusMap {
  const result: LimitStatusMap = {};
  if (!isRecord(payload)) {
    return result;
  }

  for (const [serial, entry] of Object.entries(payload)) {
    const key = serial.trim();
    if (!key) {
      continue;
    }
    result[key] = normalizeLimitStatusEntry(key, entry);
  }
  return result;
}

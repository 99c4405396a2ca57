import {
  BUFFER_MODES,
  THRESHOLD_OVERRIDE_KEYS,
  isBufferMode,
  type BufferMode,
  type ThresholdOverrideKey,
  type ThresholdSet,
} from './policy';

export type StabilizerConfig = ThresholdSet & {
  bufferMode: BufferMode;
};

export const DEFAULT_CONFIG: Readonly<StabilizerConfig> = Object.freeze({
  countThreshold: 1,
  durationThreshold: 0,
  bufferMode: 'BOTH',
});

export type ConfigErrorCode = 'TYPE' | 'RANGE';

export type ConfigError = {
  path: string;
  code: ConfigErrorCode;
  message: string;
  expected?: string;
  actual?: unknown;
};

export type ValidateConfigResult =
  | { ok: true; value: StabilizerConfig }
  | { ok: false; errors: ConfigError[] };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function coerceNumber(v: unknown): number | undefined {
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

function pushType(errors: ConfigError[], path: string, expected: string, actual: unknown): void {
  errors.push({
    path,
    code: 'TYPE',
    message: 'Invalid type for config value',
    expected,
    actual,
  });
}

function pushRange(errors: ConfigError[], path: string, expected: string, actual: unknown): void {
  errors.push({
    path,
    code: 'RANGE',
    message: 'Config value is out of allowed range',
    expected,
    actual,
  });
}

function readNumber(
  errors: ConfigError[],
  source: Record<string, unknown>,
  key: string,
  fallback: number,
): number {
  if (!(key in source) || source[key] === undefined) return fallback;
  const raw = source[key];
  const n = coerceNumber(raw);
  if (n === undefined) {
    pushType(errors, key, 'finite number', raw);
    return fallback;
  }
  return n;
}

function readOptionalNumber(
  errors: ConfigError[],
  source: Record<string, unknown>,
  key: string,
): number | undefined {
  const raw = source[key];
  if (raw === undefined || raw === null) return undefined;
  const n = coerceNumber(raw);
  if (n === undefined) {
    pushType(errors, key, 'finite number | undefined', raw);
    return undefined;
  }
  return n;
}

function checkCount(errors: ConfigError[], path: string, v: number): void {
  if (!Number.isInteger(v)) pushType(errors, path, 'integer', v);
  else if (v < 1) pushRange(errors, path, '>= 1', v);
}

function checkDuration(errors: ConfigError[], path: string, v: number): void {
  if (v < 0) pushRange(errors, path, '>= 0 (seconds)', v);
}

function isCountKey(key: ThresholdOverrideKey): boolean {
  return key.startsWith('count');
}

export function validateConfig(input: unknown): ValidateConfigResult {
  if (input === undefined) return { ok: true, value: { ...DEFAULT_CONFIG } };
  if (!isRecord(input)) {
    return {
      ok: false,
      errors: [
        {
          path: '$',
          code: 'TYPE',
          message: 'Config root must be an object',
          expected: 'object',
          actual: input,
        },
      ],
    };
  }

  const errors: ConfigError[] = [];

  const bufferModeRaw = input.bufferMode;
  let bufferMode = DEFAULT_CONFIG.bufferMode;
  if (bufferModeRaw !== undefined) {
    if (typeof bufferModeRaw !== 'string') pushType(errors, 'bufferMode', BUFFER_MODES.join(' | '), bufferModeRaw);
    else if (!isBufferMode(bufferModeRaw)) pushRange(errors, 'bufferMode', BUFFER_MODES.join(' | '), bufferModeRaw);
    else bufferMode = bufferModeRaw;
  }

  const value: StabilizerConfig = {
    countThreshold: readNumber(errors, input, 'countThreshold', DEFAULT_CONFIG.countThreshold),
    durationThreshold: readNumber(errors, input, 'durationThreshold', DEFAULT_CONFIG.durationThreshold),
    bufferMode,
  };
  checkCount(errors, 'countThreshold', value.countThreshold);
  checkDuration(errors, 'durationThreshold', value.durationThreshold);

  for (const key of THRESHOLD_OVERRIDE_KEYS) {
    const n = readOptionalNumber(errors, input, key);
    if (n === undefined) continue;
    if (isCountKey(key)) checkCount(errors, key, n);
    else checkDuration(errors, key, n);
    value[key] = n;
  }

  if (errors.length) return { ok: false, errors };
  return { ok: true, value };
}

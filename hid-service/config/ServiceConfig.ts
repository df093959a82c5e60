import { config as loadEnv } from 'dotenv';
import path from 'path';
import { SixAxisFusionParameters } from '../types/HidTypes';

loadEnv({ path: process.env.HID_ENV_FILE || path.resolve(process.cwd(), '.env') });

// Protocol constants fixed by the wire contract
export const HID_CONFIG = {
  ACTIVATION: {
    DEFAULT_CAPACITY: 0x100,
  },

  // Values the hardware reports after a reset; their calibration meaning is not documented
  FUSION: {
    DEFAULT_PARAMETER_1: 0.03,
    DEFAULT_PARAMETER_2: 0.4,
  },

  SIX_AXIS: {
    CALIBRATION_PARAMETER_SIZE: 0x744,
    IC_INFORMATION_SIZE: 0xc8,
  },

  SEVEN_SIX_AXIS: {
    WORK_BUFFER_SIZE: 0x1000,
    LIFO_BUFFER_SIZE: 0x7f000,
  },

  PALMA: {
    WAVE_ENTRY_MEMORY_SIZE: 0x3000,
    OPERATION_DATA_SIZE: 0x140,
  },

  LOG: {
    FORMAT: '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}',
    MAX_FILE_SIZE: 10 * 1024 * 1024, // 10MB
  },
} as const;

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = typeof LOG_LEVELS[number];
export type LogLevelSetting = LogLevel | false;

export interface ServiceConfig {
  activationCapacity: number;
  deviceManaged: boolean;
  fusionDefaults: SixAxisFusionParameters;
  logLevel: LogLevelSetting;
  logFileLevel: LogLevelSetting;
  // Problems found while reading the environment, reported once the logger is up
  warnings: string[];
}

export const DEFAULT_SERVICE_CONFIG: Readonly<ServiceConfig> = Object.freeze({
  activationCapacity: HID_CONFIG.ACTIVATION.DEFAULT_CAPACITY,
  deviceManaged: false,
  fusionDefaults: {
    parameter1: HID_CONFIG.FUSION.DEFAULT_PARAMETER_1,
    parameter2: HID_CONFIG.FUSION.DEFAULT_PARAMETER_2,
  },
  logLevel: 'info',
  logFileLevel: 'info',
  warnings: [],
});

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevelSetting): LogLevelSetting {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  if (value === 'false' || value === 'off' || value === 'none') {
    return false;
  }
  return isLogLevel(value) ? value : fallback;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function parseNumber(
  name: string,
  raw: string | undefined,
  fallback: number,
  warnings: string[],
  accept: (value: number) => boolean = Number.isFinite,
): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!accept(value)) {
    warnings.push(`${name}="${raw}" is not valid, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const warnings: string[] = [];

  const activationCapacity = parseNumber(
    'HID_ACTIVATION_CAPACITY',
    env.HID_ACTIVATION_CAPACITY,
    DEFAULT_SERVICE_CONFIG.activationCapacity,
    warnings,
    (value) => Number.isInteger(value) && value > 0,
  );

  const fusionDefaults: SixAxisFusionParameters = {
    parameter1: parseNumber(
      'HID_FUSION_PARAMETER_1',
      env.HID_FUSION_PARAMETER_1,
      DEFAULT_SERVICE_CONFIG.fusionDefaults.parameter1,
      warnings,
    ),
    parameter2: parseNumber(
      'HID_FUSION_PARAMETER_2',
      env.HID_FUSION_PARAMETER_2,
      DEFAULT_SERVICE_CONFIG.fusionDefaults.parameter2,
      warnings,
    ),
  };

  return {
    activationCapacity,
    deviceManaged: parseBoolean(env.HID_DEVICE_MANAGED, DEFAULT_SERVICE_CONFIG.deviceManaged),
    fusionDefaults,
    logLevel: parseLogLevel(env.HID_LOG_LEVEL, DEFAULT_SERVICE_CONFIG.logLevel),
    logFileLevel: parseLogLevel(env.HID_LOG_FILE_LEVEL, DEFAULT_SERVICE_CONFIG.logFileLevel),
    warnings,
  };
}

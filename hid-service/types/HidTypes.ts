// Controller domain vocabulary shared by handlers, validator and resources.
// Wire values are kept as plain numbers; these maps name the known ones.

export const NPAD_ID_TYPE = {
  NO1: 0,
  NO2: 1,
  NO3: 2,
  NO4: 3,
  NO5: 4,
  NO6: 5,
  NO7: 6,
  NO8: 7,
  OTHER: 0x10,
  HANDHELD: 0x20,
} as const;

export type NpadIdType = typeof NPAD_ID_TYPE[keyof typeof NPAD_ID_TYPE];

export const NPAD_STYLE_INDEX = {
  NONE: 0,
  FULLKEY: 3,
  HANDHELD: 4,
  JOYCON_DUAL: 5,
  JOYCON_LEFT: 6,
  JOYCON_RIGHT: 7,
  GAMECUBE: 8,
  POKEBALL: 9,
  NES: 10,
  SNES: 12,
  N64: 13,
  SEGA_GENESIS: 14,
  SYSTEM_EXT: 0x20,
  SYSTEM: 0x21,
} as const;

export const DEVICE_INDEX = {
  LEFT: 0,
  RIGHT: 1,
  NONE: 2,
  MAX: 3,
} as const;

export const NPAD_JOY_HOLD_TYPE = {
  VERTICAL: 0,
  HORIZONTAL: 1,
} as const;

export const NPAD_JOY_DEVICE_TYPE = {
  LEFT: 0,
  RIGHT: 1,
} as const;

export const NPAD_JOY_ASSIGNMENT_MODE = {
  DUAL: 0,
  SINGLE: 1,
} as const;

export type NpadJoyAssignmentMode = typeof NPAD_JOY_ASSIGNMENT_MODE[keyof typeof NPAD_JOY_ASSIGNMENT_MODE];

export const NPAD_HANDHELD_ACTIVATION_MODE = {
  DUAL: 0,
  SINGLE: 1,
  NONE: 2,
  MAX: 3,
} as const;

export const NPAD_COMMUNICATION_MODE = {
  MODE_5MS: 0,
  MODE_10MS: 1,
  MODE_15MS: 2,
  DEFAULT: 3,
} as const;

export const NPAD_REVISION = {
  REVISION_0: 0,
  REVISION_1: 1,
  REVISION_2: 2,
  REVISION_3: 3,
} as const;

export const GYROSCOPE_ZERO_DRIFT_MODE = {
  LOOSE: 0,
  STANDARD: 1,
  TIGHT: 2,
} as const;

export const VIBRATION_GC_ERM_COMMAND = {
  STOP: 0,
  START: 1,
  STOP_HARD: 2,
} as const;

/**
 * Identifies one controllable endpoint: a style (device kind), a logical
 * controller id and a sub-index on that controller. Vibration and six-axis
 * handles share this shape.
 */
export interface DeviceHandle {
  npadStyle: number;
  npadId: number;
  deviceIndex: number;
}

// Handles carry no identity beyond their three fields
export function isSameHandle(a: DeviceHandle, b: DeviceHandle): boolean {
  return a.npadStyle === b.npadStyle && a.npadId === b.npadId && a.deviceIndex === b.deviceIndex;
}

export function describeHandle(handle: DeviceHandle): string {
  return `style=${handle.npadStyle} id=${handle.npadId} index=${handle.deviceIndex}`;
}

export interface ConsoleSixAxisHandle {
  unknown1: number;
  unknown2: number;
}

export interface VibrationValue {
  lowAmplitude: number;
  lowFrequency: number;
  highAmplitude: number;
  highFrequency: number;
}

export const DEFAULT_VIBRATION_VALUE: Readonly<VibrationValue> = Object.freeze({
  lowAmplitude: 0,
  lowFrequency: 160,
  highAmplitude: 0,
  highFrequency: 320,
});

export interface VibrationDeviceInfo {
  deviceType: number;
  position: number;
}

export interface SixAxisFusionParameters {
  parameter1: number;
  parameter2: number;
}

export interface PalmaConnectionHandle {
  npadId: number;
}

export interface PalmaOperationInfo {
  operationType: bigint;
  data: Uint8Array;
}

export interface NpadModeChange {
  isReassigned: boolean;
  newNpadId: number;
}

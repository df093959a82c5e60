import { DEVICE_INDEX, DeviceHandle, NPAD_ID_TYPE, NPAD_STYLE_INDEX } from '../types/HidTypes';
import { RESULT_CODES, ResultCode } from '../types/ResultCodes';

export const ALL_NPAD_IDS: readonly number[] = Object.freeze(Object.values(NPAD_ID_TYPE));

const VALID_NPAD_IDS = new Set<number>(ALL_NPAD_IDS);

// Styles with a motor, and how many sub-indices each exposes
const VIBRATION_INDEX_LIMITS = new Map<number, number>([
  [NPAD_STYLE_INDEX.FULLKEY, DEVICE_INDEX.MAX],
  [NPAD_STYLE_INDEX.HANDHELD, DEVICE_INDEX.MAX],
  [NPAD_STYLE_INDEX.JOYCON_DUAL, DEVICE_INDEX.MAX],
  [NPAD_STYLE_INDEX.JOYCON_LEFT, DEVICE_INDEX.MAX],
  [NPAD_STYLE_INDEX.JOYCON_RIGHT, DEVICE_INDEX.MAX],
  [NPAD_STYLE_INDEX.GAMECUBE, 1],
  [NPAD_STYLE_INDEX.N64, 1],
  [NPAD_STYLE_INDEX.SYSTEM_EXT, DEVICE_INDEX.MAX],
  [NPAD_STYLE_INDEX.SYSTEM, DEVICE_INDEX.MAX],
]);

/**
 * The logical controller ids the client currently accepts. Starts with every
 * defined id and is replaced whenever the client sets its supported list.
 */
export class ControllerConfiguration {
  private supportedNpadIds: Set<number>;

  constructor(npadIds: readonly number[] = ALL_NPAD_IDS) {
    this.supportedNpadIds = new Set(npadIds);
  }

  isSupported(npadId: number): boolean {
    return this.supportedNpadIds.has(npadId);
  }

  setSupportedNpadIds(npadIds: readonly number[]): void {
    this.supportedNpadIds = new Set(npadIds);
  }

  getSupportedNpadIds(): number[] {
    return Array.from(this.supportedNpadIds);
  }
}

export function isNpadIdValid(npadId: number): boolean {
  return VALID_NPAD_IDS.has(npadId);
}

export function validateVibrationHandle(handle: DeviceHandle, configuration: ControllerConfiguration): ResultCode {
  const indexLimit = VIBRATION_INDEX_LIMITS.get(handle.npadStyle);
  if (indexLimit === undefined) {
    return RESULT_CODES.VIBRATION_INVALID_STYLE_INDEX;
  }

  if (!isNpadIdValid(handle.npadId) || !configuration.isSupported(handle.npadId)) {
    return RESULT_CODES.VIBRATION_INVALID_NPAD_ID;
  }

  if (handle.deviceIndex >= indexLimit) {
    return RESULT_CODES.VIBRATION_DEVICE_INDEX_OUT_OF_RANGE;
  }

  return RESULT_CODES.SUCCESS;
}

export function validateSixAxisHandle(handle: DeviceHandle): ResultCode {
  if (!isNpadIdValid(handle.npadId)) {
    return RESULT_CODES.INVALID_NPAD_ID;
  }

  if (handle.deviceIndex >= DEVICE_INDEX.MAX) {
    return RESULT_CODES.NPAD_DEVICE_INDEX_OUT_OF_RANGE;
  }

  return RESULT_CODES.SUCCESS;
}

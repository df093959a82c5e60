// Result codes travel in-band as a 32-bit word: 9 bits of module, 13 bits of description
export type ResultCode = number;

export const ERROR_MODULES = {
  SERVICE_FRAMEWORK: 10,
  HID: 202,
} as const;

const MODULE_MASK = 0x1ff;
const DESCRIPTION_SHIFT = 9;
const DESCRIPTION_MASK = 0x1fff;

export function makeResult(module: number, description: number): ResultCode {
  return ((module & MODULE_MASK) | ((description & DESCRIPTION_MASK) << DESCRIPTION_SHIFT)) >>> 0;
}

export const RESULT_CODES = {
  SUCCESS: 0,
  UNKNOWN: 0xffffffff,

  // Returned for opcodes that have no handler bound
  NOT_SUPPORTED: makeResult(ERROR_MODULES.SERVICE_FRAMEWORK, 221),

  NPAD_DEVICE_INDEX_OUT_OF_RANGE: makeResult(ERROR_MODULES.HID, 107),
  VIBRATION_INVALID_STYLE_INDEX: makeResult(ERROR_MODULES.HID, 122),
  VIBRATION_INVALID_NPAD_ID: makeResult(ERROR_MODULES.HID, 123),
  VIBRATION_DEVICE_INDEX_OUT_OF_RANGE: makeResult(ERROR_MODULES.HID, 124),
  VIBRATION_ARRAY_SIZE_MISMATCH: makeResult(ERROR_MODULES.HID, 131),
  INVALID_NPAD_ID: makeResult(ERROR_MODULES.HID, 709),
  INVALID_PALMA_HANDLE: makeResult(ERROR_MODULES.HID, 3302),
} as const;

export function isSuccess(result: ResultCode): boolean {
  return result === RESULT_CODES.SUCCESS;
}

export function isFailure(result: ResultCode): boolean {
  return result !== RESULT_CODES.SUCCESS;
}

export function getResultModule(result: ResultCode): number {
  return result & MODULE_MASK;
}

export function getResultDescription(result: ResultCode): number {
  return (result >>> DESCRIPTION_SHIFT) & DESCRIPTION_MASK;
}

const RESULT_NAMES = new Map<number, string>(
  Object.entries(RESULT_CODES).map(([name, code]) => [code, name]),
);

// Human readable form for logs, e.g. "VIBRATION_INVALID_NPAD_ID (0x0000F6CA)"
export function formatResult(result: ResultCode): string {
  const hex = `0x${result.toString(16).toUpperCase().padStart(8, '0')}`;
  const name = RESULT_NAMES.get(result);
  return name ? `${name} (${hex})` : hex;
}

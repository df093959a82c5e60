import {
  ConsoleSixAxisHandle,
  DeviceHandle,
  NpadModeChange,
  PalmaConnectionHandle,
  SixAxisFusionParameters,
  VibrationDeviceInfo,
  VibrationValue,
} from '../types/HidTypes';
import { ByteReader, ByteWriter, defineLayout } from './WireCodec';

// Field helpers shared by several layouts

function readHandle(reader: ByteReader): DeviceHandle {
  const npadStyle = reader.u8();
  const npadId = reader.u8();
  const deviceIndex = reader.u8();
  reader.skip(1);
  return { npadStyle, npadId, deviceIndex };
}

function writeHandle(writer: ByteWriter, handle: DeviceHandle): void {
  writer.u8(handle.npadStyle);
  writer.u8(handle.npadId);
  writer.u8(handle.deviceIndex);
  writer.pad(1);
}

function readPalmaHandle(reader: ByteReader): PalmaConnectionHandle {
  const npadId = reader.u32();
  reader.skip(4);
  return { npadId };
}

function writePalmaHandle(writer: ByteWriter, handle: PalmaConnectionHandle): void {
  writer.u32(handle.npadId);
  writer.pad(4);
}

function readVibrationValue(reader: ByteReader): VibrationValue {
  return {
    lowAmplitude: reader.f32(),
    lowFrequency: reader.f32(),
    highAmplitude: reader.f32(),
    highFrequency: reader.f32(),
  };
}

function writeVibrationValue(writer: ByteWriter, value: VibrationValue): void {
  writer.f32(value.lowAmplitude);
  writer.f32(value.lowFrequency);
  writer.f32(value.highAmplitude);
  writer.f32(value.highFrequency);
}

// ---------------------------------------------------------------------------
// Scalars and elements
// ---------------------------------------------------------------------------

export const ARUID = defineLayout<bigint>({
  name: 'AppletResourceUserId',
  size: 8,
  read: (reader) => reader.u64(),
  write: (writer, value) => writer.u64(value),
});

export const U32 = defineLayout<number>({
  name: 'U32',
  size: 4,
  read: (reader) => reader.u32(),
  write: (writer, value) => writer.u32(value),
});

export const U64 = defineLayout<bigint>({
  name: 'U64',
  size: 8,
  read: (reader) => reader.u64(),
  write: (writer, value) => writer.u64(value),
});

export const S64 = defineLayout<bigint>({
  name: 'S64',
  size: 8,
  read: (reader) => reader.s64(),
  write: (writer, value) => writer.s64(value),
});

// A boolean pushed as a whole word
export const BOOL_WORD = defineLayout<boolean>({
  name: 'BoolWord',
  size: 4,
  read: (reader) => {
    const value = reader.bool();
    reader.skip(3);
    return value;
  },
  write: (writer, value) => {
    writer.bool(value);
    writer.pad(3);
  },
});

export const NPAD_ID = defineLayout<number>({
  name: 'NpadIdType',
  size: 4,
  read: (reader) => reader.u32(),
  write: (writer, value) => writer.u32(value),
});

export const DEVICE_HANDLE = defineLayout<DeviceHandle>({
  name: 'DeviceHandle',
  size: 4,
  read: readHandle,
  write: writeHandle,
});

export const VIBRATION_VALUE = defineLayout<VibrationValue>({
  name: 'VibrationValue',
  size: 16,
  read: readVibrationValue,
  write: writeVibrationValue,
});

export const VIBRATION_DEVICE_INFO = defineLayout<VibrationDeviceInfo>({
  name: 'VibrationDeviceInfo',
  size: 8,
  read: (reader) => ({ deviceType: reader.u32(), position: reader.u32() }),
  write: (writer, value) => {
    writer.u32(value.deviceType);
    writer.u32(value.position);
  },
});

export const FUSION_PARAMETERS = defineLayout<SixAxisFusionParameters>({
  name: 'SixAxisFusionParameters',
  size: 8,
  read: (reader) => ({ parameter1: reader.f32(), parameter2: reader.f32() }),
  write: (writer, value) => {
    writer.f32(value.parameter1);
    writer.f32(value.parameter2);
  },
});

export const PALMA_HANDLE = defineLayout<PalmaConnectionHandle>({
  name: 'PalmaConnectionHandle',
  size: 8,
  read: readPalmaHandle,
  write: writePalmaHandle,
});

export const NPAD_MODE_CHANGE = defineLayout<NpadModeChange>({
  name: 'NpadModeChange',
  size: 8,
  read: (reader) => {
    const isReassigned = reader.bool();
    reader.skip(3);
    return { isReassigned, newNpadId: reader.u32() };
  },
  write: (writer, value) => {
    writer.bool(value.isReassigned);
    writer.pad(3);
    writer.u32(value.newNpadId);
  },
});

// ---------------------------------------------------------------------------
// Parameter blocks
// ---------------------------------------------------------------------------

export interface IdWithAruid {
  id: number;
  aruid: bigint;
}

export const ID_WITH_ARUID = defineLayout<IdWithAruid>({
  name: 'IdWithAruid',
  size: 0x10,
  read: (reader) => {
    const id = reader.u32();
    reader.skip(4);
    return { id, aruid: reader.u64() };
  },
  write: (writer, value) => {
    writer.u32(value.id);
    writer.pad(4);
    writer.u64(value.aruid);
  },
});

// Same shape as ID_WITH_ARUID with a signed leading word
export interface SignedWithAruid {
  value: number;
  aruid: bigint;
}

export const SIGNED_WITH_ARUID = defineLayout<SignedWithAruid>({
  name: 'SignedWithAruid',
  size: 0x10,
  read: (reader) => {
    const value = reader.s32();
    reader.skip(4);
    return { value, aruid: reader.u64() };
  },
  write: (writer, value) => {
    writer.s32(value.value);
    writer.pad(4);
    writer.u64(value.aruid);
  },
});

export interface HandleWithAruid {
  handle: DeviceHandle;
  aruid: bigint;
}

export const HANDLE_WITH_ARUID = defineLayout<HandleWithAruid>({
  name: 'HandleWithAruid',
  size: 0x10,
  read: (reader) => {
    const handle = readHandle(reader);
    reader.skip(4);
    return { handle, aruid: reader.u64() };
  },
  write: (writer, value) => {
    writeHandle(writer, value.handle);
    writer.pad(4);
    writer.u64(value.aruid);
  },
});

export interface FlagHandleAruid {
  enabled: boolean;
  handle: DeviceHandle;
  aruid: bigint;
}

// bool, 3 padding bytes, handle, ARUID
export const FUSION_ENABLE = defineLayout<FlagHandleAruid>({
  name: 'EnableSixAxisSensorFusionParameters',
  size: 0x10,
  read: (reader) => {
    const enabled = reader.bool();
    reader.skip(3);
    const handle = readHandle(reader);
    return { enabled, handle, aruid: reader.u64() };
  },
  write: (writer, value) => {
    writer.bool(value.enabled);
    writer.pad(3);
    writeHandle(writer, value.handle);
    writer.u64(value.aruid);
  },
});

// bool, handle packed at offset 1, 3 padding bytes, ARUID
export const UNALTERED_PASSTHROUGH = defineLayout<FlagHandleAruid>({
  name: 'UnalteredPassthroughParameters',
  size: 0x10,
  read: (reader) => {
    const enabled = reader.bool();
    const handle = readHandle(reader);
    reader.skip(3);
    return { enabled, handle, aruid: reader.u64() };
  },
  write: (writer, value) => {
    writer.bool(value.enabled);
    writeHandle(writer, value.handle);
    writer.pad(3);
    writer.u64(value.aruid);
  },
});

export interface FusionParametersRequest {
  handle: DeviceHandle;
  parameters: SixAxisFusionParameters;
  aruid: bigint;
}

export const FUSION_PARAMETERS_REQUEST = defineLayout<FusionParametersRequest>({
  name: 'SetSixAxisSensorFusionParameters',
  size: 0x18,
  read: (reader) => {
    const handle = readHandle(reader);
    const parameters = FUSION_PARAMETERS.read(reader);
    reader.skip(4);
    return { handle, parameters, aruid: reader.u64() };
  },
  write: (writer, value) => {
    writeHandle(writer, value.handle);
    FUSION_PARAMETERS.write(writer, value.parameters);
    writer.pad(4);
    writer.u64(value.aruid);
  },
});

export interface DriftModeRequest {
  handle: DeviceHandle;
  driftMode: number;
  aruid: bigint;
}

export const DRIFT_MODE_REQUEST = defineLayout<DriftModeRequest>({
  name: 'SetGyroscopeZeroDriftMode',
  size: 0x10,
  read: (reader) => ({ handle: readHandle(reader), driftMode: reader.u32(), aruid: reader.u64() }),
  write: (writer, value) => {
    writeHandle(writer, value.handle);
    writer.u32(value.driftMode);
    writer.u64(value.aruid);
  },
});

export interface IdAruidWord {
  npadId: number;
  aruid: bigint;
  value: bigint;
}

// npad id, padding word, ARUID, trailing 64-bit word
export const ID_ARUID_WORD = defineLayout<IdAruidWord>({
  name: 'IdAruidWord',
  size: 0x18,
  read: (reader) => {
    const npadId = reader.u32();
    reader.skip(4);
    return { npadId, aruid: reader.u64(), value: reader.u64() };
  },
  write: (writer, value) => {
    writer.u32(value.npadId);
    writer.pad(4);
    writer.u64(value.aruid);
    writer.u64(value.value);
  },
});

export interface AruidWithWord {
  aruid: bigint;
  value: bigint;
}

export const ARUID_WITH_WORD = defineLayout<AruidWithWord>({
  name: 'AruidWithWord',
  size: 0x10,
  read: (reader) => ({ aruid: reader.u64(), value: reader.u64() }),
  write: (writer, value) => {
    writer.u64(value.aruid);
    writer.u64(value.value);
  },
});

export interface TwoIdsWithAruid {
  first: number;
  second: number;
  aruid: bigint;
}

export const TWO_IDS_WITH_ARUID = defineLayout<TwoIdsWithAruid>({
  name: 'TwoIdsWithAruid',
  size: 0x10,
  read: (reader) => ({ first: reader.u32(), second: reader.u32(), aruid: reader.u64() }),
  write: (writer, value) => {
    writer.u32(value.first);
    writer.u32(value.second);
    writer.u64(value.aruid);
  },
});

export interface FlagIdAruid {
  enabled: boolean;
  npadId: number;
  aruid: bigint;
}

export const FLAG_ID_ARUID = defineLayout<FlagIdAruid>({
  name: 'FlagIdAruid',
  size: 0x10,
  read: (reader) => {
    const enabled = reader.bool();
    reader.skip(3);
    return { enabled, npadId: reader.u32(), aruid: reader.u64() };
  },
  write: (writer, value) => {
    writer.bool(value.enabled);
    writer.pad(3);
    writer.u32(value.npadId);
    writer.u64(value.aruid);
  },
});

export interface FlagWithAruid {
  enabled: boolean;
  aruid: bigint;
}

export const FLAG_WITH_ARUID = defineLayout<FlagWithAruid>({
  name: 'FlagWithAruid',
  size: 0x10,
  read: (reader) => {
    const enabled = reader.bool();
    reader.skip(7);
    return { enabled, aruid: reader.u64() };
  },
  write: (writer, value) => {
    writer.bool(value.enabled);
    writer.pad(7);
    writer.u64(value.aruid);
  },
});

export interface CaptureButtonRequest {
  styleSet: number;
  aruid: bigint;
  button: bigint;
}

export const CAPTURE_BUTTON_REQUEST = defineLayout<CaptureButtonRequest>({
  name: 'SetNpadCaptureButtonAssignment',
  size: 0x18,
  read: (reader) => {
    const styleSet = reader.u32();
    reader.skip(4);
    return { styleSet, aruid: reader.u64(), button: reader.u64() };
  },
  write: (writer, value) => {
    writer.u32(value.styleSet);
    writer.pad(4);
    writer.u64(value.aruid);
    writer.u64(value.button);
  },
});

export interface SendVibrationValueRequest {
  handle: DeviceHandle;
  value: VibrationValue;
  aruid: bigint;
}

export const SEND_VIBRATION_VALUE = defineLayout<SendVibrationValueRequest>({
  name: 'SendVibrationValue',
  size: 0x20,
  read: (reader) => {
    const handle = readHandle(reader);
    const value = readVibrationValue(reader);
    reader.skip(4);
    return { handle, value, aruid: reader.u64() };
  },
  write: (writer, value) => {
    writeHandle(writer, value.handle);
    writeVibrationValue(writer, value.value);
    writer.pad(4);
    writer.u64(value.aruid);
  },
});

export interface HandleAruidWord {
  handle: DeviceHandle;
  aruid: bigint;
  value: bigint;
}

export const GC_ERM_REQUEST = defineLayout<HandleAruidWord>({
  name: 'SendVibrationGcErmCommand',
  size: 0x18,
  read: (reader) => {
    const handle = readHandle(reader);
    reader.skip(4);
    return { handle, aruid: reader.u64(), value: reader.u64() };
  },
  write: (writer, value) => {
    writeHandle(writer, value.handle);
    writer.pad(4);
    writer.u64(value.aruid);
    writer.u64(value.value);
  },
});

export interface ValueInBoolRequest {
  handle: DeviceHandle;
  aruid: bigint;
  isVibrating: boolean;
}

export const VALUE_IN_BOOL_REQUEST = defineLayout<ValueInBoolRequest>({
  name: 'SendVibrationValueInBool',
  size: 0x18,
  read: (reader) => {
    const handle = readHandle(reader);
    reader.skip(4);
    const aruid = reader.u64();
    const isVibrating = reader.bool();
    reader.skip(7);
    return { handle, aruid, isVibrating };
  },
  write: (writer, value) => {
    writeHandle(writer, value.handle);
    writer.pad(4);
    writer.u64(value.aruid);
    writer.bool(value.isVibrating);
    writer.pad(7);
  },
});

export interface ConsoleSixAxisRequest {
  handle: ConsoleSixAxisHandle;
  aruid: bigint;
}

export const CONSOLE_SIX_AXIS_REQUEST = defineLayout<ConsoleSixAxisRequest>({
  name: 'ConsoleSixAxisSensorParameters',
  size: 0x10,
  read: (reader) => {
    const unknown1 = reader.u8();
    const unknown2 = reader.u8();
    reader.skip(6);
    return { handle: { unknown1, unknown2 }, aruid: reader.u64() };
  },
  write: (writer, value) => {
    writer.u8(value.handle.unknown1);
    writer.u8(value.handle.unknown2);
    writer.pad(6);
    writer.u64(value.aruid);
  },
});

export interface SevenSixAxisInitRequest {
  aruid: bigint;
  workBufferSize: bigint;
  lifoBufferSize: bigint;
}

export const SEVEN_SIX_AXIS_INIT = defineLayout<SevenSixAxisInitRequest>({
  name: 'InitializeSevenSixAxisSensor',
  size: 0x18,
  read: (reader) => ({ aruid: reader.u64(), workBufferSize: reader.u64(), lifoBufferSize: reader.u64() }),
  write: (writer, value) => {
    writer.u64(value.aruid);
    writer.u64(value.workBufferSize);
    writer.u64(value.lifoBufferSize);
  },
});

export interface TouchScreenConfigurationRequest {
  mode: number;
  aruid: bigint;
}

export const TOUCH_SCREEN_CONFIGURATION = defineLayout<TouchScreenConfigurationRequest>({
  name: 'SetTouchScreenConfiguration',
  size: 0x18,
  read: (reader) => {
    const mode = reader.u8();
    reader.skip(15);
    return { mode, aruid: reader.u64() };
  },
  write: (writer, value) => {
    writer.u8(value.mode);
    writer.pad(15);
    writer.u64(value.aruid);
  },
});

export interface TouchScreenResolutionRequest {
  width: number;
  height: number;
  aruid: bigint;
}

export const TOUCH_SCREEN_RESOLUTION = defineLayout<TouchScreenResolutionRequest>({
  name: 'SetTouchScreenResolution',
  size: 0x10,
  read: (reader) => ({ width: reader.u32(), height: reader.u32(), aruid: reader.u64() }),
  write: (writer, value) => {
    writer.u32(value.width);
    writer.u32(value.height);
    writer.u64(value.aruid);
  },
});

export interface PalmaHandleWithWord {
  handle: PalmaConnectionHandle;
  value: bigint;
}

export const PALMA_HANDLE_WITH_WORD = defineLayout<PalmaHandleWithWord>({
  name: 'PalmaHandleWithWord',
  size: 0x10,
  read: (reader) => ({ handle: readPalmaHandle(reader), value: reader.u64() }),
  write: (writer, value) => {
    writePalmaHandle(writer, value.handle);
    writer.u64(value.value);
  },
});

export interface PalmaStepRequest {
  enabled: boolean;
  handle: PalmaConnectionHandle;
}

export const PALMA_STEP_REQUEST = defineLayout<PalmaStepRequest>({
  name: 'EnablePalmaStep',
  size: 0x10,
  read: (reader) => {
    const enabled = reader.bool();
    reader.skip(7);
    return { enabled, handle: readPalmaHandle(reader) };
  },
  write: (writer, value) => {
    writer.bool(value.enabled);
    writer.pad(7);
    writePalmaHandle(writer, value.handle);
  },
});

export interface PalmaDatabaseVersionRequest {
  version: number;
  handle: PalmaConnectionHandle;
}

export const PALMA_DATABASE_VERSION = defineLayout<PalmaDatabaseVersionRequest>({
  name: 'SetPalmaDataBaseIdentificationVersion',
  size: 0x10,
  read: (reader) => {
    const version = reader.s32();
    reader.skip(4);
    return { version, handle: readPalmaHandle(reader) };
  },
  write: (writer, value) => {
    writer.s32(value.version);
    writer.pad(4);
    writePalmaHandle(writer, value.handle);
  },
});

export interface PalmaWaveEntryRequest {
  handle: PalmaConnectionHandle;
  waveSet: bigint;
  unknown: bigint;
  transferMemorySize: bigint;
  size: bigint;
}

export const PALMA_WAVE_ENTRY = defineLayout<PalmaWaveEntryRequest>({
  name: 'WritePalmaWaveEntry',
  size: 0x28,
  read: (reader) => ({
    handle: readPalmaHandle(reader),
    waveSet: reader.u64(),
    unknown: reader.u64(),
    transferMemorySize: reader.u64(),
    size: reader.u64(),
  }),
  write: (writer, value) => {
    writePalmaHandle(writer, value.handle);
    writer.u64(value.waveSet);
    writer.u64(value.unknown);
    writer.u64(value.transferMemorySize);
    writer.u64(value.size);
  },
});

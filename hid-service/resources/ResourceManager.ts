/**
 * Contracts for the device layer the service delegates to. Nothing here is
 * implemented by the dispatch core; hosts provide concrete resources and
 * tests provide fakes.
 */

import {
  DeviceHandle,
  NpadJoyAssignmentMode,
  NpadModeChange,
  PalmaConnectionHandle,
  PalmaOperationInfo,
  SixAxisFusionParameters,
  VibrationDeviceInfo,
  VibrationValue,
} from '../types/HidTypes';
import { ResultCode } from '../types/ResultCodes';

// A delegate result paired with the value it produced; `value` is meaningful only on success
export interface Outcome<T> {
  result: ResultCode;
  value: T;
}

export interface ActivatableResource {
  // Low-level activation, skipped when the firmware manages devices itself
  activate(): Promise<ResultCode>;
  activateForApplet(aruid: bigint): Promise<ResultCode>;
}

export interface TouchScreenResource extends ActivatableResource {
  setDimensions(width: number, height: number): Promise<void>;
}

export interface SevenSixAxisResource extends ActivatableResource {
  setTransferMemory(memory: TransferMemory): Promise<void>;
  resetTimestamp(): Promise<void>;
}

export interface SixAxisResource {
  setSixAxisEnabled(handle: DeviceHandle, enabled: boolean): Promise<ResultCode>;
  isFusionEnabled(handle: DeviceHandle): Promise<Outcome<boolean>>;
  setFusionEnabled(handle: DeviceHandle, enabled: boolean): Promise<ResultCode>;
  setFusionParameters(handle: DeviceHandle, parameters: SixAxisFusionParameters): Promise<ResultCode>;
  getFusionParameters(handle: DeviceHandle): Promise<Outcome<SixAxisFusionParameters>>;
  setGyroscopeZeroDriftMode(handle: DeviceHandle, mode: number): Promise<ResultCode>;
  getGyroscopeZeroDriftMode(handle: DeviceHandle): Promise<Outcome<number>>;
  isAtRest(handle: DeviceHandle): Promise<boolean>;
  enableUnalteredPassthrough(handle: DeviceHandle, enabled: boolean): Promise<ResultCode>;
  isUnalteredPassthroughEnabled(handle: DeviceHandle): Promise<Outcome<boolean>>;
  loadCalibrationParameter(handle: DeviceHandle): Promise<Outcome<Uint8Array>>;
  getIcInformation(handle: DeviceHandle): Promise<Outcome<Uint8Array>>;
}

export interface NpadResource {
  activate(aruid: bigint): Promise<ResultCode>;
  setRevision(aruid: bigint, revision: number): Promise<void>;
  setSupportedStyleSet(aruid: bigint, styleSet: number): Promise<ResultCode>;
  getSupportedStyleSet(aruid: bigint): Promise<Outcome<number>>;
  setSupportedNpadIdType(aruid: bigint, npadIds: number[]): Promise<ResultCode>;
  acquireStyleSetUpdateEvent(aruid: bigint, npadId: number): Promise<Outcome<number>>;
  disconnectNpad(aruid: bigint, npadId: number): Promise<void>;
  getLedPattern(npadId: number): Promise<Outcome<bigint>>;
  setJoyHoldType(aruid: bigint, holdType: number): Promise<ResultCode>;
  getJoyHoldType(aruid: bigint): Promise<Outcome<number>>;
  setNpadMode(
    aruid: bigint,
    npadId: number,
    deviceType: number,
    mode: NpadJoyAssignmentMode,
  ): Promise<NpadModeChange>;
  mergeSingleJoyAsDualJoy(aruid: bigint, first: number, second: number): Promise<ResultCode>;
  setHandheldActivationMode(aruid: bigint, mode: number): Promise<ResultCode>;
  getHandheldActivationMode(aruid: bigint): Promise<Outcome<number>>;
  swapNpadAssignment(aruid: bigint, first: number, second: number): Promise<ResultCode>;
  isUnintendedHomeButtonInputProtectionEnabled(aruid: bigint, npadId: number): Promise<Outcome<boolean>>;
  enableUnintendedHomeButtonInputProtection(aruid: bigint, npadId: number, enabled: boolean): Promise<ResultCode>;
  setAnalogStickUseCenterClamp(aruid: bigint, enabled: boolean): Promise<void>;
  setCaptureButtonAssignment(aruid: bigint, styleSet: number, button: bigint): Promise<ResultCode>;
  clearCaptureButtonAssignment(aruid: bigint): Promise<ResultCode>;
  isFirmwareUpdateAvailableForSixAxisSensor(aruid: bigint, handle: DeviceHandle): Promise<boolean>;
  resetIsSixAxisSensorDeviceNewlyAssigned(aruid: bigint, handle: DeviceHandle): Promise<ResultCode>;
}

export interface VibrationDevice {
  activate(): Promise<ResultCode>;
  isMounted(): boolean;
}

export interface StandardVibrationDevice {
  getActualVibrationValue(): Promise<Outcome<VibrationValue>>;
}

export interface GcVibrationDevice {
  sendGcErmCommand(command: number): Promise<ResultCode>;
  getActualGcErmCommand(): Promise<Outcome<number>>;
}

export interface N64VibrationDevice {
  sendValueInBool(isVibrating: boolean): Promise<ResultCode>;
}

export interface VibrationResource {
  getDeviceInfo(handle: DeviceHandle): Promise<Outcome<VibrationDeviceInfo>>;
  sendVibrationValue(aruid: bigint, handle: DeviceHandle, value: VibrationValue): Promise<ResultCode>;
  isAruidActive(aruid: bigint): Promise<Outcome<boolean>>;
  // Device accessors answer undefined when no device of that kind sits behind the handle
  getDevice(handle: DeviceHandle): VibrationDevice | undefined;
  getStandardDevice(handle: DeviceHandle): StandardVibrationDevice | undefined;
  getGcDevice(handle: DeviceHandle): GcVibrationDevice | undefined;
  getN64Device(handle: DeviceHandle): N64VibrationDevice | undefined;
  setMasterVolume(volume: number): Promise<ResultCode>;
  getMasterVolume(): Promise<Outcome<number>>;
  beginPermitSession(aruid: bigint): Promise<ResultCode>;
  endPermitSession(): Promise<ResultCode>;
}

export interface PalmaResource {
  getConnectionHandle(npadId: number): Promise<Outcome<PalmaConnectionHandle>>;
  initialize(handle: PalmaConnectionHandle): Promise<ResultCode>;
  acquireOperationCompleteEvent(handle: PalmaConnectionHandle): Promise<number>;
  getOperationInfo(handle: PalmaConnectionHandle): Promise<Outcome<PalmaOperationInfo>>;
  playActivity(handle: PalmaConnectionHandle, activity: bigint): Promise<ResultCode>;
  setFrModeType(handle: PalmaConnectionHandle, mode: bigint): Promise<ResultCode>;
  readStep(handle: PalmaConnectionHandle): Promise<ResultCode>;
  enableStep(handle: PalmaConnectionHandle, enabled: boolean): Promise<ResultCode>;
  resetStep(handle: PalmaConnectionHandle): Promise<ResultCode>;
  readUniqueCode(handle: PalmaConnectionHandle): Promise<void>;
  setUniqueCodeInvalid(handle: PalmaConnectionHandle): Promise<void>;
  writeRgbLedPatternEntry(handle: PalmaConnectionHandle, unknown: bigint, pattern: Uint8Array): Promise<void>;
  writeWaveEntry(handle: PalmaConnectionHandle, waveSet: bigint, memory: TransferMemory, size: bigint): Promise<void>;
  setDatabaseIdentificationVersion(handle: PalmaConnectionHandle, version: number): Promise<void>;
  getDatabaseIdentificationVersion(handle: PalmaConnectionHandle): Promise<void>;
  getOperationResult(handle: PalmaConnectionHandle): Promise<ResultCode>;
  setIsAllConnectable(connectable: boolean): Promise<void>;
  pair(handle: PalmaConnectionHandle): Promise<void>;
  setBoostMode(enabled: boolean): Promise<void>;
}

export interface ResourceManager {
  createAppletResource(aruid: bigint): Promise<ResultCode>;
  getSharedMemoryHandle(aruid: bigint): Promise<Outcome<number>>;
  getDebugPad(): ActivatableResource;
  getTouchScreen(): TouchScreenResource;
  getMouse(): ActivatableResource;
  getKeyboard(): ActivatableResource;
  getGesture(): ActivatableResource;
  getConsoleSixAxis(): ActivatableResource;
  getSevenSixAxis(): SevenSixAxisResource;
  getSixAxis(): SixAxisResource;
  getNpad(): NpadResource;
  getVibration(): VibrationResource;
  getPalma(): PalmaResource;
}

// Memory a client lends the service through a transferred handle
export interface TransferMemory {
  handle: number;
  sourceAddress: bigint;
  size: number;
}

export interface KernelObjectTable {
  getTransferMemory(handle: number): TransferMemory | undefined;
}

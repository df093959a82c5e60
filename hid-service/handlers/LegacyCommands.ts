import { DispatchEntry, defineStub, defineUnimplemented } from '../core/CommandTable';
import { ARUID, BOOL_WORD, S64, U32, U64 } from '../protocol/Layouts';
import { encodeBuffer, encodeStruct } from '../protocol/WireCodec';
import { NPAD_COMMUNICATION_MODE, NPAD_ID_TYPE } from '../types/HidTypes';
import { TransferredHandle } from '../types/Interfaces';

// Handle value clients receive where an event or LIFO object no longer exists
const NULL_COPY_HANDLE: TransferredHandle = { mode: 'copy', handle: 0 };

const XPAD_IDS: number[] = [NPAD_ID_TYPE.NO1, NPAD_ID_TYPE.NO2, NPAD_ID_TYPE.NO3, NPAD_ID_TYPE.NO4];

const U32_PARAMETER = U32.size;
const ARUID_PARAMETER = ARUID.size;
const ID_ARUID_PARAMETER = 0x10;

/**
 * Operations kept in the table for old clients. Each one has a fixed reply
 * built once here; nothing reaches a resource.
 */
export function createLegacyStubs(): DispatchEntry[] {
  return [
    defineStub({ opcode: 32, name: 'SendKeyboardLockKeyEvent', parameterSize: U32_PARAMETER }),
    defineStub({
      opcode: 40,
      name: 'AcquireXpadIdEventHandle',
      parameterSize: ARUID_PARAMETER,
      outputHandles: [NULL_COPY_HANDLE],
    }),
    defineStub({ opcode: 41, name: 'ReleaseXpadIdEventHandle', parameterSize: ARUID_PARAMETER }),
    defineStub({ opcode: 51, name: 'ActivateXpad', parameterSize: ID_ARUID_PARAMETER }),
    defineStub({
      opcode: 55,
      name: 'GetXpadIds',
      parameterSize: 0,
      output: encodeStruct(S64, BigInt(XPAD_IDS.length)),
      outputBuffers: [encodeBuffer(U32, XPAD_IDS)],
    }),
    defineStub({ opcode: 56, name: 'ActivateJoyXpad', parameterSize: U32_PARAMETER }),
    defineStub({
      opcode: 58,
      name: 'GetJoyXpadLifoHandle',
      parameterSize: U32_PARAMETER,
      outputHandles: [NULL_COPY_HANDLE],
    }),
    defineStub({ opcode: 59, name: 'GetJoyXpadIds', output: encodeStruct(S64, 0n) }),
    defineStub({ opcode: 60, name: 'ActivateSixAxisSensor', parameterSize: U32_PARAMETER }),
    defineStub({ opcode: 61, name: 'DeactivateSixAxisSensor', parameterSize: U32_PARAMETER }),
    defineStub({ opcode: 62, name: 'GetSixAxisSensorLifoHandle', parameterSize: U32_PARAMETER }),
    defineStub({ opcode: 63, name: 'ActivateJoySixAxisSensor', parameterSize: U32_PARAMETER }),
    defineStub({ opcode: 64, name: 'DeactivateJoySixAxisSensor', parameterSize: U32_PARAMETER }),
    defineStub({
      opcode: 65,
      name: 'GetJoySixAxisSensorLifoHandle',
      parameterSize: U32_PARAMETER,
      outputHandles: [NULL_COPY_HANDLE],
    }),
    defineStub({ opcode: 104, name: 'DeactivateNpad', parameterSize: ARUID_PARAMETER }),
    defineStub({ opcode: 301, name: 'StartConsoleSixAxisSensor', parameterSize: 0x10 }),
    defineStub({ opcode: 302, name: 'StopConsoleSixAxisSensor', parameterSize: 0x10 }),
    defineStub({ opcode: 304, name: 'StartSevenSixAxisSensor', parameterSize: ARUID_PARAMETER }),
    defineStub({ opcode: 305, name: 'StopSevenSixAxisSensor', parameterSize: ARUID_PARAMETER }),
    defineStub({ opcode: 307, name: 'FinalizeSevenSixAxisSensor', parameterSize: ARUID_PARAMETER }),
    defineStub({ opcode: 400, name: 'IsUsbFullKeyControllerEnabled', output: encodeStruct(BOOL_WORD, false) }),

    // Palma features that were never wired to hardware
    defineStub({ opcode: 509, name: 'ReadPalmaApplicationSection' }),
    defineStub({ opcode: 510, name: 'WritePalmaApplicationSection' }),
    defineStub({ opcode: 513, name: 'WritePalmaActivityEntry' }),
    defineStub({ opcode: 518, name: 'SuspendPalmaFeature' }),
    defineStub({ opcode: 520, name: 'ReadPalmaPlayLog' }),
    defineStub({ opcode: 521, name: 'ResetPalmaPlayLog' }),
    defineStub({ opcode: 523, name: 'SetIsPalmaPairedConnectable' }),
    defineStub({ opcode: 526, name: 'CancelWritePalmaWaveEntry' }),
    defineStub({ opcode: 527, name: 'EnablePalmaBoostMode' }),
    defineStub({ opcode: 528, name: 'GetPalmaBluetoothAddress' }),
    defineStub({ opcode: 529, name: 'SetDisallowedPalmaConnection' }),

    defineStub({ opcode: 1000, name: 'SetNpadCommunicationMode', parameterSize: 0x10 }),
    defineStub({
      opcode: 1001,
      name: 'GetNpadCommunicationMode',
      parameterSize: ARUID_PARAMETER,
      output: encodeStruct(U64, BigInt(NPAD_COMMUNICATION_MODE.DEFAULT)),
    }),
    defineStub({ opcode: 1002, name: 'SetTouchScreenConfiguration', parameterSize: 0x18 }),
    defineStub({
      opcode: 1003,
      name: 'IsFirmwareUpdateNeededForNotification',
      parameterSize: 0x10,
      output: encodeStruct(BOOL_WORD, false),
    }),
  ];
}

export function createUnimplementedCommands(): DispatchEntry[] {
  return [
    defineUnimplemented(26, 'ActivateDebugMouse'),
    defineUnimplemented(73, 'SetAccelerometerParameters'),
    defineUnimplemented(74, 'GetAccelerometerParameters'),
    defineUnimplemented(75, 'ResetAccelerometerParameters'),
    defineUnimplemented(76, 'SetAccelerometerPlayMode'),
    defineUnimplemented(77, 'GetAccelerometerPlayMode'),
    defineUnimplemented(78, 'ResetAccelerometerPlayMode'),
    defineUnimplemented(86, 'StoreSixAxisSensorCalibrationParameter'),
    defineUnimplemented(308, 'SetSevenSixAxisSensorFusionStrength'),
    defineUnimplemented(309, 'GetSevenSixAxisSensorFusionStrength'),
    defineUnimplemented(401, 'EnableUsbFullKeyController'),
    defineUnimplemented(402, 'IsUsbFullKeyControllerConnected'),
    defineUnimplemented(403, 'HasBattery'),
    defineUnimplemented(404, 'HasLeftRightBattery'),
    defineUnimplemented(405, 'GetNpadInterfaceType'),
    defineUnimplemented(406, 'GetNpadLeftRightInterfaceType'),
    defineUnimplemented(407, 'GetNpadOfHighestBatteryLevel'),
    defineUnimplemented(408, 'GetNpadOfHighestBatteryLevelForJoyRight'),
    defineUnimplemented(2000, 'ActivateDigitizer'),
  ];
}

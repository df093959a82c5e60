import { CommandTable, DispatchEntry, defineCommand } from '../core/CommandTable';
import { Dispatcher } from '../core/Dispatcher';
import {
  ARUID,
  BOOL_WORD,
  DEVICE_HANDLE,
  GC_ERM_REQUEST,
  HANDLE_WITH_ARUID,
  SEND_VIBRATION_VALUE,
  U64,
  VALUE_IN_BOOL_REQUEST,
  VIBRATION_DEVICE_INFO,
  VIBRATION_VALUE,
} from '../protocol/Layouts';
import { ActivationRegistry } from '../registry/ActivationRegistry';
import { VibrationResource } from '../resources/ResourceManager';
import { EMPTY_LAYOUT } from '../protocol/WireCodec';
import {
  DEFAULT_VIBRATION_VALUE,
  DeviceHandle,
  VIBRATION_GC_ERM_COMMAND,
  VibrationValue,
  describeHandle,
} from '../types/HidTypes';
import { RESULT_CODES, ResultCode, isFailure, isSuccess } from '../types/ResultCodes';
import { createLogger } from '../utils/logger';
import { validateVibrationHandle } from '../validation/HandleValidator';
import { HandlerDependencies } from './HandlerDependencies';

const logger = createLogger('VibrationHandler');

export const VIBRATION_COMMANDS = {
  GET_VIBRATION_DEVICE_INFO: 200,
  SEND_VIBRATION_VALUE: 201,
  GET_ACTUAL_VIBRATION_VALUE: 202,
  CREATE_ACTIVE_VIBRATION_DEVICE_LIST: 203,
  PERMIT_VIBRATION: 204,
  IS_VIBRATION_PERMITTED: 205,
  SEND_VIBRATION_VALUES: 206,
  SEND_VIBRATION_GC_ERM_COMMAND: 207,
  GET_ACTUAL_VIBRATION_GC_ERM_COMMAND: 208,
  BEGIN_PERMIT_VIBRATION_SESSION: 209,
  END_PERMIT_VIBRATION_SESSION: 210,
  IS_VIBRATION_DEVICE_MOUNTED: 211,
  SEND_VIBRATION_VALUE_IN_BOOL: 212,
} as const;

export const ACTIVE_VIBRATION_DEVICE_LIST_COMMANDS = {
  ACTIVATE_VIBRATION_DEVICE: 0,
} as const;

interface DeviceLookup<T> {
  result: ResultCode;
  device: T | undefined;
}

export class VibrationHandler {
  private listsCreated = 0;

  constructor(private readonly deps: HandlerDependencies) {}

  getCommands(): DispatchEntry[] {
    const vibration = () => this.deps.resources.getVibration();

    return [
      defineCommand({
        opcode: VIBRATION_COMMANDS.GET_VIBRATION_DEVICE_INFO,
        name: 'GetVibrationDeviceInfo',
        parameters: DEVICE_HANDLE,
        output: VIBRATION_DEVICE_INFO,
        handler: async ({ params: handle }) => {
          const { result, value } = await vibration().getDeviceInfo(handle);
          logger.debug(`GetVibrationDeviceInfo ${describeHandle(handle)} -> ${result}`);
          return { result, output: value };
        },
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.SEND_VIBRATION_VALUE,
        name: 'SendVibrationValue',
        parameters: SEND_VIBRATION_VALUE,
        handler: async ({ params }) => {
          // The client is never told whether the motor took the value
          await vibration().sendVibrationValue(params.aruid, params.handle, params.value);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.GET_ACTUAL_VIBRATION_VALUE,
        name: 'GetActualVibrationValue',
        parameters: HANDLE_WITH_ARUID,
        output: VIBRATION_VALUE,
        handler: async ({ params }) => {
          const lookup = await this.findActiveDevice(params.aruid, params.handle, (handle) =>
            vibration().getStandardDevice(handle),
          );

          let result = lookup.result;
          let value: VibrationValue = { ...DEFAULT_VIBRATION_VALUE };
          if (lookup.device) {
            const actual = await lookup.device.getActualVibrationValue();
            result = actual.result;
            value = actual.value;
          }
          if (isFailure(result)) {
            value = { ...DEFAULT_VIBRATION_VALUE };
          }
          return { result: RESULT_CODES.SUCCESS, output: value };
        },
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.CREATE_ACTIVE_VIBRATION_DEVICE_LIST,
        name: 'CreateActiveVibrationDeviceList',
        parameters: EMPTY_LAYOUT,
        handler: async () => ({
          result: RESULT_CODES.SUCCESS,
          outputHandles: [{ mode: 'interface', service: this.createDeviceList() }],
        }),
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.PERMIT_VIBRATION,
        name: 'PermitVibration',
        parameters: BOOL_WORD,
        handler: async ({ params: canVibrate }) => {
          logger.debug(`PermitVibration canVibrate=${canVibrate}`);
          return { result: await vibration().setMasterVolume(canVibrate ? 1.0 : 0.0) };
        },
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.IS_VIBRATION_PERMITTED,
        name: 'IsVibrationPermitted',
        parameters: EMPTY_LAYOUT,
        output: BOOL_WORD,
        handler: async () => {
          const { result, value } = await vibration().getMasterVolume();
          return { result, output: value > 0 };
        },
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.SEND_VIBRATION_VALUES,
        name: 'SendVibrationValues',
        parameters: ARUID,
        handler: async (context) => {
          const aruid = context.params;
          const handles = context.readBuffer(0, DEVICE_HANDLE);
          const values = context.readBuffer(1, VIBRATION_VALUE);
          logger.debug(`SendVibrationValues aruid=${aruid} count=${handles.length}`);

          if (handles.length !== values.length) {
            return { result: RESULT_CODES.VIBRATION_ARRAY_SIZE_MISMATCH };
          }

          let result: ResultCode = RESULT_CODES.SUCCESS;
          for (let i = 0; i < handles.length && isSuccess(result); i++) {
            result = await vibration().sendVibrationValue(aruid, handles[i], values[i]);
          }
          return { result };
        },
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.SEND_VIBRATION_GC_ERM_COMMAND,
        name: 'SendVibrationGcErmCommand',
        parameters: GC_ERM_REQUEST,
        handler: async ({ params }) => {
          const lookup = await this.findActiveDevice(params.aruid, params.handle, (handle) =>
            vibration().getGcDevice(handle),
          );
          if (!lookup.device) {
            return { result: lookup.result };
          }
          return { result: await lookup.device.sendGcErmCommand(Number(params.value)) };
        },
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.GET_ACTUAL_VIBRATION_GC_ERM_COMMAND,
        name: 'GetActualVibrationGcErmCommand',
        parameters: HANDLE_WITH_ARUID,
        output: U64,
        handler: async ({ params }) => {
          const lookup = await this.findActiveDevice(params.aruid, params.handle, (handle) =>
            vibration().getGcDevice(handle),
          );

          let result = lookup.result;
          let command: number = VIBRATION_GC_ERM_COMMAND.STOP;
          if (lookup.device) {
            const actual = await lookup.device.getActualGcErmCommand();
            result = actual.result;
            command = actual.value;
          }
          if (isFailure(result)) {
            command = VIBRATION_GC_ERM_COMMAND.STOP;
          }
          return { result: RESULT_CODES.SUCCESS, output: BigInt(command) };
        },
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.BEGIN_PERMIT_VIBRATION_SESSION,
        name: 'BeginPermitVibrationSession',
        parameters: ARUID,
        handler: async ({ params: aruid }) => ({ result: await vibration().beginPermitSession(aruid) }),
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.END_PERMIT_VIBRATION_SESSION,
        name: 'EndPermitVibrationSession',
        parameters: EMPTY_LAYOUT,
        handler: async () => ({ result: await vibration().endPermitSession() }),
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.IS_VIBRATION_DEVICE_MOUNTED,
        name: 'IsVibrationDeviceMounted',
        parameters: HANDLE_WITH_ARUID,
        output: BOOL_WORD,
        handler: async ({ params }) => {
          const result = validateVibrationHandle(params.handle, this.deps.controllers);
          let mounted = false;
          if (isSuccess(result)) {
            mounted = vibration().getDevice(params.handle)?.isMounted() ?? false;
          }
          return { result, output: mounted };
        },
      }),
      defineCommand({
        opcode: VIBRATION_COMMANDS.SEND_VIBRATION_VALUE_IN_BOOL,
        name: 'SendVibrationValueInBool',
        parameters: VALUE_IN_BOOL_REQUEST,
        handler: async ({ params }) => {
          const lookup = await this.findActiveDevice(params.aruid, params.handle, (handle) =>
            vibration().getN64Device(handle),
          );
          if (!lookup.device) {
            return { result: lookup.result };
          }
          return { result: await lookup.device.sendValueInBool(params.isVibrating) };
        },
      }),
    ];
  }

  /**
   * Common preamble of the per-device commands. A device is only looked up
   * for an active user id and a valid handle; an inactive user id yields
   * success with no device.
   */
  private async findActiveDevice<T>(
    aruid: bigint,
    handle: DeviceHandle,
    lookup: (handle: DeviceHandle) => T | undefined,
  ): Promise<DeviceLookup<T>> {
    const active = await this.deps.resources.getVibration().isAruidActive(aruid);
    if (isFailure(active.result) || !active.value) {
      return { result: active.result, device: undefined };
    }

    const validation = validateVibrationHandle(handle, this.deps.controllers);
    if (isFailure(validation)) {
      logger.debug(`Rejected vibration handle ${describeHandle(handle)}`);
      return { result: validation, device: undefined };
    }

    return { result: RESULT_CODES.SUCCESS, device: lookup(handle) };
  }

  private createDeviceList(): Dispatcher {
    this.listsCreated++;
    const registry = new ActivationRegistry({
      name: `ActiveVibrationDeviceList#${this.listsCreated}`,
      capacity: this.deps.config.activationCapacity,
      validate: (handle) => validateVibrationHandle(handle, this.deps.controllers),
      activateDevice: (handle) => activateVibrationDevice(this.deps.resources.getVibration(), handle),
    });
    return createActiveVibrationDeviceList(registry);
  }
}

async function activateVibrationDevice(vibration: VibrationResource, handle: DeviceHandle): Promise<ResultCode> {
  const device = vibration.getDevice(handle);
  if (!device) {
    logger.warn(`No vibration device behind ${describeHandle(handle)}`);
    return RESULT_CODES.UNKNOWN;
  }
  return device.activate();
}

export function createActiveVibrationDeviceList(registry: ActivationRegistry): Dispatcher {
  const table = new CommandTable('IActiveVibrationDeviceList', [
    defineCommand({
      opcode: ACTIVE_VIBRATION_DEVICE_LIST_COMMANDS.ACTIVATE_VIBRATION_DEVICE,
      name: 'ActivateVibrationDevice',
      parameters: DEVICE_HANDLE,
      handler: async ({ params: handle }) => {
        logger.debug(`ActivateVibrationDevice ${describeHandle(handle)}`);
        return { result: await registry.activate(handle) };
      },
    }),
  ]);
  return new Dispatcher(table);
}

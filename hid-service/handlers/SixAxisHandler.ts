import { CommandContext } from '../core/CommandContext';
import { DispatchEntry, defineCommand } from '../core/CommandTable';
import { HID_CONFIG } from '../config/ServiceConfig';
import {
  ARUID,
  BOOL_WORD,
  DRIFT_MODE_REQUEST,
  FUSION_ENABLE,
  FUSION_PARAMETERS,
  FUSION_PARAMETERS_REQUEST,
  HANDLE_WITH_ARUID,
  SEVEN_SIX_AXIS_INIT,
  U32,
  UNALTERED_PASSTHROUGH,
  SevenSixAxisInitRequest,
} from '../protocol/Layouts';
import { bytesLayout, encodeStruct } from '../protocol/WireCodec';
import { DeviceHandle, GYROSCOPE_ZERO_DRIFT_MODE, describeHandle } from '../types/HidTypes';
import { RESULT_CODES, ResultCode, isFailure } from '../types/ResultCodes';
import { createLogger } from '../utils/logger';
import { validateSixAxisHandle } from '../validation/HandleValidator';
import { HandlerDependencies } from './HandlerDependencies';

const logger = createLogger('SixAxisHandler');

const CALIBRATION_PARAMETER = bytesLayout(
  'SixAxisSensorCalibrationParameter',
  HID_CONFIG.SIX_AXIS.CALIBRATION_PARAMETER_SIZE,
);
const IC_INFORMATION = bytesLayout('SixAxisSensorIcInformation', HID_CONFIG.SIX_AXIS.IC_INFORMATION_SIZE);

export const SIX_AXIS_COMMANDS = {
  START_SIX_AXIS_SENSOR: 66,
  STOP_SIX_AXIS_SENSOR: 67,
  IS_SIX_AXIS_SENSOR_FUSION_ENABLED: 68,
  ENABLE_SIX_AXIS_SENSOR_FUSION: 69,
  SET_SIX_AXIS_SENSOR_FUSION_PARAMETERS: 70,
  GET_SIX_AXIS_SENSOR_FUSION_PARAMETERS: 71,
  RESET_SIX_AXIS_SENSOR_FUSION_PARAMETERS: 72,
  SET_GYROSCOPE_ZERO_DRIFT_MODE: 79,
  GET_GYROSCOPE_ZERO_DRIFT_MODE: 80,
  RESET_GYROSCOPE_ZERO_DRIFT_MODE: 81,
  IS_SIX_AXIS_SENSOR_AT_REST: 82,
  IS_FIRMWARE_UPDATE_AVAILABLE_FOR_SIX_AXIS_SENSOR: 83,
  ENABLE_SIX_AXIS_SENSOR_UNALTERED_PASSTHROUGH: 84,
  IS_SIX_AXIS_SENSOR_UNALTERED_PASSTHROUGH_ENABLED: 85,
  LOAD_SIX_AXIS_SENSOR_CALIBRATION_PARAMETER: 87,
  GET_SIX_AXIS_SENSOR_IC_INFORMATION: 88,
  RESET_IS_SIX_AXIS_SENSOR_DEVICE_NEWLY_ASSIGNED: 89,
  INITIALIZE_SEVEN_SIX_AXIS_SENSOR: 306,
  RESET_SEVEN_SIX_AXIS_SENSOR_TIMESTAMP: 310,
} as const;

export class SixAxisHandler {
  constructor(private readonly deps: HandlerDependencies) {}

  getCommands(): DispatchEntry[] {
    const sixAxis = () => this.deps.resources.getSixAxis();
    const fusionDefaults = this.deps.config.fusionDefaults;

    return [
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.START_SIX_AXIS_SENSOR,
        name: 'StartSixAxisSensor',
        parameters: HANDLE_WITH_ARUID,
        handler: async ({ params }) => ({
          result: await this.withHandle('StartSixAxisSensor', params.handle, (handle) =>
            sixAxis().setSixAxisEnabled(handle, true),
          ),
        }),
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.STOP_SIX_AXIS_SENSOR,
        name: 'StopSixAxisSensor',
        parameters: HANDLE_WITH_ARUID,
        handler: async ({ params }) => ({
          result: await this.withHandle('StopSixAxisSensor', params.handle, (handle) =>
            sixAxis().setSixAxisEnabled(handle, false),
          ),
        }),
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.IS_SIX_AXIS_SENSOR_FUSION_ENABLED,
        name: 'IsSixAxisSensorFusionEnabled',
        parameters: HANDLE_WITH_ARUID,
        output: BOOL_WORD,
        handler: async ({ params }) => {
          const invalid = this.rejectHandle('IsSixAxisSensorFusionEnabled', params.handle);
          if (invalid !== null) {
            return { result: invalid };
          }
          const { result, value } = await sixAxis().isFusionEnabled(params.handle);
          return { result, output: value };
        },
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.ENABLE_SIX_AXIS_SENSOR_FUSION,
        name: 'EnableSixAxisSensorFusion',
        parameters: FUSION_ENABLE,
        handler: async ({ params }) => ({
          result: await this.withHandle('EnableSixAxisSensorFusion', params.handle, (handle) =>
            sixAxis().setFusionEnabled(handle, params.enabled),
          ),
        }),
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.SET_SIX_AXIS_SENSOR_FUSION_PARAMETERS,
        name: 'SetSixAxisSensorFusionParameters',
        parameters: FUSION_PARAMETERS_REQUEST,
        handler: async ({ params }) => ({
          result: await this.withHandle('SetSixAxisSensorFusionParameters', params.handle, (handle) =>
            sixAxis().setFusionParameters(handle, params.parameters),
          ),
        }),
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.GET_SIX_AXIS_SENSOR_FUSION_PARAMETERS,
        name: 'GetSixAxisSensorFusionParameters',
        parameters: HANDLE_WITH_ARUID,
        output: FUSION_PARAMETERS,
        handler: async ({ params }) => {
          const invalid = this.rejectHandle('GetSixAxisSensorFusionParameters', params.handle);
          if (invalid !== null) {
            return { result: invalid };
          }
          const { result, value } = await sixAxis().getFusionParameters(params.handle);
          return { result, output: value };
        },
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.RESET_SIX_AXIS_SENSOR_FUSION_PARAMETERS,
        name: 'ResetSixAxisSensorFusionParameters',
        parameters: HANDLE_WITH_ARUID,
        handler: async ({ params }) => ({
          result: await this.withHandle('ResetSixAxisSensorFusionParameters', params.handle, async (handle) => {
            // Both writes are attempted; the parameter write reports first
            const parametersResult = await sixAxis().setFusionParameters(handle, { ...fusionDefaults });
            const enableResult = await sixAxis().setFusionEnabled(handle, true);
            return isFailure(parametersResult) ? parametersResult : enableResult;
          }),
        }),
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.SET_GYROSCOPE_ZERO_DRIFT_MODE,
        name: 'SetGyroscopeZeroDriftMode',
        parameters: DRIFT_MODE_REQUEST,
        handler: async ({ params }) => ({
          result: await this.withHandle('SetGyroscopeZeroDriftMode', params.handle, (handle) =>
            sixAxis().setGyroscopeZeroDriftMode(handle, params.driftMode),
          ),
        }),
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.GET_GYROSCOPE_ZERO_DRIFT_MODE,
        name: 'GetGyroscopeZeroDriftMode',
        parameters: HANDLE_WITH_ARUID,
        output: U32,
        handler: async ({ params }) => {
          const invalid = this.rejectHandle('GetGyroscopeZeroDriftMode', params.handle);
          if (invalid !== null) {
            return { result: invalid };
          }
          const { result, value } = await sixAxis().getGyroscopeZeroDriftMode(params.handle);
          return { result, output: value };
        },
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.RESET_GYROSCOPE_ZERO_DRIFT_MODE,
        name: 'ResetGyroscopeZeroDriftMode',
        parameters: HANDLE_WITH_ARUID,
        handler: async ({ params }) => ({
          result: await this.withHandle('ResetGyroscopeZeroDriftMode', params.handle, (handle) =>
            sixAxis().setGyroscopeZeroDriftMode(handle, GYROSCOPE_ZERO_DRIFT_MODE.STANDARD),
          ),
        }),
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.IS_SIX_AXIS_SENSOR_AT_REST,
        name: 'IsSixAxisSensorAtRest',
        parameters: HANDLE_WITH_ARUID,
        output: BOOL_WORD,
        handler: async ({ params }) => {
          const atRest = await sixAxis().isAtRest(params.handle);
          logger.debug(`IsSixAxisSensorAtRest ${describeHandle(params.handle)} -> ${atRest}`);
          return { result: RESULT_CODES.SUCCESS, output: atRest };
        },
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.IS_FIRMWARE_UPDATE_AVAILABLE_FOR_SIX_AXIS_SENSOR,
        name: 'IsFirmwareUpdateAvailableForSixAxisSensor',
        parameters: HANDLE_WITH_ARUID,
        output: BOOL_WORD,
        handler: async ({ params }) => {
          const available = await this.deps.resources
            .getNpad()
            .isFirmwareUpdateAvailableForSixAxisSensor(params.aruid, params.handle);
          return { result: RESULT_CODES.SUCCESS, output: available };
        },
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.ENABLE_SIX_AXIS_SENSOR_UNALTERED_PASSTHROUGH,
        name: 'EnableSixAxisSensorUnalteredPassthrough',
        parameters: UNALTERED_PASSTHROUGH,
        handler: async ({ params }) => ({
          result: await this.withHandle('EnableSixAxisSensorUnalteredPassthrough', params.handle, (handle) =>
            sixAxis().enableUnalteredPassthrough(handle, params.enabled),
          ),
        }),
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.IS_SIX_AXIS_SENSOR_UNALTERED_PASSTHROUGH_ENABLED,
        name: 'IsSixAxisSensorUnalteredPassthroughEnabled',
        parameters: HANDLE_WITH_ARUID,
        output: BOOL_WORD,
        handler: async ({ params }) => {
          const invalid = this.rejectHandle('IsSixAxisSensorUnalteredPassthroughEnabled', params.handle);
          if (invalid !== null) {
            return { result: invalid };
          }
          const { result, value } = await sixAxis().isUnalteredPassthroughEnabled(params.handle);
          return { result, output: value };
        },
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.LOAD_SIX_AXIS_SENSOR_CALIBRATION_PARAMETER,
        name: 'LoadSixAxisSensorCalibrationParameter',
        parameters: HANDLE_WITH_ARUID,
        handler: async ({ params }) => {
          const invalid = this.rejectHandle('LoadSixAxisSensorCalibrationParameter', params.handle);
          if (invalid !== null) {
            return { result: invalid };
          }
          const { result, value } = await sixAxis().loadCalibrationParameter(params.handle);
          if (isFailure(result)) {
            return { result };
          }
          return { result, outputBuffers: [encodeStruct(CALIBRATION_PARAMETER, value)] };
        },
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.GET_SIX_AXIS_SENSOR_IC_INFORMATION,
        name: 'GetSixAxisSensorIcInformation',
        parameters: HANDLE_WITH_ARUID,
        handler: async ({ params }) => {
          const invalid = this.rejectHandle('GetSixAxisSensorIcInformation', params.handle);
          if (invalid !== null) {
            return { result: invalid };
          }
          const { result, value } = await sixAxis().getIcInformation(params.handle);
          if (isFailure(result)) {
            return { result };
          }
          return { result, outputBuffers: [encodeStruct(IC_INFORMATION, value)] };
        },
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.RESET_IS_SIX_AXIS_SENSOR_DEVICE_NEWLY_ASSIGNED,
        name: 'ResetIsSixAxisSensorDeviceNewlyAssigned',
        parameters: HANDLE_WITH_ARUID,
        handler: async ({ params }) => ({
          result: await this.withHandle('ResetIsSixAxisSensorDeviceNewlyAssigned', params.handle, (handle) =>
            this.deps.resources.getNpad().resetIsSixAxisSensorDeviceNewlyAssigned(params.aruid, handle),
          ),
        }),
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.INITIALIZE_SEVEN_SIX_AXIS_SENSOR,
        name: 'InitializeSevenSixAxisSensor',
        parameters: SEVEN_SIX_AXIS_INIT,
        inputHandles: 2,
        handler: async (context: CommandContext<SevenSixAxisInitRequest>) => {
          const { params } = context;
          const workSize = HID_CONFIG.SEVEN_SIX_AXIS.WORK_BUFFER_SIZE;
          const lifoSize = HID_CONFIG.SEVEN_SIX_AXIS.LIFO_BUFFER_SIZE;

          context.assertContract(
            params.workBufferSize === BigInt(workSize),
            'work buffer size',
            workSize,
            Number(params.workBufferSize),
          );
          context.assertContract(
            params.lifoBufferSize === BigInt(lifoSize),
            'LIFO buffer size',
            lifoSize,
            Number(params.lifoBufferSize),
          );

          const workMemory = this.deps.kernel.getTransferMemory(context.getCopyHandle(0));
          const lifoMemory = this.deps.kernel.getTransferMemory(context.getCopyHandle(1));
          if (!workMemory || !lifoMemory) {
            logger.error(`InitializeSevenSixAxisSensor: transfer memory not found for aruid=${params.aruid}`);
            return { result: RESULT_CODES.UNKNOWN };
          }

          context.assertContract(workMemory.size === workSize, 'work memory size', workSize, workMemory.size);
          context.assertContract(lifoMemory.size === lifoSize, 'LIFO memory size', lifoSize, lifoMemory.size);

          const resources = this.deps.resources;
          await resources.getConsoleSixAxis().activate();
          await resources.getSevenSixAxis().activate();
          await resources.getSevenSixAxis().setTransferMemory(workMemory);

          logger.info(`Seven six-axis sensor initialized for aruid=${params.aruid}`);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: SIX_AXIS_COMMANDS.RESET_SEVEN_SIX_AXIS_SENSOR_TIMESTAMP,
        name: 'ResetSevenSixAxisSensorTimestamp',
        parameters: ARUID,
        handler: async ({ params: aruid }) => {
          await this.deps.resources.getSevenSixAxis().resetTimestamp();
          logger.debug(`ResetSevenSixAxisSensorTimestamp aruid=${aruid}`);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
    ];
  }

  // Returns the validation failure, or null for a usable handle
  private rejectHandle(command: string, handle: DeviceHandle): ResultCode | null {
    const validation = validateSixAxisHandle(handle);
    logger.debug(`${command} ${describeHandle(handle)}`);
    if (isFailure(validation)) {
      logger.debug(`${command} rejected handle ${describeHandle(handle)}`);
      return validation;
    }
    return null;
  }

  private async withHandle(
    command: string,
    handle: DeviceHandle,
    action: (handle: DeviceHandle) => Promise<ResultCode>,
  ): Promise<ResultCode> {
    const invalid = this.rejectHandle(command, handle);
    if (invalid !== null) {
      return invalid;
    }
    return action(handle);
  }
}

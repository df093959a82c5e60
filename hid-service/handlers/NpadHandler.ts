import { CommandContext } from '../core/CommandContext';
import { DispatchEntry, defineCommand } from '../core/CommandTable';
import {
  ARUID,
  ARUID_WITH_WORD,
  BOOL_WORD,
  CAPTURE_BUTTON_REQUEST,
  FLAG_ID_ARUID,
  FLAG_WITH_ARUID,
  ID_ARUID_WORD,
  ID_WITH_ARUID,
  NPAD_ID,
  NPAD_MODE_CHANGE,
  SIGNED_WITH_ARUID,
  TWO_IDS_WITH_ARUID,
  U32,
  U64,
  AruidWithWord,
} from '../protocol/Layouts';
import {
  NPAD_HANDHELD_ACTIVATION_MODE,
  NPAD_JOY_ASSIGNMENT_MODE,
  NPAD_JOY_DEVICE_TYPE,
  NPAD_JOY_HOLD_TYPE,
  NPAD_REVISION,
} from '../types/HidTypes';
import { RESULT_CODES, ResultCode, formatResult, isSuccess } from '../types/ResultCodes';
import { createLogger } from '../utils/logger';
import { isNpadIdValid } from '../validation/HandleValidator';
import { HandlerDependencies } from './HandlerDependencies';

const logger = createLogger('NpadHandler');

const HOLD_TYPES = new Set<bigint>([
  BigInt(NPAD_JOY_HOLD_TYPE.VERTICAL),
  BigInt(NPAD_JOY_HOLD_TYPE.HORIZONTAL),
]);

export const NPAD_COMMANDS = {
  SET_SUPPORTED_NPAD_STYLE_SET: 100,
  GET_SUPPORTED_NPAD_STYLE_SET: 101,
  SET_SUPPORTED_NPAD_ID_TYPE: 102,
  ACTIVATE_NPAD: 103,
  ACQUIRE_NPAD_STYLE_SET_UPDATE_EVENT_HANDLE: 106,
  DISCONNECT_NPAD: 107,
  GET_PLAYER_LED_PATTERN: 108,
  ACTIVATE_NPAD_WITH_REVISION: 109,
  SET_NPAD_JOY_HOLD_TYPE: 120,
  GET_NPAD_JOY_HOLD_TYPE: 121,
  SET_NPAD_JOY_ASSIGNMENT_MODE_SINGLE_BY_DEFAULT: 122,
  SET_NPAD_JOY_ASSIGNMENT_MODE_SINGLE: 123,
  SET_NPAD_JOY_ASSIGNMENT_MODE_DUAL: 124,
  MERGE_SINGLE_JOY_AS_DUAL_JOY: 125,
  START_LR_ASSIGNMENT_MODE: 126,
  STOP_LR_ASSIGNMENT_MODE: 127,
  SET_NPAD_HANDHELD_ACTIVATION_MODE: 128,
  GET_NPAD_HANDHELD_ACTIVATION_MODE: 129,
  SWAP_NPAD_ASSIGNMENT: 130,
  IS_UNINTENDED_HOME_BUTTON_INPUT_PROTECTION_ENABLED: 131,
  ENABLE_UNINTENDED_HOME_BUTTON_INPUT_PROTECTION: 132,
  SET_NPAD_JOY_ASSIGNMENT_MODE_SINGLE_WITH_DESTINATION: 133,
  SET_NPAD_ANALOG_STICK_USE_CENTER_CLAMP: 134,
  SET_NPAD_CAPTURE_BUTTON_ASSIGNMENT: 135,
  CLEAR_NPAD_CAPTURE_BUTTON_ASSIGNMENT: 136,
} as const;

/**
 * Controller (npad) configuration commands. Almost everything is a straight
 * hand-off to the npad resource; the exceptions are the supported id list,
 * which also feeds vibration handle validation, and the two setters whose
 * value range is part of the wire contract.
 */
export class NpadHandler {
  constructor(private readonly deps: HandlerDependencies) {}

  getCommands(): DispatchEntry[] {
    const npad = () => this.deps.resources.getNpad();

    return [
      defineCommand({
        opcode: NPAD_COMMANDS.SET_SUPPORTED_NPAD_STYLE_SET,
        name: 'SetSupportedNpadStyleSet',
        parameters: ID_WITH_ARUID,
        handler: async ({ params }) => {
          logger.debug(`SetSupportedNpadStyleSet styleSet=0x${params.id.toString(16)} aruid=${params.aruid}`);
          return { result: await npad().setSupportedStyleSet(params.aruid, params.id) };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.GET_SUPPORTED_NPAD_STYLE_SET,
        name: 'GetSupportedNpadStyleSet',
        parameters: ARUID,
        output: U32,
        handler: async ({ params: aruid }) => {
          const { result, value } = await npad().getSupportedStyleSet(aruid);
          return { result, output: value };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.SET_SUPPORTED_NPAD_ID_TYPE,
        name: 'SetSupportedNpadIdType',
        parameters: ARUID,
        handler: async (context) => {
          const aruid = context.params;
          const npadIds = context.readBuffer(0, NPAD_ID);
          logger.debug(`SetSupportedNpadIdType aruid=${aruid} ids=[${npadIds.join(', ')}]`);

          if (!npadIds.every(isNpadIdValid)) {
            return { result: RESULT_CODES.INVALID_NPAD_ID };
          }

          const result = await npad().setSupportedNpadIdType(aruid, npadIds);
          if (isSuccess(result)) {
            this.deps.controllers.setSupportedNpadIds(npadIds);
          }
          return { result };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.ACTIVATE_NPAD,
        name: 'ActivateNpad',
        parameters: ARUID,
        handler: async ({ params: aruid }) => ({
          result: await this.activateNpad(aruid, NPAD_REVISION.REVISION_0),
        }),
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.ACQUIRE_NPAD_STYLE_SET_UPDATE_EVENT_HANDLE,
        name: 'AcquireNpadStyleSetUpdateEventHandle',
        parameters: ID_ARUID_WORD,
        handler: async ({ params }) => {
          const { result, value } = await npad().acquireStyleSetUpdateEvent(params.aruid, params.npadId);
          return { result, outputHandles: [{ mode: 'copy', handle: value }] };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.DISCONNECT_NPAD,
        name: 'DisconnectNpad',
        parameters: ID_WITH_ARUID,
        handler: async ({ params }) => {
          await npad().disconnectNpad(params.aruid, params.id);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.GET_PLAYER_LED_PATTERN,
        name: 'GetPlayerLedPattern',
        parameters: NPAD_ID,
        output: U64,
        handler: async ({ params: npadId }) => {
          const { result, value } = await npad().getLedPattern(npadId);
          return { result, output: value };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.ACTIVATE_NPAD_WITH_REVISION,
        name: 'ActivateNpadWithRevision',
        parameters: SIGNED_WITH_ARUID,
        handler: async ({ params }) => ({
          result: await this.activateNpad(params.aruid, params.value),
        }),
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.SET_NPAD_JOY_HOLD_TYPE,
        name: 'SetNpadJoyHoldType',
        parameters: ARUID_WITH_WORD,
        handler: async (context: CommandContext<AruidWithWord>) => {
          const { aruid, value } = context.params;
          context.assertContract(HOLD_TYPES.has(value), `hold type ${value} is not Vertical or Horizontal`);
          return { result: await npad().setJoyHoldType(aruid, Number(value)) };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.GET_NPAD_JOY_HOLD_TYPE,
        name: 'GetNpadJoyHoldType',
        parameters: ARUID,
        output: U64,
        handler: async ({ params: aruid }) => {
          const { result, value } = await npad().getJoyHoldType(aruid);
          return { result, output: BigInt(value) };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.SET_NPAD_JOY_ASSIGNMENT_MODE_SINGLE_BY_DEFAULT,
        name: 'SetNpadJoyAssignmentModeSingleByDefault',
        parameters: ID_WITH_ARUID,
        handler: async ({ params }) => {
          await npad().setNpadMode(params.aruid, params.id, NPAD_JOY_DEVICE_TYPE.LEFT, NPAD_JOY_ASSIGNMENT_MODE.SINGLE);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.SET_NPAD_JOY_ASSIGNMENT_MODE_SINGLE,
        name: 'SetNpadJoyAssignmentModeSingle',
        parameters: ID_ARUID_WORD,
        handler: async ({ params }) => {
          await npad().setNpadMode(params.aruid, params.npadId, Number(params.value), NPAD_JOY_ASSIGNMENT_MODE.SINGLE);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.SET_NPAD_JOY_ASSIGNMENT_MODE_DUAL,
        name: 'SetNpadJoyAssignmentModeDual',
        parameters: ID_WITH_ARUID,
        handler: async ({ params }) => {
          await npad().setNpadMode(params.aruid, params.id, NPAD_JOY_DEVICE_TYPE.LEFT, NPAD_JOY_ASSIGNMENT_MODE.DUAL);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.MERGE_SINGLE_JOY_AS_DUAL_JOY,
        name: 'MergeSingleJoyAsDualJoy',
        parameters: TWO_IDS_WITH_ARUID,
        handler: async ({ params }) => ({
          result: await npad().mergeSingleJoyAsDualJoy(params.aruid, params.first, params.second),
        }),
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.START_LR_ASSIGNMENT_MODE,
        name: 'StartLrAssignmentMode',
        parameters: ARUID,
        handler: async ({ params: aruid }) => {
          logger.debug(`StartLrAssignmentMode aruid=${aruid}`);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.STOP_LR_ASSIGNMENT_MODE,
        name: 'StopLrAssignmentMode',
        parameters: ARUID,
        handler: async ({ params: aruid }) => {
          logger.debug(`StopLrAssignmentMode aruid=${aruid}`);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.SET_NPAD_HANDHELD_ACTIVATION_MODE,
        name: 'SetNpadHandheldActivationMode',
        parameters: ARUID_WITH_WORD,
        handler: async (context: CommandContext<AruidWithWord>) => {
          const { aruid, value } = context.params;
          context.assertContract(
            value < BigInt(NPAD_HANDHELD_ACTIVATION_MODE.MAX),
            `handheld activation mode ${value} is out of range`,
            NPAD_HANDHELD_ACTIVATION_MODE.MAX,
            Number(value),
          );
          return { result: await npad().setHandheldActivationMode(aruid, Number(value)) };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.GET_NPAD_HANDHELD_ACTIVATION_MODE,
        name: 'GetNpadHandheldActivationMode',
        parameters: ARUID,
        output: U64,
        handler: async ({ params: aruid }) => {
          const { result, value } = await npad().getHandheldActivationMode(aruid);
          return { result, output: BigInt(value) };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.SWAP_NPAD_ASSIGNMENT,
        name: 'SwapNpadAssignment',
        parameters: TWO_IDS_WITH_ARUID,
        handler: async ({ params }) => ({
          result: await npad().swapNpadAssignment(params.aruid, params.first, params.second),
        }),
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.IS_UNINTENDED_HOME_BUTTON_INPUT_PROTECTION_ENABLED,
        name: 'IsUnintendedHomeButtonInputProtectionEnabled',
        parameters: ID_WITH_ARUID,
        output: BOOL_WORD,
        handler: async ({ params }) => {
          if (!isNpadIdValid(params.id)) {
            logger.warn(`Invalid npad id ${params.id}`);
            return { result: RESULT_CODES.INVALID_NPAD_ID };
          }
          const { result, value } = await npad().isUnintendedHomeButtonInputProtectionEnabled(params.aruid, params.id);
          return { result, output: value };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.ENABLE_UNINTENDED_HOME_BUTTON_INPUT_PROTECTION,
        name: 'EnableUnintendedHomeButtonInputProtection',
        parameters: FLAG_ID_ARUID,
        handler: async ({ params }) => {
          if (!isNpadIdValid(params.npadId)) {
            logger.warn(`Invalid npad id ${params.npadId}`);
            return { result: RESULT_CODES.INVALID_NPAD_ID };
          }
          return {
            result: await npad().enableUnintendedHomeButtonInputProtection(params.aruid, params.npadId, params.enabled),
          };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.SET_NPAD_JOY_ASSIGNMENT_MODE_SINGLE_WITH_DESTINATION,
        name: 'SetNpadJoyAssignmentModeSingleWithDestination',
        parameters: ID_ARUID_WORD,
        output: NPAD_MODE_CHANGE,
        handler: async ({ params }) => {
          const change = await npad().setNpadMode(
            params.aruid,
            params.npadId,
            Number(params.value),
            NPAD_JOY_ASSIGNMENT_MODE.SINGLE,
          );
          return { result: RESULT_CODES.SUCCESS, output: change };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.SET_NPAD_ANALOG_STICK_USE_CENTER_CLAMP,
        name: 'SetNpadAnalogStickUseCenterClamp',
        parameters: FLAG_WITH_ARUID,
        handler: async ({ params }) => {
          await npad().setAnalogStickUseCenterClamp(params.aruid, params.enabled);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.SET_NPAD_CAPTURE_BUTTON_ASSIGNMENT,
        name: 'SetNpadCaptureButtonAssignment',
        parameters: CAPTURE_BUTTON_REQUEST,
        handler: async ({ params }) => ({
          result: await npad().setCaptureButtonAssignment(params.aruid, params.styleSet, params.button),
        }),
      }),
      defineCommand({
        opcode: NPAD_COMMANDS.CLEAR_NPAD_CAPTURE_BUTTON_ASSIGNMENT,
        name: 'ClearNpadCaptureButtonAssignment',
        parameters: ARUID,
        handler: async ({ params: aruid }) => ({
          result: await npad().clearCaptureButtonAssignment(aruid),
        }),
      }),
    ];
  }

  private async activateNpad(aruid: bigint, revision: number): Promise<ResultCode> {
    const npad = this.deps.resources.getNpad();
    await npad.setRevision(aruid, revision);
    const result = await npad.activate(aruid);
    logger.info(`Npad activated for aruid=${aruid} revision=${revision}: ${formatResult(result)}`);
    return result;
  }
}

import { CommandContext } from '../core/CommandContext';
import { DispatchEntry, ImplementedEntry, defineCommand } from '../core/CommandTable';
import { HID_CONFIG } from '../config/ServiceConfig';
import {
  BOOL_WORD,
  FLAG_WITH_ARUID,
  ID_WITH_ARUID,
  PALMA_DATABASE_VERSION,
  PALMA_HANDLE,
  PALMA_HANDLE_WITH_WORD,
  PALMA_STEP_REQUEST,
  PALMA_WAVE_ENTRY,
  U64,
  PalmaWaveEntryRequest,
} from '../protocol/Layouts';
import { bytesLayout, encodeStruct } from '../protocol/WireCodec';
import { PalmaResource } from '../resources/ResourceManager';
import { PalmaConnectionHandle } from '../types/HidTypes';
import { RESULT_CODES, ResultCode, isFailure } from '../types/ResultCodes';
import { createLogger } from '../utils/logger';
import { HandlerDependencies } from './HandlerDependencies';

const logger = createLogger('PalmaHandler');

const OPERATION_DATA = bytesLayout('PalmaOperationData', HID_CONFIG.PALMA.OPERATION_DATA_SIZE);

export const PALMA_COMMANDS = {
  GET_PALMA_CONNECTION_HANDLE: 500,
  INITIALIZE_PALMA: 501,
  ACQUIRE_PALMA_OPERATION_COMPLETE_EVENT: 502,
  GET_PALMA_OPERATION_INFO: 503,
  PLAY_PALMA_ACTIVITY: 504,
  SET_PALMA_FR_MODE_TYPE: 505,
  READ_PALMA_STEP: 506,
  ENABLE_PALMA_STEP: 507,
  RESET_PALMA_STEP: 508,
  READ_PALMA_UNIQUE_CODE: 511,
  SET_PALMA_UNIQUE_CODE_INVALID: 512,
  WRITE_PALMA_RGB_LED_PATTERN_ENTRY: 514,
  WRITE_PALMA_WAVE_ENTRY: 515,
  SET_PALMA_DATA_BASE_IDENTIFICATION_VERSION: 516,
  GET_PALMA_DATA_BASE_IDENTIFICATION_VERSION: 517,
  GET_PALMA_OPERATION_RESULT: 519,
  SET_IS_PALMA_ALL_CONNECTABLE: 522,
  PAIR_PALMA: 524,
  SET_PALMA_BOOST_MODE: 525,
} as const;

// Commands on the palma accessory; each forwards to the palma resource
export class PalmaHandler {
  constructor(private readonly deps: HandlerDependencies) {}

  getCommands(): DispatchEntry[] {
    const palma = () => this.deps.resources.getPalma();

    return [
      defineCommand({
        opcode: PALMA_COMMANDS.GET_PALMA_CONNECTION_HANDLE,
        name: 'GetPalmaConnectionHandle',
        parameters: ID_WITH_ARUID,
        output: PALMA_HANDLE,
        handler: async ({ params }) => {
          logger.debug(`GetPalmaConnectionHandle npadId=${params.id} aruid=${params.aruid}`);
          const { result, value } = await palma().getConnectionHandle(params.id);
          return { result, output: value };
        },
      }),
      this.handleCommand(PALMA_COMMANDS.INITIALIZE_PALMA, 'InitializePalma', (resource, handle) =>
        resource.initialize(handle),
      ),
      defineCommand({
        opcode: PALMA_COMMANDS.ACQUIRE_PALMA_OPERATION_COMPLETE_EVENT,
        name: 'AcquirePalmaOperationCompleteEvent',
        parameters: PALMA_HANDLE,
        handler: async ({ params: handle }) => {
          const event = await palma().acquireOperationCompleteEvent(handle);
          return { result: RESULT_CODES.SUCCESS, outputHandles: [{ mode: 'copy', handle: event }] };
        },
      }),
      defineCommand({
        opcode: PALMA_COMMANDS.GET_PALMA_OPERATION_INFO,
        name: 'GetPalmaOperationInfo',
        parameters: PALMA_HANDLE,
        output: U64,
        handler: async ({ params: handle }) => {
          const { result, value } = await palma().getOperationInfo(handle);
          if (isFailure(result)) {
            return { result };
          }
          return {
            result,
            output: value.operationType,
            outputBuffers: [encodeStruct(OPERATION_DATA, value.data)],
          };
        },
      }),
      defineCommand({
        opcode: PALMA_COMMANDS.PLAY_PALMA_ACTIVITY,
        name: 'PlayPalmaActivity',
        parameters: PALMA_HANDLE_WITH_WORD,
        handler: async ({ params }) => {
          logger.debug(`PlayPalmaActivity npadId=${params.handle.npadId} activity=${params.value}`);
          return { result: await palma().playActivity(params.handle, params.value) };
        },
      }),
      defineCommand({
        opcode: PALMA_COMMANDS.SET_PALMA_FR_MODE_TYPE,
        name: 'SetPalmaFrModeType',
        parameters: PALMA_HANDLE_WITH_WORD,
        handler: async ({ params }) => ({ result: await palma().setFrModeType(params.handle, params.value) }),
      }),
      this.handleCommand(PALMA_COMMANDS.READ_PALMA_STEP, 'ReadPalmaStep', (resource, handle) =>
        resource.readStep(handle),
      ),
      defineCommand({
        opcode: PALMA_COMMANDS.ENABLE_PALMA_STEP,
        name: 'EnablePalmaStep',
        parameters: PALMA_STEP_REQUEST,
        handler: async ({ params }) => ({ result: await palma().enableStep(params.handle, params.enabled) }),
      }),
      this.handleCommand(PALMA_COMMANDS.RESET_PALMA_STEP, 'ResetPalmaStep', (resource, handle) =>
        resource.resetStep(handle),
      ),
      this.handleCommand(PALMA_COMMANDS.READ_PALMA_UNIQUE_CODE, 'ReadPalmaUniqueCode', async (resource, handle) => {
        await resource.readUniqueCode(handle);
        return RESULT_CODES.SUCCESS;
      }),
      this.handleCommand(
        PALMA_COMMANDS.SET_PALMA_UNIQUE_CODE_INVALID,
        'SetPalmaUniqueCodeInvalid',
        async (resource, handle) => {
          await resource.setUniqueCodeInvalid(handle);
          return RESULT_CODES.SUCCESS;
        },
      ),
      defineCommand({
        opcode: PALMA_COMMANDS.WRITE_PALMA_RGB_LED_PATTERN_ENTRY,
        name: 'WritePalmaRgbLedPatternEntry',
        parameters: PALMA_HANDLE_WITH_WORD,
        handler: async (context) => {
          const { handle, value } = context.params;
          await palma().writeRgbLedPatternEntry(handle, value, context.readRawBuffer(0));
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: PALMA_COMMANDS.WRITE_PALMA_WAVE_ENTRY,
        name: 'WritePalmaWaveEntry',
        parameters: PALMA_WAVE_ENTRY,
        inputHandles: 1,
        handler: async (context: CommandContext<PalmaWaveEntryRequest>) => {
          const { params } = context;
          const memorySize = HID_CONFIG.PALMA.WAVE_ENTRY_MEMORY_SIZE;

          context.assertContract(
            params.transferMemorySize === BigInt(memorySize),
            'transfer memory size',
            memorySize,
            Number(params.transferMemorySize),
          );

          const memory = this.deps.kernel.getTransferMemory(context.getCopyHandle(0));
          if (!memory) {
            logger.error(`WritePalmaWaveEntry: transfer memory not found for npadId=${params.handle.npadId}`);
            return { result: RESULT_CODES.UNKNOWN };
          }
          context.assertContract(memory.size === memorySize, 'transfer memory object size', memorySize, memory.size);

          logger.warn(`(STUBBED) WritePalmaWaveEntry npadId=${params.handle.npadId} waveSet=${params.waveSet}`);
          await palma().writeWaveEntry(params.handle, params.waveSet, memory, params.transferMemorySize);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: PALMA_COMMANDS.SET_PALMA_DATA_BASE_IDENTIFICATION_VERSION,
        name: 'SetPalmaDataBaseIdentificationVersion',
        parameters: PALMA_DATABASE_VERSION,
        handler: async ({ params }) => {
          await palma().setDatabaseIdentificationVersion(params.handle, params.version);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      this.handleCommand(
        PALMA_COMMANDS.GET_PALMA_DATA_BASE_IDENTIFICATION_VERSION,
        'GetPalmaDataBaseIdentificationVersion',
        async (resource, handle) => {
          await resource.getDatabaseIdentificationVersion(handle);
          return RESULT_CODES.SUCCESS;
        },
      ),
      this.handleCommand(PALMA_COMMANDS.GET_PALMA_OPERATION_RESULT, 'GetPalmaOperationResult', (resource, handle) =>
        resource.getOperationResult(handle),
      ),
      defineCommand({
        opcode: PALMA_COMMANDS.SET_IS_PALMA_ALL_CONNECTABLE,
        name: 'SetIsPalmaAllConnectable',
        parameters: FLAG_WITH_ARUID,
        handler: async ({ params }) => {
          logger.debug(`SetIsPalmaAllConnectable ${params.enabled} aruid=${params.aruid}`);
          await palma().setIsAllConnectable(params.enabled);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      this.handleCommand(PALMA_COMMANDS.PAIR_PALMA, 'PairPalma', async (resource, handle) => {
        await resource.pair(handle);
        return RESULT_CODES.SUCCESS;
      }),
      defineCommand({
        opcode: PALMA_COMMANDS.SET_PALMA_BOOST_MODE,
        name: 'SetPalmaBoostMode',
        parameters: BOOL_WORD,
        handler: async ({ params: enabled }) => {
          await palma().setBoostMode(enabled);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
    ];
  }

  // Commands whose whole parameter block is the connection handle
  private handleCommand(
    opcode: number,
    name: string,
    action: (resource: PalmaResource, handle: PalmaConnectionHandle) => Promise<ResultCode>,
  ): ImplementedEntry {
    return defineCommand({
      opcode,
      name,
      parameters: PALMA_HANDLE,
      handler: async ({ params: handle }) => {
        logger.debug(`${name} npadId=${handle.npadId}`);
        return { result: await action(this.deps.resources.getPalma(), handle) };
      },
    });
  }
}

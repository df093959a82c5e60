import { CommandTable, DispatchEntry, ImplementedEntry, defineCommand } from '../core/CommandTable';
import { Dispatcher } from '../core/Dispatcher';
import { ARUID, ID_WITH_ARUID, TOUCH_SCREEN_RESOLUTION } from '../protocol/Layouts';
import { EMPTY_LAYOUT } from '../protocol/WireCodec';
import { ActivatableResource } from '../resources/ResourceManager';
import { RESULT_CODES, ResultCode, isSuccess } from '../types/ResultCodes';
import { createLogger } from '../utils/logger';
import { HandlerDependencies } from './HandlerDependencies';

const logger = createLogger('InputDeviceHandler');

export const INPUT_DEVICE_COMMANDS = {
  CREATE_APPLET_RESOURCE: 0,
  ACTIVATE_DEBUG_PAD: 1,
  ACTIVATE_TOUCH_SCREEN: 11,
  ACTIVATE_MOUSE: 21,
  ACTIVATE_KEYBOARD: 31,
  ACTIVATE_GESTURE: 91,
  ACTIVATE_CONSOLE_SIX_AXIS_SENSOR: 300,
  ACTIVATE_SEVEN_SIX_AXIS_SENSOR: 303,
  SET_TOUCH_SCREEN_RESOLUTION: 1004,
} as const;

export const APPLET_RESOURCE_COMMANDS = {
  GET_SHARED_MEMORY_HANDLE: 0,
} as const;

/**
 * Activation of the simple input devices plus the per-applet resource.
 *
 * Every activation follows the same two steps: the low-level activate
 * (skipped when the firmware manages devices) and, if that succeeded,
 * activation for the calling applet.
 */
export class InputDeviceHandler {
  constructor(private readonly deps: HandlerDependencies) {}

  getCommands(): DispatchEntry[] {
    const resources = this.deps.resources;

    return [
      defineCommand({
        opcode: INPUT_DEVICE_COMMANDS.CREATE_APPLET_RESOURCE,
        name: 'CreateAppletResource',
        parameters: ARUID,
        handler: async ({ params: aruid }) => {
          const result = await resources.createAppletResource(aruid);
          logger.debug(`CreateAppletResource aruid=${aruid} result=${result}`);
          return {
            result,
            outputHandles: [{ mode: 'interface', service: createAppletResource(this.deps, aruid) }],
          };
        },
      }),
      this.activationCommand(INPUT_DEVICE_COMMANDS.ACTIVATE_DEBUG_PAD, 'ActivateDebugPad', () => resources.getDebugPad()),
      this.activationCommand(INPUT_DEVICE_COMMANDS.ACTIVATE_TOUCH_SCREEN, 'ActivateTouchScreen', () => resources.getTouchScreen()),
      this.activationCommand(INPUT_DEVICE_COMMANDS.ACTIVATE_MOUSE, 'ActivateMouse', () => resources.getMouse()),
      this.activationCommand(INPUT_DEVICE_COMMANDS.ACTIVATE_KEYBOARD, 'ActivateKeyboard', () => resources.getKeyboard()),
      defineCommand({
        opcode: INPUT_DEVICE_COMMANDS.ACTIVATE_GESTURE,
        name: 'ActivateGesture',
        parameters: ID_WITH_ARUID,
        handler: async ({ params }) => {
          logger.debug(`ActivateGesture gesture=${params.id} aruid=${params.aruid}`);
          return { result: await this.activateResource(resources.getGesture(), params.aruid) };
        },
      }),
      this.activationCommand(
        INPUT_DEVICE_COMMANDS.ACTIVATE_CONSOLE_SIX_AXIS_SENSOR,
        'ActivateConsoleSixAxisSensor',
        () => resources.getConsoleSixAxis(),
      ),
      defineCommand({
        opcode: INPUT_DEVICE_COMMANDS.ACTIVATE_SEVEN_SIX_AXIS_SENSOR,
        name: 'ActivateSevenSixAxisSensor',
        parameters: ARUID,
        handler: async ({ params: aruid }) => {
          const result = await this.activateResource(resources.getSevenSixAxis(), aruid);
          if (!isSuccess(result)) {
            logger.warn(`Seven six-axis activation for aruid=${aruid} returned ${result}, reporting success`);
          }
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
      defineCommand({
        opcode: INPUT_DEVICE_COMMANDS.SET_TOUCH_SCREEN_RESOLUTION,
        name: 'SetTouchScreenResolution',
        parameters: TOUCH_SCREEN_RESOLUTION,
        handler: async ({ params }) => {
          logger.info(`Touch screen resolution ${params.width}x${params.height} aruid=${params.aruid}`);
          await resources.getTouchScreen().setDimensions(params.width, params.height);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
    ];
  }

  private activationCommand(opcode: number, name: string, getResource: () => ActivatableResource): ImplementedEntry {
    return defineCommand({
      opcode,
      name,
      parameters: ARUID,
      handler: async ({ params: aruid }) => {
        logger.debug(`${name} aruid=${aruid}`);
        return { result: await this.activateResource(getResource(), aruid) };
      },
    });
  }

  private async activateLowLevel(resource: ActivatableResource): Promise<ResultCode> {
    if (this.deps.firmware.isDeviceManaged()) {
      return RESULT_CODES.SUCCESS;
    }
    return resource.activate();
  }

  private async activateResource(resource: ActivatableResource, aruid: bigint): Promise<ResultCode> {
    const result = await this.activateLowLevel(resource);
    if (!isSuccess(result)) {
      return result;
    }
    return resource.activateForApplet(aruid);
  }
}

// The applet resource is bound to the user id it was created for
export function createAppletResource(deps: HandlerDependencies, aruid: bigint): Dispatcher {
  const table = new CommandTable('IAppletResource', [
    defineCommand({
      opcode: APPLET_RESOURCE_COMMANDS.GET_SHARED_MEMORY_HANDLE,
      name: 'GetSharedMemoryHandle',
      parameters: EMPTY_LAYOUT,
      handler: async () => {
        const { result, value } = await deps.resources.getSharedMemoryHandle(aruid);
        logger.debug(`GetSharedMemoryHandle aruid=${aruid} result=${result}`);
        return { result, outputHandles: [{ mode: 'copy', handle: value }] };
      },
    }),
  ]);
  return new Dispatcher(table);
}

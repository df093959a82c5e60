import { Dispatcher } from '../core/Dispatcher';
import {
  ARUID,
  ARUID_WITH_WORD,
  BOOL_WORD,
  FLAG_ID_ARUID,
  ID_ARUID_WORD,
  ID_WITH_ARUID,
  NPAD_ID,
  NPAD_MODE_CHANGE,
  SIGNED_WITH_ARUID,
  TWO_IDS_WITH_ARUID,
  U32,
  U64,
} from '../protocol/Layouts';
import { RESULT_CODES } from '../types/ResultCodes';
import { TestEnvironment, createTestEnvironment } from '../test/FakeResourceManager';
import {
  TEST_ARUID,
  TEST_SESSION,
  bufferOf,
  buildRequest,
  createTestDispatcher,
  expectViolation,
  readOutput,
  send,
} from '../test/requests';
import { NPAD_COMMANDS, NpadHandler } from './NpadHandler';

describe('NpadHandler', () => {
  let env: TestEnvironment;
  let dispatcher: Dispatcher;

  beforeEach(() => {
    env = createTestEnvironment();
    dispatcher = createTestDispatcher(new NpadHandler(env.deps).getCommands());
  });

  test('should set and read back the supported style set', async () => {
    await send(
      dispatcher,
      buildRequest(NPAD_COMMANDS.SET_SUPPORTED_NPAD_STYLE_SET, ID_WITH_ARUID, { id: 0x1f, aruid: TEST_ARUID }),
    );
    const response = await send(dispatcher, buildRequest(NPAD_COMMANDS.GET_SUPPORTED_NPAD_STYLE_SET, ARUID, TEST_ARUID));

    expect(env.resources.npad.setSupportedStyleSet).toHaveBeenCalledWith(TEST_ARUID, 0x1f);
    expect(readOutput(U32, response)).toBe(0x3f);
  });

  describe('SetSupportedNpadIdType', () => {
    const request = (ids: number[]) =>
      buildRequest(NPAD_COMMANDS.SET_SUPPORTED_NPAD_ID_TYPE, ARUID, TEST_ARUID, {
        inputBuffers: [bufferOf(NPAD_ID, ids)],
      });

    test('should hand the id list on and narrow the controller configuration', async () => {
      const response = await send(dispatcher, request([0, 0x20]));

      expect(response.result).toBe(RESULT_CODES.SUCCESS);
      expect(env.resources.npad.setSupportedNpadIdType).toHaveBeenCalledWith(TEST_ARUID, [0, 0x20]);
      expect(env.controllers.getSupportedNpadIds()).toEqual([0, 0x20]);
    });

    test('should reject a list holding an undefined id', async () => {
      const response = await send(dispatcher, request([0, 9]));

      expect(response.result).toBe(RESULT_CODES.INVALID_NPAD_ID);
      expect(env.resources.npad.setSupportedNpadIdType).not.toHaveBeenCalled();
      expect(env.controllers.isSupported(1)).toBe(true);
    });

    test('should keep the configuration when the resource refuses', async () => {
      env.resources.npad.setSupportedNpadIdType.mockResolvedValueOnce(RESULT_CODES.UNKNOWN);

      const response = await send(dispatcher, request([1]));

      expect(response.result).toBe(RESULT_CODES.UNKNOWN);
      expect(env.controllers.isSupported(0)).toBe(true);
    });

    test('should accept an empty list', async () => {
      const response = await send(dispatcher, buildRequest(NPAD_COMMANDS.SET_SUPPORTED_NPAD_ID_TYPE, ARUID, TEST_ARUID));

      expect(response.result).toBe(RESULT_CODES.SUCCESS);
      expect(env.controllers.getSupportedNpadIds()).toEqual([]);
    });

    test('should treat a ragged id buffer as a protocol violation', async () => {
      const outcome = await dispatcher.handleRequest(
        buildRequest(NPAD_COMMANDS.SET_SUPPORTED_NPAD_ID_TYPE, ARUID, TEST_ARUID, { inputBuffers: [new Uint8Array(6)] }),
        TEST_SESSION,
      );

      expect(expectViolation(outcome)).toMatchObject({ command: 'SetSupportedNpadIdType', reason: 'buffer-stride' });
    });
  });

  describe('activation', () => {
    test('should activate at revision 0', async () => {
      const response = await send(dispatcher, buildRequest(NPAD_COMMANDS.ACTIVATE_NPAD, ARUID, TEST_ARUID));

      expect(response.result).toBe(RESULT_CODES.SUCCESS);
      expect(env.resources.npad.setRevision).toHaveBeenCalledWith(TEST_ARUID, 0);
      expect(env.resources.npad.activate).toHaveBeenCalledWith(TEST_ARUID);
    });

    test('should activate at the requested revision and pass the result on', async () => {
      env.resources.npad.activate.mockResolvedValueOnce(RESULT_CODES.UNKNOWN);

      const response = await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.ACTIVATE_NPAD_WITH_REVISION, SIGNED_WITH_ARUID, { value: 3, aruid: TEST_ARUID }),
      );

      expect(response.result).toBe(RESULT_CODES.UNKNOWN);
      expect(env.resources.npad.setRevision).toHaveBeenCalledWith(TEST_ARUID, 3);
    });
  });

  test('should return the style set update event as a copy handle', async () => {
    const response = await send(
      dispatcher,
      buildRequest(NPAD_COMMANDS.ACQUIRE_NPAD_STYLE_SET_UPDATE_EVENT_HANDLE, ID_ARUID_WORD, {
        npadId: 2,
        aruid: TEST_ARUID,
        value: 0n,
      }),
    );

    expect(response.outputHandles).toEqual([{ mode: 'copy', handle: 0x1234 }]);
    expect(env.resources.npad.acquireStyleSetUpdateEvent).toHaveBeenCalledWith(TEST_ARUID, 2);
  });

  test('should read the player LED pattern', async () => {
    const response = await send(dispatcher, buildRequest(NPAD_COMMANDS.GET_PLAYER_LED_PATTERN, NPAD_ID, 1));

    expect(readOutput(U64, response)).toBe(0x0101n);
    expect(env.resources.npad.getLedPattern).toHaveBeenCalledWith(1);
  });

  describe('SetNpadJoyHoldType', () => {
    test('should accept vertical and horizontal', async () => {
      const response = await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.SET_NPAD_JOY_HOLD_TYPE, ARUID_WITH_WORD, { aruid: TEST_ARUID, value: 1n }),
      );

      expect(response.result).toBe(RESULT_CODES.SUCCESS);
      expect(env.resources.npad.setJoyHoldType).toHaveBeenCalledWith(TEST_ARUID, 1);
    });

    test('should treat any other hold type as a protocol violation', async () => {
      const outcome = await dispatcher.handleRequest(
        buildRequest(NPAD_COMMANDS.SET_NPAD_JOY_HOLD_TYPE, ARUID_WITH_WORD, { aruid: TEST_ARUID, value: 2n }),
        TEST_SESSION,
      );

      expect(expectViolation(outcome)).toMatchObject({
        opcode: 120,
        reason: 'contract',
        message: 'SetNpadJoyHoldType: hold type 2 is not Vertical or Horizontal',
      });
      expect(env.resources.npad.setJoyHoldType).not.toHaveBeenCalled();
    });
  });

  test('should widen the hold type to a 64-bit reply', async () => {
    const response = await send(dispatcher, buildRequest(NPAD_COMMANDS.GET_NPAD_JOY_HOLD_TYPE, ARUID, TEST_ARUID));

    expect(readOutput(U64, response)).toBe(1n);
  });

  describe('assignment modes', () => {
    test('should switch to single mode on the left joy-con by default', async () => {
      const response = await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.SET_NPAD_JOY_ASSIGNMENT_MODE_SINGLE_BY_DEFAULT, ID_WITH_ARUID, { id: 1, aruid: TEST_ARUID }),
      );

      expect(response.result).toBe(RESULT_CODES.SUCCESS);
      expect(env.resources.npad.setNpadMode).toHaveBeenCalledWith(TEST_ARUID, 1, 0, 1);
    });

    test('should switch to single mode on the requested side', async () => {
      await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.SET_NPAD_JOY_ASSIGNMENT_MODE_SINGLE, ID_ARUID_WORD, {
          npadId: 1,
          aruid: TEST_ARUID,
          value: 1n,
        }),
      );

      expect(env.resources.npad.setNpadMode).toHaveBeenCalledWith(TEST_ARUID, 1, 1, 1);
    });

    test('should switch to dual mode', async () => {
      await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.SET_NPAD_JOY_ASSIGNMENT_MODE_DUAL, ID_WITH_ARUID, { id: 2, aruid: TEST_ARUID }),
      );

      expect(env.resources.npad.setNpadMode).toHaveBeenCalledWith(TEST_ARUID, 2, 0, 0);
    });

    test('should report where a single joy-con was reassigned', async () => {
      const response = await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.SET_NPAD_JOY_ASSIGNMENT_MODE_SINGLE_WITH_DESTINATION, ID_ARUID_WORD, {
          npadId: 1,
          aruid: TEST_ARUID,
          value: 0n,
        }),
      );

      expect(response.result).toBe(RESULT_CODES.SUCCESS);
      expect(readOutput(NPAD_MODE_CHANGE, response)).toEqual({ isReassigned: true, newNpadId: 4 });
    });

    test('should merge and swap controller pairs', async () => {
      await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.MERGE_SINGLE_JOY_AS_DUAL_JOY, TWO_IDS_WITH_ARUID, { first: 0, second: 1, aruid: TEST_ARUID }),
      );
      await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.SWAP_NPAD_ASSIGNMENT, TWO_IDS_WITH_ARUID, { first: 2, second: 3, aruid: TEST_ARUID }),
      );

      expect(env.resources.npad.mergeSingleJoyAsDualJoy).toHaveBeenCalledWith(TEST_ARUID, 0, 1);
      expect(env.resources.npad.swapNpadAssignment).toHaveBeenCalledWith(TEST_ARUID, 2, 3);
    });
  });

  describe('handheld activation mode', () => {
    test('should accept a mode below the limit', async () => {
      const response = await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.SET_NPAD_HANDHELD_ACTIVATION_MODE, ARUID_WITH_WORD, { aruid: TEST_ARUID, value: 2n }),
      );

      expect(response.result).toBe(RESULT_CODES.SUCCESS);
      expect(env.resources.npad.setHandheldActivationMode).toHaveBeenCalledWith(TEST_ARUID, 2);
    });

    test('should treat an out-of-range mode as a protocol violation', async () => {
      const outcome = await dispatcher.handleRequest(
        buildRequest(NPAD_COMMANDS.SET_NPAD_HANDHELD_ACTIVATION_MODE, ARUID_WITH_WORD, { aruid: TEST_ARUID, value: 3n }),
        TEST_SESSION,
      );

      expect(expectViolation(outcome)).toMatchObject({ reason: 'contract', expected: 3, actual: 3 });
    });

    test('should read the mode back as a 64-bit value', async () => {
      const response = await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.GET_NPAD_HANDHELD_ACTIVATION_MODE, ARUID, TEST_ARUID),
      );

      expect(readOutput(U64, response)).toBe(2n);
    });
  });

  describe('home button protection', () => {
    test('should report the protection state', async () => {
      const response = await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.IS_UNINTENDED_HOME_BUTTON_INPUT_PROTECTION_ENABLED, ID_WITH_ARUID, {
          id: 0x20,
          aruid: TEST_ARUID,
        }),
      );

      expect(response.result).toBe(RESULT_CODES.SUCCESS);
      expect(readOutput(BOOL_WORD, response)).toBe(true);
    });

    test('should reject an undefined controller id', async () => {
      const query = await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.IS_UNINTENDED_HOME_BUTTON_INPUT_PROTECTION_ENABLED, ID_WITH_ARUID, {
          id: 8,
          aruid: TEST_ARUID,
        }),
      );
      const update = await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.ENABLE_UNINTENDED_HOME_BUTTON_INPUT_PROTECTION, FLAG_ID_ARUID, {
          enabled: true,
          npadId: 8,
          aruid: TEST_ARUID,
        }),
      );

      expect(query.result).toBe(RESULT_CODES.INVALID_NPAD_ID);
      expect(readOutput(BOOL_WORD, query)).toBe(false);
      expect(update.result).toBe(RESULT_CODES.INVALID_NPAD_ID);
      expect(env.resources.npad.enableUnintendedHomeButtonInputProtection).not.toHaveBeenCalled();
    });

    test('should enable protection for a defined controller', async () => {
      await send(
        dispatcher,
        buildRequest(NPAD_COMMANDS.ENABLE_UNINTENDED_HOME_BUTTON_INPUT_PROTECTION, FLAG_ID_ARUID, {
          enabled: false,
          npadId: 3,
          aruid: TEST_ARUID,
        }),
      );

      expect(env.resources.npad.enableUnintendedHomeButtonInputProtection).toHaveBeenCalledWith(TEST_ARUID, 3, false);
    });
  });

  test('should report success for the LR assignment mode toggles', async () => {
    const start = await send(dispatcher, buildRequest(NPAD_COMMANDS.START_LR_ASSIGNMENT_MODE, ARUID, TEST_ARUID));
    const stop = await send(dispatcher, buildRequest(NPAD_COMMANDS.STOP_LR_ASSIGNMENT_MODE, ARUID, TEST_ARUID));

    expect(start.result).toBe(RESULT_CODES.SUCCESS);
    expect(stop.result).toBe(RESULT_CODES.SUCCESS);
  });

  test('should pass the capture button clear result through', async () => {
    env.resources.npad.clearCaptureButtonAssignment.mockResolvedValueOnce(RESULT_CODES.UNKNOWN);

    const response = await send(
      dispatcher,
      buildRequest(NPAD_COMMANDS.CLEAR_NPAD_CAPTURE_BUTTON_ASSIGNMENT, ARUID, TEST_ARUID),
    );

    expect(response.result).toBe(RESULT_CODES.UNKNOWN);
  });
});

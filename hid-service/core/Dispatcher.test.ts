import { ProtocolViolationError } from '../protocol/ProtocolViolation';
import { DEVICE_HANDLE, U32 } from '../protocol/Layouts';
import { EMPTY_LAYOUT } from '../protocol/WireCodec';
import { createRequest } from '../types/Interfaces';
import { RESULT_CODES } from '../types/ResultCodes';
import { TEST_SESSION, buildRequest, createTestDispatcher, expectViolation, readOutput } from '../test/requests';
import { defineCommand, defineStub, defineUnimplemented } from './CommandTable';
import { UNKNOWN_OPCODE_STATS_KEY, unwrapOutcome } from './Dispatcher';

describe('Dispatcher', () => {
  test('should reply NOT_SUPPORTED to an unimplemented opcode without touching any handler', async () => {
    const handler = jest.fn(async () => ({ result: RESULT_CODES.SUCCESS }));
    const dispatcher = createTestDispatcher([
      defineUnimplemented(5, 'Missing'),
      defineCommand({ opcode: 6, name: 'Present', parameters: EMPTY_LAYOUT, handler }),
    ]);

    const named = unwrapOutcome(await dispatcher.handleRequest(createRequest(5), TEST_SESSION));
    const unknown = unwrapOutcome(await dispatcher.handleRequest(createRequest(1234), TEST_SESSION));

    expect(named).toEqual({ result: RESULT_CODES.NOT_SUPPORTED, output: new Uint8Array(0), outputBuffers: [], outputHandles: [] });
    expect(unknown.result).toBe(RESULT_CODES.NOT_SUPPORTED);
    expect(handler).not.toHaveBeenCalled();
  });

  test('should decode parameters and encode the handler output', async () => {
    const dispatcher = createTestDispatcher([
      defineCommand<number, number>({
        opcode: 1,
        name: 'Double',
        parameters: U32,
        output: U32,
        handler: async (context) => ({ result: RESULT_CODES.SUCCESS, output: context.params * 2 }),
      }),
    ]);

    const response = unwrapOutcome(await dispatcher.handleRequest(buildRequest(1, U32, 21), TEST_SESSION));

    expect(response.result).toBe(RESULT_CODES.SUCCESS);
    expect(readOutput(U32, response)).toBe(42);
  });

  test('should report a parameter-size violation for a short block', async () => {
    const handler = jest.fn(async () => ({ result: RESULT_CODES.SUCCESS }));
    const dispatcher = createTestDispatcher([defineCommand({ opcode: 1, name: 'Sized', parameters: U32, handler })]);

    const outcome = await dispatcher.handleRequest(createRequest(1, new Uint8Array(3)), TEST_SESSION);

    expect(expectViolation(outcome)).toMatchObject({
      opcode: 1,
      command: 'Sized',
      reason: 'parameter-size',
      expected: 4,
      actual: 3,
    });
    expect(handler).not.toHaveBeenCalled();
  });

  test('should report a handle-count violation before invoking the handler', async () => {
    const handler = jest.fn(async () => ({ result: RESULT_CODES.SUCCESS }));
    const dispatcher = createTestDispatcher([
      defineCommand({ opcode: 1, name: 'NeedsHandle', parameters: EMPTY_LAYOUT, inputHandles: 1, handler }),
    ]);

    const outcome = await dispatcher.handleRequest(createRequest(1), TEST_SESSION);

    expect(expectViolation(outcome)).toMatchObject({ reason: 'handle-count', expected: 1, actual: 0 });
    expect(handler).not.toHaveBeenCalled();
  });

  test('should turn a violation raised inside a handler into a violation outcome', async () => {
    const dispatcher = createTestDispatcher([
      defineCommand({
        opcode: 9,
        name: 'ReadsHandles',
        parameters: EMPTY_LAYOUT,
        handler: async (context) => {
          context.readBuffer(0, DEVICE_HANDLE);
          return { result: RESULT_CODES.SUCCESS };
        },
      }),
    ]);
    const request = { ...createRequest(9), inputBuffers: [new Uint8Array(5)] };

    const outcome = await dispatcher.handleRequest(request, TEST_SESSION);

    expect(expectViolation(outcome)).toMatchObject({
      opcode: 9,
      command: 'ReadsHandles',
      reason: 'buffer-stride',
      expected: 4,
      actual: 5,
    });
  });

  test('should reply UNKNOWN when a handler throws and keep serving', async () => {
    const handler = jest
      .fn<Promise<{ result: number }>, []>()
      .mockRejectedValueOnce(new Error('backend offline'))
      .mockResolvedValueOnce({ result: RESULT_CODES.SUCCESS });
    const dispatcher = createTestDispatcher([defineCommand({ opcode: 1, name: 'Flaky', parameters: EMPTY_LAYOUT, handler })]);

    const first = unwrapOutcome(await dispatcher.handleRequest(createRequest(1), TEST_SESSION));
    const second = unwrapOutcome(await dispatcher.handleRequest(createRequest(1), TEST_SESSION));

    expect(first.result).toBe(RESULT_CODES.UNKNOWN);
    expect(second.result).toBe(RESULT_CODES.SUCCESS);
  });

  describe('stubs', () => {
    test('should return the fixed reply on every call, unaffected by callers mutating it', async () => {
      const dispatcher = createTestDispatcher([
        defineStub({ opcode: 3, name: 'Fixed', output: new Uint8Array([4, 0, 0, 0]), outputBuffers: [new Uint8Array([1, 2])] }),
      ]);

      const first = unwrapOutcome(await dispatcher.handleRequest(createRequest(3), TEST_SESSION));
      first.output[0] = 0xff;
      first.outputBuffers[0][0] = 0xff;
      const second = unwrapOutcome(await dispatcher.handleRequest(createRequest(3), TEST_SESSION));

      expect(Array.from(second.output)).toEqual([4, 0, 0, 0]);
      expect(Array.from(second.outputBuffers[0])).toEqual([1, 2]);
    });

    test('should ignore the parameter block when no size is declared', async () => {
      const dispatcher = createTestDispatcher([defineStub({ opcode: 3, name: 'Lenient' })]);

      const response = unwrapOutcome(await dispatcher.handleRequest(createRequest(3, new Uint8Array(13)), TEST_SESSION));

      expect(response.result).toBe(RESULT_CODES.SUCCESS);
    });

    test('should check the parameter size when one is declared', async () => {
      const dispatcher = createTestDispatcher([defineStub({ opcode: 3, name: 'Strict', parameterSize: 8 })]);

      const outcome = await dispatcher.handleRequest(createRequest(3, new Uint8Array(4)), TEST_SESSION);

      expect(expectViolation(outcome)).toMatchObject({ opcode: 3, reason: 'parameter-size', expected: 8, actual: 4 });
    });
  });

  describe('stats', () => {
    test('should count handled, failed and violating requests per opcode', async () => {
      const dispatcher = createTestDispatcher([
        defineCommand({
          opcode: 2,
          name: 'Fails',
          parameters: U32,
          handler: async () => ({ result: RESULT_CODES.UNKNOWN }),
        }),
      ]);

      await dispatcher.handleRequest(buildRequest(2, U32, 0), TEST_SESSION);
      await dispatcher.handleRequest(createRequest(2), TEST_SESSION);
      await dispatcher.handleRequest(createRequest(77), TEST_SESSION);

      expect(dispatcher.getStatsForOpcode(2)).toMatchObject({ name: 'Fails', handled: 2, failed: 1, violations: 1 });
      expect(dispatcher.getStatsForOpcode(UNKNOWN_OPCODE_STATS_KEY)).toMatchObject({
        name: 'unknown',
        handled: 1,
        failed: 1,
        violations: 0,
      });
      expect(dispatcher.getStats().map((stats) => stats.opcode)).toEqual([UNKNOWN_OPCODE_STATS_KEY, 2]);

      dispatcher.resetStats();
      expect(dispatcher.getStatsForOpcode(2)).toBeNull();
    });

    test('should count every opcode outside the table in one shared entry', async () => {
      const dispatcher = createTestDispatcher([defineStub({ opcode: 1, name: 'Known' })]);

      for (let opcode = 100000; opcode < 101000; opcode++) {
        await dispatcher.handleRequest(createRequest(opcode), TEST_SESSION);
      }
      await dispatcher.handleRequest(createRequest(1), TEST_SESSION);

      expect(dispatcher.getStats().map((stats) => [stats.opcode, stats.name, stats.handled])).toEqual([
        [UNKNOWN_OPCODE_STATS_KEY, 'unknown', 1000],
        [1, 'Known', 1],
      ]);
      expect(dispatcher.getStatsForOpcode(100000)).toBeNull();
    });

    test('should keep named unimplemented opcodes in their own entry', async () => {
      const dispatcher = createTestDispatcher([defineUnimplemented(26, 'ActivateDebugMouse')]);

      await dispatcher.handleRequest(createRequest(26), TEST_SESSION);

      expect(dispatcher.getStats()).toEqual([
        expect.objectContaining({ opcode: 26, name: 'ActivateDebugMouse', handled: 1, failed: 1 }),
      ]);
    });
  });

  describe('unwrapOutcome', () => {
    test('should throw the violation as a ProtocolViolationError', async () => {
      const dispatcher = createTestDispatcher([defineStub({ opcode: 1, name: 'Strict', parameterSize: 4 })]);

      const outcome = await dispatcher.handleRequest(createRequest(1), TEST_SESSION);

      expect(() => unwrapOutcome(outcome)).toThrow(ProtocolViolationError);
      expect(() => unwrapOutcome(outcome)).toThrow('Strict: parameter-size mismatch (expected 4, got 0)');
    });
  });
});

import { attributeViolation } from '../protocol/ProtocolViolation';
import { StructLayout, decodeStruct, encodeStruct } from '../protocol/WireCodec';
import {
  DispatchOutcome,
  OutputHandle,
  RequestMessage,
  ResponseMessage,
  SessionContext,
  TransferredHandle,
} from '../types/Interfaces';
import { RESULT_CODES, ResultCode } from '../types/ResultCodes';
import { CommandContext } from './CommandContext';

export const ENTRY_KINDS = {
  IMPLEMENTED: 'implemented',
  STUBBED: 'stubbed',
  UNIMPLEMENTED: 'unimplemented',
} as const;

export interface ImplementedEntry {
  readonly kind: typeof ENTRY_KINDS.IMPLEMENTED;
  readonly opcode: number;
  readonly name: string;
  readonly parameterSize: number;
  readonly inputHandleCount: number;
  invoke(request: RequestMessage, session: SessionContext): Promise<DispatchOutcome>;
}

// Retired operations: fixed reply, pre-encoded once
export interface StubbedEntry {
  readonly kind: typeof ENTRY_KINDS.STUBBED;
  readonly opcode: number;
  readonly name: string;
  // Undefined when the parameter block is ignored entirely
  readonly parameterSize?: number;
  readonly inputHandleCount: number;
  readonly result: ResultCode;
  readonly output: Uint8Array;
  readonly outputBuffers: readonly Uint8Array[];
  readonly outputHandles: readonly TransferredHandle[];
}

export interface UnimplementedEntry {
  readonly kind: typeof ENTRY_KINDS.UNIMPLEMENTED;
  readonly opcode: number;
  readonly name?: string;
}

export type DispatchEntry = ImplementedEntry | StubbedEntry | UnimplementedEntry;

export interface CommandReply<O> {
  result: ResultCode;
  // Omitted output encodes as a zeroed block of the declared size
  output?: O;
  outputBuffers?: Uint8Array[];
  outputHandles?: OutputHandle[];
}

export interface CommandDefinition<P, O> {
  opcode: number;
  name: string;
  parameters: StructLayout<P>;
  output?: StructLayout<O>;
  inputHandles?: number;
  handler: (context: CommandContext<P>) => Promise<CommandReply<O>>;
}

export interface StubDefinition {
  opcode: number;
  name: string;
  parameterSize?: number;
  inputHandles?: number;
  result?: ResultCode;
  output?: Uint8Array;
  outputBuffers?: Uint8Array[];
  outputHandles?: TransferredHandle[];
}

function encodeReply<O>(layout: StructLayout<O> | undefined, reply: CommandReply<O>): ResponseMessage {
  let output: Uint8Array = new Uint8Array(0);

  if (layout) {
    output = reply.output === undefined ? new Uint8Array(layout.size) : encodeStruct(layout, reply.output);
  } else if (reply.output !== undefined) {
    throw new Error('Command replied with output but declares no output layout');
  }

  return {
    result: reply.result,
    output,
    outputBuffers: reply.outputBuffers ?? [],
    outputHandles: reply.outputHandles ?? [],
  };
}

export function defineCommand<P, O = never>(definition: CommandDefinition<P, O>): ImplementedEntry {
  const { opcode, name, parameters, output, handler } = definition;

  const entry: ImplementedEntry = {
    kind: ENTRY_KINDS.IMPLEMENTED,
    opcode,
    name,
    parameterSize: parameters.size,
    inputHandleCount: definition.inputHandles ?? 0,
    invoke: async (request, session) => {
      const decoded = decodeStruct(parameters, request.parameters);
      if (!decoded.ok) {
        return { kind: 'violation', violation: attributeViolation(decoded.violation, opcode, name) };
      }

      const context = new CommandContext(opcode, name, decoded.value, session, request);
      const reply = await handler(context);
      return { kind: 'reply', response: encodeReply(output, reply) };
    },
  };

  return Object.freeze(entry);
}

export function defineStub(definition: StubDefinition): StubbedEntry {
  const entry: StubbedEntry = {
    kind: ENTRY_KINDS.STUBBED,
    opcode: definition.opcode,
    name: definition.name,
    parameterSize: definition.parameterSize,
    inputHandleCount: definition.inputHandles ?? 0,
    result: definition.result ?? RESULT_CODES.SUCCESS,
    output: definition.output ? definition.output.slice() : new Uint8Array(0),
    outputBuffers: Object.freeze((definition.outputBuffers ?? []).map((buffer) => buffer.slice())),
    outputHandles: Object.freeze((definition.outputHandles ?? []).map((handle) => ({ ...handle }))),
  };

  return Object.freeze(entry);
}

export function defineUnimplemented(opcode: number, name: string): UnimplementedEntry {
  const entry: UnimplementedEntry = { kind: ENTRY_KINDS.UNIMPLEMENTED, opcode, name };
  return Object.freeze(entry);
}

/**
 * Immutable opcode -> entry mapping, built once per service object.
 * Unknown opcodes resolve to an anonymous unimplemented entry.
 */
export class CommandTable {
  private readonly entries: ReadonlyMap<number, DispatchEntry>;

  constructor(readonly name: string, entries: readonly DispatchEntry[]) {
    const map = new Map<number, DispatchEntry>();

    for (const entry of entries) {
      if (!Number.isInteger(entry.opcode) || entry.opcode < 0 || entry.opcode > 0xffffffff) {
        throw new Error(`${name}: opcode ${entry.opcode} is not a 32-bit unsigned integer`);
      }
      if (map.has(entry.opcode)) {
        throw new Error(`${name}: opcode ${entry.opcode} registered twice`);
      }
      map.set(entry.opcode, entry);
    }

    this.entries = map;
    Object.freeze(this);
  }

  lookup(opcode: number): DispatchEntry {
    return this.entries.get(opcode) ?? { kind: ENTRY_KINDS.UNIMPLEMENTED, opcode };
  }

  has(opcode: number): boolean {
    return this.entries.has(opcode);
  }

  get size(): number {
    return this.entries.size;
  }

  getOpcodes(): number[] {
    return Array.from(this.entries.keys()).sort((a, b) => a - b);
  }

  getEntries(): DispatchEntry[] {
    return this.getOpcodes().flatMap((opcode) => {
      const entry = this.entries.get(opcode);
      return entry ? [entry] : [];
    });
  }
}

import { ProtocolViolation } from '../protocol/ProtocolViolation';
import { ResultCode } from './ResultCodes';

// Kernel object references moved across the session boundary
export interface TransferredHandle {
  mode: 'copy' | 'move';
  handle: number;
}

export type OutputHandle =
  | TransferredHandle
  | { mode: 'interface'; service: ServiceObject };

export interface RequestMessage {
  opcode: number;
  parameters: Uint8Array;
  inputBuffers: Uint8Array[];
  inputHandles: TransferredHandle[];
}

export interface ResponseMessage {
  result: ResultCode;
  output: Uint8Array;
  outputBuffers: Uint8Array[];
  outputHandles: OutputHandle[];
}

// Opaque per-client token; handlers only log it
export interface SessionContext {
  sessionId: string;
  openedAt: number;
}

export type DispatchOutcome =
  | { kind: 'reply'; response: ResponseMessage }
  | { kind: 'violation'; violation: ProtocolViolation };

// Anything that can answer requests: the root service and the sub-interfaces it hands out
export interface ServiceObject {
  readonly name: string;
  handleRequest(request: RequestMessage, session: SessionContext): Promise<DispatchOutcome>;
}

export function createResponse(result: ResultCode, output: Uint8Array = new Uint8Array(0)): ResponseMessage {
  return { result, output, outputBuffers: [], outputHandles: [] };
}

export function createRequest(opcode: number, parameters: Uint8Array = new Uint8Array(0)): RequestMessage {
  return { opcode, parameters, inputBuffers: [], inputHandles: [] };
}

import {
  ProtocolViolationError,
  VIOLATION_REASONS,
  createViolation,
} from '../protocol/ProtocolViolation';
import { StructLayout, decodeBuffer } from '../protocol/WireCodec';
import { RequestMessage, SessionContext, TransferredHandle } from '../types/Interfaces';

/**
 * What a command handler sees: its decoded parameter block plus accessors
 * for the variable parts of the request. Accessors raise
 * ProtocolViolationError on contract breaches; the dispatcher turns that
 * into a violation outcome.
 */
export class CommandContext<P> {
  constructor(
    readonly opcode: number,
    readonly name: string,
    readonly params: P,
    readonly session: SessionContext,
    private readonly request: RequestMessage,
  ) {}

  get inputHandles(): readonly TransferredHandle[] {
    return this.request.inputHandles;
  }

  // A missing buffer reads as empty
  readRawBuffer(index: number): Uint8Array {
    return this.request.inputBuffers[index] ?? new Uint8Array(0);
  }

  readBuffer<T>(index: number, layout: StructLayout<T>): T[] {
    const decoded = decodeBuffer(layout, this.readRawBuffer(index));
    if (!decoded.ok) {
      throw new ProtocolViolationError({ ...decoded.violation, opcode: this.opcode, command: this.name });
    }
    return decoded.value;
  }

  getCopyHandle(index: number): number {
    const handle = this.request.inputHandles[index];
    if (!handle || handle.mode !== 'copy') {
      throw new ProtocolViolationError({
        ...createViolation(
          this.name,
          VIOLATION_REASONS.HANDLE_COUNT,
          index + 1,
          this.request.inputHandles.length,
          `expected a copy handle at position ${index}`,
        ),
        opcode: this.opcode,
      });
    }
    return handle.handle;
  }

  // Conditions the client can only break with a malformed request
  assertContract(condition: boolean, detail: string, expected = 1, actual = 0): asserts condition {
    if (!condition) {
      throw new ProtocolViolationError({
        ...createViolation(this.name, VIOLATION_REASONS.CONTRACT, expected, actual, detail),
        opcode: this.opcode,
      });
    }
  }
}

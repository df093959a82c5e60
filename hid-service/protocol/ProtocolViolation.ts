export const VIOLATION_REASONS = {
  PARAMETER_SIZE: 'parameter-size',
  BUFFER_STRIDE: 'buffer-stride',
  HANDLE_COUNT: 'handle-count',
  CONTRACT: 'contract',
} as const;

export type ViolationReason = typeof VIOLATION_REASONS[keyof typeof VIOLATION_REASONS];

/**
 * An encoder/decoder contract breach. Correctly encoded input can never
 * produce one, so it is reported apart from result codes and the transport
 * decides how to fail the request.
 */
export interface ProtocolViolation {
  opcode?: number;
  command: string;
  reason: ViolationReason;
  expected: number;
  actual: number;
  message: string;
}

export class ProtocolViolationError extends Error {
  readonly violation: ProtocolViolation;

  constructor(violation: ProtocolViolation) {
    super(violation.message);
    this.name = 'ProtocolViolationError';
    this.violation = violation;
  }
}

export function createViolation(
  command: string,
  reason: ViolationReason,
  expected: number,
  actual: number,
  detail?: string,
): ProtocolViolation {
  const message = detail
    ? `${command}: ${detail}`
    : `${command}: ${reason} mismatch (expected ${expected}, got ${actual})`;
  return { command, reason, expected, actual, message };
}

// Stamps the dispatching command onto a violation raised by a layout or helper
export function attributeViolation(violation: ProtocolViolation, opcode: number, command: string): ProtocolViolation {
  return { ...violation, opcode, command };
}

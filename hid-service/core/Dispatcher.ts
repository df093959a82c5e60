import {
  ProtocolViolation,
  ProtocolViolationError,
  VIOLATION_REASONS,
  attributeViolation,
  createViolation,
} from '../protocol/ProtocolViolation';
import {
  DispatchOutcome,
  RequestMessage,
  ResponseMessage,
  ServiceObject,
  SessionContext,
  createResponse,
} from '../types/Interfaces';
import { RESULT_CODES, formatResult, isFailure } from '../types/ResultCodes';
import { ScopedLogger, createLogger } from '../utils/logger';
import { CommandTable, DispatchEntry, ImplementedEntry, StubbedEntry } from './CommandTable';

export interface CommandStats {
  opcode: number;
  name: string;
  handled: number;
  failed: number;
  violations: number;
  lastHandled: number;
}

// Requests for opcodes outside the table share one stats bucket under this key
export const UNKNOWN_OPCODE_STATS_KEY = -1;

/**
 * Routes requests through a command table: lookup, decode, invoke, encode.
 * Holds no state besides per-opcode statistics and never retries.
 */
export class Dispatcher implements ServiceObject {
  private readonly logger: ScopedLogger;
  private readonly stats = new Map<number, CommandStats>();

  constructor(private readonly table: CommandTable) {
    this.logger = createLogger(table.name);
  }

  get name(): string {
    return this.table.name;
  }

  getTable(): CommandTable {
    return this.table;
  }

  async handleRequest(request: RequestMessage, session: SessionContext): Promise<DispatchOutcome> {
    const entry = this.table.lookup(request.opcode);
    const outcome = await this.dispatch(entry, request, session);
    this.updateStats(entry, outcome);
    return outcome;
  }

  getStats(): CommandStats[] {
    return Array.from(this.stats.values()).sort((a, b) => a.opcode - b.opcode);
  }

  getStatsForOpcode(opcode: number): CommandStats | null {
    return this.stats.get(opcode) ?? null;
  }

  resetStats(): void {
    this.stats.clear();
  }

  private async dispatch(
    entry: DispatchEntry,
    request: RequestMessage,
    session: SessionContext,
  ): Promise<DispatchOutcome> {
    switch (entry.kind) {
      case 'unimplemented':
        this.logger.warn(
          `Unimplemented command ${entry.opcode}${entry.name ? ` (${entry.name})` : ''} from session ${session.sessionId}`,
        );
        return { kind: 'reply', response: createResponse(RESULT_CODES.NOT_SUPPORTED) };

      case 'stubbed':
        return this.replyFromStub(entry, request);

      case 'implemented':
        return this.invokeHandler(entry, request, session);
    }
  }

  private replyFromStub(entry: StubbedEntry, request: RequestMessage): DispatchOutcome {
    if (entry.parameterSize !== undefined && request.parameters.byteLength !== entry.parameterSize) {
      return this.violation(
        createViolation(entry.name, VIOLATION_REASONS.PARAMETER_SIZE, entry.parameterSize, request.parameters.byteLength),
        entry,
      );
    }

    const handleViolation = this.checkHandleCount(entry, request);
    if (handleViolation) {
      return handleViolation;
    }

    this.logger.warn(`(STUBBED) ${entry.name} called`);

    // Shared stub bytes are copied so a caller cannot alter later replies
    const response: ResponseMessage = {
      result: entry.result,
      output: entry.output.slice(),
      outputBuffers: entry.outputBuffers.map((buffer) => buffer.slice()),
      outputHandles: entry.outputHandles.map((handle) => ({ ...handle })),
    };
    return { kind: 'reply', response };
  }

  private async invokeHandler(
    entry: ImplementedEntry,
    request: RequestMessage,
    session: SessionContext,
  ): Promise<DispatchOutcome> {
    const handleViolation = this.checkHandleCount(entry, request);
    if (handleViolation) {
      return handleViolation;
    }

    try {
      const outcome = await entry.invoke(request, session);
      if (outcome.kind === 'violation') {
        this.logger.error(`Protocol violation in ${entry.name}: ${outcome.violation.message}`);
      } else if (isFailure(outcome.response.result)) {
        this.logger.debug(`${entry.name} -> ${formatResult(outcome.response.result)}`);
      }
      return outcome;
    } catch (error) {
      if (error instanceof ProtocolViolationError) {
        return this.violation(error.violation, entry);
      }

      // A delegate blew up; report it in-band and keep serving
      this.logger.error(`❌ ${entry.name} failed for session ${session.sessionId}:`, error);
      return { kind: 'reply', response: createResponse(RESULT_CODES.UNKNOWN) };
    }
  }

  private checkHandleCount(entry: ImplementedEntry | StubbedEntry, request: RequestMessage): DispatchOutcome | null {
    if (request.inputHandles.length === entry.inputHandleCount) {
      return null;
    }
    return this.violation(
      createViolation(entry.name, VIOLATION_REASONS.HANDLE_COUNT, entry.inputHandleCount, request.inputHandles.length),
      entry,
    );
  }

  private violation(violation: ProtocolViolation, entry: ImplementedEntry | StubbedEntry): DispatchOutcome {
    const attributed = attributeViolation(violation, entry.opcode, entry.name);
    this.logger.error(`Protocol violation in ${entry.name}: ${attributed.message}`);
    return { kind: 'violation', violation: attributed };
  }

  private updateStats(entry: DispatchEntry, outcome: DispatchOutcome): void {
    const known = this.table.has(entry.opcode);
    const key = known ? entry.opcode : UNKNOWN_OPCODE_STATS_KEY;
    let stats = this.stats.get(key);
    if (!stats) {
      stats = {
        opcode: key,
        name: known ? entry.name ?? `#${entry.opcode}` : 'unknown',
        handled: 0,
        failed: 0,
        violations: 0,
        lastHandled: 0,
      };
      this.stats.set(key, stats);
    }

    stats.handled++;
    stats.lastHandled = Date.now();
    if (outcome.kind === 'violation') {
      stats.violations++;
    } else if (isFailure(outcome.response.result)) {
      stats.failed++;
    }
  }
}

// For transports that abort on a violation instead of inspecting the outcome
export function unwrapOutcome(outcome: DispatchOutcome): ResponseMessage {
  if (outcome.kind === 'violation') {
    throw new ProtocolViolationError(outcome.violation);
  }
  return outcome.response;
}

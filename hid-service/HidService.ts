import { v4 as uuidv4 } from 'uuid';
import { ServiceConfig, loadServiceConfig } from './config/ServiceConfig';
import { CommandTable, DispatchEntry } from './core/CommandTable';
import { CommandStats, Dispatcher } from './core/Dispatcher';
import { HandlerDependencies } from './handlers/HandlerDependencies';
import { InputDeviceHandler } from './handlers/InputDeviceHandler';
import { createLegacyStubs, createUnimplementedCommands } from './handlers/LegacyCommands';
import { NpadHandler } from './handlers/NpadHandler';
import { PalmaHandler } from './handlers/PalmaHandler';
import { SixAxisHandler } from './handlers/SixAxisHandler';
import { VibrationHandler } from './handlers/VibrationHandler';
import { FirmwareSettings, StaticFirmwareSettings } from './resources/FirmwareSettings';
import { KernelObjectTable, ResourceManager } from './resources/ResourceManager';
import { DispatchOutcome, RequestMessage, ServiceObject, SessionContext } from './types/Interfaces';
import { configureLogging, createLogger } from './utils/logger';
import { ControllerConfiguration } from './validation/HandleValidator';

const logger = createLogger('HidService');

// Collaborators the host injects
export interface HidServiceOptions {
  resources: ResourceManager;
  kernel: KernelObjectTable;
  // Defaults to the deviceManaged flag of the configuration
  firmware?: FirmwareSettings;
  config?: ServiceConfig;
}

/**
 * Root of the HID service: owns the `hid` command table and hands out
 * client sessions. Requests from every session go through the same
 * dispatcher; only the sub-interfaces it returns carry per-object state.
 */
export class HidService implements ServiceObject {
  private readonly dispatcher: Dispatcher;
  private readonly controllers = new ControllerConfiguration();
  private readonly config: ServiceConfig;
  private readonly sessions = new Map<string, SessionContext>();

  constructor(options: HidServiceOptions) {
    this.config = options.config ?? loadServiceConfig();

    configureLogging({ consoleLevel: this.config.logLevel, fileLevel: this.config.logFileLevel });
    for (const warning of this.config.warnings) {
      logger.warn(`⚠️ ${warning}`);
    }

    const deps: HandlerDependencies = {
      resources: options.resources,
      kernel: options.kernel,
      firmware: options.firmware ?? new StaticFirmwareSettings(this.config.deviceManaged),
      controllers: this.controllers,
      config: this.config,
    };

    const table = new CommandTable('hid', this.collectCommands(deps));
    this.dispatcher = new Dispatcher(table);

    logger.info(
      `🚀 HID service ready: ${table.size} commands, activation capacity ${this.config.activationCapacity}`,
    );
  }

  get name(): string {
    return this.dispatcher.name;
  }

  /**
   * Sessions are bookkeeping for the transport: ids for logging and a live count.
   * `handleRequest` does not check membership, so admitting or rejecting a
   * closed session is left to the transport that owns the connection.
   */
  openSession(): SessionContext {
    const session: SessionContext = { sessionId: uuidv4(), openedAt: Date.now() };
    this.sessions.set(session.sessionId, session);
    logger.info(`🔗 Session opened: ${session.sessionId}`);
    return session;
  }

  closeSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      logger.info(`🔌 Session closed: ${sessionId}`);
    }
    return removed;
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  handleRequest(request: RequestMessage, session: SessionContext): Promise<DispatchOutcome> {
    return this.dispatcher.handleRequest(request, session);
  }

  getCommandTable(): CommandTable {
    return this.dispatcher.getTable();
  }

  getControllerConfiguration(): ControllerConfiguration {
    return this.controllers;
  }

  getStats(): CommandStats[] {
    return this.dispatcher.getStats();
  }

  resetStats(): void {
    this.dispatcher.resetStats();
  }

  private collectCommands(deps: HandlerDependencies): DispatchEntry[] {
    return [
      ...new InputDeviceHandler(deps).getCommands(),
      ...new SixAxisHandler(deps).getCommands(),
      ...new NpadHandler(deps).getCommands(),
      ...new VibrationHandler(deps).getCommands(),
      ...new PalmaHandler(deps).getCommands(),
      ...createLegacyStubs(),
      ...createUnimplementedCommands(),
    ];
  }
}

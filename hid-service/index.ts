export { HidService } from './HidService';
export type { HidServiceOptions } from './HidService';

export { CommandTable, defineCommand, defineStub, defineUnimplemented, ENTRY_KINDS } from './core/CommandTable';
export type {
  CommandDefinition,
  CommandReply,
  DispatchEntry,
  ImplementedEntry,
  StubbedEntry,
  UnimplementedEntry,
} from './core/CommandTable';
export { CommandContext } from './core/CommandContext';
export { Dispatcher, UNKNOWN_OPCODE_STATS_KEY, unwrapOutcome } from './core/Dispatcher';
export type { CommandStats } from './core/Dispatcher';
export { ExclusiveSection } from './core/ExclusiveSection';

export * from './protocol/WireCodec';
export * from './protocol/Layouts';
export * from './protocol/ProtocolViolation';

export { ActivationRegistry } from './registry/ActivationRegistry';
export type { ActivationRegistryOptions, ActivationRegistryStatus } from './registry/ActivationRegistry';

export {
  ALL_NPAD_IDS,
  ControllerConfiguration,
  isNpadIdValid,
  validateSixAxisHandle,
  validateVibrationHandle,
} from './validation/HandleValidator';

export { StaticFirmwareSettings } from './resources/FirmwareSettings';
export type { FirmwareSettings } from './resources/FirmwareSettings';
export type * from './resources/ResourceManager';

export * from './types/HidTypes';
export * from './types/Interfaces';
export * from './types/ResultCodes';

export { DEFAULT_SERVICE_CONFIG, HID_CONFIG, loadServiceConfig } from './config/ServiceConfig';
export type { ServiceConfig } from './config/ServiceConfig';
export { configureLogging, createLogger } from './utils/logger';

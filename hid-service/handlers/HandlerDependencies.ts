import { ServiceConfig } from '../config/ServiceConfig';
import { FirmwareSettings } from '../resources/FirmwareSettings';
import { KernelObjectTable, ResourceManager } from '../resources/ResourceManager';
import { ControllerConfiguration } from '../validation/HandleValidator';

// Collaborators every command group is built with
export interface HandlerDependencies {
  resources: ResourceManager;
  firmware: FirmwareSettings;
  kernel: KernelObjectTable;
  controllers: ControllerConfiguration;
  config: ServiceConfig;
}

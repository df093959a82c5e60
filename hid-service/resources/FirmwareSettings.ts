export interface FirmwareSettings {
  // True when controllers are driven by the firmware rather than emulated here
  isDeviceManaged(): boolean;
}

export class StaticFirmwareSettings implements FirmwareSettings {
  constructor(private readonly deviceManaged: boolean) {}

  isDeviceManaged(): boolean {
    return this.deviceManaged;
  }
}

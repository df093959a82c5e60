/**
 * Activation Registry
 *
 * Bounded set of device handles that have been physically activated.
 * Activation is idempotent: a handle already in the set succeeds without
 * touching the device again and never counts against capacity.
 *
 * Order inside `activate`, all under one exclusive section:
 *   validate -> dedupe -> capacity -> delegate -> insert
 */

import { ExclusiveSection, ExclusiveSectionStatus } from '../core/ExclusiveSection';
import { DeviceHandle, describeHandle, isSameHandle } from '../types/HidTypes';
import { RESULT_CODES, ResultCode, formatResult, isFailure } from '../types/ResultCodes';
import { createLogger } from '../utils/logger';

const logger = createLogger('ActivationRegistry');

export interface ActivationRegistryOptions {
  capacity: number;
  validate: (handle: DeviceHandle) => ResultCode;
  activateDevice: (handle: DeviceHandle) => Promise<ResultCode>;
  name?: string;
}

export interface ActivationRegistryStatus extends ExclusiveSectionStatus {
  size: number;
  capacity: number;
}

export class ActivationRegistry {
  private readonly entries: DeviceHandle[] = [];
  private readonly section: ExclusiveSection;
  private readonly capacityLimit: number;
  private readonly validate: (handle: DeviceHandle) => ResultCode;
  private readonly activateDevice: (handle: DeviceHandle) => Promise<ResultCode>;

  constructor(options: ActivationRegistryOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity <= 0) {
      throw new Error(`Activation registry capacity must be a positive integer, got ${options.capacity}`);
    }

    this.capacityLimit = options.capacity;
    this.validate = options.validate;
    this.activateDevice = options.activateDevice;
    this.section = new ExclusiveSection(options.name ?? 'ActivationRegistry');
  }

  get size(): number {
    return this.entries.length;
  }

  get capacity(): number {
    return this.capacityLimit;
  }

  activate(handle: DeviceHandle): Promise<ResultCode> {
    // Copy so later caller mutations cannot alter a stored entry
    const candidate: DeviceHandle = { ...handle };
    return this.section.run(() => this.activateExclusive(candidate));
  }

  has(handle: DeviceHandle): boolean {
    return this.entries.some((entry) => isSameHandle(entry, handle));
  }

  list(): DeviceHandle[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  getStatus(): ActivationRegistryStatus {
    return {
      ...this.section.getStatus(),
      size: this.entries.length,
      capacity: this.capacityLimit,
    };
  }

  private async activateExclusive(handle: DeviceHandle): Promise<ResultCode> {
    const validation = this.validate(handle);
    if (isFailure(validation)) {
      logger.debug(`Rejected ${describeHandle(handle)}: ${formatResult(validation)}`);
      return validation;
    }

    if (this.has(handle)) {
      return RESULT_CODES.SUCCESS;
    }

    if (this.entries.length >= this.capacityLimit) {
      logger.warn(`Registry full (${this.capacityLimit}), refusing ${describeHandle(handle)}`);
      return RESULT_CODES.VIBRATION_DEVICE_INDEX_OUT_OF_RANGE;
    }

    const result = await this.activateDevice(handle);
    if (isFailure(result)) {
      logger.warn(`Device activation failed for ${describeHandle(handle)}: ${formatResult(result)}`);
      return result;
    }

    this.entries.push(handle);
    logger.debug(`Activated ${describeHandle(handle)} (${this.entries.length}/${this.capacityLimit})`);
    return RESULT_CODES.SUCCESS;
  }
}

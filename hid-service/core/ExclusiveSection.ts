/**
 * Exclusive Section
 *
 * Runs async critical sections one at a time, in arrival order. A task
 * starts only after the previous one has settled, so check-then-mutate
 * sequences that await external delegates stay atomic.
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('ExclusiveSection');

type QueuedTask = () => Promise<void>;

export interface ExclusiveSectionStatus {
  name: string;
  busy: boolean;
  pending: number;
}

export class ExclusiveSection {
  private queue: QueuedTask[] = [];
  private isProcessing = false;

  constructor(private readonly name: string) {}

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await task());
        } catch (error) {
          reject(error);
        }
      });

      if (!this.isProcessing) {
        this.processNext().catch((error: unknown) => {
          logger.error(`Queue processor for ${this.name} stopped:`, error);
        });
      }
    });
  }

  getStatus(): ExclusiveSectionStatus {
    return {
      name: this.name,
      busy: this.isProcessing,
      pending: this.queue.length,
    };
  }

  private async processNext(): Promise<void> {
    this.isProcessing = true;
    try {
      let next = this.queue.shift();
      while (next) {
        await next();
        next = this.queue.shift();
      }
    } finally {
      this.isProcessing = false;
    }
  }
}

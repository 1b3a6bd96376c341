/**
 * Datapoint Initializer
 * =====================
 *
 * Background worker that sends a read request for every newly bound state
 * datapoint, so items get their initial value without waiting for the next
 * telegram on the field bus.
 *
 * Hundreds of datapoints may be queued at once (e.g. on startup), so reads
 * are paced by `readingPauseMs` to keep the field bus from being flooded.
 *
 * Loop:
 *   Idle ⇄ Draining → Stopped
 *   - each iteration snapshots the pending set and processes the snapshot
 *   - datapoints queued during a batch are picked up on the next iteration
 *   - every datapoint gets one attempt, successful or not; no automatic retry
 *   - stop is cooperative: checked at loop top and between datapoints
 *   - only one batch runs at a time; a drain() during a batch joins it
 */

import { DatapointKind } from './types';
import type { Datapoint, DomainValue, FieldBusTransport, Logger, RawPayload } from './types';
import type { TypeMapperRegistry } from './type-mapper-registry';
import { DecodeFault, TransportFault, describeError } from './errors';
import { LogComponents } from '../logging/components';

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_READING_PAUSE_MS = 0;

export interface DatapointInitializerOptions {
  pollIntervalMs?: number;
  readingPauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface DatapointInitializerContext {
  transport: FieldBusTransport;
  typeMappers: TypeMapperRegistry;
  publishStateUpdate: (itemName: string, value: DomainValue) => void;
  logger: Logger;
}

export class DatapointInitializer {
  private readonly pendingSet = new Set<Datapoint>();
  private readonly pollIntervalMs: number;
  private readonly readingPauseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private loop: Promise<void> | null = null;
  private batch: Promise<number> | null = null;
  private stopRequested = false;
  private restartRequested = false;

  constructor(
    private readonly context: DatapointInitializerContext,
    options: DatapointInitializerOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.readingPauseMs = options.readingPauseMs ?? DEFAULT_READING_PAUSE_MS;
    this.sleep = options.sleep ?? ((ms) => new Promise(resolve => setTimeout(resolve, ms)));
  }

  enqueue(datapoint: Datapoint): void {
    this.pendingSet.add(datapoint);
  }

  pending(): Datapoint[] {
    return [...this.pendingSet];
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) {
      // a stop is still winding the loop down; start again once it has exited
      if (this.stopRequested) {
        this.restartRequested = true;
      }
      return;
    }
    this.stopRequested = false;
    this.context.logger.debug('Datapoint initializer started', {
      component: LogComponents.INITIALIZER,
      pollIntervalMs: this.pollIntervalMs,
      readingPauseMs: this.readingPauseMs
    });
    this.loop = this.run().finally(() => {
      this.loop = null;
      if (this.restartRequested) {
        this.restartRequested = false;
        this.start();
      }
    });
  }

  /**
   * Request the loop to stop and wait until it has exited
   */
  async stop(): Promise<void> {
    if (!this.loop) {
      return;
    }
    this.stopRequested = true;
    this.restartRequested = false;
    await this.loop;
    this.context.logger.debug('Datapoint initializer stopped', {
      component: LogComponents.INITIALIZER,
      pending: this.pendingSet.size
    });
  }

  /**
   * Process one snapshot of the pending set, or join the batch already
   * running. Resolves to the number of state datapoints attempted, which
   * includes those skipped while the field bus was unavailable.
   */
  drain(): Promise<number> {
    if (!this.batch) {
      this.batch = this.processBatch().finally(() => {
        this.batch = null;
      });
    }
    return this.batch;
  }

  private async processBatch(): Promise<number> {
    const batch = [...this.pendingSet];
    let attempted = 0;

    for (const datapoint of batch) {
      if (this.stopRequested && this.loop) {
        break;
      }

      // command datapoints are write-only
      if (datapoint.kind === DatapointKind.STATE) {
        await this.initialize(datapoint);
        attempted++;
      }
      this.pendingSet.delete(datapoint);

      if (this.readingPauseMs > 0) {
        await this.sleep(this.readingPauseMs);
      }
    }

    return attempted;
  }

  private async run(): Promise<void> {
    while (!this.stopRequested) {
      if (this.pendingSet.size > 0) {
        await this.drain();
      }
      await this.sleep(this.pollIntervalMs);
    }
  }

  private async initialize(datapoint: Datapoint): Promise<void> {
    const { transport, typeMappers, logger } = this.context;

    if (!transport.isAvailable()) {
      logger.debug(`Field bus unavailable, skipping read for item '${datapoint.itemName}'`, {
        component: LogComponents.INITIALIZER
      });
      return;
    }

    try {
      logger.debug(`Sending read request for item '${datapoint.itemName}'`, {
        component: LogComponents.INITIALIZER
      });

      let payload: RawPayload;
      try {
        payload = await transport.read(datapoint);
      } catch (error) {
        const fault = new TransportFault('read', datapoint, error);
        logger.warn(fault.message, { component: LogComponents.INITIALIZER });
        return;
      }

      const value = typeMappers.toDomainValue(datapoint, payload);
      if (value === null) {
        const fault = new DecodeFault(datapoint);
        logger.warn(fault.message, { component: LogComponents.INITIALIZER });
        return;
      }

      this.context.publishStateUpdate(datapoint.itemName, value);
    } catch (error) {
      logger.error(`Error initializing item '${datapoint.itemName}': ${describeError(error)}`, {
        component: LogComponents.INITIALIZER
      });
    }
  }
}

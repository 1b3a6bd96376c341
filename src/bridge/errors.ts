/**
 * Bridge errors
 *
 * Unbound items and unsupported conversions are expected steady-state
 * conditions and have no error class; callers skip them.
 */

import type { Datapoint } from './types';
import { describeGroupAddress } from './group-address';

export class TransportFault extends Error {
  constructor(
    public readonly operation: 'read' | 'write',
    public readonly datapoint: Datapoint,
    cause?: unknown
  ) {
    super(
      `Field-bus ${operation} failed for item '${datapoint.itemName}' ` +
      `at ${describeGroupAddress(datapoint.address)}: ${describeError(cause)}`,
      { cause }
    );
    this.name = 'TransportFault';
  }
}

export class DecodeFault extends Error {
  constructor(public readonly datapoint: Datapoint) {
    super(
      `Payload read for item '${datapoint.itemName}' could not be decoded ` +
      `as ${datapoint.encoding}`
    );
    this.name = 'DecodeFault';
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid bridge configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

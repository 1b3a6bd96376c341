import { DomainValue, serializeValue } from './types';

/**
 * Counted set of events the bridge published itself.
 *
 * A record is added right before an event crosses to the application bus
 * and consumed by the first matching event coming back from it.
 */
export class EchoSuppressor {
  private readonly records = new Map<string, number>();

  record(itemName: string, value: DomainValue): void {
    const key = echoKey(itemName, value);
    this.records.set(key, (this.records.get(key) ?? 0) + 1);
  }

  /**
   * Consume one matching record. Returns true when the event is an echo.
   */
  consume(itemName: string, value: DomainValue): boolean {
    const key = echoKey(itemName, value);
    const count = this.records.get(key);
    if (count === undefined) {
      return false;
    }
    if (count <= 1) {
      this.records.delete(key);
    } else {
      this.records.set(key, count - 1);
    }
    return true;
  }

  size(): number {
    let total = 0;
    for (const count of this.records.values()) {
      total += count;
    }
    return total;
  }

  clear(): void {
    this.records.clear();
  }
}

// JSON tuple encoding keeps ("ab", "c") and ("a", "bc") apart
export function echoKey(itemName: string, value: DomainValue): string {
  return JSON.stringify([itemName, serializeValue(value)]);
}

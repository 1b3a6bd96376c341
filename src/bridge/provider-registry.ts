import type { BindingProvider, Datapoint } from './types';

/**
 * Ordered set of binding providers.
 *
 * Point lookups return the first non-null result in registration order;
 * listening-name lookups return the union over all providers.
 */
export class ProviderRegistry {
  private readonly entries: BindingProvider[] = [];

  add(provider: BindingProvider): boolean {
    if (this.entries.includes(provider)) {
      return false;
    }
    this.entries.push(provider);
    return true;
  }

  remove(provider: BindingProvider): boolean {
    const index = this.entries.indexOf(provider);
    if (index === -1) {
      return false;
    }
    this.entries.splice(index, 1);
    return true;
  }

  has(provider: BindingProvider): boolean {
    return this.entries.includes(provider);
  }

  providers(): BindingProvider[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  getDatapointByAddress(itemName: string, address: number): Datapoint | null {
    for (const provider of this.entries) {
      const datapoint = provider.getDatapointByAddress(itemName, address);
      if (datapoint) {
        return datapoint;
      }
    }
    return null;
  }

  getDatapointByType(itemName: string, type: string): Datapoint | null {
    for (const provider of this.entries) {
      const datapoint = provider.getDatapointByType(itemName, type);
      if (datapoint) {
        return datapoint;
      }
    }
    return null;
  }

  getListeningItemNames(address: number): string[] {
    const names = new Set<string>();
    for (const provider of this.entries) {
      for (const itemName of provider.getListeningItemNames(address)) {
        names.add(itemName);
      }
    }
    return [...names];
  }
}

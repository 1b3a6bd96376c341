/**
 * Configured Binding Provider
 *
 * Binding provider backed by declarative item bindings, e.g.
 *
 *   { item: 'Light1', address: '1/0/1', kind: 'state', encoding: '1.001', type: 'OnOff' }
 *
 * `type` is the value-kind the binding answers to on the application bus.
 * `listen` lists extra group addresses whose telegrams also update the item.
 *
 * Events emitted:
 * - 'item-changed': string - bindings of one item were replaced or removed
 * - 'all-changed': the whole binding set was replaced
 */

import { EventEmitter } from 'events';
import { z } from 'zod';
import { createDatapoint, DatapointKind } from '../bridge/types';
import type { BindingProvider, Datapoint } from '../bridge/types';
import { parseGroupAddress } from '../bridge/group-address';
import { ConfigError, describeError } from '../bridge/errors';

export const GroupAddressSchema = z.string().transform((text, ctx) => {
  try {
    return parseGroupAddress(text);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(error) });
    return z.NEVER;
  }
});

export const ItemBindingSchema = z.object({
  item: z.string().min(1),
  address: GroupAddressSchema,
  kind: z.nativeEnum(DatapointKind),
  encoding: z.string().min(1),
  type: z.string().min(1),
  listen: z.array(GroupAddressSchema).optional().default([])
});

export type ItemBindingInput = z.input<typeof ItemBindingSchema>;
export type ItemBinding = z.output<typeof ItemBindingSchema>;

interface ResolvedBinding {
  type: string;
  datapoint: Datapoint;
  listeners: Datapoint[];     // one per extra listen address
}

export class ConfiguredBindingProvider extends EventEmitter implements BindingProvider {
  private bindings = new Map<string, ResolvedBinding[]>();

  constructor(public readonly name: string, initial: ItemBinding[] = []) {
    super();
    this.bindings = groupByItem(initial);
  }

  /**
   * Replace every binding of this provider
   */
  setBindings(bindings: ItemBinding[]): void {
    this.bindings = groupByItem(bindings);
    this.emit('all-changed');
  }

  /**
   * Replace the bindings of one item
   */
  upsertItem(itemName: string, bindings: Omit<ItemBinding, 'item'>[]): void {
    this.bindings.set(itemName, bindings.map(binding => resolveBinding({ ...binding, item: itemName })));
    this.emit('item-changed', itemName);
  }

  removeItem(itemName: string): boolean {
    if (!this.bindings.delete(itemName)) {
      return false;
    }
    this.emit('item-changed', itemName);
    return true;
  }

  itemNames(): string[] {
    return [...this.bindings.keys()];
  }

  getReadableDatapoints(): Datapoint[] {
    const readable: Datapoint[] = [];
    for (const bindings of this.bindings.values()) {
      for (const binding of bindings) {
        if (binding.datapoint.kind === DatapointKind.STATE) {
          readable.push(binding.datapoint);
        }
      }
    }
    return readable;
  }

  getDatapointByAddress(itemName: string, address: number): Datapoint | null {
    for (const binding of this.bindings.get(itemName) ?? []) {
      if (binding.datapoint.address === address) {
        return binding.datapoint;
      }
      const listener = binding.listeners.find(dp => dp.address === address);
      if (listener) {
        return listener;
      }
    }
    return null;
  }

  getDatapointByType(itemName: string, type: string): Datapoint | null {
    const binding = this.bindings.get(itemName)?.find(b => b.type === type);
    return binding ? binding.datapoint : null;
  }

  getListeningItemNames(address: number): string[] {
    const names: string[] = [];
    for (const [itemName, bindings] of this.bindings) {
      const listens = bindings.some(binding =>
        binding.datapoint.address === address ||
        binding.listeners.some(dp => dp.address === address)
      );
      if (listens) {
        names.push(itemName);
      }
    }
    return names;
  }
}

/**
 * Validate raw bindings (e.g. from a config file); throws ConfigError
 */
export function parseBindings(input: unknown): ItemBinding[] {
  const result = z.array(ItemBindingSchema).safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `bindings.${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

function resolveBinding(binding: ItemBinding): ResolvedBinding {
  return {
    type: binding.type,
    datapoint: createDatapoint(binding.item, binding.address, binding.kind, binding.encoding),
    listeners: binding.listen.map(address =>
      createDatapoint(binding.item, address, binding.kind, binding.encoding)
    )
  };
}

function groupByItem(bindings: ItemBinding[]): Map<string, ResolvedBinding[]> {
  const grouped = new Map<string, ResolvedBinding[]>();
  for (const binding of bindings) {
    const entries = grouped.get(binding.item) ?? [];
    entries.push(resolveBinding(binding));
    grouped.set(binding.item, entries);
  }
  return grouped;
}

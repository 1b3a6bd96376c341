import type { EventEmitter } from 'events';

/**
 * Direction of a bound field-bus point.
 * - COMMAND: telegrams are published to the application bus as commands
 * - STATE: telegrams are published as state updates; readable on discovery
 */
export enum DatapointKind {
  COMMAND = 'command',
  STATE = 'state'
}

/**
 * One bound field-bus point
 */
export interface Datapoint {
  readonly itemName: string;
  readonly address: number;          // 16-bit group address
  readonly kind: DatapointKind;
  readonly encoding: string;         // opaque to the bridge, e.g. "1.001"
}

/**
 * Domain value carried on the application bus.
 * `type` is the value-kind used to pick the bound datapoint (e.g. "OnOff", "Percent").
 */
export interface DomainValue {
  readonly type: string;
  readonly value: string | number | boolean;
}

export type RawPayload = Uint8Array;

export function createDatapoint(
  itemName: string,
  address: number,
  kind: DatapointKind,
  encoding: string
): Datapoint {
  return Object.freeze({ itemName, address, kind, encoding });
}

export function serializeValue(value: DomainValue): string {
  return String(value.value);
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Source of datapoints for a subset of items.
 *
 * Events emitted:
 * - 'item-changed': string - bindings of one item changed
 * - 'all-changed': all bindings of this provider changed
 */
export interface BindingProvider extends Pick<EventEmitter, 'on' | 'off'> {
  readonly name: string;
  getReadableDatapoints(): Datapoint[];
  getDatapointByAddress(itemName: string, address: number): Datapoint | null;
  getDatapointByType(itemName: string, type: string): Datapoint | null;
  getListeningItemNames(address: number): string[];
}

/**
 * Stateless conversion between domain values and raw field-bus payloads.
 * Both directions return null when this mapper does not handle the input.
 */
export interface TypeMapper {
  toDomainValue(datapoint: Datapoint, payload: RawPayload): DomainValue | null;
  toRawValue(value: DomainValue): RawPayload | null;
}

/**
 * Field-bus link. Connection handling lives behind this interface.
 * `write` and `read` reject on failure.
 *
 * Events emitted:
 * - 'telegram': (address: number, payload: RawPayload) - group telegram received
 * - 'detached': (reason: string) - the link to the field bus was lost
 */
export interface FieldBusTransport extends Pick<EventEmitter, 'on' | 'off'> {
  write(datapoint: Datapoint, payload: RawPayload): Promise<void>;
  read(datapoint: Datapoint): Promise<RawPayload>;
  isAvailable(): boolean;
  requestReconnect(): void;
}

/**
 * Application-bus publisher
 */
export interface EventPublisher {
  publishCommand(itemName: string, value: DomainValue): void;
  publishStateUpdate(itemName: string, value: DomainValue): void;
}

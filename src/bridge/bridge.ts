/**
 * Field-Bus Bridge
 *
 * Central event exchange between the application bus and the field bus.
 * Listens to commands and state updates on the application bus and writes
 * them to the field bus; listens to telegrams on the field bus and publishes
 * them on the application bus.
 *
 * Translating in both directions means every event we publish comes back to
 * us from the other side. Those echoes are recorded before publishing and
 * consumed on their way back, so they are never re-translated.
 */

import { DatapointKind } from './types';
import type {
  BindingProvider,
  Datapoint,
  DomainValue,
  EventPublisher,
  FieldBusTransport,
  Logger,
  RawPayload,
  TypeMapper
} from './types';
import { ProviderRegistry } from './provider-registry';
import { TypeMapperRegistry } from './type-mapper-registry';
import { EchoSuppressor } from './echo-suppressor';
import { DatapointInitializer, type DatapointInitializerOptions } from './datapoint-initializer';
import { TransportFault, describeError } from './errors';
import { describeGroupAddress } from './group-address';
import { LogComponents } from '../logging/components';

export type FieldBusBridgeOptions = DatapointInitializerOptions;

type ApplicationEventClass = 'command' | 'update';

interface ProviderListeners {
  itemChanged: (itemName: string) => void;
  allChanged: () => void;
}

export class FieldBusBridge {
  private readonly providerRegistry = new ProviderRegistry();
  private readonly typeMapperRegistry = new TypeMapperRegistry();
  private readonly echoes = new EchoSuppressor();
  private readonly providerListeners = new Map<BindingProvider, ProviderListeners>();
  private readonly initializer: DatapointInitializer;
  private publisher: EventPublisher | null = null;

  constructor(
    private readonly transport: FieldBusTransport,
    private readonly logger: Logger,
    options: FieldBusBridgeOptions = {}
  ) {
    this.initializer = new DatapointInitializer(
      {
        transport,
        typeMappers: this.typeMapperRegistry,
        publishStateUpdate: (itemName, value) => this.publish(DatapointKind.STATE, itemName, value),
        logger
      },
      options
    );
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  activate(): void {
    this.initializer.start();
    this.logger.info('Field-bus bridge activated', { component: LogComponents.BRIDGE });
  }

  async deactivate(): Promise<void> {
    for (const provider of this.providerRegistry.providers()) {
      this.detachProvider(provider);
    }
    this.providerRegistry.clear();
    await this.initializer.stop();
    this.logger.info('Field-bus bridge deactivated', { component: LogComponents.BRIDGE });
  }

  isActive(): boolean {
    return this.initializer.isRunning();
  }

  setEventPublisher(publisher: EventPublisher): void {
    this.publisher = publisher;
  }

  unsetEventPublisher(): void {
    this.publisher = null;
  }

  // ---------------------------------------------------------------------------
  // Registries
  // ---------------------------------------------------------------------------

  /**
   * Register a provider and queue all of its readable datapoints for discovery
   */
  addProvider(provider: BindingProvider): void {
    if (!this.providerRegistry.add(provider)) {
      return;
    }

    const listeners: ProviderListeners = {
      itemChanged: (itemName) => this.bindingChanged(provider, itemName),
      allChanged: () => this.allBindingsChanged(provider)
    };
    provider.on('item-changed', listeners.itemChanged);
    provider.on('all-changed', listeners.allChanged);
    this.providerListeners.set(provider, listeners);

    this.logger.info(`Binding provider registered: ${provider.name}`, { component: LogComponents.BRIDGE });
    this.allBindingsChanged(provider);
  }

  /**
   * Unregister a provider. Datapoints already queued for discovery stay queued.
   */
  removeProvider(provider: BindingProvider): void {
    if (!this.providerRegistry.remove(provider)) {
      return;
    }
    this.detachProvider(provider);
    this.logger.info(`Binding provider removed: ${provider.name}`, { component: LogComponents.BRIDGE });
  }

  addTypeMapper(mapper: TypeMapper): void {
    this.typeMapperRegistry.add(mapper);
  }

  removeTypeMapper(mapper: TypeMapper): void {
    this.typeMapperRegistry.remove(mapper);
  }

  pendingDatapoints(): Datapoint[] {
    return this.initializer.pending();
  }

  /**
   * Run one discovery batch right away instead of waiting for the worker.
   * Joins the worker's batch when one is in progress.
   */
  initializePending(): Promise<number> {
    return this.initializer.drain();
  }

  // ---------------------------------------------------------------------------
  // Application bus → field bus
  // ---------------------------------------------------------------------------

  onApplicationCommand(itemName: string, command: DomainValue): Promise<void> {
    return this.forwardToFieldBus('command', itemName, command);
  }

  onApplicationUpdate(itemName: string, newState: DomainValue): Promise<void> {
    return this.forwardToFieldBus('update', itemName, newState);
  }

  // ---------------------------------------------------------------------------
  // Field bus → application bus
  // ---------------------------------------------------------------------------

  onFieldBusEvent(address: number, payload: RawPayload): void {
    // zero-length data means "no data", not an empty state
    if (payload.length === 0) {
      return;
    }

    // a failure aborts delivery to the remaining items of this address
    try {
      for (const itemName of this.providerRegistry.getListeningItemNames(address)) {
        const datapoint = this.providerRegistry.getDatapointByAddress(itemName, address);
        if (!datapoint) {
          continue;
        }

        const value = this.typeMapperRegistry.toDomainValue(datapoint, payload);
        if (value === null) {
          continue;
        }

        this.publish(datapoint.kind, itemName, value);
      }
    } catch (error) {
      this.logger.error(
        `Error while receiving telegram for ${describeGroupAddress(address)} from field bus: ${describeError(error)}`,
        { component: LogComponents.BRIDGE }
      );
    }
  }

  onTransportDetached(reason: string): void {
    this.logger.error(`Field-bus link detached: ${reason}`, { component: LogComponents.BRIDGE });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async forwardToFieldBus(
    eventClass: ApplicationEventClass,
    itemName: string,
    value: DomainValue
  ): Promise<void> {
    try {
      if (this.echoes.consume(itemName, value)) {
        // we published this event ourselves; don't send it back
        return;
      }

      const datapoint = this.providerRegistry.getDatapointByType(itemName, value.type);
      if (!datapoint) {
        return;
      }

      const payload = this.typeMapperRegistry.toRawValue(value);
      if (payload === null) {
        this.logger.debug(
          `No type mapper converts ${value.type} '${value.value}' for item '${itemName}'`,
          { component: LogComponents.BRIDGE }
        );
        return;
      }

      if (!this.transport.isAvailable()) {
        this.logger.debug(`Field bus unavailable, dropping ${eventClass} for item '${itemName}'`, {
          component: LogComponents.BRIDGE
        });
        return;
      }

      try {
        await this.transport.write(datapoint, payload);
      } catch (error) {
        const fault = new TransportFault('write', datapoint, error);
        if (eventClass === 'command') {
          this.logger.error(`Command could not be sent to the field bus: ${fault.message}`, {
            component: LogComponents.BRIDGE
          });
        } else {
          this.logger.error(`Update could not be sent to the field bus: ${fault.message}`, {
            component: LogComponents.BRIDGE
          });
          this.transport.requestReconnect();
        }
      }
    } catch (error) {
      this.logger.error(`Error while sending ${eventClass} for item '${itemName}': ${describeError(error)}`, {
        component: LogComponents.BRIDGE
      });
    }
  }

  private publish(kind: DatapointKind, itemName: string, value: DomainValue): void {
    const publisher = this.publisher;
    if (!publisher) {
      this.logger.debug(`No event publisher attached, dropping event for item '${itemName}'`, {
        component: LogComponents.BRIDGE
      });
      return;
    }

    // must be in place before the event can come back to us
    this.echoes.record(itemName, value);

    if (kind === DatapointKind.COMMAND) {
      publisher.publishCommand(itemName, value);
    } else {
      publisher.publishStateUpdate(itemName, value);
    }
  }

  private bindingChanged(provider: BindingProvider, itemName: string): void {
    for (const datapoint of provider.getReadableDatapoints()) {
      if (datapoint.itemName === itemName) {
        this.initializer.enqueue(datapoint);
      }
    }
  }

  private allBindingsChanged(provider: BindingProvider): void {
    for (const datapoint of provider.getReadableDatapoints()) {
      this.initializer.enqueue(datapoint);
    }
  }

  private detachProvider(provider: BindingProvider): void {
    const listeners = this.providerListeners.get(provider);
    if (!listeners) {
      return;
    }
    provider.off('item-changed', listeners.itemChanged);
    provider.off('all-changed', listeners.allChanged);
    this.providerListeners.delete(provider);
  }
}

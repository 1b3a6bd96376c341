/**
 * Bridge Service
 *
 * Wires a bridge from configuration: logger, configured bindings, the
 * caller's field-bus transport and type mappers, and the MQTT application bus.
 */

import type { MqttClient } from 'mqtt';
import { FieldBusBridge } from './bridge/bridge';
import type { FieldBusTransport, Logger, RawPayload, TypeMapper } from './bridge/types';
import { ConfiguredBindingProvider } from './providers/configured-provider';
import { MqttApplicationBus, connectApplicationBus } from './mqtt/application-bus';
import { createLogger } from './logging/logger';
import { LogComponents } from './logging/components';
import type { BridgeConfig } from './config';

export interface BridgeServiceOptions {
  config: BridgeConfig;
  transport: FieldBusTransport;
  typeMappers: TypeMapper[];
  logger?: Logger;
  mqttClient?: MqttClient;   // injected clients are left open on stop
}

export class BridgeService {
  readonly bridge: FieldBusBridge;
  readonly provider: ConfiguredBindingProvider;
  readonly bus: MqttApplicationBus;
  private readonly logger: Logger;
  private readonly transport: FieldBusTransport;
  private readonly ownsClient: boolean;
  private running = false;

  private readonly telegramHandler = (address: number, payload: RawPayload): void => {
    this.bridge.onFieldBusEvent(address, payload);
  };

  private readonly detachedHandler = (reason: string): void => {
    this.bridge.onTransportDetached(reason);
  };

  constructor(options: BridgeServiceOptions) {
    const { config } = options;
    this.logger = options.logger ?? createLogger(config.logging);
    this.transport = options.transport;
    this.ownsClient = !options.mqttClient;

    this.bridge = new FieldBusBridge(options.transport, this.logger, {
      pollIntervalMs: config.pollIntervalMs,
      readingPauseMs: config.readingPauseMs
    });
    for (const mapper of options.typeMappers) {
      this.bridge.addTypeMapper(mapper);
    }

    this.provider = new ConfiguredBindingProvider('config');
    this.provider.setBindings(config.bindings);

    this.bus = options.mqttClient
      ? new MqttApplicationBus(options.mqttClient, {
        topicPrefix: config.mqtt.topicPrefix,
        qos: config.mqtt.qos,
        logger: this.logger
      })
      : connectApplicationBus(config.mqtt, this.logger);
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.bridge.setEventPublisher(this.bus);
    this.bridge.addProvider(this.provider);
    this.bus.attach(this.bridge);
    this.transport.on('telegram', this.telegramHandler);
    this.transport.on('detached', this.detachedHandler);
    this.bridge.activate();
    this.running = true;
    this.logger.info('Bridge service started', {
      component: LogComponents.BRIDGE,
      items: this.provider.itemNames().length
    });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.transport.off('telegram', this.telegramHandler);
    this.transport.off('detached', this.detachedHandler);
    if (this.ownsClient) {
      this.bus.close();
    } else {
      this.bus.detach();
    }
    await this.bridge.deactivate();
    this.bridge.unsetEventPublisher();
    this.running = false;
    this.logger.info('Bridge service stopped', { component: LogComponents.BRIDGE });
  }

  isRunning(): boolean {
    return this.running;
  }
}

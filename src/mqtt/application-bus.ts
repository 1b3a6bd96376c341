/**
 * MQTT Application Bus
 *
 * Carries the application side of the bridge over MQTT:
 *
 *   <prefix>/<item>/command   commands      payload {"type":"OnOff","value":"ON"}
 *   <prefix>/<item>/state     state updates payload {"type":"OnOff","value":"ON"}
 *
 * The bus subscribes to both topic patterns, so everything the bridge
 * publishes is delivered back to it; the bridge drops those echoes itself.
 */

import { connect } from 'mqtt';
import type { MqttClient } from 'mqtt';
import { z } from 'zod';
import type { DomainValue, EventPublisher, Logger } from '../bridge/types';
import { describeError } from '../bridge/errors';
import { LogComponents } from '../logging/components';
import type { MqttConfig } from '../config';

export const DomainValueSchema = z.object({
  type: z.string().min(1),
  value: z.union([z.string(), z.number(), z.boolean()])
});

type Channel = 'command' | 'state';

/**
 * Receiver of application-bus events (the bridge)
 */
export interface ApplicationEventSink {
  onApplicationCommand(itemName: string, command: DomainValue): Promise<void>;
  onApplicationUpdate(itemName: string, newState: DomainValue): Promise<void>;
}

export interface MqttApplicationBusOptions {
  topicPrefix: string;
  qos?: 0 | 1 | 2;
  logger: Logger;
}

export class MqttApplicationBus implements EventPublisher {
  private sink: ApplicationEventSink | null = null;
  private readonly topicPrefix: string;
  private readonly qos: 0 | 1 | 2;
  private readonly logger: Logger;

  private readonly messageHandler = (topic: string, payload: Buffer): void => {
    this.handleMessage(topic, payload);
  };

  constructor(private readonly client: MqttClient, options: MqttApplicationBusOptions) {
    this.topicPrefix = options.topicPrefix.replace(/\/+$/, '');
    this.qos = options.qos ?? 0;
    this.logger = options.logger;
  }

  publishCommand(itemName: string, value: DomainValue): void {
    this.publish(itemName, 'command', value);
  }

  publishStateUpdate(itemName: string, value: DomainValue): void {
    this.publish(itemName, 'state', value);
  }

  /**
   * Start routing subscribed messages to the sink
   */
  attach(sink: ApplicationEventSink): void {
    if (this.sink) {
      this.detach();
    }
    this.sink = sink;
    this.client.on('message', this.messageHandler);
    this.client.subscribe(this.subscriptionTopics(), { qos: this.qos }, (error) => {
      if (error) {
        this.logger.error(`MQTT subscribe failed: ${error.message}`, { component: LogComponents.MQTT });
      }
    });
  }

  detach(): void {
    if (!this.sink) {
      return;
    }
    this.client.removeListener('message', this.messageHandler);
    this.client.unsubscribe(this.subscriptionTopics());
    this.sink = null;
  }

  /**
   * Detach and end the broker connection
   */
  close(): void {
    this.detach();
    this.client.end();
  }

  topicFor(itemName: string, channel: Channel): string {
    return `${this.topicPrefix}/${itemName}/${channel}`;
  }

  private subscriptionTopics(): string[] {
    return [`${this.topicPrefix}/+/command`, `${this.topicPrefix}/+/state`];
  }

  private publish(itemName: string, channel: Channel, value: DomainValue): void {
    const topic = this.topicFor(itemName, channel);
    const message = JSON.stringify({ type: value.type, value: value.value });
    this.client.publish(topic, message, { qos: this.qos }, (error) => {
      if (error) {
        this.logger.error(`MQTT publish to ${topic} failed: ${error.message}`, { component: LogComponents.MQTT });
      }
    });
  }

  private handleMessage(topic: string, payload: Buffer): void {
    const sink = this.sink;
    if (!sink) {
      return;
    }

    const route = this.parseTopic(topic);
    if (!route) {
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(payload.toString('utf8'));
    } catch (error) {
      this.logger.warn(`Dropping non-JSON message on ${topic}: ${describeError(error)}`, {
        component: LogComponents.MQTT
      });
      return;
    }

    const parsed = DomainValueSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(`Dropping malformed message on ${topic}`, {
        component: LogComponents.MQTT,
        issues: parsed.error.issues.map(issue => issue.message)
      });
      return;
    }

    const delivery = route.channel === 'command'
      ? sink.onApplicationCommand(route.itemName, parsed.data)
      : sink.onApplicationUpdate(route.itemName, parsed.data);

    delivery.catch((error: unknown) => {
      this.logger.error(`Error delivering ${route.channel} for item '${route.itemName}': ${describeError(error)}`, {
        component: LogComponents.MQTT
      });
    });
  }

  private parseTopic(topic: string): { itemName: string; channel: Channel } | null {
    const prefix = `${this.topicPrefix}/`;
    if (!topic.startsWith(prefix)) {
      return null;
    }
    const parts = topic.slice(prefix.length).split('/');
    if (parts.length !== 2 || parts[0] === '') {
      return null;
    }
    const [itemName, channel] = parts;
    if (channel !== 'command' && channel !== 'state') {
      return null;
    }
    return { itemName, channel };
  }
}

/**
 * Connect to the broker and wrap the client
 */
export function connectApplicationBus(config: MqttConfig, logger: Logger): MqttApplicationBus {
  const client = connect(config.brokerUrl, { reconnectPeriod: 5000, connectTimeout: 10000 });

  client.on('connect', () => {
    logger.info(`Connected to MQTT broker: ${config.brokerUrl}`, { component: LogComponents.MQTT });
  });
  client.on('error', (error) => {
    logger.error(`MQTT connection error: ${error.message}`, { component: LogComponents.MQTT });
  });

  return new MqttApplicationBus(client, {
    topicPrefix: config.topicPrefix,
    qos: config.qos,
    logger
  });
}

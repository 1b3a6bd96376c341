import { MqttApplicationBus } from '../../../src/mqtt/application-bus';
import { FieldBusBridge } from '../../../src/bridge/bridge';
import { createDatapoint, DatapointKind } from '../../../src/bridge/types';
import { MockMqttClient } from '../../helpers/mock-mqtt-client';
import { MockTransport, StaticProvider, SwitchMapper, ON, createMockLogger } from '../../helpers/fakes';

function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('MqttApplicationBus', () => {
  let client: MockMqttClient;
  let logger: ReturnType<typeof createMockLogger>;
  let bus: MqttApplicationBus;
  let sink: {
    onApplicationCommand: jest.Mock;
    onApplicationUpdate: jest.Mock;
  };

  beforeEach(() => {
    client = new MockMqttClient();
    logger = createMockLogger();
    bus = new MqttApplicationBus(client.asClient(), { topicPrefix: 'home', logger });
    sink = {
      onApplicationCommand: jest.fn().mockResolvedValue(undefined),
      onApplicationUpdate: jest.fn().mockResolvedValue(undefined)
    };
  });

  describe('publishing', () => {
    it('should publish state updates as JSON on the state topic', () => {
      bus.publishStateUpdate('Light1', ON);

      expect(client.publish).toHaveBeenCalledWith(
        'home/Light1/state',
        '{"type":"OnOff","value":"ON"}',
        { qos: 0 },
        expect.any(Function)
      );
    });

    it('should publish commands on the command topic', () => {
      bus.publishCommand('Dimmer', { type: 'Percent', value: 40 });

      expect(client.publish.mock.calls[0][0]).toBe('home/Dimmer/command');
      expect(client.publish.mock.calls[0][1]).toBe('{"type":"Percent","value":40}');
    });

    it('should log failed publishes', () => {
      client.publishError = new Error('broker gone');

      bus.publishStateUpdate('Light1', ON);

      expect(logger.error).toHaveBeenCalledWith(
        'MQTT publish to home/Light1/state failed: broker gone',
        { component: 'MqttBus' }
      );
    });

    it('should trim a trailing slash from the prefix', () => {
      const slashed = new MqttApplicationBus(client.asClient(), { topicPrefix: 'home/', logger });

      expect(slashed.topicFor('Light1', 'state')).toBe('home/Light1/state');
    });
  });

  describe('receiving', () => {
    beforeEach(() => {
      bus.attach(sink);
    });

    it('should subscribe to command and state topics', () => {
      expect(client.subscribe).toHaveBeenCalledWith(
        ['home/+/command', 'home/+/state'],
        { qos: 0 },
        expect.any(Function)
      );
    });

    it('should route commands to the sink', () => {
      client.deliver('home/Light1/command', '{"type":"OnOff","value":"ON"}');

      expect(sink.onApplicationCommand).toHaveBeenCalledWith('Light1', ON);
      expect(sink.onApplicationUpdate).not.toHaveBeenCalled();
    });

    it('should route state updates to the sink', () => {
      client.deliver('home/Dimmer/state', '{"type":"Percent","value":40}');

      expect(sink.onApplicationUpdate).toHaveBeenCalledWith('Dimmer', { type: 'Percent', value: 40 });
    });

    it('should drop messages that are not JSON', () => {
      client.deliver('home/Light1/state', 'ON');

      expect(sink.onApplicationUpdate).not.toHaveBeenCalled();
      expect(logger.warn.mock.calls[0][0]).toContain('Dropping non-JSON message on home/Light1/state: ');
    });

    it('should drop messages that are not domain values', () => {
      client.deliver('home/Light1/state', '{"value":"ON"}');

      expect(sink.onApplicationUpdate).not.toHaveBeenCalled();
      expect(logger.warn.mock.calls[0][0]).toBe('Dropping malformed message on home/Light1/state');
    });

    it('should ignore topics outside the bridge layout', () => {
      client.deliver('other/Light1/state', '{"type":"OnOff","value":"ON"}');
      client.deliver('home/Light1/extra/state', '{"type":"OnOff","value":"ON"}');
      client.deliver('home/Light1/status', '{"type":"OnOff","value":"ON"}');

      expect(sink.onApplicationUpdate).not.toHaveBeenCalled();
      expect(sink.onApplicationCommand).not.toHaveBeenCalled();
    });

    it('should log a delivery the sink rejects', async () => {
      sink.onApplicationUpdate.mockRejectedValueOnce(new Error('boom'));

      client.deliver('home/Light1/state', '{"type":"OnOff","value":"ON"}');
      await flush();

      expect(logger.error).toHaveBeenCalledWith(
        "Error delivering state for item 'Light1': boom",
        { component: 'MqttBus' }
      );
    });

    it('should stop routing after detach', () => {
      bus.detach();

      client.deliver('home/Light1/state', '{"type":"OnOff","value":"ON"}');

      expect(client.unsubscribe).toHaveBeenCalledWith(['home/+/command', 'home/+/state']);
      expect(client.listenerCount('message')).toBe(0);
      expect(sink.onApplicationUpdate).not.toHaveBeenCalled();
    });
  });

  describe('close', () => {
    it('should detach and end the client', () => {
      bus.attach(sink);

      bus.close();

      expect(client.unsubscribe).toHaveBeenCalledWith(['home/+/command', 'home/+/state']);
      expect(client.listenerCount('message')).toBe(0);
      expect(client.end).toHaveBeenCalledTimes(1);
    });
  });

  describe('with a bridge', () => {
    it('should not write the echo of a telegram back to the field bus', async () => {
      const transport = new MockTransport();
      const bridge = new FieldBusBridge(transport, logger);
      const light = createDatapoint('Light1', 2049, DatapointKind.STATE, '1.001');
      bridge.addTypeMapper(new SwitchMapper());
      bridge.addProvider(new StaticProvider('static', [{ datapoint: light, type: 'OnOff' }]));
      bridge.setEventPublisher(bus);
      bus.attach(bridge);

      bridge.onFieldBusEvent(2049, Uint8Array.of(0x01));
      client.loopBack();
      await flush();

      expect(client.publish).toHaveBeenCalledTimes(1);
      expect(transport.writeStub.called).toBe(false);
    });

    it('should write an update coming from another client', async () => {
      const transport = new MockTransport();
      const bridge = new FieldBusBridge(transport, logger);
      const light = createDatapoint('Light1', 2049, DatapointKind.STATE, '1.001');
      bridge.addTypeMapper(new SwitchMapper());
      bridge.addProvider(new StaticProvider('static', [{ datapoint: light, type: 'OnOff' }]));
      bus.attach(bridge);

      client.deliver('home/Light1/command', '{"type":"OnOff","value":"OFF"}');
      await flush();

      expect(transport.writeStub.callCount).toBe(1);
      expect(Array.from(transport.writeStub.firstCall.args[1])).toEqual([0x00]);
    });
  });
});

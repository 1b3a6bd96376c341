import { restore } from 'sinon';
import { DatapointInitializer } from '../../../src/bridge/datapoint-initializer';
import { TypeMapperRegistry } from '../../../src/bridge/type-mapper-registry';
import { createDatapoint, DatapointKind } from '../../../src/bridge/types';
import { MockTransport, SwitchMapper, ON, OFF, createMockLogger, waitFor, yieldingSleep } from '../../helpers/fakes';

describe('DatapointInitializer', () => {
  let transport: MockTransport;
  let logger: ReturnType<typeof createMockLogger>;
  let typeMappers: TypeMapperRegistry;
  let publishStateUpdate: jest.Mock;
  let sleep: jest.Mock;
  let initializer: DatapointInitializer;

  const light = createDatapoint('Light1', 2049, DatapointKind.STATE, '1.001');
  const hall = createDatapoint('Hall', 2050, DatapointKind.STATE, '1.001');
  const scene = createDatapoint('Scene1', 2051, DatapointKind.COMMAND, '1.001');

  beforeEach(() => {
    transport = new MockTransport();
    logger = createMockLogger();
    typeMappers = new TypeMapperRegistry();
    typeMappers.add(new SwitchMapper());
    publishStateUpdate = jest.fn();
    sleep = jest.fn(yieldingSleep);

    initializer = new DatapointInitializer(
      { transport, typeMappers, publishStateUpdate, logger },
      { pollIntervalMs: 1000, readingPauseMs: 0, sleep }
    );
  });

  afterEach(async () => {
    await initializer.stop();
    restore();
  });

  describe('drain', () => {
    it('should read and publish every pending state datapoint', async () => {
      transport.readStub.withArgs(hall).resolves(Uint8Array.of(0x00));
      initializer.enqueue(light);
      initializer.enqueue(hall);

      const reads = await initializer.drain();

      expect(reads).toBe(2);
      expect(publishStateUpdate.mock.calls).toEqual([
        ['Light1', ON],
        ['Hall', OFF]
      ]);
      expect(initializer.pending()).toEqual([]);
    });

    it('should never read command datapoints but still remove them', async () => {
      initializer.enqueue(scene);

      const reads = await initializer.drain();

      expect(reads).toBe(0);
      expect(transport.readStub.called).toBe(false);
      expect(initializer.pending()).toEqual([]);
    });

    it('should treat duplicate enqueues as one entry', async () => {
      initializer.enqueue(light);
      initializer.enqueue(light);

      await initializer.drain();

      expect(transport.readStub.callCount).toBe(1);
    });

    it('should remove a datapoint whose read failed and continue the batch', async () => {
      transport.readStub.withArgs(light).rejects(new Error('no response'));
      initializer.enqueue(light);
      initializer.enqueue(hall);

      await initializer.drain();

      expect(logger.warn).toHaveBeenCalledWith(
        "Field-bus read failed for item 'Light1' at 1/0/1: no response",
        { component: 'DatapointInitializer' }
      );
      expect(publishStateUpdate).toHaveBeenCalledTimes(1);
      expect(publishStateUpdate).toHaveBeenCalledWith('Hall', ON);
      expect(initializer.pending()).toEqual([]);
    });

    it('should remove a datapoint whose payload could not be decoded', async () => {
      transport.readStub.resolves(Uint8Array.of(0x07));
      initializer.enqueue(light);

      await initializer.drain();

      expect(logger.warn).toHaveBeenCalledWith(
        "Payload read for item 'Light1' could not be decoded as 1.001",
        { component: 'DatapointInitializer' }
      );
      expect(publishStateUpdate).not.toHaveBeenCalled();
      expect(initializer.pending()).toEqual([]);
    });

    it('should count the attempt when the field bus is unavailable', async () => {
      transport.available = false;
      initializer.enqueue(light);

      const reads = await initializer.drain();

      expect(reads).toBe(1);
      expect(transport.readStub.called).toBe(false);
      expect(initializer.pending()).toEqual([]);
    });

    it('should leave datapoints queued during a batch for the next one', async () => {
      transport.readStub.callsFake(async () => {
        initializer.enqueue(hall);
        return Uint8Array.of(0x01);
      });
      initializer.enqueue(light);

      await initializer.drain();

      expect(transport.readStub.callCount).toBe(1);
      expect(initializer.pending()).toEqual([hall]);
    });

    it('should pause between datapoints when a reading pause is set', async () => {
      const paced = new DatapointInitializer(
        { transport, typeMappers, publishStateUpdate, logger },
        { readingPauseMs: 50, sleep }
      );
      paced.enqueue(light);
      paced.enqueue(scene);

      await paced.drain();

      expect(sleep.mock.calls).toEqual([[50], [50]]);
    });

    it('should not pause without a reading pause', async () => {
      initializer.enqueue(light);
      initializer.enqueue(hall);

      await initializer.drain();

      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe('loop', () => {
    it('should drain pending datapoints in the background', async () => {
      initializer.start();
      initializer.enqueue(light);
      initializer.enqueue(scene);

      await waitFor(() => initializer.pending().length === 0);

      expect(transport.readStub.callCount).toBe(1);
      expect(publishStateUpdate).toHaveBeenCalledWith('Light1', ON);
    });

    it('should sleep the poll interval after every iteration', async () => {
      initializer.start();
      await waitFor(() => sleep.mock.calls.length >= 2);

      expect(sleep).toHaveBeenCalledWith(1000);
      expect(sleep.mock.calls.every(([ms]) => ms === 1000)).toBe(true);
    });

    it('should stop at the next check point', async () => {
      initializer.start();
      expect(initializer.isRunning()).toBe(true);

      await initializer.stop();

      expect(initializer.isRunning()).toBe(false);
    });

    it('should join the running batch instead of reading again', async () => {
      let release: (payload: Uint8Array) => void = () => undefined;
      transport.readStub.callsFake(() => new Promise<Uint8Array>(resolve => {
        release = resolve;
      }));
      initializer.enqueue(light);
      initializer.start();
      await waitFor(() => transport.readStub.callCount === 1);

      const manual = initializer.drain();
      release(Uint8Array.of(0x01));

      expect(await manual).toBe(1);
      expect(transport.readStub.callCount).toBe(1);
      expect(publishStateUpdate).toHaveBeenCalledTimes(1);
    });

    it('should run again when started while a stop is pending', async () => {
      initializer.start();
      const stopping = initializer.stop();
      initializer.start();
      await stopping;

      expect(initializer.isRunning()).toBe(true);
      initializer.enqueue(light);
      await waitFor(() => initializer.pending().length === 0);
      expect(publishStateUpdate).toHaveBeenCalledWith('Light1', ON);
    });

    it('should stay stopped when a restart is followed by another stop', async () => {
      initializer.start();
      const stopping = initializer.stop();
      initializer.start();
      await initializer.stop();
      await stopping;

      expect(initializer.isRunning()).toBe(false);
    });

    it('should not start twice', () => {
      initializer.start();
      initializer.start();

      const starts = logger.debug.mock.calls.filter(
        (call: unknown[]) => call[0] === 'Datapoint initializer started'
      );
      expect(starts).toHaveLength(1);
    });
  });
});

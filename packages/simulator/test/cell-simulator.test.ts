/**
 * Cell Simulator Tests
 *
 * MQTT wiring of the simulator against an in-process stand-in client.
 */

import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadCellConfig } from '@crane-cell/shared';
import { CellModel } from '../src/cell-model.js';
import { CellSimulator, type SimulatorBusClient } from '../src/cell-simulator.js';

const CONFIG_PATH = fileURLToPath(new URL('../../../config/cell.json', import.meta.url));

class FakeBusClient implements SimulatorBusClient {
  readonly subscriptions: string[] = [];
  readonly published: Array<{ topic: string; message: string; retain: boolean }> = [];

  on(_event: 'message', _listener: (topic: string, payload: Buffer) => void): this {
    return this;
  }

  subscribe(topic: string, callback?: (err: Error | null) => void): this {
    this.subscriptions.push(topic);
    callback?.(null);
    return this;
  }

  publish(topic: string, message: string, opts: { qos: 0 | 1 | 2; retain: boolean }): this {
    this.published.push({ topic, message, retain: opts.retain });
    return this;
  }
}

describe('CellSimulator', () => {
  let client: FakeBusClient;
  let model: CellModel;
  let simulator: CellSimulator;

  beforeEach(async () => {
    const config = await loadCellConfig(CONFIG_PATH);
    client = new FakeBusClient();
    model = new CellModel(config);
    simulator = new CellSimulator(client, model, { prefix: 'cell', tickMs: 100, spawnEveryMs: 0 });
    simulator.start();
  });

  afterEach(() => {
    simulator.stop();
  });

  it('publishes every register retained on start and subscribes to writes', () => {
    expect(client.subscriptions).toEqual(['cell/registers/+/set']);
    expect(client.published).toContainEqual({ topic: 'cell/registers/17', message: '0', retain: true });
    expect(client.published).toHaveLength(model.snapshot().size);
  });

  it('applies register writes and publishes the changes', () => {
    client.published.length = 0;

    simulator.handleMessage('cell/registers/4/set', Buffer.from('1'));

    expect(model.peek(4)).toBe(1);
    expect(client.published).toEqual([{ topic: 'cell/registers/4', message: '1', retain: true }]);
  });

  it('re-publishes the device value when a write is rejected', () => {
    client.published.length = 0;

    simulator.handleMessage('cell/registers/17/set', Buffer.from('1'));

    expect(model.peek(17)).toBe(0);
    expect(client.published).toEqual([{ topic: 'cell/registers/17', message: '0', retain: true }]);
  });

  it('ignores malformed writes and unrelated topics', () => {
    client.published.length = 0;

    simulator.handleMessage('cell/registers/4/set', Buffer.from('on'));
    simulator.handleMessage('cell/registers/4', Buffer.from('1'));
    simulator.handleMessage('cell/events/part', Buffer.from('{}'));

    expect(model.peek(4)).toBe(0);
    expect(client.published).toEqual([]);
  });

  describe('random arrivals', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('places parts at roughly the configured rate', () => {
      vi.useFakeTimers();
      const spawning = new CellModel(model.config);
      const spawn = vi.spyOn(spawning, 'spawnPart');
      const sim = new CellSimulator(new FakeBusClient(), spawning, { prefix: 'cell', tickMs: 100, spawnEveryMs: 1000 });

      sim.start();
      vi.advanceTimersByTime(1500);
      sim.stop();

      expect(spawn).toHaveBeenCalled();
    });

    it('stays off when the interval is not a number', () => {
      vi.useFakeTimers();
      const quiet = new CellModel(model.config);
      const spawn = vi.spyOn(quiet, 'spawnPart');
      const sim = new CellSimulator(new FakeBusClient(), quiet, { prefix: 'cell', tickMs: 100, spawnEveryMs: Number('soon') });

      sim.start();
      vi.advanceTimersByTime(100);
      sim.stop();

      expect(spawn).not.toHaveBeenCalled();
    });
  });
});

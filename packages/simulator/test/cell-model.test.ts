/**
 * Cell Model Tests
 *
 * Crane travel, vacuum pick/place and the station cycle of the simulated
 * field device.
 */

import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import { loadCellConfig, type CellConfig } from '@crane-cell/shared';
import { CellModel } from '../src/cell-model.js';

const CONFIG_PATH = fileURLToPath(new URL('../../../config/cell.json', import.meta.url));

describe('CellModel', () => {
  let config: CellConfig;
  let model: CellModel;

  beforeAll(async () => {
    config = await loadCellConfig(CONFIG_PATH);
  });

  beforeEach(() => {
    model = new CellModel(config);
  });

  async function moveTo(x: number, y: number): Promise<void> {
    await model.write(1, x);
    await model.write(2, y);
    model.advance(5000);
  }

  it('powers up with the crane at home and every register known', async () => {
    expect(model.cranePosition).toEqual({ x: 0, y: 0 });
    await expect(model.read(17)).resolves.toBe(0);
    await expect(model.read(19)).resolves.toBe(0);
    await expect(model.read(99)).resolves.toBeNull();
  });

  it('rejects writes to sensor registers', async () => {
    await expect(model.write(15, 300)).resolves.toBe(false);
    await expect(model.write(17, 1)).resolves.toBe(false);
    await expect(model.write(99, 1)).resolves.toBe(false);
    expect(model.peek(15)).toBe(0);
  });

  it('moves the crane toward its target at the configured speed', async () => {
    await model.write(1, 100);
    await model.write(2, 50);

    model.advance(100);
    expect(model.cranePosition).toEqual({ x: 50, y: 50 });

    model.advance(100);
    expect(model.cranePosition).toEqual({ x: 100, y: 50 });
  });

  it('picks a part off a source and places it in a station', async () => {
    expect(model.spawnPart('source1')).toBe(true);
    await moveTo(55, 82);

    await model.write(3, 1);
    expect(model.peek(17)).toBe(0);
    expect(model.held).toEqual({ from: 'source1' });

    await moveTo(450, 82);
    await model.write(3, 0);
    expect(model.held).toBeNull();
    expect(model.peek(21)).toBe(1);
  });

  it('delivers to the sink', async () => {
    model.spawnPart('source2');
    await moveTo(158, 82);
    await model.write(3, 1);
    await moveTo(945, 82);
    await model.write(3, 0);

    expect(model.sinkCount).toBe(1);
    expect(model.droppedCount).toBe(0);
  });

  it('counts a part released away from every location as dropped', async () => {
    model.spawnPart('source1');
    await moveTo(55, 82);
    await model.write(3, 1);
    await moveTo(300, 200);
    await model.write(3, 0);

    expect(model.droppedCount).toBe(1);
    expect(model.held).toBeNull();
  });

  it('grips nothing over an empty location', async () => {
    await moveTo(55, 82);
    await model.write(3, 1);

    expect(model.held).toBeNull();
  });

  it('only spawns onto a free, known source', () => {
    expect(model.spawnPart('source1')).toBe(true);
    expect(model.spawnPart('source1')).toBe(false);
    expect(model.spawnPart('source9')).toBe(false);
  });

  it('runs a station cycle after the run command', async () => {
    await model.write(4, 1);
    expect(model.stationPhase('process1')).toBe('starting');

    model.advance(300);
    expect(model.peek(19)).toBe(1);
    expect(model.stationPhase('process1')).toBe('processing');

    model.advance(2999);
    expect(model.peek(19)).toBe(1);
    model.advance(1);
    expect(model.peek(19)).toBe(0);
    expect(model.stationPhase('process1')).toBe('done');

    await model.write(4, 0);
    expect(model.stationPhase('process1')).toBe('idle');
  });

  it('reports every register change to listeners', async () => {
    const changes: Array<[number, number]> = [];
    model.onChange((address, value) => changes.push([address, value]));

    await model.write(5, 1);
    model.advance(5000);

    expect(changes).toEqual([[5, 1], [20, 1], [20, 0]]);
  });

  it('stops the station when the run command drops mid-cycle', async () => {
    await model.write(4, 1);
    model.advance(1000);
    await model.write(4, 0);

    expect(model.peek(19)).toBe(0);
    expect(model.stationPhase('process1')).toBe('idle');
  });

  it('uses per-station processing times', async () => {
    model = new CellModel(config, { processingMs: { process1: 500 }, stationStartDelayMs: 0 });

    await model.write(4, 1);
    expect(model.peek(19)).toBe(1);
    model.advance(500);
    expect(model.peek(19)).toBe(0);
  });
});

/**
 * Sequence Interpreter Tests
 */

import { describe, it, expect } from 'vitest';
import type { CellFile, Sequence } from '@crane-cell/shared';
import { CellContext } from '../src/cell-context.js';
import { VirtualClock } from '../src/clock.js';
import { MemoryPositionLog } from '../src/position-log.js';
import { PositionWaiter } from '../src/position-waiter.js';
import { SequenceInterpreter, describeFailure } from '../src/sequence-interpreter.js';
import { StationController } from '../src/station-controller.js';
import { baseCellFile, makeConfig } from './helpers/cell.js';
import { FakeRegisterPort, withInstantCrane, withStationCycle } from './helpers/fake-register-port.js';

function setup(patch: (file: CellFile) => void = () => {}) {
  const clock = new VirtualClock();
  const port = new FakeRegisterPort(clock);
  const file = baseCellFile();
  patch(file);
  const config = makeConfig(file);
  const context = new CellContext(config, port, clock);
  const log = new MemoryPositionLog();
  const interpreter = new SequenceInterpreter(context, new PositionWaiter(context), new StationController(context), log);
  return { clock, port, config, context, log, interpreter };
}

function sequence(config: { sequences: Record<string, Sequence> }, name: string): Sequence {
  const found = config.sequences[name];
  if (!found) throw new Error(`no sequence ${name}`);
  return found;
}

describe('SequenceInterpreter', () => {
  it('runs a pick sequence and logs only moves made while holding the part', async () => {
    const { port, config, context, log, interpreter } = setup();
    withInstantCrane(port);

    const result = await interpreter.run(sequence(config, 'pick_from_source1'), 7);

    expect(result).toEqual({ sequence: 'pick_from_source1', status: 'completed', actionsRun: 4, failures: [] });
    expect(port.written()).toEqual([
      [1, 55], [2, 200],
      [1, 55], [2, 82],
      [3, 1],
      [1, 55], [2, 200],
    ]);
    expect(log.records).toEqual([
      { partId: 7, timestamp: '1970-01-01T00:00:00.500Z', x: 55, y: 200, endEffectorEngaged: true },
    ]);
    expect(context.endEffectorEngaged).toBe(true);
  });

  it('settles after engaging and after releasing', async () => {
    const { clock, port, config, interpreter } = setup();
    withInstantCrane(port);

    await interpreter.run(sequence(config, 'place_in_sink'), 1);

    expect(port.writes.find(w => w.address === 3)).toEqual({ address: 3, value: 0, at: 0 });
    expect(clock.now()).toBe(800);
  });

  it('does not log a move while the end effector is released', async () => {
    const { port, log, interpreter } = setup();
    port.set(15, 448).set(16, 83);

    const result = await interpreter.run({ name: 'approach', actions: [{ kind: 'move_to', x: 450, y: 82 }] }, 1);

    expect(result.status).toBe('completed');
    expect(log.records).toEqual([]);
  });

  it('logs the measured position rather than the target', async () => {
    const { port, context, log, interpreter } = setup();
    context.endEffectorEngaged = true;
    port.set(15, 448).set(16, 83);

    await interpreter.run({ name: 'approach', actions: [{ kind: 'move_to', x: 450, y: 82 }] }, 3);

    expect(log.records).toEqual([
      { partId: 3, timestamp: '1970-01-01T00:00:00.000Z', x: 448, y: 83, endEffectorEngaged: true },
    ]);
  });

  it('records a position timeout and carries on under the continue policy', async () => {
    const { clock, port, interpreter } = setup();
    port.set(15, 0).set(16, 0);

    const result = await interpreter.run(
      { name: 'stuck', actions: [{ kind: 'move_to', x: 100, y: 100 }, { kind: 'set_end_effector', engaged: true }] },
      2,
    );

    expect(result.status).toBe('completed');
    expect(result.actionsRun).toBe(2);
    expect(result.failures).toEqual([{ kind: 'position_timeout', sequence: 'stuck', actionIndex: 0, x: 100, y: 100 }]);
    expect(describeFailure(result.failures[0])).toBe('stuck[0]: crane did not reach (100, 100)');
    expect(port.written()).toEqual([[1, 100], [2, 100], [3, 1]]);
    expect(clock.now()).toBe(30500);
  });

  it('stops at the first failure under the abort policy', async () => {
    const { port, interpreter } = setup(file => {
      file.policies = { failurePolicy: 'abort' };
    });
    port.set(15, 0).set(16, 0);

    const result = await interpreter.run(
      { name: 'stuck', actions: [{ kind: 'move_to', x: 100, y: 100 }, { kind: 'set_end_effector', engaged: true }] },
      2,
    );

    expect(result.status).toBe('failed');
    expect(result.actionsRun).toBe(1);
    expect(port.written()).toEqual([[1, 100], [2, 100]]);
  });

  it('records a rejected end-effector write and keeps the tracked state', async () => {
    const { port, context, interpreter } = setup();
    port.failWrites.add(3);

    const result = await interpreter.run({ name: 'grip', actions: [{ kind: 'set_end_effector', engaged: true }] }, 4);

    expect(result.failures).toEqual([{ kind: 'write_failed', sequence: 'grip', actionIndex: 0, register: 3 }]);
    expect(describeFailure(result.failures[0])).toBe('grip[0]: write to register 3 failed');
    expect(context.endEffectorEngaged).toBe(false);
  });

  it('skips the wait when a target write is rejected', async () => {
    const { clock, port, interpreter } = setup();
    port.failWrites.add(1);

    const result = await interpreter.run({ name: 'move', actions: [{ kind: 'move_to', x: 10, y: 10 }] }, 4);

    expect(result.failures).toEqual([{ kind: 'write_failed', sequence: 'move', actionIndex: 0, register: 1 }]);
    expect(port.written()).toEqual([[1, 10]]);
    expect(clock.now()).toBe(0);
  });

  it('settles before handing over to the station', async () => {
    const { clock, port, interpreter } = setup();
    port.set(21, 1);
    withStationCycle(port, clock, { run: 4, running: 19 }, 2000);

    const result = await interpreter.run({ name: 'run_process1', actions: [{ kind: 'await_station', stationId: 'process1' }] }, 1);

    expect(result).toEqual({ sequence: 'run_process1', status: 'completed', actionsRun: 1, failures: [] });
    expect(port.writes.map(w => [w.address, w.value, w.at])).toEqual([[4, 1, 500], [4, 0, 2500]]);
  });

  it('reports a station failure', async () => {
    const { port, interpreter } = setup();
    port.set(19, 1);

    const result = await interpreter.run({ name: 'run_process1', actions: [{ kind: 'await_station', stationId: 'process1' }] }, 1);

    expect(result.failures.map(describeFailure)).toEqual(['run_process1[0]: station process1 completion_timeout']);
  });

  it('abandons the sequence when a stop is requested between actions', async () => {
    const { clock, port, context, config, interpreter } = setup();
    withInstantCrane(port);
    clock.onAdvance(() => context.requestStop());

    const result = await interpreter.run(sequence(config, 'pick_from_source1'), 1);

    expect(result).toEqual({ sequence: 'pick_from_source1', status: 'interrupted', actionsRun: 3, failures: [] });
    expect(port.written()).toEqual([[1, 55], [2, 200], [1, 55], [2, 82], [3, 1]]);
  });

  it('runs nothing once a stop is pending', async () => {
    const { port, context, config, interpreter } = setup();
    context.requestStop();

    const result = await interpreter.run(sequence(config, 'pick_from_source1'), 1);

    expect(result.status).toBe('interrupted');
    expect(result.actionsRun).toBe(0);
    expect(port.written()).toEqual([]);
  });
});

/**
 * Cell Configuration Tests
 *
 * Schema validation, action record expansion and routing plan checks.
 */

import { fileURLToPath } from 'node:url';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { ConfigError } from '../src/errors.js';
import { loadCellConfig, parseCellConfig, validateRoutingPlan, type CellFile } from '../src/cell-config.js';

function minimalFile(): CellFile {
  return {
    crane: { targetX: 1, targetY: 2, endEffector: 3, currentX: 4, currentY: 5 },
    sources: [{ id: 'in', presence: 10, partType: 'a' }],
    stations: [{ id: 'press', run: 20, running: 21, partPresent: 22 }],
    sequences: {
      fetch: [{ targetX: 0, targetY: 0 }, { endEffector: 1 }],
      drop: [{ endEffector: 0 }],
    },
    routing: { a: ['fetch', { station: 'press' }, 'drop'] },
  };
}

function issuesOf(raw: unknown): string[] {
  try {
    parseCellConfig(raw);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe('parseCellConfig', () => {
  it('normalises sources, stations and routing steps', () => {
    const config = parseCellConfig(minimalFile());

    expect(config.sources).toEqual([{ sourceId: 'in', presence: 10, partType: 'a' }]);
    expect(config.stations).toEqual([{ stationId: 'press', run: 20, running: 21, partPresent: 22 }]);
    expect(config.routing['a'].steps).toEqual([
      { kind: 'sequence', name: 'fetch' },
      { kind: 'station', stationId: 'press' },
      { kind: 'sequence', name: 'drop' },
    ]);
    expect(config.positions).toEqual({});
  });

  it('fills in default timings and policies', () => {
    const config = parseCellConfig(minimalFile());

    expect(config.timings).toEqual({
      arrivalPollIntervalMs: 500,
      positionTolerance: 5,
      positionTimeoutMs: 30000,
      positionPollMs: 100,
      engageSettleMs: 500,
      releaseSettleMs: 800,
      stationSettleMs: 500,
      stationRunDelayMs: 1000,
      stationStartTimeoutMs: 10000,
      stationStartPollMs: 200,
      stationCompletionTimeoutMs: 60000,
      stationCompletionPollMs: 500,
      stationOffSettleMs: 500,
    });
    expect(config.policies).toEqual({ failurePolicy: 'continue', strictStart: false });
  });

  it('expands a multi-key record as end effector, then move, then station wait', () => {
    const file = minimalFile();
    file.sequences['fetch'] = [
      { description: 'grab and go', awaitStation: 'press', targetX: 10, targetY: 20, endEffector: true },
    ];

    const config = parseCellConfig(file);

    expect(config.sequences['fetch'].actions).toEqual([
      { kind: 'set_end_effector', engaged: true, description: 'grab and go' },
      { kind: 'move_to', x: 10, y: 20, description: 'grab and go' },
      { kind: 'await_station', stationId: 'press', description: 'grab and go' },
    ]);
  });

  it('reads endEffector 0 as release', () => {
    const config = parseCellConfig(minimalFile());
    expect(config.sequences['drop'].actions).toEqual([{ kind: 'set_end_effector', engaged: false }]);
  });

  it('rejects a target with only one axis', () => {
    const file = minimalFile();
    file.sequences['fetch'] = [{ targetX: 10 }];

    expect(issuesOf(file)).toEqual(['sequences.fetch[0]: targetX and targetY must be given together']);
  });

  it('rejects an empty action record', () => {
    const file = minimalFile();
    file.sequences['drop'] = [{ description: 'nothing' }];

    expect(issuesOf(file)).toEqual(['sequences.drop[0]: record has no endEffector, targetX/targetY or awaitStation']);
  });

  it('rejects a sequence that waits on an unknown station', () => {
    const file = minimalFile();
    file.sequences['drop'] = [{ awaitStation: 'oven' }];

    expect(issuesOf(file)).toEqual(["sequences.drop: unknown station 'oven'"]);
  });

  it('rejects reserved location ids', () => {
    const file = minimalFile();
    file.sources = [{ id: 'sink', presence: 10, partType: 'a' }];

    expect(issuesOf(file)).toEqual(["sources.0.id: 'crane' and 'sink' are reserved"]);
  });

  it('rejects a register mapped to two roles', () => {
    const file = minimalFile();
    file.stations = [{ id: 'press', run: 20, running: 21, partPresent: 10 }];

    expect(issuesOf(file)).toEqual(['register 10 is mapped to more than one role']);
  });

  it('rejects a source whose part type has no plan', () => {
    const file = minimalFile();
    file.sources = [{ id: 'in', presence: 10, partType: 'b' }];

    expect(issuesOf(file)).toEqual(["sources.in: no routing plan for part type 'b'"]);
  });

  it('rejects unknown keys', () => {
    expect(issuesOf({ ...minimalFile(), conveyor: true })).toEqual([
      "<root>: Unrecognized key(s) in object: 'conveyor'",
    ]);
  });

  it('reports the source of the configuration in the error', () => {
    const file = minimalFile();
    file.routing = { a: [] };

    expect(() => parseCellConfig(file, 'cell.json')).toThrow(
      'Invalid cell configuration (cell.json): routing.a: plan has no steps',
    );
  });
});

describe('validateRoutingPlan', () => {
  const sequences = new Set(['fetch', 'drop']);
  const stations = new Set(['press', 'oven']);

  it('accepts a plan that picks, processes and delivers', () => {
    const issues = validateRoutingPlan(
      {
        partType: 'a',
        steps: [
          { kind: 'sequence', name: 'fetch' },
          { kind: 'station', stationId: 'press' },
          { kind: 'sequence', name: 'drop' },
        ],
      },
      sequences,
      stations,
    );
    expect(issues).toEqual([]);
  });

  it('rejects adjacent station steps and unknown references', () => {
    const issues = validateRoutingPlan(
      {
        partType: 'a',
        steps: [
          { kind: 'sequence', name: 'fetch' },
          { kind: 'station', stationId: 'press' },
          { kind: 'station', stationId: 'kiln' },
          { kind: 'sequence', name: 'deliver' },
        ],
      },
      sequences,
      stations,
    );
    expect(issues).toEqual([
      'routing.a[1]: station steps must be separated by a sequence',
      "routing.a[2]: unknown station 'kiln'",
      "routing.a[3]: unknown sequence 'deliver'",
    ]);
  });

  it('requires a sequence at both ends', () => {
    const issues = validateRoutingPlan(
      { partType: 'a', steps: [{ kind: 'station', stationId: 'press' }] },
      sequences,
      stations,
    );
    expect(issues).toEqual(['routing.a: plan must start with a sequence', 'routing.a: plan must end with a sequence']);
  });
});

describe('loadCellConfig', () => {
  it('loads the bundled cell configuration', async () => {
    const path = fileURLToPath(new URL('../../../config/cell.json', import.meta.url));
    const config = await loadCellConfig(path);

    expect(config.sources.map(s => s.sourceId)).toEqual(['source1', 'source2']);
    expect(config.routing['type1'].steps).toHaveLength(5);
    expect(config.routing['type2'].steps).toHaveLength(8);
    expect(config.sequences['pick_from_source1'].actions[2]).toEqual({
      kind: 'set_end_effector',
      engaged: true,
      description: 'Vacuum on',
    });
  });

  it('reports invalid JSON with the file path', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'crane-cell-'));
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "crane": ');

    await expect(loadCellConfig(path)).rejects.toMatchObject({ name: 'ConfigError', source: path });
  });

  it('reports a missing file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'crane-cell-'));
    const path = join(dir, 'missing.json');

    await expect(loadCellConfig(path)).rejects.toBeInstanceOf(ConfigError);
  });
});

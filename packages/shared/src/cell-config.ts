import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { CRANE_LOCATION, SINK_LOCATION } from './types.js';
import type { Action, CellConfig, RoutingPlan, RoutingStep, Sequence } from './types.js';

// ---- File Schema ----
// The cell file is hand-written JSON. Action records follow the crane
// program format: one record may carry an end-effector command, a target
// position and a station wait at once, executed in that order.

const address = z.number().int().min(0).max(65535);
const coordinate = z.number().int().min(0).max(65535);
const locationId = z
  .string()
  .min(1)
  .refine(id => id !== CRANE_LOCATION && id !== SINK_LOCATION, { message: `'${CRANE_LOCATION}' and '${SINK_LOCATION}' are reserved` });

const craneSchema = z.object({
  targetX: address,
  targetY: address,
  currentX: address,
  currentY: address,
  endEffector: address,
}).strict();

const sourceSchema = z.object({
  id: locationId,
  presence: address,
  partType: z.string().min(1),
}).strict();

const stationSchema = z.object({
  id: locationId,
  run: address,
  running: address,
  partPresent: address,
}).strict();

const actionRecordSchema = z.object({
  description: z.string().optional(),
  endEffector: z.union([z.boolean(), z.literal(0), z.literal(1)]).optional(),
  targetX: coordinate.optional(),
  targetY: coordinate.optional(),
  awaitStation: z.string().min(1).optional(),
}).strict();

type ActionRecord = z.infer<typeof actionRecordSchema>;

const routingStepSchema = z.union([
  z.string().min(1),
  z.object({ station: z.string().min(1) }).strict(),
]);

const ms = z.number().int().min(0);

const timingsSchema = z.object({
  arrivalPollIntervalMs: ms.default(500),
  positionTolerance: z.number().int().min(0).default(5),
  positionTimeoutMs: ms.default(30000),
  positionPollMs: ms.min(1).default(100),
  engageSettleMs: ms.default(500),
  releaseSettleMs: ms.default(800),
  stationSettleMs: ms.default(500),
  stationRunDelayMs: ms.default(1000),
  stationStartTimeoutMs: ms.default(10000),
  stationStartPollMs: ms.min(1).default(200),
  stationCompletionTimeoutMs: ms.default(60000),
  stationCompletionPollMs: ms.min(1).default(500),
  stationOffSettleMs: ms.default(500),
}).strict();

const policiesSchema = z.object({
  failurePolicy: z.enum(['continue', 'abort']).default('continue'),
  strictStart: z.boolean().default(false),
}).strict();

const cellFileSchema = z.object({
  crane: craneSchema,
  sources: z.array(sourceSchema).min(1),
  stations: z.array(stationSchema),
  positions: z.record(z.object({ x: coordinate, y: coordinate }).strict()).default({}),
  sequences: z.record(z.array(actionRecordSchema)),
  routing: z.record(z.array(routingStepSchema)),
  timings: timingsSchema.default({}),
  policies: policiesSchema.default({}),
}).strict();

export type CellFile = z.input<typeof cellFileSchema>;

// ---- Conversion ----

function toActions(record: ActionRecord, where: string, issues: string[]): Action[] {
  const actions: Action[] = [];
  let paired = true;
  const description = record.description;
  const withDescription = description === undefined ? {} : { description };

  if (record.endEffector !== undefined) {
    const engaged = record.endEffector === true || record.endEffector === 1;
    actions.push({ kind: 'set_end_effector', engaged, ...withDescription });
  }

  if (record.targetX !== undefined && record.targetY !== undefined) {
    actions.push({ kind: 'move_to', x: record.targetX, y: record.targetY, ...withDescription });
  } else if (record.targetX !== undefined || record.targetY !== undefined) {
    issues.push(`${where}: targetX and targetY must be given together`);
    paired = false;
  }

  if (record.awaitStation !== undefined) {
    actions.push({ kind: 'await_station', stationId: record.awaitStation, ...withDescription });
  }

  if (actions.length === 0 && paired) {
    issues.push(`${where}: record has no endEffector, targetX/targetY or awaitStation`);
  }
  return actions;
}

function toStep(step: z.infer<typeof routingStepSchema>): RoutingStep {
  return typeof step === 'string'
    ? { kind: 'sequence', name: step }
    : { kind: 'station', stationId: step.station };
}

function duplicates(values: Array<string | number>): Array<string | number> {
  const seen = new Set<string | number>();
  const dupes = new Set<string | number>();
  for (const value of values) {
    if (seen.has(value)) dupes.add(value);
    seen.add(value);
  }
  return [...dupes];
}

/**
 * Check a routing plan's shape: it must pick up with a sequence, end with a
 * sequence that delivers the part, and every station step needs a placing
 * sequence before it and a picking sequence after it.
 */
export function validateRoutingPlan(
  plan: RoutingPlan,
  sequences: ReadonlySet<string>,
  stations: ReadonlySet<string>,
): string[] {
  const issues: string[] = [];
  const where = `routing.${plan.partType}`;
  const { steps } = plan;

  if (steps.length === 0) return [`${where}: plan has no steps`];

  steps.forEach((step, index) => {
    if (step.kind === 'sequence' && !sequences.has(step.name)) {
      issues.push(`${where}[${index}]: unknown sequence '${step.name}'`);
    }
    if (step.kind === 'station') {
      if (!stations.has(step.stationId)) {
        issues.push(`${where}[${index}]: unknown station '${step.stationId}'`);
      }
      if (steps[index + 1]?.kind === 'station') {
        issues.push(`${where}[${index}]: station steps must be separated by a sequence`);
      }
    }
  });

  if (steps[0].kind !== 'sequence') issues.push(`${where}: plan must start with a sequence`);
  if (steps[steps.length - 1].kind !== 'sequence') issues.push(`${where}: plan must end with a sequence`);

  return issues;
}

/**
 * Validate and normalise a parsed cell file.
 * Throws ConfigError listing every problem found.
 */
export function parseCellConfig(raw: unknown, source: string | null = null): CellConfig {
  const result = cellFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    );
  }

  const file = result.data;
  const issues: string[] = [];

  const stationIds = file.stations.map(s => s.id);
  const locationIds = [...file.sources.map(s => s.id), ...stationIds];
  for (const dupe of duplicates(locationIds)) {
    issues.push(`location id '${dupe}' is used more than once`);
  }

  const addresses = [
    ...Object.values(file.crane),
    ...file.sources.map(s => s.presence),
    ...file.stations.flatMap(s => [s.run, s.running, s.partPresent]),
  ];
  for (const dupe of duplicates(addresses)) {
    issues.push(`register ${dupe} is mapped to more than one role`);
  }

  const knownStations = new Set(stationIds);
  const sequences: Record<string, Sequence> = {};
  for (const [name, records] of Object.entries(file.sequences)) {
    if (records.length === 0) {
      issues.push(`sequences.${name}: sequence has no actions`);
      continue;
    }
    const actions = records.flatMap((record, index) => toActions(record, `sequences.${name}[${index}]`, issues));
    for (const action of actions) {
      if (action.kind === 'await_station' && !knownStations.has(action.stationId)) {
        issues.push(`sequences.${name}: unknown station '${action.stationId}'`);
      }
    }
    sequences[name] = { name, actions };
  }

  const knownSequences = new Set(Object.keys(file.sequences));
  const routing: Record<string, RoutingPlan> = {};
  for (const [partType, steps] of Object.entries(file.routing)) {
    const plan: RoutingPlan = { partType, steps: steps.map(toStep) };
    issues.push(...validateRoutingPlan(plan, knownSequences, knownStations));
    routing[partType] = plan;
  }

  for (const src of file.sources) {
    if (!routing[src.partType]) {
      issues.push(`sources.${src.id}: no routing plan for part type '${src.partType}'`);
    }
  }

  if (issues.length > 0) throw new ConfigError(source, issues);

  return {
    crane: file.crane,
    sources: file.sources.map(s => ({ sourceId: s.id, presence: s.presence, partType: s.partType })),
    stations: file.stations.map(s => ({ stationId: s.id, run: s.run, running: s.running, partPresent: s.partPresent })),
    sequences,
    routing,
    timings: file.timings,
    policies: file.policies,
    positions: file.positions,
  };
}

/** Read and validate a cell configuration file */
export async function loadCellConfig(path: string): Promise<CellConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(path, [`cannot read file: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(path, [`invalid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }

  return parseCellConfig(raw, path);
}

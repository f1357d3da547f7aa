import {
  CRANE_LOCATION,
  ConfigError,
  SINK_LOCATION,
  validateRoutingPlan,
  type CellConfig,
  type PartStatus,
  type RoutingPlan,
  type RoutingStep,
} from '@crane-cell/shared';

export interface Milestone {
  status: PartStatus;
  location: string;
}

export interface PlannedStep {
  step: RoutingStep;
  /** Transitions applied once the step has finished */
  milestones: Milestone[];
}

export interface CompiledPlan {
  partType: string;
  steps: PlannedStep[];
}

/**
 * Derive lifecycle transitions from a plan's shape. The first sequence
 * picks the part up, a sequence in front of a station places it there, a
 * sequence after a station picks it back up, and the last one delivers it.
 */
export function planMilestones(plan: RoutingPlan): PlannedStep[] {
  const { steps } = plan;
  return steps.map((step, index) => {
    const milestones: Milestone[] = [];
    if (step.kind === 'sequence') {
      const previous = steps[index - 1];
      const next = steps[index + 1];
      if (index === 0 || previous?.kind === 'station') {
        milestones.push({ status: 'in_transit', location: CRANE_LOCATION });
      }
      if (next?.kind === 'station') {
        milestones.push({ status: 'processing', location: next.stationId });
      } else if (index === steps.length - 1) {
        milestones.push({ status: 'completed', location: SINK_LOCATION });
      }
    }
    return { step, milestones };
  });
}

/**
 * Part type → routing plan. Pure data: adding a part type means adding a
 * plan to the configuration, not code.
 */
export class RoutingTable {
  private readonly plans = new Map<string, CompiledPlan>();

  constructor(config: CellConfig) {
    const sequences = new Set(Object.keys(config.sequences));
    const stations = new Set(config.stations.map(s => s.stationId));
    const issues: string[] = [];

    for (const plan of Object.values(config.routing)) {
      issues.push(...validateRoutingPlan(plan, sequences, stations));
      this.plans.set(plan.partType, { partType: plan.partType, steps: planMilestones(plan) });
    }
    for (const source of config.sources) {
      if (!this.plans.has(source.partType)) {
        issues.push(`sources.${source.sourceId}: no routing plan for part type '${source.partType}'`);
      }
    }

    if (issues.length > 0) throw new ConfigError(null, issues);
  }

  get(partType: string): CompiledPlan | undefined {
    return this.plans.get(partType);
  }

  partTypes(): string[] {
    return [...this.plans.keys()];
  }
}

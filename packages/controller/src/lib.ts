export { CellContext, type CellEvents } from './cell-context.js';
export { SystemClock, VirtualClock, type Clock, type AdvanceListener } from './clock.js';
export { pollUntil, type PollOptions, type PollResult } from './poll.js';
export type { RegisterPort, RegisterValue } from './register-port.js';
export { PositionWaiter, type WaitOptions } from './position-waiter.js';
export { StationController, type StationFailureReason, type StationRunResult } from './station-controller.js';
export { SequenceInterpreter, describeFailure, type SequenceFailure, type SequenceResult } from './sequence-interpreter.js';
export { PartArrivalDetector } from './arrival-detector.js';
export { RoutingTable, planMilestones, type CompiledPlan, type Milestone, type PlannedStep } from './routing.js';
export {
  OrchestrationScheduler,
  type PartOutcome,
  type ShutdownSummary,
  type StepOutcome,
} from './scheduler.js';
export {
  CSV_HEADER,
  CsvPositionLog,
  FanoutPositionLog,
  MemoryPositionLog,
  formatCsvRow,
  type PositionLog,
} from './position-log.js';
export { MqttRegisterPort, type RegisterBusClient } from './mqtt-register-port.js';
export { CellEventPublisher } from './event-publisher.js';
export { loadRuntimeConfig, type RuntimeConfig, type RuntimeOverrides } from './config.js';
export { startController, type RunningController } from './controller.js';
export { createProgram, describeCell, runCli, toOverrides, type RunOptions } from './cli.js';

// ---- Part Tracking ----

export type PartStatus = 'waiting' | 'in_transit' | 'processing' | 'completed' | 'failed';
export type StationState = 'idle' | 'starting' | 'running' | 'completing' | 'timed_out';

/** Fixed locations a part can occupy besides its source and the stations */
export const CRANE_LOCATION = 'crane';
export const SINK_LOCATION = 'sink';

export interface PartHistoryEntry {
  status: PartStatus;
  location: string;
  at: string;
}

export interface Part {
  id: number;
  partType: string;
  /** Source the part arrived at */
  source: string;
  /** A source id, a station id, 'crane' or 'sink' */
  location: string;
  status: PartStatus;
  createdAt: string;
  history: PartHistoryEntry[];
}

// ---- Crane Actions ----

export type Action =
  | { kind: 'set_end_effector'; engaged: boolean; description?: string }
  | { kind: 'move_to'; x: number; y: number; description?: string }
  | { kind: 'await_station'; stationId: string; description?: string };

export interface Sequence {
  name: string;
  actions: readonly Action[];
}

// ---- Routing ----

export type RoutingStep =
  | { kind: 'sequence'; name: string }
  | { kind: 'station'; stationId: string };

export interface RoutingPlan {
  partType: string;
  steps: readonly RoutingStep[];
}

// ---- Cell Layout ----

export interface Point {
  x: number;
  y: number;
}

export interface CraneRegisters {
  targetX: number;
  targetY: number;
  currentX: number;
  currentY: number;
  endEffector: number;
}

export interface SourceConfig {
  sourceId: string;
  /** Presence sensor register, 1 = part present */
  presence: number;
  partType: string;
}

export interface StationConfig {
  stationId: string;
  run: number;
  running: number;
  partPresent: number;
}

export type FailurePolicy = 'continue' | 'abort';

export interface CellTimings {
  arrivalPollIntervalMs: number;
  positionTolerance: number;
  positionTimeoutMs: number;
  positionPollMs: number;
  engageSettleMs: number;
  releaseSettleMs: number;
  stationSettleMs: number;
  stationRunDelayMs: number;
  stationStartTimeoutMs: number;
  stationStartPollMs: number;
  stationCompletionTimeoutMs: number;
  stationCompletionPollMs: number;
  stationOffSettleMs: number;
}

export interface CellPolicies {
  failurePolicy: FailurePolicy;
  /** Treat a running flag that never asserts as a station failure */
  strictStart: boolean;
}

export interface CellConfig {
  crane: CraneRegisters;
  sources: SourceConfig[];
  stations: StationConfig[];
  sequences: Record<string, Sequence>;
  routing: Record<string, RoutingPlan>;
  timings: CellTimings;
  policies: CellPolicies;
  /** Pick/place points keyed by source id, station id or 'sink' (used by the simulator) */
  positions: Record<string, Point>;
}

// ---- Position Log ----

export interface PositionLogRecord {
  partId: number;
  timestamp: string;
  x: number;
  y: number;
  endEffectorEngaged: boolean;
}

// ---- MQTT Payloads ----

export interface MqttPartEvent {
  part: Part;
  timestamp: string;
}

export interface MqttStationEvent {
  stationId: string;
  state: StationState;
  timestamp: string;
}

export interface MqttPartFinished {
  partId: number;
  status: PartStatus;
  failures: string[];
  timestamp: string;
}

// ---- WebSocket Messages (Observer -> Display) ----

export type WsMessage =
  | { type: 'init'; data: { registers: Record<string, number>; parts: Part[]; stations: Record<string, StationState>; positions: PositionLogRecord[] } }
  | { type: 'register'; data: { address: number; value: number | null } }
  | { type: 'part'; data: MqttPartEvent }
  | { type: 'part_finished'; data: MqttPartFinished }
  | { type: 'station'; data: MqttStationEvent }
  | { type: 'position'; data: PositionLogRecord };

// ---- WebSocket Messages (Display -> Observer) ----

export type WsRequest =
  | { type: 'get_part'; partId: number }
  | { type: 'list_parts'; status?: PartStatus };

export type WsResponse =
  | { type: 'part_detail'; data: Part | null }
  | { type: 'part_list'; data: Part[] };

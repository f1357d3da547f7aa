export { CellModel, type CellModelOptions, type HeldPart, type RegisterListener, type StationPhase } from './cell-model.js';
export { CellSimulator, type CellSimulatorOptions, type SimulatorBusClient } from './cell-simulator.js';
export { loadSimulatorEnv, type SimulatorEnv } from './env.js';

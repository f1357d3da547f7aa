export { startBroker, type BrokerOptions, type RunningBroker } from './server.js';
export { StateManager } from './state-manager.js';
export { processMessage, processRequest } from './mqtt-handler.js';
export { parseJson, partEventSchema, partFinishedSchema, positionRecordSchema, stationEventSchema, wsRequestSchema } from './payloads.js';
export { loadBrokerEnv, type BrokerEnv } from './env.js';

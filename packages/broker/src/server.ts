import aedesModule from 'aedes';
import { createServer, type Server } from 'node:net';
import mqtt from 'mqtt';
import { WebSocketServer, type WebSocket } from 'ws';
import { createLogger, type WsMessage } from '@crane-cell/shared';
import { StateManager } from './state-manager.js';
import { processMessage, processRequest } from './mqtt-handler.js';

const log = createLogger('broker');

export interface BrokerOptions {
  mqttPort: number;
  wsPort: number;
  prefix: string;
  /** Stations to show as idle before their first event */
  stationIds: string[];
}

export interface RunningBroker {
  state: StateManager;
  close(): Promise<void>;
}

function listen(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

/**
 * Start the embedded MQTT broker and the read-only observer that mirrors
 * registers and cell events to WebSocket displays.
 */
export async function startBroker(options: BrokerOptions): Promise<RunningBroker> {
  const { mqttPort, wsPort, prefix } = options;

  // 1. Aedes MQTT broker
  const aedes = aedesModule.createBroker();
  const mqttServer = createServer(aedes.handle);
  try {
    await listen(mqttServer, mqttPort);
  } catch (err) {
    aedes.close();
    throw err;
  }
  log.info({ port: mqttPort }, 'MQTT broker running');

  // 2. State view
  const state = new StateManager(options.stationIds);

  // 3. Internal observer client: registers and events, never the /set topics
  const client = mqtt.connect(`mqtt://localhost:${mqttPort}`);
  client.on('connect', () => {
    log.info('Observer client connected');
    client.subscribe([`${prefix}/registers/+`, `${prefix}/events/#`], (err) => {
      if (err) log.error({ err }, 'Subscribe error');
      else log.info({ prefix }, 'Observer subscribed');
    });
  });
  client.on('error', err => log.error({ err }, 'Observer client error'));

  // 4. WebSocket server for displays
  const wss = new WebSocketServer({ port: wsPort });
  const wsClients = new Set<WebSocket>();

  wss.on('listening', () => log.info({ port: wsPort }, 'WebSocket server running'));

  wss.on('connection', (socket) => {
    log.info('Display connected');
    wsClients.add(socket);

    const initMsg: WsMessage = { type: 'init', data: state.getInitData() };
    socket.send(JSON.stringify(initMsg));

    socket.on('message', (raw) => {
      const response = processRequest(raw.toString(), state);
      if (response) socket.send(JSON.stringify(response));
      else log.warn({ raw: raw.toString() }, 'Invalid display request');
    });

    socket.on('close', () => {
      wsClients.delete(socket);
      log.info('Display disconnected');
    });
  });

  // 5. Bridge: MQTT -> state update -> WS broadcast
  client.on('message', (topic, payload) => {
    const wsMsg = processMessage(prefix, topic, payload, state);
    if (wsMsg) broadcast(wsMsg);
  });

  function broadcast(msg: WsMessage): void {
    const json = JSON.stringify(msg);
    for (const socket of wsClients) {
      if (socket.readyState === socket.OPEN) socket.send(json);
    }
  }

  return {
    state,
    async close() {
      for (const socket of wsClients) socket.close();
      await new Promise<void>((resolve, reject) => wss.close(err => (err ? reject(err) : resolve())));
      await client.endAsync();
      await new Promise<void>(resolve => aedes.close(() => resolve()));
      await new Promise<void>(resolve => mqttServer.close(() => resolve()));
      log.info('Broker stopped');
    },
  };
}

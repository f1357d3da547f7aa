import { parseRegisterPayload, parseTopic, type WsMessage, type WsResponse } from '@crane-cell/shared';
import {
  parseJson,
  partEventSchema,
  partFinishedSchema,
  positionRecordSchema,
  stationEventSchema,
  wsRequestSchema,
} from './payloads.js';
import type { StateManager } from './state-manager.js';

/**
 * Apply one MQTT message to the state view and return what displays
 * should be told, or null when the message is irrelevant, malformed or
 * changes nothing.
 */
export function processMessage(
  prefix: string,
  topic: string,
  payload: Buffer,
  state: StateManager,
): WsMessage | null {
  const parsed = parseTopic(prefix, topic);

  switch (parsed.kind) {
    case 'register': {
      // An empty retained payload clears the register
      const value = payload.length === 0 ? null : parseRegisterPayload(payload);
      if (!state.handleRegister(parsed.address, value)) return null;
      return { type: 'register', data: { address: parsed.address, value } };
    }

    case 'event': {
      switch (parsed.event) {
        case 'part': {
          const event = parseJson(partEventSchema, payload);
          if (!event || !state.handlePart(event)) return null;
          return { type: 'part', data: event };
        }
        case 'part-finished': {
          const event = parseJson(partFinishedSchema, payload);
          if (!event || !state.handlePartFinished(event)) return null;
          return { type: 'part_finished', data: event };
        }
        case 'station': {
          const event = parseJson(stationEventSchema, payload);
          if (!event) return null;
          state.handleStation(event);
          return { type: 'station', data: event };
        }
        case 'position': {
          const record = parseJson(positionRecordSchema, payload);
          if (!record) return null;
          state.handlePosition(record);
          return { type: 'position', data: record };
        }
        default:
          return null;
      }
    }

    // Write requests are the controller's business; the observer only watches values
    case 'register_set':
    case 'unknown':
      return null;
  }
}

/** Answer a display's query from the state view; null for an invalid request */
export function processRequest(raw: Buffer | string, state: StateManager): WsResponse | null {
  const request = parseJson(wsRequestSchema, raw);
  if (!request) return null;

  switch (request.type) {
    case 'get_part':
      return { type: 'part_detail', data: state.getPart(request.partId) };
    case 'list_parts':
      return { type: 'part_list', data: state.listParts(request.status) };
  }
}

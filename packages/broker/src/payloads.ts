import { z } from 'zod';
import type { MqttPartEvent, MqttPartFinished, MqttStationEvent, PositionLogRecord, WsRequest } from '@crane-cell/shared';

// Event payloads come from another process; check them before they reach
// the state view or a display.

const partStatus = z.enum(['waiting', 'in_transit', 'processing', 'completed', 'failed']);
const stationState = z.enum(['idle', 'starting', 'running', 'completing', 'timed_out']);

const partSchema = z.object({
  id: z.number().int(),
  partType: z.string(),
  source: z.string(),
  location: z.string(),
  status: partStatus,
  createdAt: z.string(),
  history: z.array(z.object({ status: partStatus, location: z.string(), at: z.string() })),
});

export const partEventSchema = z.object({
  part: partSchema,
  timestamp: z.string(),
}) satisfies z.ZodType<MqttPartEvent>;

export const partFinishedSchema = z.object({
  partId: z.number().int(),
  status: partStatus,
  failures: z.array(z.string()),
  timestamp: z.string(),
}) satisfies z.ZodType<MqttPartFinished>;

export const stationEventSchema = z.object({
  stationId: z.string(),
  state: stationState,
  timestamp: z.string(),
}) satisfies z.ZodType<MqttStationEvent>;

export const positionRecordSchema = z.object({
  partId: z.number().int(),
  timestamp: z.string(),
  x: z.number(),
  y: z.number(),
  endEffectorEngaged: z.boolean(),
}) satisfies z.ZodType<PositionLogRecord>;

export const wsRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('get_part'), partId: z.number().int() }),
  z.object({ type: z.literal('list_parts'), status: partStatus.optional() }),
]) satisfies z.ZodType<WsRequest>;

/** Parse a JSON payload against a schema; null if either step fails */
export function parseJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: Buffer | string): T | null {
  let raw: unknown;
  try {
    raw = JSON.parse(payload.toString());
  } catch {
    return null;
  }
  const result = schema.safeParse(raw);
  return result.success ? result.data : null;
}

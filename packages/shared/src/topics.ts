// ---- Topic Layout ----
// {prefix}/registers/{address}        retained register value, published by the field device
// {prefix}/registers/{address}/set    write request, published by the controller only
// {prefix}/events/part                part status change
// {prefix}/events/part-finished       part left the active slot
// {prefix}/events/station             station state change
// {prefix}/events/position            position log record

export const DEFAULT_TOPIC_PREFIX = 'cell';

export function registerTopic(prefix: string, address: number): string {
  return `${prefix}/registers/${address}`;
}

export function registerSetTopic(prefix: string, address: number): string {
  return `${prefix}/registers/${address}/set`;
}

export function eventTopic(prefix: string, event: 'part' | 'part-finished' | 'station' | 'position'): string {
  return `${prefix}/events/${event}`;
}

export type ParsedTopic =
  | { kind: 'register'; address: number }
  | { kind: 'register_set'; address: number }
  | { kind: 'event'; event: string }
  | { kind: 'unknown' };

export function parseTopic(prefix: string, topic: string): ParsedTopic {
  const parts = topic.split('/');
  if (parts[0] !== prefix || parts.length < 3) return { kind: 'unknown' };

  if (parts[1] === 'registers') {
    const address = Number(parts[2]);
    if (!Number.isInteger(address) || address < 0) return { kind: 'unknown' };
    if (parts.length === 3) return { kind: 'register', address };
    if (parts.length === 4 && parts[3] === 'set') return { kind: 'register_set', address };
    return { kind: 'unknown' };
  }

  if (parts[1] === 'events' && parts.length === 3) {
    return { kind: 'event', event: parts[2] };
  }

  return { kind: 'unknown' };
}

/** Register payloads are plain decimal integers; anything else reads as unknown */
export function parseRegisterPayload(payload: Buffer | string): number | null {
  const text = payload.toString().trim();
  if (!/^-?\d+$/.test(text)) return null;
  return Number(text);
}

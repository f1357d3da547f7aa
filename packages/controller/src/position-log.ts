import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { once } from 'node:events';
import { createLogger, type PositionLogRecord } from '@crane-cell/shared';

const log = createLogger('position-log');

export const CSV_HEADER = 'part_id,timestamp,x,y,end_effector';

/**
 * Append-only sink for crane positions recorded while a part is held.
 */
export interface PositionLog {
  append(record: PositionLogRecord): void;
  close(): Promise<void>;
}

export function formatCsvRow(record: PositionLogRecord): string {
  return `${record.partId},${record.timestamp},${record.x},${record.y},${record.endEffectorEngaged ? 1 : 0}`;
}

/**
 * Writes records to a CSV file, adding the header only when the file is new.
 */
export class CsvPositionLog implements PositionLog {
  private constructor(
    readonly path: string,
    private readonly stream: WriteStream,
  ) {}

  static async open(path: string): Promise<CsvPositionLog> {
    await mkdir(dirname(path), { recursive: true });
    const isNew = await stat(path).then(s => s.size === 0, () => true);
    const stream = createWriteStream(path, { flags: 'a' });
    stream.on('error', err => log.error({ err, path }, 'Position log write failed'));
    if (isNew) stream.write(`${CSV_HEADER}\n`);
    log.info({ path }, 'Position logging initialized');
    return new CsvPositionLog(path, stream);
  }

  append(record: PositionLogRecord): void {
    this.stream.write(`${formatCsvRow(record)}\n`);
  }

  async close(): Promise<void> {
    if (this.stream.closed) return;
    this.stream.end();
    await once(this.stream, 'close');
    log.info({ path: this.path }, 'Position log closed');
  }
}

/** Keeps records in memory */
export class MemoryPositionLog implements PositionLog {
  readonly records: PositionLogRecord[] = [];
  closed = false;

  append(record: PositionLogRecord): void {
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Forwards every record to each sink; with no sinks logging is off */
export class FanoutPositionLog implements PositionLog {
  constructor(private readonly sinks: PositionLog[]) {}

  append(record: PositionLogRecord): void {
    for (const sink of this.sinks) sink.append(record);
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map(sink => sink.close()));
  }
}

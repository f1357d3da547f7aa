import { createLogger, type Logger, type Part, type SourceConfig } from '@crane-cell/shared';
import type { CellContext } from './cell-context.js';

/**
 * Turns source presence sensors into queued parts.
 *
 * A sensor stays at 1 for as long as the part sits on the source, so a
 * detection is dropped while a waiting part from that source is already
 * queued or holds the active slot.
 */
export class PartArrivalDetector {
  private readonly logger: Logger;

  constructor(private readonly context: CellContext) {
    this.logger = createLogger('arrival-detector');
  }

  /** Poll every source once, returning the parts that were enqueued */
  async poll(): Promise<Part[]> {
    const arrived: Part[] = [];
    for (const source of this.context.config.sources) {
      const part = await this.pollSource(source);
      if (part) arrived.push(part);
    }
    return arrived;
  }

  async pollSource(source: SourceConfig): Promise<Part | null> {
    const value = await this.context.port.read(source.presence);
    if (value !== 1) return null;
    if (this.context.hasWaitingAt(source.sourceId)) return null;

    const createdAt = this.context.timestamp();
    const part: Part = {
      id: this.context.nextPartId(),
      partType: source.partType,
      source: source.sourceId,
      location: source.sourceId,
      status: 'waiting',
      createdAt,
      history: [{ status: 'waiting', location: source.sourceId, at: createdAt }],
    };
    this.context.enqueue(part);

    this.logger.info(
      { partId: part.id, partType: part.partType, source: source.sourceId, queueDepth: this.context.queueDepth() },
      'New part detected',
    );
    this.context.emit('part-arrived', part);
    return part;
  }
}

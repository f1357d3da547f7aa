/**
 * Error types shared by the cell packages.
 */

/**
 * Thrown when the cell configuration cannot be read, parsed or validated.
 * Always fatal: the controller refuses to enter its loop.
 */
export class ConfigError extends Error {
  readonly name = 'ConfigError';
  readonly source: string | null;
  readonly issues: string[];

  constructor(source: string | null, issues: string[]) {
    const location = source ? ` (${source})` : '';
    super(`Invalid cell configuration${location}: ${issues.join('; ')}`);
    this.source = source;
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Thrown when the field-bus transport cannot be reached at startup.
 */
export class TransportError extends Error {
  readonly name = 'TransportError';
  readonly url: string;
  readonly reason: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot connect to ${url}: ${reason}`);
    this.url = url;
    this.reason = reason;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

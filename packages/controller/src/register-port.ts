/** Register contents; null when the value is unknown (transport failure, never seen, malformed) */
export type RegisterValue = number | null;

/**
 * Point-in-time access to the cell's field-bus registers.
 *
 * Implementations never throw for transport problems: a failed read
 * resolves to null and a failed write resolves to false.
 */
export interface RegisterPort {
  read(address: number): Promise<RegisterValue>;
  write(address: number, value: number): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Port reservation contract
 *
 * Ports handed out by `acquire` are exclusive to the caller until passed back
 * to `release`.
 */
export interface PortReservation {
  acquire(count: number): Promise<number[]>;
  release(ports: readonly number[]): void;
}

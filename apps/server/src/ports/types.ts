import type { PortReclamationError } from '../errors';

export interface ListeningProcess {
  port: number;
  pid: number;
  command?: string;
}

/**
 * Narrow view of the OS socket and process tables. Everything that touches
 * other processes goes through this interface.
 */
export interface ProcessTable {
  /** Processes holding a listening TCP socket on `port`; empty when there are none. */
  findListeners(port: number): Promise<ListeningProcess[]>;
  /** Sends a forceful termination signal. Resolves false when the process is already gone. */
  terminate(process: ListeningProcess): Promise<boolean>;
}

export type ReclaimResult =
  | { outcome: 'not-found'; port: number }
  | {
      outcome: 'terminated';
      port: number;
      processes: ListeningProcess[];
      failures: PortReclamationError[];
    }
  | { outcome: 'failed'; port: number; error: PortReclamationError };

export interface PortReclaimer {
  reclaim(port: number): Promise<ReclaimResult>;
}

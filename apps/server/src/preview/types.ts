export type ServerState = 'STARTING' | 'SERVING' | 'STOPPING' | 'STOPPED';

export interface PreviewServerStatus {
  status: ServerState;
  rootDirectory: string;
  port?: number;
  url?: string;
  uptime?: number;
  error?: string;
}

export interface PreviewServerOptions {
  port: number;
  rootDirectory: string;
  /** Bind address; all interfaces when omitted. */
  host?: string;
  shutdownTimeoutMs?: number;
  logRequests?: boolean;
}

export interface PreviewAppOptions {
  rootDirectory: string;
  logRequests?: boolean;
}

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

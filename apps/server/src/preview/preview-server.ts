import { EventEmitter } from 'events';
import { promises as fs, constants as fsConstants } from 'fs';
import { createServer, type Server } from 'http';
import { resolve } from 'path';
import { BindError, DirectoryUnreadableError, errorCode, errorMessage } from '../errors';
import { createPreviewApp } from './static-app';
import { SHUTDOWN_SIGNALS, type PreviewServerOptions, type PreviewServerStatus, type ServerState } from './types';

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10000;

export type SignalSource = NodeJS.EventEmitter;

export function displayHost(host?: string): string {
  if (!host || host === '0.0.0.0' || host === '::') {
    return 'localhost';
  }
  return host.includes(':') ? `[${host}]` : host;
}

async function assertReadableDirectory(rootDirectory: string): Promise<void> {
  try {
    const stats = await fs.stat(rootDirectory);
    if (!stats.isDirectory()) {
      throw new DirectoryUnreadableError(rootDirectory, 'ENOTDIR');
    }
    await fs.access(rootDirectory, fsConstants.R_OK | fsConstants.X_OK);
  } catch (error) {
    if (error instanceof DirectoryUnreadableError) {
      throw error;
    }
    throw new DirectoryUnreadableError(rootDirectory, errorCode(error));
  }
}

function listen(server: Server, port: number, host?: string): Promise<void> {
  return new Promise((resolveListen, rejectListen) => {
    const onError = (error: Error) => {
      rejectListen(error);
    };
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      resolveListen();
    });
  });
}

/**
 * Supervises one static file server at a time.
 *
 * STARTING -> SERVING -> STOPPING -> STOPPED, or STARTING -> STOPPED when the
 * directory check or the bind fails. A new session may start once STOPPED.
 */
export class PreviewServer extends EventEmitter {
  private state: ServerState = 'STOPPED';
  private server: Server | undefined;
  private port: number | undefined;
  private startTime: number | undefined;
  private lastError: Error | undefined;
  private readonly rootDirectory: string;
  private readonly options: PreviewServerOptions;

  constructor(options: PreviewServerOptions) {
    super();
    this.options = options;
    this.rootDirectory = resolve(options.rootDirectory);
  }

  getStatus(): PreviewServerStatus {
    const status: PreviewServerStatus = {
      status: this.state,
      rootDirectory: this.rootDirectory,
    };

    if (this.port !== undefined) {
      status.port = this.port;
      status.url = `http://${displayHost(this.options.host)}:${this.port}`;
    }

    if (this.startTime !== undefined) {
      status.uptime = Date.now() - this.startTime;
    }

    if (this.lastError) {
      status.error = this.lastError.message;
    }

    return status;
  }

  async start(): Promise<void> {
    if (this.state !== 'STOPPED') {
      throw new Error(`Preview server is already ${this.state.toLowerCase()}`);
    }

    this.lastError = undefined;
    this.setState('STARTING');

    const { port, host } = this.options;
    const server = createServer(
      createPreviewApp({ rootDirectory: this.rootDirectory, logRequests: this.options.logRequests })
    );

    try {
      await assertReadableDirectory(this.rootDirectory);
      await listen(server, port, host);
    } catch (error) {
      this.lastError =
        error instanceof DirectoryUnreadableError ? error : new BindError(port, errorCode(error), errorMessage(error));
      this.setState('STOPPED');
      throw this.lastError;
    }

    server.on('error', (error) => {
      console.error('[PREVIEW] Server error:', error.message);
    });

    const address = server.address();
    this.port = typeof address === 'object' && address !== null ? address.port : port;
    this.server = server;
    this.startTime = Date.now();
    this.setState('SERVING');
    this.emit('ready', { port: this.port, url: this.getStatus().url });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (this.state !== 'SERVING' || !server) {
      return;
    }

    this.setState('STOPPING');
    this.emit('stopping');

    const timeoutMs = this.options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;

    await new Promise<void>((resolveClose, rejectClose) => {
      const timer = setTimeout(() => {
        console.warn(`[PREVIEW] Connections still open after ${timeoutMs}ms; closing them`);
        server.closeAllConnections();
      }, timeoutMs);

      server.close((error) => {
        clearTimeout(timer);
        if (error) {
          rejectClose(error);
        } else {
          resolveClose();
        }
      });
      server.closeIdleConnections();
    }).finally(() => {
      this.server = undefined;
      this.port = undefined;
      this.startTime = undefined;
      this.setState('STOPPED');
    });

    this.emit('stopped');
  }

  /** Closes every open connection, in-flight responses included. */
  forceClose(): void {
    this.server?.closeAllConnections();
  }

  /**
   * Starts the server and blocks until a shutdown signal arrives, then stops
   * it. Resolves to the process exit code: 0 after a clean stop, 1 when the
   * server could not start.
   */
  async run(signals: SignalSource = process): Promise<number> {
    // Listen before starting so a signal that arrives mid-start is not lost
    const interrupted = waitForSignal(signals);

    try {
      await this.start();
    } catch (error) {
      interrupted.cancel();
      console.error(`[PREVIEW] ${errorMessage(error)}`);
      return 1;
    }

    const signal = await interrupted.signal;
    console.log(`\n[PREVIEW] Received ${signal}. Shutting down gracefully...`);

    const removeForceHandlers = onSignals(signals, (second) => {
      console.warn(`[PREVIEW] Received ${second} again; closing open connections`);
      this.forceClose();
    });

    try {
      await this.stop();
    } catch (error) {
      console.error(`[PREVIEW] Shutdown failed: ${errorMessage(error)}`);
      return 1;
    } finally {
      removeForceHandlers();
    }

    console.log('[PREVIEW] Server stopped');
    return 0;
  }

  private setState(state: ServerState): void {
    this.state = state;
    this.emit('stateChange', state);
  }
}

/**
 * Calls `handler` for the first shutdown signal only. Returns a function that
 * removes the handlers if none has fired.
 */
function onSignals(signals: SignalSource, handler: (signal: NodeJS.Signals) => void): () => void {
  const listeners = SHUTDOWN_SIGNALS.map((name) => ({ name, listener: () => fire(name) }));
  const remove = () => {
    for (const { name, listener } of listeners) {
      signals.off(name, listener);
    }
  };
  const fire = (signal: NodeJS.Signals) => {
    remove();
    handler(signal);
  };
  for (const { name, listener } of listeners) {
    signals.on(name, listener);
  }
  return remove;
}

function waitForSignal(signals: SignalSource): { signal: Promise<NodeJS.Signals>; cancel: () => void } {
  let cancel = () => {};
  const signal = new Promise<NodeJS.Signals>((resolveSignal) => {
    cancel = onSignals(signals, resolveSignal);
  });
  return { signal, cancel };
}

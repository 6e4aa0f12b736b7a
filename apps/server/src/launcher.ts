import type { LauncherConfig } from './config';
import { PortReaper } from './ports/port-reaper';
import type { PortReclaimer } from './ports/types';
import { PreviewServer, displayHost, type SignalSource } from './preview/preview-server';

export interface LaunchDependencies {
  reaper?: PortReclaimer;
  signals?: SignalSource;
  createServer?: (config: LauncherConfig) => PreviewServer;
}

export function bannerLines(config: Pick<LauncherConfig, 'port' | 'host'>): string[] {
  return [`Starting local server at http://${displayHost(config.host)}:${config.port}`, 'Press Ctrl+C to stop'];
}

/**
 * Frees the configured port, announces the URL and serves until interrupted.
 * Resolves to the exit code for the process.
 */
export async function launch(config: LauncherConfig, deps: LaunchDependencies = {}): Promise<number> {
  const reaper = deps.reaper ?? new PortReaper();
  await reaper.reclaim(config.port);

  for (const line of bannerLines(config)) {
    console.log(line);
  }

  const server = deps.createServer
    ? deps.createServer(config)
    : new PreviewServer({
        port: config.port,
        host: config.host,
        rootDirectory: config.rootDirectory,
        shutdownTimeoutMs: config.shutdownTimeoutMs,
        logRequests: config.logRequests,
      });

  return server.run(deps.signals);
}

import killPort from 'kill-port';
import { InvalidPortError, PortReclamationError, errorMessage } from '../errors';
import { LsofProcessTable } from './lsof-process-table';
import type { ListeningProcess, PortReclaimer, ProcessTable, ReclaimResult } from './types';

export type KillPortFn = (port: number) => Promise<unknown>;

export interface PortReaperOptions {
  processTable?: ProcessTable;
  platform?: NodeJS.Platform;
  killPort?: KillPortFn;
  /** Never signalled, even when it holds the port. Defaults to the current process. */
  ownPid?: number;
}

const TASKKILL_SUCCESS = /SUCCESS: The process with PID (\d+) has been terminated/g;
const TASKKILL_WITH_PID = /\/PID \d+/;

export function assertValidPort(port: number): void {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidPortError(port);
  }
}

/**
 * Frees a TCP port by forcefully terminating whatever is listening on it.
 * Runtime failures resolve as a `failed` result instead of rejecting: the
 * subsequent bind is what decides whether the port is usable.
 */
export class PortReaper implements PortReclaimer {
  private processTable: ProcessTable;
  private platform: NodeJS.Platform;
  private killPort: KillPortFn;
  private ownPid: number;

  constructor(options: PortReaperOptions = {}) {
    this.processTable = options.processTable ?? new LsofProcessTable();
    this.platform = options.platform ?? process.platform;
    this.killPort = options.killPort ?? ((port) => killPort(port));
    this.ownPid = options.ownPid ?? process.pid;
  }

  async reclaim(port: number): Promise<ReclaimResult> {
    assertValidPort(port);

    const result =
      this.platform === 'win32' ? await this.reclaimWithKillPort(port) : await this.reclaimWithProcessTable(port);

    logResult(result);
    return result;
  }

  private async reclaimWithProcessTable(port: number): Promise<ReclaimResult> {
    let listeners: ListeningProcess[];
    try {
      listeners = await this.processTable.findListeners(port);
    } catch (error) {
      return { outcome: 'failed', port, error: toReclamationError(port, error) };
    }

    const targets = listeners.filter((listener) => listener.pid !== this.ownPid);
    if (targets.length < listeners.length) {
      console.log(`[PORTS] Port ${port} is held by this process; leaving it alone`);
    }
    if (targets.length === 0) {
      return { outcome: 'not-found', port };
    }

    const processes: ListeningProcess[] = [];
    const failures: PortReclamationError[] = [];

    for (const target of targets) {
      try {
        if (await this.processTable.terminate(target)) {
          processes.push(target);
        }
      } catch (error) {
        failures.push(toReclamationError(port, error));
      }
    }

    if (processes.length > 0) {
      return { outcome: 'terminated', port, processes, failures };
    }
    if (failures.length > 0) {
      return { outcome: 'failed', port, error: failures[0] };
    }
    // Every listener exited between the query and the signal
    return { outcome: 'not-found', port };
  }

  private async reclaimWithKillPort(port: number): Promise<ReclaimResult> {
    let output: ShellOutput;
    try {
      output = readShellOutput(await this.killPort(port));
    } catch (error) {
      return { outcome: 'failed', port, error: toReclamationError(port, error) };
    }

    const killed = [...output.stdout.matchAll(TASKKILL_SUCCESS)].map((match) => Number.parseInt(match[1], 10));
    if (killed.length > 0) {
      return { outcome: 'terminated', port, processes: killed.map((pid) => ({ port, pid })), failures: [] };
    }

    if (output.cmd.startsWith('TaskKill')) {
      // netstat listed no pid, so TaskKill ran without one
      if (!TASKKILL_WITH_PID.test(output.cmd)) {
        return { outcome: 'not-found', port };
      }
    } else if (!output.stderr.trim() && (output.code ?? 0) === 0) {
      // kill-port stops after an empty netstat
      return { outcome: 'not-found', port };
    }

    const detail = output.stderr.trim() || `exit code ${output.code ?? 'unknown'}`;
    return {
      outcome: 'failed',
      port,
      error: new PortReclamationError(port, `Could not reclaim port ${port}: ${detail}`),
    };
  }
}

interface ShellOutput {
  stdout: string;
  stderr: string;
  cmd: string;
  code?: number;
}

/** kill-port resolves with the shell-exec result of its last command on Windows. */
function readShellOutput(value: unknown): ShellOutput {
  const output: ShellOutput = { stdout: '', stderr: '', cmd: '' };
  if (typeof value !== 'object' || value === null) {
    return output;
  }
  if ('stdout' in value && typeof value.stdout === 'string') {
    output.stdout = value.stdout;
  }
  if ('stderr' in value && typeof value.stderr === 'string') {
    output.stderr = value.stderr;
  }
  if ('cmd' in value && typeof value.cmd === 'string') {
    output.cmd = value.cmd;
  }
  if ('code' in value && typeof value.code === 'number') {
    output.code = value.code;
  }
  return output;
}

function toReclamationError(port: number, error: unknown): PortReclamationError {
  if (error instanceof PortReclamationError) {
    return error;
  }
  return new PortReclamationError(port, `Could not reclaim port ${port}: ${errorMessage(error)}`, error);
}

function describeListener(listener: ListeningProcess): string {
  return listener.command ? `${listener.pid} (${listener.command})` : `${listener.pid}`;
}

function logResult(result: ReclaimResult): void {
  switch (result.outcome) {
    case 'not-found':
      console.log(`[PORTS] Port ${result.port} is free`);
      break;
    case 'terminated':
      if (result.processes.length > 0) {
        console.log(`[PORTS] Killed process ${result.processes.map(describeListener).join(', ')} on port ${result.port}`);
      } else {
        console.log(`[PORTS] Killed process on port ${result.port}`);
      }
      for (const failure of result.failures) {
        console.warn(`[PORTS] ${failure.message}`);
      }
      break;
    case 'failed':
      console.warn(`[PORTS] ${result.error.message}; continuing anyway`);
      break;
  }
}

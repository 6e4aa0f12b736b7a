import { execFile } from 'child_process';
import { promisify } from 'util';
import { PortReclamationError, errorCode, errorMessage } from '../errors';
import type { ListeningProcess, ProcessTable } from './types';

const execFileAsync = promisify(execFile);

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string }>;
export type SignalSender = (pid: number, signal: NodeJS.Signals) => void;

export interface LsofProcessTableOptions {
  run?: CommandRunner;
  kill?: SignalSender;
}

const defaultRun: CommandRunner = (file, args) => execFileAsync(file, args, { encoding: 'utf8' });
const defaultKill: SignalSender = (pid, signal) => {
  process.kill(pid, signal);
};

/**
 * Parses `lsof -F pc` output: a `p<pid>` line opens each process, `c<command>`
 * names it, and every other field line is ignored.
 */
export function parseLsofOutput(port: number, stdout: string): ListeningProcess[] {
  const processes: ListeningProcess[] = [];
  let current: ListeningProcess | undefined;

  for (const line of stdout.split('\n')) {
    const field = line.charAt(0);
    const value = line.slice(1).trim();

    if (field === 'p') {
      const pid = Number.parseInt(value, 10);
      if (!Number.isInteger(pid) || pid <= 0) {
        current = undefined;
        continue;
      }
      current = processes.find((entry) => entry.pid === pid);
      if (!current) {
        current = { port, pid };
        processes.push(current);
      }
    } else if (field === 'c' && current && value) {
      current.command = value;
    }
  }

  return processes;
}

export class LsofProcessTable implements ProcessTable {
  private run: CommandRunner;
  private kill: SignalSender;

  constructor(options: LsofProcessTableOptions = {}) {
    this.run = options.run ?? defaultRun;
    this.kill = options.kill ?? defaultKill;
  }

  async findListeners(port: number): Promise<ListeningProcess[]> {
    try {
      const { stdout } = await this.run('lsof', ['-nP', `-iTCP:${port}`, '-sTCP:LISTEN', '-Fpc']);
      return parseLsofOutput(port, stdout);
    } catch (error) {
      // lsof exits 1 when nothing matches, and also after warnings about
      // files it could not read; any pids it printed are still listeners
      const listeners = parseLsofOutput(port, stdoutOf(error));
      if (listeners.length > 0) {
        return listeners;
      }
      if (isExitStatus(error, 1)) {
        return [];
      }
      const code = errorCode(error);
      const reason = code === 'ENOENT' ? 'lsof is not installed' : errorMessage(error);
      throw new PortReclamationError(port, `Could not query listeners on port ${port}: ${reason}`, error);
    }
  }

  async terminate(listener: ListeningProcess): Promise<boolean> {
    try {
      this.kill(listener.pid, 'SIGKILL');
      return true;
    } catch (error) {
      if (errorCode(error) === 'ESRCH') {
        return false;
      }
      throw new PortReclamationError(
        listener.port,
        `Could not terminate process ${listener.pid} on port ${listener.port}: ${errorMessage(error)}`,
        error
      );
    }
  }
}

function isExitStatus(error: unknown, status: number): boolean {
  return error instanceof Error && 'code' in error && error.code === status;
}

function stdoutOf(error: unknown): string {
  return error instanceof Error && 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
}

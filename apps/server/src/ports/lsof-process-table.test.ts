import { describe, it, expect, vi } from 'vitest';
import { PortReclamationError } from '../errors.js';
import { LsofProcessTable, parseLsofOutput } from './lsof-process-table.js';

function exitError(code: number | string, stdout = '', stderr = ''): Error {
  return Object.assign(new Error(`Command failed with ${code}`), { code, stdout, stderr });
}

describe('parseLsofOutput', () => {
  it('should read pid and command fields', () => {
    const stdout = 'p4242\ncpython3\nf3\np5151\ncnode\nf21\nf22\n';
    expect(parseLsofOutput(8000, stdout)).toEqual([
      { port: 8000, pid: 4242, command: 'python3' },
      { port: 8000, pid: 5151, command: 'node' },
    ]);
  });

  it('should merge repeated pids', () => {
    expect(parseLsofOutput(8000, 'p10\ncnode\np10\n')).toEqual([{ port: 8000, pid: 10, command: 'node' }]);
  });

  it('should skip malformed pids and their fields', () => {
    expect(parseLsofOutput(8000, 'pabc\ncghost\np7\n')).toEqual([{ port: 8000, pid: 7 }]);
  });

  it('should return nothing for empty output', () => {
    expect(parseLsofOutput(8000, '')).toEqual([]);
  });
});

describe('LsofProcessTable', () => {
  describe('findListeners', () => {
    it('should ask lsof for listening TCP sockets on the port', async () => {
      const run = vi.fn().mockResolvedValue({ stdout: 'p99\ncpython3\n' });
      const table = new LsofProcessTable({ run });

      await expect(table.findListeners(8000)).resolves.toEqual([{ port: 8000, pid: 99, command: 'python3' }]);
      expect(run).toHaveBeenCalledWith('lsof', ['-nP', '-iTCP:8000', '-sTCP:LISTEN', '-Fpc']);
    });

    it('should treat exit status 1 without output as no listeners', async () => {
      const run = vi.fn().mockRejectedValue(exitError(1));
      const table = new LsofProcessTable({ run });

      await expect(table.findListeners(8000)).resolves.toEqual([]);
    });

    it('should report a missing lsof binary', async () => {
      const run = vi.fn().mockRejectedValue(exitError('ENOENT'));
      const table = new LsofProcessTable({ run });

      await expect(table.findListeners(8000)).rejects.toThrow(
        'Could not query listeners on port 8000: lsof is not installed'
      );
    });

    it('should keep pids printed before a non-zero exit', async () => {
      const run = vi
        .fn()
        .mockRejectedValue(exitError(1, 'p77\ncnode\nf20\n', 'lsof: WARNING: can\'t stat() fuse.portal file system\n'));
      const table = new LsofProcessTable({ run });

      await expect(table.findListeners(8000)).resolves.toEqual([{ port: 8000, pid: 77, command: 'node' }]);
    });

    it('should treat warnings without pids as no listeners', async () => {
      const run = vi.fn().mockRejectedValue(exitError(1, '', 'lsof: WARNING: can\'t stat() fuse.portal file system\n'));
      const table = new LsofProcessTable({ run });

      await expect(table.findListeners(8000)).resolves.toEqual([]);
    });

    it('should report other lsof failures', async () => {
      const run = vi.fn().mockRejectedValue(exitError('EACCES', '', ''));
      const table = new LsofProcessTable({ run });

      await expect(table.findListeners(8000)).rejects.toBeInstanceOf(PortReclamationError);
      await expect(table.findListeners(8000)).rejects.toThrow(
        'Could not query listeners on port 8000: Command failed with EACCES'
      );
    });
  });

  describe('terminate', () => {
    it('should send SIGKILL to the pid', async () => {
      const kill = vi.fn();
      const table = new LsofProcessTable({ kill });

      await expect(table.terminate({ port: 8000, pid: 1234 })).resolves.toBe(true);
      expect(kill).toHaveBeenCalledWith(1234, 'SIGKILL');
    });

    it('should report a process that is already gone', async () => {
      const kill = vi.fn(() => {
        throw exitError('ESRCH');
      });
      const table = new LsofProcessTable({ kill });

      await expect(table.terminate({ port: 8000, pid: 1234 })).resolves.toBe(false);
    });

    it('should fail when the signal is not permitted', async () => {
      const kill = vi.fn(() => {
        throw exitError('EPERM');
      });
      const table = new LsofProcessTable({ kill });

      await expect(table.terminate({ port: 8000, pid: 1 })).rejects.toThrow(
        'Could not terminate process 1 on port 8000: Command failed with EPERM'
      );
    });
  });
});

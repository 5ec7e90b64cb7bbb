import { spawn } from 'node:child_process';
import { ToolConfigurationError, ToolTimeoutError } from '@gps-sim-prep/domain';
import type { SignalToolRunnerPort, ToolRunOptions, ToolRunResult } from '@gps-sim-prep/domain';

export class ChildProcessToolRunner implements SignalToolRunnerPort {
  run(toolPath: string, args: readonly string[], opts: ToolRunOptions): Promise<ToolRunResult> {
    return new Promise<ToolRunResult>((resolve, reject) => {
      const child = spawn(toolPath, args, {
        cwd: opts.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        child.kill('SIGKILL');
        reject(new ToolTimeoutError(opts.timeoutMs));
      }, opts.timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (err: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        const detail =
          err.code === 'ENOENT'
            ? 'executable not found'
            : err.code === 'EACCES'
              ? 'permission denied'
              : err.message;
        reject(new ToolConfigurationError(toolPath, detail, { cause: err }));
      });

      child.on('close', (exitCode, signal) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({
          exitCode,
          signal,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
        });
      });
    });
  }
}

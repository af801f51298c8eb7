import { spawn } from 'child_process';

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  env?: Record<string, string>;
  cwd?: string;
  /** Receives stdout and stderr chunks as they arrive */
  onData?: (chunk: string) => void;
};

export type ExecFn = (cmd: string, args: string[], opts?: ExecOptions) => Promise<ExecResult>;

/**
 * Run a command to completion and collect its output.
 * A missing binary resolves with exit code 127 instead of rejecting.
 */
export const execCmd: ExecFn = (cmd, args, opts = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      env: { ...process.env, ...(opts.env ?? {}) },
      cwd: opts.cwd,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';

    child.stdout?.on('data', (d: Buffer) => {
      const out = d.toString();
      stdout += out;
      opts.onData?.(out);
    });
    child.stderr?.on('data', (d: Buffer) => {
      const out = d.toString();
      stderr += out;
      opts.onData?.(out);
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') {
        resolve({
          code: 127,
          stdout: '',
          stderr: `Command not found: ${cmd}`
        });
      } else {
        reject(err);
      }
    });

    child.on('close', (code: number | null) => {
      resolve({
        code: code ?? 1,
        stdout: stdout.trim(),
        stderr: stderr.trim()
      });
    });
  });
};

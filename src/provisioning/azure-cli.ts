import chalk from 'chalk';
import { execCmd, ExecFn, ExecResult } from './exec';
import { redact } from '../config/credentials';

/**
 * An `az` invocation. Values listed in `secrets` are masked wherever the
 * command line is displayed.
 */
export interface AzCommand {
  args: string[];
  secrets: string[];
}

export interface AzureCliOptions {
  /** Echo every command line (secrets masked) before running it */
  verbose?: boolean;
  /** Name or path of the az binary */
  binary?: string;
  exec?: ExecFn;
}

export function formatCommand(command: AzCommand, binary: string = 'az'): string {
  const line = [binary, ...command.args]
    .map(arg => (/[\s"']/.test(arg) ? JSON.stringify(arg) : arg))
    .join(' ');
  return redact(line, command.secrets);
}

/**
 * Echoes az output to stderr a line at a time so a secret split across two
 * chunks is still masked
 */
function createRedactingEcho(secrets: readonly string[]): { write: (chunk: string) => void; flush: () => void } {
  let pending = '';

  return {
    write: chunk => {
      pending += chunk;
      const end = pending.lastIndexOf('\n');
      if (end === -1) {
        return;
      }
      process.stderr.write(redact(pending.slice(0, end + 1), secrets));
      pending = pending.slice(end + 1);
    },
    flush: () => {
      if (pending) {
        process.stderr.write(redact(pending, secrets));
        pending = '';
      }
    }
  };
}

/**
 * Thin wrapper over the az binary. Every call blocks until az exits; there is
 * no timeout and no retry.
 */
export class AzureCli {
  private readonly binary: string;
  private readonly exec: ExecFn;
  private readonly verbose: boolean;

  constructor(options: AzureCliOptions = {}) {
    this.binary = options.binary ?? 'az';
    this.exec = options.exec ?? execCmd;
    this.verbose = options.verbose ?? false;
  }

  async run(command: AzCommand): Promise<ExecResult> {
    if (!this.verbose) {
      return this.mask(await this.exec(this.binary, command.args, {}), command.secrets);
    }

    console.error(chalk.gray(`$ ${formatCommand(command, this.binary)}`));
    const echo = createRedactingEcho(command.secrets);
    try {
      return this.mask(await this.exec(this.binary, command.args, { onData: echo.write }), command.secrets);
    } finally {
      echo.flush();
    }
  }

  private mask(result: ExecResult, secrets: readonly string[]): ExecResult {
    return {
      code: result.code,
      stdout: redact(result.stdout, secrets),
      stderr: redact(result.stderr, secrets)
    };
  }
}

/**
 * Parse az `--output json` output, returning undefined when it is not JSON
 */
export function parseJsonOutput(stdout: string): unknown {
  if (!stdout) {
    return undefined;
  }
  try {
    return JSON.parse(stdout);
  } catch {
    return undefined;
  }
}

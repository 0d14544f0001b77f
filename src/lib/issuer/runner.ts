import { spawn } from 'child_process';
import { mkdirSync } from 'fs';
import type { HelperConfig } from '../config.js';
import { IssuanceError, NotFoundError } from '../errors/helper-errors.js';
import { debugIssuer } from '../utils/debug.js';

/**
 * Runs the external issuance tool. The tool owns ACME negotiation, retries
 * and rate limits; a runner only reports how it exited.
 */
export interface IssuerRunner {
  /** @returns process exit status */
  run(command: string, args: string[], cwd: string): Promise<number>;
}

/** Error raised by a runner when the executable cannot be started */
export class SpawnError extends Error {
  constructor(
    message: string,
    public readonly errno?: string,
  ) {
    super(message);
    this.name = 'SpawnError';
  }
}

/** Spawns the tool as a child process sharing this terminal */
export class SpawnIssuerRunner implements IssuerRunner {
  run(command: string, args: string[], cwd: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, { cwd, stdio: 'inherit' });

      proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        debugIssuer('%s exited code=%s signal=%s', command, code, signal);
        resolve(code ?? 1);
      });

      proc.on('error', (err: NodeJS.ErrnoException) => {
        reject(new SpawnError(`Failed to spawn ${command}: ${err.message}`, err.code));
      });
    });
  }
}

export interface RunIssuanceOptions {
  runner?: IssuerRunner;
  /** Ask the tool for verbose output */
  debug?: boolean;
}

/**
 * Make sure the certificate directory exists, then run the issuance tool
 * inside it (the tool writes its output files to the working directory).
 */
export async function runIssuance(
  config: Pick<HelperConfig, 'certsDir' | 'issuerCommand'>,
  args: string[],
  opts: RunIssuanceOptions = {},
): Promise<void> {
  const { runner = new SpawnIssuerRunner(), debug = false } = opts;
  mkdirSync(config.certsDir, { recursive: true });

  const finalArgs = debug ? [...args, '-vv'] : [...args];
  debugIssuer('running %s in %s args=%o', config.issuerCommand, config.certsDir, finalArgs);

  let exitCode: number;
  try {
    exitCode = await runner.run(config.issuerCommand, finalArgs, config.certsDir);
  } catch (err) {
    if (err instanceof SpawnError && err.errno === 'ENOENT') {
      throw NotFoundError.executable(config.issuerCommand);
    }
    throw err;
  }
  if (exitCode !== 0) throw new IssuanceError(config.issuerCommand, exitCode);
}

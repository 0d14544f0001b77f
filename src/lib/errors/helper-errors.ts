/**
 * Typed errors raised by the setup helper.
 *
 * Every error is terminal for the current run: the CLI reports it and exits
 * with a non-zero status. Nothing here is retried.
 */

/**
 * Base class for all helper errors
 */
export abstract class HelperError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A directory, file or executable the run depends on is missing
 */
export class NotFoundError extends HelperError {
  readonly code = 'NOT_FOUND';

  static nginxDir(dir: string): NotFoundError {
    return new NotFoundError(
      `Could not locate nginx conf dir at ${dir}. Please provide correct location ` +
        `(--nginx-dir) or set env var NGINX_CONF=<correct_dir>`,
      { path: dir },
    );
  }

  static executable(command: string): NotFoundError {
    return new NotFoundError(
      `Could not run ${command}. Install it or point SIMP_LE=<path> at the executable`,
      { command },
    );
  }
}

/**
 * Malformed input: a configuration line or a missing required option
 */
export class ValidationError extends HelperError {
  readonly code = 'VALIDATION';

  static serverName(file: string, line: number): ValidationError {
    return new ValidationError(`Invalid \`server_name\` section in ${file}:${line}`, {
      file,
      line,
    });
  }

  static missingDomainSource(): ValidationError {
    return new ValidationError('Either --nginx-files or --domains are required', {
      options: ['nginx-files', 'domains'],
    });
  }

  static noDomains(): ValidationError {
    return new ValidationError('No domains to secure, check the `server_name` directives');
  }
}

/**
 * Target already exists and the operator declined to overwrite it
 */
export class ConflictError extends HelperError {
  readonly code = 'CONFLICT';

  static exists(path: string): ConflictError {
    return new ConflictError(`Cowardly escape! ${path} already exists and was left untouched`, {
      path,
    });
  }
}

/** Single failed reachability check */
export interface VerificationFailure {
  domain: string;
  /** HTTP status, absent when the request itself failed */
  status?: number;
  reason: string;
}

/**
 * One or more domains did not answer the challenge path with 404
 */
export class VerificationError extends HelperError {
  readonly code = 'VERIFICATION';

  constructor(public readonly failures: VerificationFailure[]) {
    super(`Errors found:\n\n${failures.map((f) => f.reason).join('\n')}`, {
      domains: failures.map((f) => f.domain),
    });
  }
}

/**
 * Certificate artifacts expected from the issuance tool are absent
 */
export class PreconditionError extends HelperError {
  readonly code = 'PRECONDITION';

  static missingCertificates(certsDir: string, missing: string[]): PreconditionError {
    return new PreconditionError(
      `Certificate files missing in ${certsDir} (${missing.join(', ')}), please run the ` +
        '`issue` sub-command first (or if it is your first time, follow the interactive ' +
        'guide in the main command).',
      { certsDir, missing },
    );
  }
}

/**
 * The issuance tool ran but exited with a failure status
 */
export class IssuanceError extends HelperError {
  readonly code = 'ISSUANCE';

  constructor(
    public readonly command: string,
    public readonly exitCode: number,
  ) {
    super(`${command} exited with status ${exitCode}`, { command, exitCode });
  }
}

/**
 * Operator chose to stop at a confirmation step
 */
export class AbortError extends HelperError {
  readonly code = 'ABORTED';
}

export type HelperErrorType =
  | NotFoundError
  | ValidationError
  | ConflictError
  | VerificationError
  | PreconditionError
  | IssuanceError
  | AbortError;

export function isHelperError(error: unknown): error is HelperErrorType {
  return error instanceof HelperError;
}

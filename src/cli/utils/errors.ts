import chalk from 'chalk';
import {
  AbortError,
  ConflictError,
  HelperError,
  PreconditionError,
  VerificationError,
} from '../../lib/errors/helper-errors.js';

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (error instanceof AbortError) {
    console.error('\n' + chalk.yellow(error.message));
  } else if (error instanceof VerificationError) {
    console.error('\n' + chalk.red('Domain verification failed'));
    error.failures.forEach((f) => console.error('  - ' + f.reason));
    console.error(chalk.gray('Fix the listed hosts or answer "yes" to skip verification.'));
  } else if (error instanceof ConflictError || error instanceof PreconditionError) {
    console.error(chalk.yellow('Stopped:'), error.message);
  } else if (error instanceof HelperError) {
    console.error(chalk.red('Error:'), error.message);
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}

import chalk from 'chalk';
import ora from 'ora';

/** Progress indicator around a network step */
export interface Progress {
  succeed(text: string): void;
  fail(text: string): void;
}

export function startProgress(text: string): Progress {
  const spinner = ora(text).start();
  return {
    succeed: (done) => {
      spinner.succeed(chalk.green(done));
    },
    fail: (failed) => {
      spinner.fail(chalk.red(failed));
    },
  };
}

/** Title of a setup step */
export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

const SNIPPET_RULE = chalk.gray('-'.repeat(60));

export const render = {
  line(msg = '') {
    console.log(msg);
  },
  success(msg: string) {
    console.log(chalk.green('✔ ' + msg));
  },
  info(msg: string) {
    console.log(chalk.cyan(msg));
  },
  /** Progress and debug detail */
  dim(msg: string) {
    console.log(chalk.gray(msg));
  },
  warn(msg: string) {
    console.log(chalk.yellow(msg));
  },
  /** Domains or file paths, one per line */
  list(values: string[]) {
    values.forEach((v) => console.log('  * ' + chalk.white(v)));
  },
  /** Configuration the operator pastes into nginx, between rules */
  snippet(text: string) {
    console.log(SNIPPET_RULE);
    console.log(chalk.white(text.replace(/^\n+|\n+$/g, '')));
    console.log(SNIPPET_RULE);
  },
};

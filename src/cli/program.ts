import { Command } from 'commander';
import { getPackageInfo } from '../lib/utils/package-info.js';
import { handleError } from './utils/errors.js';
import { createContext, type CliDependencies } from './context.js';
import { handleConfigureSslCommand } from './commands/configure-ssl.js';
import { handleConfirmDomainsCommand } from './commands/confirm-domains.js';
import { handleGenerateRenewScriptCommand } from './commands/generate-renew-script.js';
import { handleGetFilesCommand } from './commands/get-files.js';
import { handleIssueCommand } from './commands/issue.js';
import { handleSetupCommand } from './commands/setup.js';

interface RootCliOptions {
  debug?: boolean;
  yes?: boolean;
  nginxDir?: string;
  email?: string;
  saveTo?: string;
  verify?: boolean;
  skipCheck?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Build a Commander program instance for the nginx-le CLI. */
export function createCli(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('nginx-le')
    .description("Step-by-step Let's Encrypt certificate setup for nginx")
    .version(getPackageInfo().version)
    .enablePositionalOptions();

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.NGINX_LE_CLI_TEST) {
    program.exitOverride();
  }

  // Helper deciding whether to exit (skip during tests)
  function exitOnError() {
    if (process.env.NGINX_LE_CLI_TEST) return;
    process.exit(1);
  }

  async function guarded(fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (e) {
      handleError(e);
      exitOnError();
    }
  }

  program
    .option('--debug', 'Print extra diagnostics and run the tool verbosely', false)
    .option('-y, --yes', 'Confirm all prompts with default action', false)
    .option('--nginx-dir <dir>', 'Location of nginx configuration')
    .option('--email <email>', "Let's Encrypt account email")
    .option('-s, --save-to <path>', 'Where to save the renew script')
    .option('--verify', 'Check domain reachability even with --yes')
    .option('--skip-check', 'Do not look for certificate files before printing the TLS section')
    .action((opts: RootCliOptions) =>
      guarded(() =>
        handleSetupCommand(
          {
            debug: opts.debug,
            yes: opts.yes,
            nginxDir: opts.nginxDir,
            email: opts.email,
            saveTo: opts.saveTo,
            verify: opts.verify,
            skipCheck: opts.skipCheck,
          },
          createContext(opts, deps),
        ),
      ),
    );

  program
    .command('get-files')
    .description('Find nginx configuration files and guide adding the challenge section')
    .option('--nginx-dir <dir>', 'Location of nginx configuration')
    .option('-y, --yes', 'Confirm all prompts with default action', false)
    .action((opts: { nginxDir?: string; yes?: boolean }) =>
      guarded(() =>
        handleGetFilesCommand(
          { nginxDir: opts.nginxDir, yes: opts.yes },
          createContext(opts, deps),
        ),
      ),
    );

  program
    .command('confirm-domains')
    .description('Collect server_name values and make sure challenge urls return 404')
    .option('-n, --nginx-files <file>', 'nginx configuration file (repeatable)', collect, [])
    .option('-d, --domains <domain>', 'Domain name (repeatable)', collect, [])
    .option('-y, --yes', 'Confirm all prompts with default action', false)
    .option('--verify', 'Check domain reachability even with --yes')
    .option('--debug', 'Print the raw domain list', false)
    .action(
      (opts: {
        nginxFiles: string[];
        domains: string[];
        yes?: boolean;
        verify?: boolean;
        debug?: boolean;
      }) =>
        guarded(() =>
          handleConfirmDomainsCommand(
            {
              nginxFiles: opts.nginxFiles,
              domains: opts.domains,
              yes: opts.yes,
              verify: opts.verify,
              debug: opts.debug,
            },
            createContext(opts, deps),
          ),
        ),
    );

  program
    .command('generate-renew-script')
    .description('Generate a script re-running the issuance tool, e.g. for a monthly cronjob')
    .option('-d, --domains <domain>', 'Domain name (repeatable)', collect, [])
    .option('-s, --save-to <path>', 'Where to save the renew script')
    .option('--email <email>', "Let's Encrypt account email")
    .option('-y, --yes', 'Confirm all prompts with default action', false)
    .action((opts: { domains: string[]; saveTo?: string; email?: string; yes?: boolean }) =>
      guarded(() =>
        handleGenerateRenewScriptCommand(
          { domains: opts.domains, saveTo: opts.saveTo, email: opts.email, yes: opts.yes },
          createContext(opts, deps),
        ),
      ),
    );

  program
    .command('issue')
    .alias('simp-le')
    .description('Run the issuance tool in the certificate directory, passing further arguments')
    .argument('[toolArgs...]', 'Arguments for the issuance tool')
    .option('--debug', 'Run the tool verbosely', false)
    .helpOption('--helper-help', 'Display help for this command')
    .allowUnknownOption()
    .action((toolArgs: string[], opts: { debug?: boolean }) =>
      guarded(() =>
        handleIssueCommand({ args: toolArgs, debug: opts.debug }, createContext({}, deps)),
      ),
    );

  program
    .command('configure-ssl')
    .description('Check the certificates exist and print the nginx TLS section')
    .option('--skip-check', 'Do not look for the certificate files first')
    .action((opts: { skipCheck?: boolean }) =>
      guarded(() =>
        handleConfigureSslCommand({ skipCheck: opts.skipCheck }, createContext({}, deps)),
      ),
    );

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<Command> {
  const program = createCli(deps);
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'commander.helpDisplayed' || code === 'commander.version') {
      // help and version output are not failures
    } else {
      throw err;
    }
  }
  return program;
}

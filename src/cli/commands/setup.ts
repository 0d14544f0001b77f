import { buildIssuerArgs } from '../../lib/issuer/arguments.js';
import { Pipeline } from '../../lib/pipeline.js';
import type { CommandContext } from '../context.js';
import { render } from '../logger.js';
import { handleConfigureSslCommand } from './configure-ssl.js';
import { handleConfirmDomainsCommand } from './confirm-domains.js';
import { handleGenerateRenewScriptCommand } from './generate-renew-script.js';
import { handleGetFilesCommand } from './get-files.js';
import { handleIssueCommand } from './issue.js';

/** Options for the guided end-to-end run. */
export interface SetupOptions {
  debug?: boolean;
  yes?: boolean;
  nginxDir?: string;
  email?: string;
  saveTo?: string;
  verify?: boolean;
  skipCheck?: boolean;
}

/** Stage names of the guided run, in order */
export const SETUP_STAGES = [
  'DiscoverFiles',
  'ConfirmDomains',
  'GenerateRenewScript',
  'Issue',
  'ReportSSLConfig',
] as const;

/**
 * Guided setup: every step in order, stopping at the first failure or when
 * the operator aborts.
 */
export async function handleSetupCommand(options: SetupOptions, ctx: CommandContext) {
  const { config, prompter } = ctx;
  const { yes, debug } = options;

  const nginxDir =
    options.nginxDir ??
    (yes ? config.nginxDir : await prompter.input('Nginx dir', config.nginxDir));
  const email =
    options.email ??
    ((yes ? '' : await prompter.input("Let's Encrypt account email (optional)")) || undefined);

  const flow = Pipeline.start<string>()
    .then(SETUP_STAGES[0], (dir) => handleGetFilesCommand({ nginxDir: dir, yes }, ctx))
    .then(SETUP_STAGES[1], (files) =>
      handleConfirmDomainsCommand({ nginxFiles: files, yes, verify: options.verify, debug }, ctx),
    )
    .then(SETUP_STAGES[2], async (domains) => {
      await handleGenerateRenewScriptCommand(
        { domains, saveTo: options.saveTo, email, yes },
        ctx,
      );
      return domains;
    })
    .then(SETUP_STAGES[3], (domains) =>
      handleIssueCommand(
        { args: buildIssuerArgs({ email, domains, challengeDir: config.challengeDir }), debug },
        ctx,
      ),
    )
    .then(SETUP_STAGES[4], () => handleConfigureSslCommand({ skipCheck: options.skipCheck }, ctx));

  await flow.run(nginxDir, {
    onStageStart: (stage) => {
      if (debug) render.dim(`stage ${stage}`);
    },
  });
}

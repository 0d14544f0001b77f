import { buildIssuerArgs } from '../../lib/issuer/arguments.js';
import {
  renderRenewScript,
  writeRenewScript,
  type WrittenScript,
} from '../../lib/issuer/renew-script.js';
import { ValidationError } from '../../lib/errors/helper-errors.js';
import type { CommandContext } from '../context.js';
import { render } from '../logger.js';

/** Options accepted by the generate-renew-script command. */
export interface GenerateRenewScriptOptions {
  domains?: string[];
  saveTo?: string;
  email?: string;
  yes?: boolean;
}

/**
 * Write a shell script re-running the issuance tool for the given domains,
 * meant to be scheduled (e.g. as a monthly cronjob).
 */
export async function handleGenerateRenewScriptCommand(
  options: GenerateRenewScriptOptions,
  ctx: CommandContext,
): Promise<WrittenScript> {
  const domains = options.domains ?? [];
  if (domains.length === 0) throw ValidationError.noDomains();

  const { config, prompter } = ctx;
  const args = buildIssuerArgs({
    email: options.email,
    domains,
    challengeDir: config.challengeDir,
  });
  const content = renderRenewScript({
    executable: config.issuerCommand,
    certsDir: config.certsDir,
    args,
  });
  const path = options.saveTo ?? config.renewScriptPath;

  const written = await writeRenewScript(path, content, {
    overwrite: async () => {
      render.warn(`Renew script already exists at ${path}`);
      if (options.yes) {
        render.info('Overwriting script without prompt... (--yes)');
        return true;
      }
      return prompter.confirm('Do you want to overwrite?', false);
    },
  });
  render.success(`Generated renew script at ${written.path}`);
  return written;
}

import { extractDomains, mergeDomains } from '../../lib/nginx/domains.js';
import { AbortError, ValidationError } from '../../lib/errors/helper-errors.js';
import { verifyDomains } from '../../lib/verify/domain-verifier.js';
import type { CommandContext } from '../context.js';
import { heading, render, startProgress } from '../logger.js';

/** Options accepted by the confirm-domains command. */
export interface ConfirmDomainsOptions {
  nginxFiles?: string[];
  domains?: string[];
  yes?: boolean;
  /** With --yes, still run the reachability check */
  verify?: boolean;
  debug?: boolean;
}

type DomainsAnswer = 'yes' | 'no' | 'verify';

/**
 * Collect domains from nginx files and/or flags, have the operator confirm
 * them and optionally check that the challenge path answers 404.
 */
export async function handleConfirmDomainsCommand(
  options: ConfirmDomainsOptions,
  ctx: CommandContext,
): Promise<string[]> {
  const files = options.nginxFiles ?? [];
  const explicit = options.domains ?? [];
  if (files.length === 0 && explicit.length === 0) throw ValidationError.missingDomainSource();

  const domains = mergeDomains(explicit, files.length > 0 ? extractDomains(files) : []);
  if (options.debug) render.dim(JSON.stringify(domains));
  if (domains.length === 0) throw ValidationError.noDomains();

  heading("These are the domains we're securing today:");
  render.list(domains);

  let verify = Boolean(options.verify);
  if (!options.yes) {
    const answer = await ctx.prompter.choose<DomainsAnswer>(
      'Is that correct?',
      [
        { name: 'Yes', value: 'yes' },
        { name: 'No', value: 'no' },
        { name: 'Verify the domains first', value: 'verify' },
      ],
      'verify',
    );
    if (answer === 'no') {
      throw new AbortError(
        'Abort!!! Go over your config and come run again ' +
          '(tip: run with `--domains` to run for specific domains)',
      );
    }
    verify = answer === 'verify';
  }

  if (verify) {
    const spin = startProgress('Verifying the domains are accessible');
    try {
      await verifyDomains(domains, { timeoutMs: ctx.config.verifyTimeoutMs, probe: ctx.probe });
    } catch (err) {
      spin.fail('Verification failed');
      throw err;
    }
    spin.succeed('Great!');
  }
  return domains;
}

import { sslBlock } from '../../lib/nginx/templates.js';
import { assertCertificates } from '../../lib/report/certificates.js';
import type { CommandContext } from '../context.js';
import { render } from '../logger.js';

/** Options accepted by the configure-ssl command. */
export interface ConfigureSslOptions {
  /** Print the block without looking for the certificate files */
  skipCheck?: boolean;
}

/**
 * Make sure the certificates exist where nginx will look for them, then show
 * the TLS section to add to each server.
 */
export async function handleConfigureSslCommand(
  options: ConfigureSslOptions,
  ctx: CommandContext,
): Promise<void> {
  const { certsDir } = ctx.config;
  if (!options.skipCheck) assertCertificates(certsDir);
  render.success(
    'Congrats! Now that you have obtained the certificates, update each server ' +
      'configuration with the following section:',
  );
  render.snippet(sslBlock(certsDir));
}

/**
 * Library usage without the CLI: scan a conf dir, collect domains, verify
 * them and write the renew script, branching on the typed errors.
 *
 * Run with: NGINX_CONF=/path/to/conf.d tsx examples/typed-errors.ts
 */

import {
  ConflictError,
  NotFoundError,
  ValidationError,
  VerificationError,
  buildIssuerArgs,
  extractDomains,
  listConfigFiles,
  renderRenewScript,
  resolveConfig,
  verifyDomains,
  writeRenewScript,
} from '../src/index.js';

async function main(): Promise<void> {
  const config = resolveConfig();

  try {
    const files = listConfigFiles(config.nginxDir).filter((f) => f.containsChallenge);
    const domains = extractDomains(files.map((f) => f.path));
    console.log('Domains:', domains.join(', '));

    await verifyDomains(domains, { timeoutMs: 1000 });

    const script = renderRenewScript({
      executable: config.issuerCommand,
      certsDir: config.certsDir,
      args: buildIssuerArgs({ domains, challengeDir: config.challengeDir }),
    });
    const written = await writeRenewScript(config.renewScriptPath, script, {
      overwrite: async () => false,
    });
    console.log('Renew script written to', written.path);
  } catch (error) {
    if (error instanceof NotFoundError) {
      console.error('Missing:', error.message);
    } else if (error instanceof ValidationError) {
      console.error('Bad configuration:', error.message, error.context);
    } else if (error instanceof VerificationError) {
      for (const failure of error.failures) {
        console.error(`${failure.domain}: ${failure.status ?? 'no response'}`);
      }
    } else if (error instanceof ConflictError) {
      console.log('Keeping existing script:', error.context?.path);
    } else {
      throw error;
    }
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});

import { runIssuance } from '../../lib/issuer/runner.js';
import type { CommandContext } from '../context.js';
import { heading, kv, render } from '../logger.js';

/** Options accepted by the issue command. */
export interface IssueOptions {
  /** Arguments handed to the issuance tool as-is */
  args: string[];
  debug?: boolean;
}

/** Run the issuance tool inside the certificate directory. */
export async function handleIssueCommand(options: IssueOptions, ctx: CommandContext) {
  const { certsDir, issuerCommand } = ctx.config;
  heading('Obtaining certificates');
  kv('Tool', issuerCommand);
  kv('Directory', certsDir);
  if (options.debug) render.dim(`Arguments are ${JSON.stringify(options.args)}`);

  await runIssuance(ctx.config, options.args, { runner: ctx.runner, debug: options.debug });
  render.success(`${issuerCommand} finished`);
}

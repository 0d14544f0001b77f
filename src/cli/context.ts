import { resolveConfig, type HelperConfig } from '../lib/config.js';
import type { IssuerRunner } from '../lib/issuer/runner.js';
import { InquirerPrompter, ScriptedPrompter, type Prompter } from '../lib/prompts/prompter.js';
import type { StatusProbe } from '../lib/verify/domain-verifier.js';

/** Collaborators commands use; tests substitute any of them */
export interface CliDependencies {
  prompter?: Prompter;
  probe?: StatusProbe;
  runner?: IssuerRunner;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export interface CommandContext {
  config: HelperConfig;
  prompter: Prompter;
  probe?: StatusProbe;
  runner?: IssuerRunner;
}

/** Resolve configuration and pick the prompter for one command invocation. */
export function createContext(
  opts: { yes?: boolean; nginxDir?: string; saveTo?: string },
  deps: CliDependencies = {},
): CommandContext {
  const config = resolveConfig(
    { nginxDir: opts.nginxDir, renewScriptPath: opts.saveTo, homeDir: deps.homeDir },
    deps.env,
  );
  const prompter = deps.prompter ?? (opts.yes ? new ScriptedPrompter() : new InquirerPrompter());
  return { config, prompter, probe: deps.probe, runner: deps.runner };
}

import { accessSync, constants, statSync } from 'fs';
import { homedir } from 'os';
import { delimiter, join } from 'path';
import {
  CERTS_DIRNAME,
  CHALLENGE_DIRNAME,
  DEFAULT_ISSUER_COMMAND,
  DEFAULT_NGINX_CONF_DIR,
  ISSUER_COMMAND_ENV,
  LE_BASE_DIRNAME,
  NGINX_CONF_ENV,
  RENEW_SCRIPT_FILENAME,
  VERIFY_TIMEOUT_MS,
} from './constants/defaults.js';
import { debugMain } from './utils/debug.js';

/**
 * Paths and settings every component receives explicitly.
 */
export interface HelperConfig {
  /** Directory holding nginx server configuration files */
  nginxDir: string;
  homeDir: string;
  /** `<home>/letsencrypt` */
  baseDir: string;
  /** Where the issuance tool writes fullchain.pem and key.pem */
  certsDir: string;
  /** Webroot served under /.well-known/acme-challenge */
  challengeDir: string;
  renewScriptPath: string;
  /** Executable (path or bare name) of the issuance tool */
  issuerCommand: string;
  verifyTimeoutMs: number;
}

export type HelperConfigOverrides = Partial<
  Pick<HelperConfig, 'nginxDir' | 'homeDir' | 'renewScriptPath' | 'issuerCommand' | 'verifyTimeoutMs'>
>;

/**
 * Locate an executable on PATH.
 * @returns Absolute path or undefined when not found
 */
export function findExecutable(name: string, pathEnv = process.env.PATH ?? ''): string | undefined {
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, name);
    try {
      if (!statSync(candidate).isFile()) continue;
      accessSync(candidate, constants.X_OK);
      return candidate;
    } catch {
      // not here
    }
  }
  return undefined;
}

/**
 * Build the run configuration from explicit overrides, then the environment,
 * then defaults derived from the home directory.
 */
export function resolveConfig(
  overrides: HelperConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): HelperConfig {
  const homeDir = overrides.homeDir ?? homedir();
  const baseDir = join(homeDir, LE_BASE_DIRNAME);
  const issuerCommand =
    overrides.issuerCommand ??
    env[ISSUER_COMMAND_ENV] ??
    findExecutable(DEFAULT_ISSUER_COMMAND, env.PATH ?? '') ??
    DEFAULT_ISSUER_COMMAND;

  const config: HelperConfig = {
    nginxDir: overrides.nginxDir ?? env[NGINX_CONF_ENV] ?? DEFAULT_NGINX_CONF_DIR,
    homeDir,
    baseDir,
    certsDir: join(baseDir, CERTS_DIRNAME),
    challengeDir: join(baseDir, CHALLENGE_DIRNAME),
    renewScriptPath: overrides.renewScriptPath ?? join(homeDir, RENEW_SCRIPT_FILENAME),
    issuerCommand,
    verifyTimeoutMs: overrides.verifyTimeoutMs ?? VERIFY_TIMEOUT_MS,
  };
  debugMain('resolved config %o', config);
  return config;
}

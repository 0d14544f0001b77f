import { FULLCHAIN_FILENAME, KEY_FILENAME } from '../constants/defaults.js';

/** Everything the issuance tool needs for one certificate */
export interface IssuanceRequest {
  email?: string;
  /** Domains in the order they should be passed */
  domains: string[];
  /** Webroot each domain's challenge is written to */
  challengeDir: string;
}

/** Output-file flags, always passed */
export const OUTPUT_ARGS: readonly string[] = ['-f', FULLCHAIN_FILENAME, '-f', KEY_FILENAME];

/**
 * Flat argument list for the issuance tool: optional `--email`, the output
 * flags, then one `-d <domain>:<challengeDir>` pair per domain.
 */
export function buildIssuerArgs(req: IssuanceRequest): string[] {
  const args: string[] = [];
  if (req.email) args.push('--email', req.email);
  args.push(...OUTPUT_ARGS);
  for (const domain of req.domains) {
    args.push('-d', `${domain.trim()}:${req.challengeDir}`);
  }
  return args;
}

const SHELL_SAFE = /^[A-Za-z0-9@%+=:,./_-]+$/;

/** Single-quote a word for a POSIX shell unless it is made of safe characters only */
export function shellQuote(word: string): string {
  if (SHELL_SAFE.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

/**
 * Join arguments with shell line continuations, pairing each flag with its
 * value. Every word is quoted as needed.
 */
export function joinArgs(args: string[]): string {
  const lines: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg.startsWith('-') && next !== undefined && !next.startsWith('-')) {
      lines.push(`${shellQuote(arg)} ${shellQuote(next)}`);
      i++;
    } else {
      lines.push(shellQuote(arg));
    }
  }
  return lines.join(' \\\n  ');
}

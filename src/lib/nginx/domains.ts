import { readFileSync } from 'fs';
import { SERVER_NAME_DIRECTIVE } from '../constants/defaults.js';
import { ValidationError } from '../errors/helper-errors.js';
import { debugDomains } from '../utils/debug.js';

/** Sorted, de-duplicated copy of a hostname list */
export function uniqueSorted(domains: Iterable<string>): string[] {
  return [...new Set(domains)].sort();
}

/**
 * Raw fields following the directive on a `server_name` line, up to the
 * statement terminator. Text after `#` is a comment.
 * @returns undefined when the line carries no directive
 */
export function parseServerNameLine(line: string): string[] | undefined {
  const code = line.split('#', 1)[0].trim();
  if (!code) return undefined;
  const fields = code.split(/\s+/);
  const at = fields.findIndex((token) => token.replace(/;+$/, '') === SERVER_NAME_DIRECTIVE);
  if (at === -1) return undefined;
  if (fields[at].endsWith(';')) return [];
  const rest = fields.slice(at + 1);
  const end = rest.findIndex((token) => token.endsWith(';'));
  return end === -1 ? rest : rest.slice(0, end + 1);
}

/** Hostname with its statement terminator trimmed */
export function cleanHostname(token: string): string {
  return token.trim().replace(/^;+|;+$/g, '');
}

/**
 * Collect every hostname declared through `server_name` in the given files.
 * @throws ValidationError when a directive line names no hostname
 */
export function extractDomains(paths: string[]): string[] {
  const domains: string[] = [];
  for (const path of paths) {
    const lines = readFileSync(path, 'utf-8').split(/\r?\n/);
    lines.forEach((line, index) => {
      const fields = parseServerNameLine(line);
      if (fields === undefined) return;
      const hosts = fields.map(cleanHostname).filter((host) => host.length > 0);
      if (hosts.length === 0) throw ValidationError.serverName(path, index + 1);
      domains.push(...hosts);
    });
  }
  const result = uniqueSorted(domains);
  debugDomains('extracted %d domain(s) from %d file(s): %o', result.length, paths.length, result);
  return result;
}

/** Union of operator supplied domains and extracted ones */
export function mergeDomains(explicit: string[], extracted: string[]): string[] {
  return uniqueSorted([...explicit.map(cleanHostname).filter(Boolean), ...extracted]);
}

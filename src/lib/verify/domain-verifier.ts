/**
 * Pre-issuance reachability check.
 *
 * Each domain must answer `http://<domain>/letsencrypt/challenge/` with 404:
 * the host is reachable over plain HTTP and the path is not claimed yet.
 * Best-effort convenience, the operator may skip it.
 */

import { request } from 'undici';
import { VERIFY_EXPECTED_STATUS, VERIFY_PATH, VERIFY_TIMEOUT_MS } from '../constants/defaults.js';
import { VerificationError, type VerificationFailure } from '../errors/helper-errors.js';
import { debugVerify } from '../utils/debug.js';
import { buildUserAgent } from '../utils/package-info.js';

/** Issue a HEAD request and resolve with the response status */
export type StatusProbe = (url: string, timeoutMs: number) => Promise<number>;

export interface VerifyOptions {
  /** Per-request timeout (default: 200ms) */
  timeoutMs?: number;
  probe?: StatusProbe;
}

/** Outcome for a single domain */
export interface DomainCheck {
  domain: string;
  url: string;
  status?: number;
  error?: string;
}

/** Default probe backed by undici */
export const undiciHeadProbe: StatusProbe = async (url, timeoutMs) => {
  const res = await request(url, {
    method: 'HEAD',
    headers: { 'User-Agent': buildUserAgent() },
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
    signal: AbortSignal.timeout(timeoutMs),
  });
  return res.statusCode;
};

export function challengeCheckUrl(domain: string): string {
  return `http://${domain}${VERIFY_PATH}`;
}

/**
 * Probe every domain concurrently; one slow host does not hold up the others
 * beyond its own timeout.
 */
export async function checkDomains(
  domains: string[],
  opts: VerifyOptions = {},
): Promise<DomainCheck[]> {
  const { timeoutMs = VERIFY_TIMEOUT_MS, probe = undiciHeadProbe } = opts;
  return Promise.all(
    domains.map(async (domain): Promise<DomainCheck> => {
      const url = challengeCheckUrl(domain);
      const start = Date.now();
      try {
        const status = await probe(url, timeoutMs);
        debugVerify('HEAD %s status=%d durationMs=%d', url, status, Date.now() - start);
        return { domain, url, status };
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        debugVerify('HEAD %s error: %s', url, error);
        return { domain, url, error };
      }
    }),
  );
}

/** Translate a check into a failure entry, or undefined when it passed */
export function toFailure(check: DomainCheck): VerificationFailure | undefined {
  if (check.error !== undefined) {
    return { domain: check.domain, reason: `${check.domain} failed: ${check.error}` };
  }
  if (check.status !== VERIFY_EXPECTED_STATUS) {
    return {
      domain: check.domain,
      status: check.status,
      reason: `${check.domain} returned ${check.status}`,
    };
  }
  return undefined;
}

/**
 * Verify all domains answer 404 on the challenge path.
 * @throws VerificationError listing every failing domain with its status
 */
export async function verifyDomains(domains: string[], opts: VerifyOptions = {}): Promise<void> {
  const checks = await checkDomains(domains, opts);
  const failures = checks
    .map(toFailure)
    .filter((f): f is VerificationFailure => f !== undefined);
  if (failures.length > 0) throw new VerificationError(failures);
}

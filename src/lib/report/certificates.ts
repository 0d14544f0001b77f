import { existsSync } from 'fs';
import { join } from 'path';
import { CERT_ARTIFACTS } from '../constants/defaults.js';
import { PreconditionError } from '../errors/helper-errors.js';

/** Expected artifact files not present in the certificate directory */
export function missingCertificates(certsDir: string): string[] {
  return CERT_ARTIFACTS.filter((name) => !existsSync(join(certsDir, name)));
}

/**
 * Require fullchain.pem and key.pem in `certsDir`. Contents are not inspected.
 * @throws PreconditionError listing the missing files
 */
export function assertCertificates(certsDir: string): void {
  const missing = missingCertificates(certsDir);
  if (missing.length > 0) throw PreconditionError.missingCertificates(certsDir, missing);
}

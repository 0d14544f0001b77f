import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { readFileSync, statSync, writeFileSync } from 'fs';
import { join } from 'path';
import { renderRenewScript, writeRenewScript } from '../../src/lib/issuer/renew-script.js';
import { ConflictError } from '../../src/lib/errors/helper-errors.js';
import { makeTempDir, removeDir } from '../test-utils.js';

describe('renderRenewScript', () => {
  it('produces a bash script changing into the certificate dir', () => {
    const script = renderRenewScript({
      executable: '/usr/local/bin/simp_le',
      certsDir: '/home/ops/letsencrypt/certs',
      args: ['--email', 'e@example.com', '-f', 'fullchain.pem', '-d', 'a.com:/c'],
    });
    expect(script).toBe(
      '#!/bin/bash\n' +
        'cd /home/ops/letsencrypt/certs\n' +
        '/usr/local/bin/simp_le --email e@example.com \\\n' +
        '  -f fullchain.pem \\\n' +
        '  -d a.com:/c\n',
    );
  });
});

describe('renderRenewScript quoting', () => {
  it('quotes a certificate dir and arguments containing spaces', () => {
    const script = renderRenewScript({
      executable: 'simp_le',
      certsDir: '/home/web ops/letsencrypt/certs',
      args: ['-d', 'a.com:/home/web ops/letsencrypt/challenge'],
    });
    expect(script).toBe(
      '#!/bin/bash\n' +
        "cd '/home/web ops/letsencrypt/certs'\n" +
        "simp_le -d 'a.com:/home/web ops/letsencrypt/challenge'\n",
    );
  });
});

describe('writeRenewScript', () => {
  let dir: string;
  let target: string;

  beforeEach(() => {
    dir = makeTempDir();
    target = join(dir, 'renew.sh');
  });

  afterEach(() => removeDir(dir));

  it('writes a new executable script without asking', async () => {
    let asked = false;
    const result = await writeRenewScript(target, 'new', {
      overwrite: async () => {
        asked = true;
        return false;
      },
    });
    expect(result).toEqual({ path: target, replaced: false });
    expect(asked).toBe(false);
    expect(readFileSync(target, 'utf-8')).toBe('new');
    expect(statSync(target).mode & 0o777).toBe(0o755);
  });

  it('leaves an existing file byte-for-byte unchanged when overwrite is declined', async () => {
    writeFileSync(target, 'original\n');
    await expect(
      writeRenewScript(target, 'replacement', { overwrite: async () => false }),
    ).rejects.toBeInstanceOf(ConflictError);
    expect(readFileSync(target, 'utf-8')).toBe('original\n');
  });

  it('replaces an existing file when overwrite is confirmed', async () => {
    writeFileSync(target, 'original\n');
    const result = await writeRenewScript(target, 'replacement', { overwrite: async () => true });
    expect(result.replaced).toBe(true);
    expect(readFileSync(target, 'utf-8')).toBe('replacement');
  });
});

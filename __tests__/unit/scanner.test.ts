import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdirSync } from 'fs';
import { join } from 'path';
import {
  containsChallenge,
  formatFileList,
  listConfigFiles,
} from '../../src/lib/nginx/scanner.js';
import { NotFoundError } from '../../src/lib/errors/helper-errors.js';
import { CHALLENGE_LOCATION, makeTempDir, removeDir, serverBlock, writeConf } from '../test-utils.js';

describe('listConfigFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    writeConf(dir, 'b.conf', serverBlock('b.example.com'));
    writeConf(dir, 'a.conf', serverBlock('a.example.com') + CHALLENGE_LOCATION);
    mkdirSync(join(dir, 'snippets'));
  });

  afterEach(() => removeDir(dir));

  it('fails with NotFoundError for a missing directory', () => {
    const missing = join(dir, 'nope');
    expect(() => listConfigFiles(missing)).toThrow(NotFoundError);
    expect(() => listConfigFiles(missing)).toThrow(`Could not locate nginx conf dir at ${missing}`);
  });

  it('lists regular files sorted by name and flags the challenge marker', () => {
    const files = listConfigFiles(dir);
    expect(files).toEqual([
      { path: join(dir, 'a.conf'), name: 'a.conf', containsChallenge: true },
      { path: join(dir, 'b.conf'), name: 'b.conf', containsChallenge: false },
    ]);
  });

  it('excludes already modified files with skipModified and reports progress', () => {
    const messages: string[] = [];
    const files = listConfigFiles(dir, { skipModified: true, onProgress: (m) => messages.push(m) });
    expect(files.map((f) => f.name)).toEqual(['b.conf']);
    expect(messages).toEqual([
      'Already found acme-challenge in a.conf, skipping',
      'File b.conf requires acme-challenge',
    ]);
  });

  it('reports nothing when not skipping', () => {
    const messages: string[] = [];
    listConfigFiles(dir, { onProgress: (m) => messages.push(m) });
    expect(messages).toEqual([]);
  });
});

describe('containsChallenge', () => {
  it('matches the well-known path anywhere in the text', () => {
    expect(containsChallenge("location '/.well-known/acme-challenge' {")).toBe(true);
    expect(containsChallenge('location /letsencrypt {')).toBe(false);
  });
});

describe('formatFileList', () => {
  it('renders one bullet per file', () => {
    expect(
      formatFileList([
        { path: '/etc/nginx/conf.d/a.conf', name: 'a.conf', containsChallenge: false },
        { path: '/etc/nginx/conf.d/b.conf', name: 'b.conf', containsChallenge: true },
      ]),
    ).toBe('* /etc/nginx/conf.d/a.conf\n* /etc/nginx/conf.d/b.conf');
  });
});

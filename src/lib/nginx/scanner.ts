import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import { CHALLENGE_MARKER } from '../constants/defaults.js';
import { NotFoundError } from '../errors/helper-errors.js';
import { debugScan } from '../utils/debug.js';

/** nginx configuration file found by the scanner */
export interface ConfigFile {
  path: string;
  /** File name relative to the scanned directory */
  name: string;
  /** Whether the file already declares the ACME challenge location */
  containsChallenge: boolean;
}

export interface ScanOptions {
  /** Leave out files that already contain the challenge marker */
  skipModified?: boolean;
  /** Receives human readable progress lines */
  onProgress?: (message: string) => void;
}

/** Whether the configuration text already routes the ACME challenge path */
export function containsChallenge(content: string): boolean {
  return content.includes(CHALLENGE_MARKER);
}

/**
 * List the configuration files in an nginx conf directory, sorted by name.
 * Read-only; subdirectories are ignored.
 */
export function listConfigFiles(dir: string, options: ScanOptions = {}): ConfigFile[] {
  const { skipModified = false, onProgress } = options;
  if (!existsSync(dir)) throw NotFoundError.nginxDir(dir);

  const files: ConfigFile[] = [];
  for (const name of readdirSync(dir).sort()) {
    const path = join(dir, name);
    if (!statSync(path).isFile()) {
      debugScan('skipping non-file entry %s', path);
      continue;
    }
    const file: ConfigFile = {
      path,
      name,
      containsChallenge: containsChallenge(readFileSync(path, 'utf-8')),
    };
    if (skipModified) {
      if (file.containsChallenge) {
        onProgress?.(`Already found acme-challenge in ${name}, skipping`);
        continue;
      }
      onProgress?.(`File ${name} requires acme-challenge`);
    }
    files.push(file);
  }
  debugScan('scanned %s skipModified=%s -> %d file(s)', dir, skipModified, files.length);
  return files;
}

/** Bullet list used in operator instructions */
export function formatFileList(files: ConfigFile[]): string {
  return files.map((f) => `* ${f.path}`).join('\n');
}

import { chmodSync, existsSync, writeFileSync } from 'fs';
import { ConflictError } from '../errors/helper-errors.js';
import { joinArgs, shellQuote } from './arguments.js';

export interface RenewScriptParams {
  /** Path or name of the issuance tool */
  executable: string;
  /** Directory the tool writes certificates into */
  certsDir: string;
  args: string[];
}

export interface WriteRenewScriptOptions {
  /** Asked only when the target exists; resolve true to replace it */
  overwrite: () => Promise<boolean>;
}

/** Result of writing the renewal script */
export interface WrittenScript {
  path: string;
  /** Whether an existing file was replaced */
  replaced: boolean;
}

export function renderRenewScript({ executable, certsDir, args }: RenewScriptParams): string {
  return `#!/bin/bash\ncd ${shellQuote(certsDir)}\n${shellQuote(executable)} ${joinArgs(args)}\n`;
}

/**
 * Write the renewal script as an executable file.
 * @throws ConflictError when the file exists and overwriting was declined
 */
export async function writeRenewScript(
  path: string,
  content: string,
  { overwrite }: WriteRenewScriptOptions,
): Promise<WrittenScript> {
  const exists = existsSync(path);
  if (exists && !(await overwrite())) throw ConflictError.exists(path);
  writeFileSync(path, content);
  chmodSync(path, 0o755);
  return { path, replaced: exists };
}

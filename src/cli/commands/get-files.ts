import { challengeBlock } from '../../lib/nginx/templates.js';
import { formatFileList, listConfigFiles, type ConfigFile } from '../../lib/nginx/scanner.js';
import { AbortError } from '../../lib/errors/helper-errors.js';
import type { CommandContext } from '../context.js';
import { heading, render } from '../logger.js';

/** Options accepted by the get-files command. */
export interface GetFilesOptions {
  nginxDir?: string;
  yes?: boolean;
}

const ENTER_PROMPT = 'Press Enter when done...';

type SkipAnswer = 'skip' | 'rescan' | 'quit';

/**
 * Show the nginx files and the challenge section to add, then wait until the
 * operator has edited them.
 * @returns Paths of the files that now carry the challenge location
 */
export async function handleGetFilesCommand(
  options: GetFilesOptions,
  ctx: CommandContext,
): Promise<string[]> {
  const dir = options.nginxDir ?? ctx.config.nginxDir;
  const allFiles = listConfigFiles(dir);

  heading('Step 1: add the ACME challenge location');
  render.line('First, you need to modify some/all of these nginx config files:\n');
  render.line(formatFileList(allFiles));
  render.line("\nAdd the next part to a file's `server` section:");
  render.snippet(challengeBlock(ctx.config.challengeDir));
  await ctx.prompter.pause(ENTER_PROMPT);

  let unmodified: ConfigFile[];
  for (;;) {
    unmodified = listConfigFiles(dir, { skipModified: true, onProgress: render.dim });
    if (unmodified.length === 0) break;

    render.warn('WARNING! you have yet to modify the following files:');
    render.line(formatFileList(unmodified));
    if (options.yes) break;

    const answer = await ctx.prompter.choose<SkipAnswer>(
      'Do you want to skip these files?',
      [
        { name: 'Yes, skip them', value: 'skip' },
        { name: 'No, check again', value: 'rescan' },
        { name: 'Quit', value: 'quit' },
      ],
      'skip',
    );
    if (answer === 'skip') break;
    if (answer === 'quit') throw new AbortError('Please run me again to start over');
  }

  render.line('You should now restart/reload your nginx server.');
  await ctx.prompter.pause(ENTER_PROMPT);

  const pending = new Set(unmodified.map((f) => f.path));
  return allFiles.filter((f) => !pending.has(f.path)).map((f) => f.path);
}

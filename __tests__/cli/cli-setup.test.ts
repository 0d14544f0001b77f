import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { runCli } from '../../src/cli/program.js';
import { ScriptedPrompter } from '../../src/lib/prompts/prompter.js';
import type { StatusProbe } from '../../src/lib/verify/domain-verifier.js';
import {
  CHALLENGE_LOCATION,
  FakeRunner,
  captureConsole,
  makeTempDir,
  removeDir,
  serverBlock,
  writeConf,
} from '../test-utils.js';

const notClaimed: StatusProbe = async () => 404;

/** Stand-in tool writing the two expected artifacts into its working directory */
function issuingRunner(exitCode = 0) {
  return new FakeRunner(exitCode, ({ cwd }) => {
    writeFileSync(join(cwd, 'fullchain.pem'), 'chain');
    writeFileSync(join(cwd, 'key.pem'), 'key');
  });
}

describe('guided setup', () => {
  let home: string;
  let confDir: string;
  let out: ReturnType<typeof captureConsole>;

  beforeEach(() => {
    process.env.NGINX_LE_CLI_TEST = '1';
    home = makeTempDir();
    confDir = join(home, 'conf.d');
    writeConf(confDir, 'a.conf', serverBlock('a.example.com', 'www.a.example.com') + CHALLENGE_LOCATION);
    writeConf(confDir, 'b.conf', serverBlock('b.example.com'));
    out = captureConsole();
  });

  afterEach(() => {
    out.restore();
    removeDir(home);
    delete process.env.NGINX_LE_CLI_TEST;
  });

  test('walks every step for the modified files', async () => {
    const prompter = new ScriptedPrompter(['skip', 'verify']);
    const runner = issuingRunner();
    await runCli(['--nginx-dir', confDir, '--email', 'ops@example.com'], {
      homeDir: home,
      env: {},
      prompter,
      probe: notClaimed,
      runner,
    });

    const certsDir = join(home, 'letsencrypt', 'certs');
    const challengeDir = join(home, 'letsencrypt', 'challenge');
    expect(prompter.asked).toEqual([
      'Press Enter when done...',
      'Do you want to skip these files?',
      'Press Enter when done...',
      'Is that correct?',
    ]);
    expect(runner.runs).toEqual([
      {
        command: 'simp_le',
        args: [
          '--email',
          'ops@example.com',
          '-f',
          'fullchain.pem',
          '-f',
          'key.pem',
          '-d',
          `a.example.com:${challengeDir}`,
          '-d',
          `www.a.example.com:${challengeDir}`,
        ],
        cwd: certsDir,
      },
    ]);
    expect(readFileSync(join(home, 'renew_script.sh'), 'utf-8')).toContain(
      `simp_le --email ops@example.com \\\n`,
    );
    expect(out.output()).toContain(`ssl_certificate_key  ${join(certsDir, 'key.pem')};`);
    expect(out.errors()).toBe('');
  });

  test('prompts for the nginx dir and email when not given', async () => {
    const prompter = new ScriptedPrompter([confDir, '', 'skip', 'yes']);
    const runner = issuingRunner();
    await runCli([], { homeDir: home, env: {}, prompter, probe: notClaimed, runner });

    expect(prompter.asked.slice(0, 2)).toEqual([
      'Nginx dir',
      "Let's Encrypt account email (optional)",
    ]);
    expect(runner.runs[0].args.slice(0, 2)).toEqual(['-f', 'fullchain.pem']);
  });

  test('stops without side effects when the operator quits', async () => {
    const runner = issuingRunner();
    await runCli(['--nginx-dir', confDir, '--email', 'ops@example.com'], {
      homeDir: home,
      env: {},
      prompter: new ScriptedPrompter(['quit']),
      runner,
    });
    expect(out.errors()).toContain('Please run me again to start over');
    expect(runner.runs).toEqual([]);
    expect(existsSync(join(home, 'renew_script.sh'))).toBe(false);
  });

  test('stops before issuing when the renew script may not be replaced', async () => {
    writeFileSync(join(home, 'renew_script.sh'), 'keep me\n');
    const runner = issuingRunner();
    await runCli(['--nginx-dir', confDir, '--email', 'ops@example.com'], {
      homeDir: home,
      env: {},
      prompter: new ScriptedPrompter(['skip', 'yes', false]),
      runner,
    });
    expect(readFileSync(join(home, 'renew_script.sh'), 'utf-8')).toBe('keep me\n');
    expect(runner.runs).toEqual([]);
    expect(out.errors()).toContain('Stopped:');
  });

  test('fails the final check when the tool produced nothing', async () => {
    const runner = new FakeRunner(0);
    await runCli(['-y', '--nginx-dir', confDir], {
      homeDir: home,
      env: {},
      prompter: new ScriptedPrompter(),
      runner,
    });
    expect(runner.runs).toHaveLength(1);
    expect(out.errors()).toContain('Certificate files missing');
    expect(out.output()).not.toContain('ssl_certificate ');
  });

  test('reports a failing tool and skips the final step', async () => {
    await runCli(['-y', '--nginx-dir', confDir], {
      homeDir: home,
      env: {},
      prompter: new ScriptedPrompter(),
      runner: issuingRunner(1),
    });
    expect(out.errors()).toContain('Error: simp_le exited with status 1');
    expect(out.output()).not.toContain('Congrats!');
  });
});

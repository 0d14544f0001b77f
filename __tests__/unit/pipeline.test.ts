import { describe, it, expect } from '@jest/globals';
import { Pipeline } from '../../src/lib/pipeline.js';
import { AbortError } from '../../src/lib/errors/helper-errors.js';

describe('Pipeline', () => {
  it('feeds each stage the previous output', async () => {
    const flow = Pipeline.start<number>()
      .then('double', (n) => n * 2)
      .then('describe', async (n) => `value=${n}`);
    expect(flow.stages).toEqual(['double', 'describe']);
    await expect(flow.run(21)).resolves.toBe('value=42');
  });

  it('stops at the first failure and rethrows it unchanged', async () => {
    const ran: string[] = [];
    const abort = new AbortError('operator quit');
    const flow = Pipeline.start<void>()
      .then('one', () => {
        ran.push('one');
      })
      .then('two', () => {
        ran.push('two');
        throw abort;
      })
      .then('three', () => {
        ran.push('three');
      });
    await expect(flow.run(undefined)).rejects.toBe(abort);
    expect(ran).toEqual(['one', 'two']);
  });

  it('settles with the failing stage name', async () => {
    const failure = new Error('nope');
    const flow = Pipeline.start<string>()
      .then('ok', (s) => s)
      .then('broken', () => {
        throw failure;
      });
    await expect(flow.settle('x')).resolves.toEqual({ ok: false, stage: 'broken', error: failure });
  });

  it('notifies hooks around every completed stage', async () => {
    const events: string[] = [];
    await Pipeline.start<number>()
      .then('a', (n) => n + 1)
      .then('b', (n) => n + 1)
      .run(0, {
        onStageStart: (s) => events.push(`start:${s}`),
        onStageEnd: (s) => events.push(`end:${s}`),
      });
    expect(events).toEqual(['start:a', 'end:a', 'start:b', 'end:b']);
  });
});

import { debugPipeline } from './utils/debug.js';

export interface PipelineHooks {
  onStageStart?(stage: string): void;
  onStageEnd?(stage: string): void;
}

/** Outcome of a settled run: the final value or the stage that failed */
export type PipelineResult<T> =
  | { ok: true; value: T }
  | { ok: false; stage: string; error: unknown };

/** Failure tagged with the stage it happened in */
class StageFailure extends Error {
  constructor(
    readonly stage: string,
    readonly failure: unknown,
  ) {
    super(`Stage ${stage} failed`);
    this.name = 'StageFailure';
  }
}

/**
 * Linear sequence of named, fallible stages. Each stage receives the previous
 * stage's output; the first failure stops the run.
 *
 * @example
 * ```ts
 * const flow = Pipeline.start<string>()
 *   .then('Discover', (dir) => listConfigFiles(dir))
 *   .then('Extract', (files) => extractDomains(files.map((f) => f.path)));
 * const domains = await flow.run('/etc/nginx/conf.d');
 * ```
 */
export class Pipeline<I, O> {
  private constructor(
    readonly stages: readonly string[],
    private readonly exec: (input: I, hooks: PipelineHooks) => Promise<O>,
  ) {}

  static start<T>(): Pipeline<T, T> {
    return new Pipeline<T, T>([], async (input) => input);
  }

  then<N>(stage: string, run: (input: O) => N | Promise<N>): Pipeline<I, N> {
    return new Pipeline<I, N>([...this.stages, stage], async (input, hooks) => {
      const prev = await this.exec(input, hooks);
      hooks.onStageStart?.(stage);
      debugPipeline('-> %s', stage);
      let out: N;
      try {
        out = await run(prev);
      } catch (err) {
        debugPipeline('x %s: %s', stage, err instanceof Error ? err.message : String(err));
        throw err instanceof StageFailure ? err : new StageFailure(stage, err);
      }
      debugPipeline('<- %s', stage);
      hooks.onStageEnd?.(stage);
      return out;
    });
  }

  /** Run all stages, rethrowing the first stage error unchanged */
  async run(input: I, hooks: PipelineHooks = {}): Promise<O> {
    const result = await this.settle(input, hooks);
    if (!result.ok) throw result.error;
    return result.value;
  }

  /** Run all stages without throwing */
  async settle(input: I, hooks: PipelineHooks = {}): Promise<PipelineResult<O>> {
    try {
      return { ok: true, value: await this.exec(input, hooks) };
    } catch (err) {
      if (err instanceof StageFailure) return { ok: false, stage: err.stage, error: err.failure };
      return { ok: false, stage: 'unknown', error: err };
    }
  }
}

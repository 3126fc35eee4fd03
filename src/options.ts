import {CheckError} from './errors';

export type ExhaustionBehavior = 'throw' | 'sentinel';

export interface GeneratorOptions {
  /**
   * What to do when a generator is resumed after it has already returned {@link EXHAUSTED}:
   * - `'throw'` raises a `GeneratorExhaustedError`.
   * - `'sentinel'` returns `EXHAUSTED` again without running any of the body.
   *
   * Generators never restart from the top.  Defaults to `'throw'`.
   */
  afterExhaustion?: ExhaustionBehavior;

  /**
   * Whether to run a generator's cleanup action when it gets garbage collected without having been
   * disposed.  This is only a backstop; the timing is up to the garbage collector, so you should
   * always dispose of generators (or adopt them into a `Scope`) when done with them.  Defaults to
   * `true`.
   */
  finalize?: boolean;

  /**
   * The maximum number of jumps a generator body can make within a single `resume` call before it's
   * considered stuck in a loop.  Defaults to 10000.
   */
  maxJumpsPerResume?: number;
}

export type ResolvedOptions = Readonly<Required<GeneratorOptions>>;

export const DEFAULT_OPTIONS: ResolvedOptions = {
  afterExhaustion: 'throw',
  finalize: true,
  maxJumpsPerResume: 10000,
};

export function resolveOptions(options: GeneratorOptions): ResolvedOptions {
  const resolved: ResolvedOptions = {
    afterExhaustion: options.afterExhaustion ?? DEFAULT_OPTIONS.afterExhaustion,
    finalize: options.finalize ?? DEFAULT_OPTIONS.finalize,
    maxJumpsPerResume: options.maxJumpsPerResume ?? DEFAULT_OPTIONS.maxJumpsPerResume,
  };
  CHECK: {
    if (resolved.afterExhaustion !== 'throw' && resolved.afterExhaustion !== 'sentinel') {
      throw new CheckError(`Unknown afterExhaustion behavior: ${resolved.afterExhaustion}`);
    }
    if (!Number.isInteger(resolved.maxJumpsPerResume) || resolved.maxJumpsPerResume <= 0) {
      throw new CheckError(
        `maxJumpsPerResume must be a positive integer, got ${resolved.maxJumpsPerResume}`);
    }
  }
  return resolved;
}

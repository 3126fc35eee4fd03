import {CleanupRegistry} from './cleanup';
import {CheckError} from './errors';
import {Resumable, ResumableImpl} from './machine';
import {GeneratorOptions, ResolvedOptions, resolveOptions} from './options';
import type {Arms, Resumption, Step} from './positions';
import {FactoryStats} from './stats';


/**
 * Describes a generator: how to build its state, where its body starts, what happens at each of
 * its yield positions, and how to release its resources.
 */
export interface GeneratorDefinition<
  A extends unknown[], T, P extends unknown[], S, M extends object
> {
  /** A name to identify generators in error messages and stats. */
  readonly name?: string;

  /**
   * Creates the state of a new generator instance.  Everything that needs to survive from one
   * `resume` to the next and isn't handed over as locals to a position should live in here.
   */
  setup(...args: A): S;

  /** The entry point of the body, executed on the first `resume`. */
  start(co: Resumption<T, P, S, M>): Step<T>;

  /** One arm per position declared in the positions map, each continuing after its yield. */
  readonly arms: Arms<T, P, S, M>;

  /**
   * Releases resources held in the state.  It will be called exactly once when the generator is
   * torn down, whether or not the body ran to completion.
   */
  cleanup?(state: S): void;
}

export interface GeneratorFactory<A extends unknown[], T, P extends unknown[]> {
  readonly name: string;
  readonly options: ResolvedOptions;
  readonly stats: FactoryStats;

  /**
   * Creates a new, independent generator.  Every instance gets its own state and cleanup.
   * @param args The creation parameters, passed through to the definition's `setup`.
   */
  create(...args: A): Resumable<T, P>;

  logStats(): void;
}

/** The type of the generators made by a factory. */
export type ResumableOf<F> =
  F extends GeneratorFactory<infer A, infer T, infer P> ? Resumable<T, P> : never;

export interface GeneratorBuilder<T, P extends unknown[], M extends object> {
  /**
   * Defines a generator.  The creation parameters and state type are inferred from the definition's
   * `setup` method.
   * @param definition The generator's setup, body and cleanup.
   * @param options Options that apply to every generator created by the resulting factory.
   */
  define<A extends unknown[], S>(
    definition: GeneratorDefinition<A, T, P, S, M>, options?: GeneratorOptions
  ): GeneratorFactory<A, T, P>;
}


let anonymousCounter = 0;

class GeneratorFactoryImpl<A extends unknown[], T, P extends unknown[], S, M extends object>
implements GeneratorFactory<A, T, P> {
  readonly name: string;
  readonly options: ResolvedOptions;
  readonly stats: FactoryStats;

  constructor(
    private readonly definition: GeneratorDefinition<A, T, P, S, M>, options: GeneratorOptions
  ) {
    CHECK: {
      if (typeof definition.setup !== 'function') {
        throw new CheckError('Generator definition is missing its setup method');
      }
      if (typeof definition.start !== 'function') {
        throw new CheckError('Generator definition is missing its start arm');
      }
    }
    this.name = definition.name ?? `generator${++anonymousCounter}`;
    this.options = resolveOptions(options);
    this.stats = new FactoryStats(this.name);
  }

  create(...args: A): Resumable<T, P> {
    const definition = this.definition;
    const state = definition.setup(...args);
    const registry = new CleanupRegistry(reason => this.stats.recordTeardown(reason));
    const cleanup = definition.cleanup;
    if (cleanup) registry.register(() => cleanup.call(definition, state));
    const resumable = new ResumableImpl<T, P, S, M>(
      this.name, state, co => definition.start(co), definition.arms, registry, this.options);
    if (this.options.finalize) registry.attach(resumable);
    this.stats.recordCreated();
    return resumable;
  }

  logStats(): void {
    console.log(`Generator ${this.name}: ${this.stats}`);
  }
}


/**
 * Starts the definition of a generator.  The type parameters fix the shape of the generator:
 * @typeParam T The type of the values it yields.
 * @typeParam P The parameters it takes on every `resume` call.
 * @typeParam M The positions map: one key per yield position, with the locals handed over to it.
 */
export function generator<T, P extends unknown[] = [], M extends object = Record<never, never>>(
): GeneratorBuilder<T, P, M> {
  return {
    define<A extends unknown[], S>(
      definition: GeneratorDefinition<A, T, P, S, M>, options: GeneratorOptions = {}
    ): GeneratorFactory<A, T, P> {
      return new GeneratorFactoryImpl(definition, options);
    },
  };
}

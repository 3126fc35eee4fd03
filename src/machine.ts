import type {CleanupRegistry} from './cleanup';
import {
  CheckError, GeneratorDisposedError, GeneratorExhaustedError, GeneratorFailedError,
  GeneratorRunningError, InternalError
} from './errors';
import type {ResolvedOptions} from './options';
import {
  Arms, EXHAUSTED, Exhausted, LocalsArgs, PositionName, ResumePosition, Resumption, START, Step,
  STEP_OWNER
} from './positions';
import {GeneratorStats} from './stats';


export type GeneratorStatus =
  'fresh' | 'suspended' | 'running' | 'exhausted' | 'failed' | 'disposed';

/**
 * A generator instance, as returned by a factory's `create` method.  Its shape depends only on the
 * type of the values it yields and on the parameters it takes on every call, so generators made by
 * different factories are interchangeable as long as those match.
 *
 * A generator must be driven by a single owner.  Once you're done with it, call `dispose` (or let a
 * {@link Scope} do it for you) so that its cleanup action runs.
 */
export interface Resumable<T, P extends unknown[] = []> {
  readonly name: string;
  readonly status: GeneratorStatus;

  /**
   * Where execution will continue on the next `resume`: {@link START} if the generator has never
   * been resumed, otherwise the name of the position the body last yielded or jumped to.
   */
  readonly position: ResumePosition;

  readonly stats: GeneratorStats;

  /**
   * Runs the generator's body until it yields a value or completes.
   * @param params Parameters for this call; they're visible to the body until it yields again.
   * @returns The yielded value, or {@link EXHAUSTED} if the body completed during this call.
   */
  resume(...params: P): T | Exhausted;

  /**
   * Tears the generator down and runs its cleanup action, whatever state it's in.  Disposing more
   * than once has no further effect.  If called from within the generator's own body the teardown
   * happens as soon as the current `resume` returns.
   */
  dispose(): void;
}


class ResumptionImpl<T, P extends unknown[], S, M extends object>
implements Resumption<T, P, S, M> {
  private __params?: P;
  private readonly __done: Step<T> = {kind: 'done', [STEP_OWNER]: this};

  constructor(readonly state: S, private readonly __arms: Arms<T, P, S, M>) {}

  get params(): P {
    if (this.__params === undefined) {
      throw new InternalError('Generator params accessed outside of resume');
    }
    return this.__params;
  }

  enter(params: P): void {
    this.__params = params;
  }

  leave(): void {
    this.__params = undefined;
  }

  yield<K extends PositionName<M>>(value: T, position: K, ...locals: LocalsArgs<M[K]>): Step<T> {
    return {
      kind: 'yield', [STEP_OWNER]: this, value, position,
      next: () => this.__arms[position](this, ...locals)
    };
  }

  jump<K extends PositionName<M>>(position: K, ...locals: LocalsArgs<M[K]>): Step<T> {
    return {
      kind: 'jump', [STEP_OWNER]: this, position, next: () => this.__arms[position](this, ...locals)
    };
  }

  done(): Step<T> {
    return this.__done;
  }
}

function finished(): never {
  throw new InternalError('Continuation invoked on a generator that has stopped');
}


export class ResumableImpl<T, P extends unknown[], S, M extends object>
implements Resumable<T, P> {
  private __status: GeneratorStatus = 'fresh';
  private __position: ResumePosition = START;
  private __continuation: () => Step<T>;
  private __error: unknown;
  private __disposeRequested = false;
  private readonly __co: ResumptionImpl<T, P, S, M>;
  readonly stats = new GeneratorStats();

  constructor(
    readonly name: string,
    state: S,
    start: (co: Resumption<T, P, S, M>) => Step<T>,
    arms: Arms<T, P, S, M>,
    private readonly __registry: CleanupRegistry,
    private readonly __options: ResolvedOptions
  ) {
    const co = this.__co = new ResumptionImpl<T, P, S, M>(state, arms);
    this.__continuation = () => start(co);
  }

  get status(): GeneratorStatus {
    return this.__status;
  }

  get position(): ResumePosition {
    return this.__position;
  }

  resume(...params: P): T | Exhausted {
    switch (this.__status) {
      case 'disposed':
        throw new GeneratorDisposedError(this.name);
      case 'running':
        throw new GeneratorRunningError(this.name);
      case 'failed':
        throw new GeneratorFailedError(this.name, this.__error);
      case 'exhausted':
        if (this.__options.afterExhaustion === 'throw') {
          throw new GeneratorExhaustedError(this.name);
        }
        return EXHAUSTED;
    }

    this.__status = 'running';
    this.stats.resumes += 1;
    this.__co.enter(params);
    try {
      return this.__run();
    } catch (e) {
      this.__status = 'failed';
      this.__error = e;
      this.__continuation = finished;
      throw e;
    } finally {
      this.__co.leave();
      if (this.__disposeRequested) this.__teardown();
    }
  }

  dispose(): void {
    if (this.__status === 'disposed') return;
    if (this.__status === 'running') {
      this.__disposeRequested = true;
      return;
    }
    this.__teardown();
  }

  private __run(): T | Exhausted {
    let jumps = 0;
    let step = this.__continuation();
    for (;;) {
      CHECK: if (step[STEP_OWNER] !== this.__co) {
        throw new CheckError(`Generator ${this.name} returned a step made by another generator`);
      }
      switch (step.kind) {
        case 'yield':
          this.__position = step.position;
          this.__continuation = step.next;
          this.__status = 'suspended';
          this.stats.yields += 1;
          return step.value;
        case 'jump':
          CHECK: if (++jumps > this.__options.maxJumpsPerResume) {
            throw new CheckError(
              `Generator ${this.name} jumped more than ${this.__options.maxJumpsPerResume} times ` +
              'without yielding, please raise maxJumpsPerResume if this is intended');
          }
          this.__position = step.position;
          this.stats.jumps += 1;
          step = step.next();
          break;
        case 'done':
          this.__status = 'exhausted';
          this.__continuation = finished;
          return EXHAUSTED;
      }
    }
  }

  private __teardown(): void {
    this.__status = 'disposed';
    this.__disposeRequested = false;
    this.__continuation = finished;
    this.__registry.fire('dispose');
  }
}

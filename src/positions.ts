/**
 * The resume position of a generator that has never been resumed.  Yield positions are always
 * strings, so they can never be mistaken for this one.
 */
export const START: unique symbol = Symbol('start');

/**
 * Returned by `resume` once a generator's body has run to completion.  It's distinct from every
 * value a generator can yield, including `undefined`.
 */
export const EXHAUSTED: unique symbol = Symbol('exhausted');

export type Exhausted = typeof EXHAUSTED;

export type ResumePosition = typeof START | string;

export function isExhausted(value: unknown): value is Exhausted {
  return value === EXHAUSTED;
}

/**
 * Names of the yield positions declared in a positions map.  A positions map is an object type
 * whose keys are the positions and whose values are the locals carried over to each one, or `void`
 * if none are needed:
 *
 * ```ts
 * type Positions = {
 *   counting: {i: number};
 *   finished: void;
 * };
 * ```
 */
export type PositionName<M extends object> = keyof M & string;

/**
 * The trailing arguments needed to hand locals over to a position.  Positions without locals take
 * none.
 */
export type LocalsArgs<L> = [L] extends [void] ? [] : [locals: L];

/** Marks the resumption handle that produced a step.  Kept out of the public exports. */
export const STEP_OWNER: unique symbol = Symbol('stepOwner');

/**
 * What an arm returns to the state machine.  Steps can only be obtained from the arm's own
 * {@link Resumption}; a step made by another generator is rejected when it's returned.
 */
export type Step<T> =
  | {readonly kind: 'yield'; readonly [STEP_OWNER]: object; readonly value: T;
     readonly position: string; readonly next: () => Step<T>}
  | {readonly kind: 'jump'; readonly [STEP_OWNER]: object; readonly position: string;
     readonly next: () => Step<T>}
  | {readonly kind: 'done'; readonly [STEP_OWNER]: object};

/**
 * Control handle passed to every arm of a generator body.  All steps must be obtained from it.
 */
export interface Resumption<T, P extends unknown[], S, M extends object> {
  /** The generator's own state, created by its definition's `setup`. */
  readonly state: S;

  /** The parameters passed to the `resume` call that is currently executing. */
  readonly params: P;

  /**
   * Hands `value` back to the caller of `resume`.  The next call will continue in the arm for
   * `position`, receiving the given locals.  You must return the step from the arm.
   */
  yield<K extends PositionName<M>>(value: T, position: K, ...locals: LocalsArgs<M[K]>): Step<T>;

  /**
   * Continues immediately in the arm for `position`, within the current `resume` call.
   */
  jump<K extends PositionName<M>>(position: K, ...locals: LocalsArgs<M[K]>): Step<T>;

  /** Ends the generator's body.  The current `resume` call will return {@link EXHAUSTED}. */
  done(): Step<T>;
}

export type Arm<T, P extends unknown[], S, M extends object, L> =
  (co: Resumption<T, P, S, M>, ...locals: LocalsArgs<L>) => Step<T>;

/**
 * The table of continuations, one per declared position.  Since it's keyed by the positions map,
 * every position has exactly one arm and no two positions can share one.
 */
export type Arms<T, P extends unknown[], S, M extends object> = {
  [K in keyof M]: Arm<T, P, S, M, M[K]>;
};

import {CheckError} from './errors';
import type {Resumable} from './machine';
import {isExhausted} from './positions';


/**
 * Adapts a generator that takes no parameters to the iteration protocol, so it can be used with
 * `for...of`, spreads and the like.  The iterator takes ownership: the generator gets disposed once
 * it's exhausted or iteration stops early.
 */
export function* iterate<T>(resumable: Resumable<T, []>): IterableIterator<T> {
  try {
    for (;;) {
      const value = resumable.resume();
      if (isExhausted(value)) return;
      yield value;
    }
  } finally {
    resumable.dispose();
  }
}

/**
 * Drains a generator that takes no parameters into an array, then disposes of it.
 * @param limit The maximum number of values to take.  Without a limit the generator must be finite.
 */
export function collect<T>(resumable: Resumable<T, []>, limit = Infinity): T[] {
  CHECK: if (!(limit >= 0)) throw new CheckError(`Limit must be non-negative, got ${limit}`);
  const values: T[] = [];
  if (limit === 0) {
    resumable.dispose();
    return values;
  }
  for (const value of iterate(resumable)) {
    values.push(value);
    if (values.length >= limit) break;
  }
  return values;
}

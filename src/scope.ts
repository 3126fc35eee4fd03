import {CheckError} from './errors';

export interface Disposable {
  dispose(): void;
}


/**
 * An owner for generators (or anything else that can be disposed).  Closing the scope disposes
 * everything it adopted, most recently adopted first.
 */
export class Scope implements Disposable {
  private readonly owned: Disposable[] = [];
  private _closed = false;

  /**
   * Runs a function with a fresh scope, and closes the scope once the function returns or throws.
   * @param fn The function to run; it can adopt resources into the scope it receives.
   * @returns Whatever the function returned.
   */
  static run<R>(fn: (scope: Scope) => R): R {
    const scope = new Scope();
    let result: R;
    try {
      result = fn(scope);
    } catch (e) {
      try {
        scope.close();
      } catch (closeError) {
        throw new AggregateError([e, closeError], 'Scope failed and could not be closed cleanly');
      }
      throw e;
    }
    scope.close();
    return result;
  }

  get closed(): boolean {
    return this._closed;
  }

  get size(): number {
    return this.owned.length;
  }

  adopt<D extends Disposable>(resource: D): D {
    if (this._closed) throw new CheckError('Cannot adopt resources into a closed scope');
    this.owned.push(resource);
    return resource;
  }

  /**
   * Disposes of all adopted resources in reverse order.  If any of them fail to dispose, the
   * remaining ones are still disposed and the error is thrown at the end (as an `AggregateError` if
   * there was more than one).
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    const errors: unknown[] = [];
    while (this.owned.length) {
      const resource = this.owned.pop();
      try {
        resource?.dispose();
      } catch (e) {
        errors.push(e);
      }
    }
    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) {
      throw new AggregateError(errors, `${errors.length} resources failed to dispose`);
    }
  }

  dispose(): void {
    this.close();
  }
}

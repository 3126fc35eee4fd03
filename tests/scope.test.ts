import {CheckError, Scope} from '../src';
import {oneTwoThree} from './generators';

class Resource {
  constructor(
    private readonly name: string, private readonly log: string[], private readonly fail = false
  ) {}

  dispose(): void {
    this.log.push(this.name);
    if (this.fail) throw new Error(`${this.name} failed`);
  }
}


describe('scope', () => {
  test('disposes adopted resources in reverse order', () => {
    const log: string[] = [];
    const scope = new Scope();
    const a = new Resource('a', log);
    expect(scope.adopt(a)).toBe(a);
    scope.adopt(new Resource('b', log));
    expect(scope.size).toBe(2);
    scope.close();
    expect(log).toEqual(['b', 'a']);
    expect(scope.closed).toBe(true);
    expect(scope.size).toBe(0);
  });

  test('closes only once', () => {
    const log: string[] = [];
    const scope = new Scope();
    scope.adopt(new Resource('a', log));
    scope.close();
    scope.dispose();
    expect(log).toEqual(['a']);
  });

  test('rejects adoption after closing', () => {
    const scope = new Scope();
    scope.close();
    expect(() => scope.adopt(new Resource('a', []))).toThrow(CheckError);
  });

  test('keeps disposing after a failure and rethrows it', () => {
    const log: string[] = [];
    const scope = new Scope();
    scope.adopt(new Resource('a', log));
    scope.adopt(new Resource('b', log, true));
    scope.adopt(new Resource('c', log));
    expect(() => scope.close()).toThrow('b failed');
    expect(log).toEqual(['c', 'b', 'a']);
  });

  test('aggregates several failures', () => {
    const scope = new Scope();
    scope.adopt(new Resource('a', [], true));
    scope.adopt(new Resource('b', [], true));
    let error: unknown;
    try {
      scope.close();
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(AggregateError);
    expect(error).toHaveProperty('message', '2 resources failed to dispose');
    expect(error).toHaveProperty('errors', [new Error('b failed'), new Error('a failed')]);
  });

  test('tears down generators it owns', () => {
    const log: string[] = [];
    const factory = oneTwoThree();
    const scope = new Scope();
    const first = scope.adopt(factory.create(log));
    const second = scope.adopt(factory.create(log));
    first.resume();
    scope.close();
    expect(log).toEqual(['cleanup', 'cleanup']);
    expect(first.status).toBe('disposed');
    expect(second.status).toBe('disposed');
  });
});


describe('running in a scope', () => {
  test('returns the result and closes the scope', () => {
    const log: string[] = [];
    const result = Scope.run(scope => {
      const gen = scope.adopt(oneTwoThree().create(log));
      return gen.resume();
    });
    expect(result).toBe(1);
    expect(log).toEqual(['cleanup']);
  });

  test('closes the scope when the function throws', () => {
    const log: string[] = [];
    expect(() => Scope.run(scope => {
      scope.adopt(new Resource('a', log));
      throw new Error('stopped');
    })).toThrow('stopped');
    expect(log).toEqual(['a']);
  });

  test('reports both errors when closing fails too', () => {
    let error: unknown;
    try {
      Scope.run(scope => {
        scope.adopt(new Resource('a', [], true));
        throw new Error('stopped');
      });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(AggregateError);
    expect(error).toHaveProperty('errors', [new Error('stopped'), new Error('a failed')]);
  });
});

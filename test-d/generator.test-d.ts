import {expectAssignable, expectType} from 'tsd';
import {
  Exhausted, generator, GeneratorFactory, Resumable, ResumableOf, ResumePosition, Step
} from '../src';

test('factory shape follows the declared types', () => {
  const pairs = generator<[string, number], [key: string], {next: {count: number}}>().define({
    setup(prefix: string, limit: number) {
      return {prefix, limit};
    },
    start: co => co.jump('next', {count: 0}),
    arms: {
      next: (co, {count}) => count < co.state.limit ?
        co.yield([co.state.prefix + co.params[0], count], 'next', {count: count + 1}) :
        co.done(),
    },
  });

  expectType<GeneratorFactory<[prefix: string, limit: number], [string, number], [key: string]>>(
    pairs);
  const gen = pairs.create('a', 3);
  expectType<Resumable<[string, number], [key: string]>>(gen);
  expectType<[string, number] | Exhausted>(gen.resume('b'));
  expectType<ResumePosition>(gen.position);
  expectAssignable<ResumableOf<typeof pairs>>(gen);
});

test('arms receive the locals declared for their position', () => {
  generator<number, [], {withLocals: {a: string; b: boolean}; withoutLocals: void}>().define({
    setup() {
      return {};
    },
    start: co => co.jump('withoutLocals'),
    arms: {
      withLocals(co, locals) {
        expectType<{a: string; b: boolean}>(locals);
        return co.done();
      },
      withoutLocals(co) {
        expectType<Step<number>>(co.yield(1, 'withLocals', {a: 'x', b: true}));
        return co.jump('withLocals', {a: 'y', b: false});
      },
    },
  });
});

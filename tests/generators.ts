import {generator, GeneratorOptions} from '../src';

export function oneTwoThree(options?: GeneratorOptions) {
  return generator<number, [], {afterOne: void; afterTwo: void; afterThree: void}>().define({
    name: 'oneTwoThree',
    setup(log: string[]) {
      return {log};
    },
    start: co => co.yield(1, 'afterOne'),
    arms: {
      afterOne: co => co.yield(2, 'afterTwo'),
      afterTwo: co => co.yield(3, 'afterThree'),
      afterThree: co => co.done(),
    },
    cleanup(state) {
      state.log.push('cleanup');
    },
  }, options);
}

export const range = generator<number, [], {counting: {i: number}}>().define({
  name: 'range',
  setup(from: number, to: number) {
    return {from, to};
  },
  start: co => co.jump('counting', {i: co.state.from}),
  arms: {
    counting: (co, {i}) => i < co.state.to ? co.yield(i, 'counting', {i: i + 1}) : co.done(),
  },
});

export const accumulator = generator<number, [amount: number], {added: void}>().define({
  name: 'accumulator',
  setup() {
    return {total: 0};
  },
  start: co => co.jump('added'),
  arms: {
    added(co) {
      co.state.total += co.params[0];
      return co.yield(co.state.total, 'added');
    },
  },
});


export class FakeHandle {
  opened = true;
  closeCount = 0;
  private cursor = 0;

  constructor(private readonly lines: string[]) {}

  read(): string | undefined {
    if (!this.opened) throw new Error('Read from closed handle');
    return this.lines[this.cursor++];
  }

  close(): void {
    this.closeCount += 1;
    this.opened = false;
  }
}

export const lines = generator<string, [], {reading: void}>().define({
  name: 'lines',
  setup(handle: FakeHandle) {
    return {handle};
  },
  start: co => co.jump('reading'),
  arms: {
    reading(co) {
      const line = co.state.handle.read();
      return line === undefined ? co.done() : co.yield(line, 'reading');
    },
  },
  cleanup(state) {
    state.handle.close();
  },
});

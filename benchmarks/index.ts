import {existsSync, readFileSync, writeFileSync} from 'fs';
import {performance} from 'perf_hooks';
import chalk from 'chalk';
import {EXHAUSTED, generator} from '../src';

type Results = {[key: string]: {ops: number, rel: number}};

const OPS_WIDTH = 18;
const DIFF_WIDTH = 5;
const NAME_WIDTH = 20;
const ITERATIONS = 1_000_000;
const LAST_RESULTS_FILE = './benchmarks/results.json';
const CURRENT_RESULTS_FILE = './benchmarks/current_results.json';

const counter = generator<number, [], {counting: {i: number}}>().define({
  name: 'counter',
  setup(limit: number) {
    return {limit};
  },
  start: co => co.jump('counting', {i: 0}),
  arms: {
    counting: (co, {i}) => i < co.state.limit ? co.yield(i, 'counting', {i: i + 1}) : co.done(),
  },
}, {finalize: false});

const BENCHMARKS: {[name: string]: (n: number) => number} = {
  baseline(n) {
    let sum = 0;
    for (let i = 0; i < n; i++) sum += i;
    return sum;
  },

  native(n) {
    function* count() {
      for (let i = 0; i < n; i++) yield i;
    }
    let sum = 0;
    for (const value of count()) sum += value;
    return sum;
  },

  resumable(n) {
    const gen = counter.create(n);
    let sum = 0;
    for (let value = gen.resume(); value !== EXHAUSTED; value = gen.resume()) sum += value;
    gen.dispose();
    return sum;
  },

  creation(n) {
    let sum = 0;
    for (let i = 0; i < n; i++) {
      const gen = counter.create(1);
      const value = gen.resume();
      if (value !== EXHAUSTED) sum += value;
      gen.dispose();
    }
    return sum;
  },
};

function measure(fn: (n: number) => number): number {
  fn(ITERATIONS / 10);
  const start = performance.now();
  fn(ITERATIONS);
  const seconds = (performance.now() - start) / 1000;
  return Math.round(ITERATIONS / seconds);
}

function formatDiff(diff: number): string {
  if (Math.abs(diff) < 0.05) return ' '.repeat(DIFF_WIDTH + 2);
  const color = diff > 0 ? 'green' : 'red';
  const sign = diff > 0 ? '+' : '';
  const value = (diff * 100).toFixed(0);
  return '(' + chalk[color](`${sign}${value}%`.padStart(DIFF_WIDTH)) + ')';
}

function main(): void {
  const lastResults: Results | undefined = existsSync(LAST_RESULTS_FILE) ?
    JSON.parse(readFileSync(LAST_RESULTS_FILE, {encoding: 'utf8'})) : undefined;
  const results: Results = {};
  const baselineOps = measure(BENCHMARKS.baseline);

  for (const [name, fn] of Object.entries(BENCHMARKS)) {
    const ops = name === 'baseline' ? baselineOps : measure(fn);
    const rel = ops / baselineOps;
    results[name] = {ops, rel};
    const lastRel = lastResults?.[name]?.rel;
    const diff = lastRel ? (rel - lastRel) / lastRel : 0;
    console.log(
      ' ',
      name.padEnd(NAME_WIDTH),
      `${ops.toLocaleString()} op/s`.padStart(OPS_WIDTH),
      formatDiff(diff)
    );
  }

  counter.logStats();
  writeFileSync(CURRENT_RESULTS_FILE, JSON.stringify(results, undefined, 2));
}

main();

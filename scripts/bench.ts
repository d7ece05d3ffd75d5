/*
 * Benchmark name resolution and rendering.
 *
 * Notes:
 * - This is a micro-benchmark. Results vary by machine and Node.js version.
 * - "convert+render" includes turning plain data into template values.
 */

import { performance } from 'node:perf_hooks';

import type { TplInstruction, TplValue } from '../src/types.js';

import {
  renderTemplate,
  renderTemplateInto,
  TplScopeStack,
  TplStringSink,
  tplArg,
  tplFromJs,
  tplRawArg,
  tplResolve,
  tplSection,
  tplText,
} from '../src/index.js';

type BenchmarkKind = 'resolve' | 'render' | 'convert+render';

interface BenchmarkResult {
  kind: BenchmarkKind;
  scenario: string;
  iterations: number;
  totalMs: number;
  msPerOp: number;
  opsPerSec: number;
}

interface Scenario {
  name: string;
  template: TplInstruction[];
  data: Record<string, unknown>;
  /** Names resolved from the innermost frame of `depth` nested scopes. */
  names: string[];
  depth: number;
}

const formats = [ 'table', 'md', 'json' ] as const;
type Format = typeof formats[number];

const modes = [ 'all', 'resolve', 'render', 'convert+render' ] as const;
type Mode = typeof modes[number];

const isFormat = (s: string): s is Format => formats.some((f) => f === s);
const isMode = (s: string): s is Mode => modes.some((m) => m === s);

function parseArgs (argv: string[]): {
  iterations: number;
  warmup: number;
  format: Format;
  mode: Mode;
} {
  const out: {
    iterations: number;
    warmup: number;
    format: Format;
    mode: Mode;
  } = {
    iterations: 20_000,
    warmup: 2_000,
    format: 'table',
    mode: 'all',
  };

  for (const arg of argv) {
    const m = /^--(iterations|warmup)=(\d+)$/.exec(arg);
    if (!m) continue;

    const value = Number.parseInt(m[2] ?? '', 10);
    if (!Number.isFinite(value) || value < 0) continue;

    if (m[1] === 'iterations') out.iterations = value;
    if (m[1] === 'warmup') out.warmup = value;
  }

  // keep things sane
  out.warmup = Math.max(0, Math.min(out.warmup, 200_000));
  out.iterations = Math.max(1, Math.min(out.iterations, 2_000_000));

  for (const arg of argv) {
    const m = /^--format=(.+)$/.exec(arg);
    if (m && isFormat(m[1])) out.format = m[1];
  }

  for (const arg of argv) {
    const m = /^--mode=(.+)$/.exec(arg);
    if (m && isMode(m[1])) out.mode = m[1];
  }

  return out;
}

function toResult (kind: BenchmarkKind, scenario: string, iterations: number, totalMs: number): BenchmarkResult {
  return {
    kind,
    scenario,
    iterations,
    totalMs,
    msPerOp: totalMs / iterations,
    opsPerSec: (iterations / totalMs) * 1000,
  };
}

function benchResolve (scenario: Scenario, root: TplValue, iterations: number, warmup: number): BenchmarkResult {
  const stack = new TplScopeStack(root);
  for (let i = 0; i < scenario.depth; i++) stack.push(tplFromJs({ [`level${i}`]: i }));
  const frame = stack.top;

  let sink = 0;
  const run = (): void => {
    for (const name of scenario.names) {
      if (tplResolve(frame, name) !== undefined) sink++;
    }
  };

  for (let i = 0; i < warmup; i++) run();
  const start = performance.now();
  for (let i = 0; i < iterations; i++) run();
  const end = performance.now();

  if (sink === Number.NEGATIVE_INFINITY) {
    // Prevent DCE in case of overly aggressive optimizations.
    console.log('sink', sink);
  }

  return toResult('resolve', scenario.name, iterations, end - start);
}

function benchRender (scenario: Scenario, root: TplValue, iterations: number, warmup: number): BenchmarkResult {
  let sink = 0;

  for (let i = 0; i < warmup; i++) {
    sink += renderTemplateInto(new TplStringSink(), scenario.template, root).length;
  }

  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    sink += renderTemplateInto(new TplStringSink(), scenario.template, root).length;
  }
  const end = performance.now();

  if (sink === Number.NEGATIVE_INFINITY) {
    console.log('sink', sink);
  }

  return toResult('render', scenario.name, iterations, end - start);
}

function benchConvertAndRender (scenario: Scenario, iterations: number, warmup: number): BenchmarkResult {
  let sink = 0;

  for (let i = 0; i < warmup; i++) {
    sink += renderTemplate(scenario.template, scenario.data).length;
  }

  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    sink += renderTemplate(scenario.template, scenario.data).length;
  }
  const end = performance.now();

  if (sink === Number.NEGATIVE_INFINITY) {
    console.log('sink', sink);
  }

  return toResult('convert+render', scenario.name, iterations, end - start);
}

function main (): void {
  const args = parseArgs(process.argv.slice(2));

  if (process.execArgv.some((a) => a.startsWith('--inspect'))) {
    console.warn('Warning: Node inspector is enabled; benchmark results will be distorted.');
    console.warn('Tip: run in a normal terminal / unset NODE_OPTIONS.');
    console.warn('');
  }

  const scenarios: Scenario[] = [
    {
      name: 'small (interpolation)',
      template: [ tplText('Hello '), tplArg('name'), tplText('!\n') ],
      data: {
        name: 'Alice',
      },
      names: [ 'name' ],
      depth: 0,
    },
    {
      name: 'medium (sections + dot-paths)',
      template: [
        tplSection('user.admin', [ tplText('Admin') ]),
        tplText('\n'),
        tplSection('items', [
          tplText('- '),
          tplArg('title'),
          tplText(' ('),
          tplArg('count'),
          tplText(') '),
          tplRawArg('site.name'),
          tplText('\n'),
        ]),
      ],
      data: {
        site: { name: 'Example' },
        user: { admin: true },
        items: [
          { title: 'Foo', count: 1 },
          { title: 'Bar', count: 2 },
          { title: 'Baz', count: 0 },
        ],
      },
      names: [ 'user.admin', 'site.name', 'items', 'missing.field' ],
      depth: 4,
    },
    {
      name: 'large (many interpolations)',
      template: Array.from({ length: 80 }, (_, i) => [
        tplText(`Row ${i}: `),
        tplArg('user.name'),
        tplText(' - '),
        tplArg('user.email'),
        tplText('\n'),
      ]).flat(),
      data: {
        user: {
          name: 'Alice',
          email: 'alice@example.test',
        },
      },
      names: [ 'user.name', 'user.email' ],
      depth: 16,
    },
  ];

  const results: BenchmarkResult[] = [];

  for (const scenario of scenarios) {
    const root = tplFromJs(scenario.data);

    if (args.mode === 'all' || args.mode === 'resolve') {
      results.push(benchResolve(scenario, root, args.iterations, args.warmup));
    }
    if (args.mode === 'all' || args.mode === 'render') {
      results.push(benchRender(scenario, root, args.iterations, args.warmup));
    }
    if (args.mode === 'all' || args.mode === 'convert+render') {
      results.push(benchConvertAndRender(scenario, args.iterations, args.warmup));
    }
  }

  const rows = results.map((r) => ({
    kind: r.kind,
    scenario: r.scenario,
    iterations: r.iterations,
    totalMs: Number(r.totalMs.toFixed(2)),
    msPerOp: Number(r.msPerOp.toFixed(6)),
    opsPerSec: Number(r.opsPerSec.toFixed(0)),
  }));

  if (args.format === 'json') {
    console.log(JSON.stringify({
      node: process.version,
      params: {
        iterations: args.iterations,
        warmup: args.warmup,
        mode: args.mode,
      },
      results: rows,
    }));
    return;
  }

  if (args.format === 'md') {
    console.log('## scopestache benchmark');
    console.log('');
    console.log(`- Node: ${process.version}`);
    console.log(`- Params: iterations=${args.iterations}, warmup=${args.warmup}, mode=${args.mode}`);
    console.log('');
    console.log('| Kind | Scenario | Iterations | Total (ms) | ms/op | ops/sec |');
    console.log('| --- | --- | ---: | ---: | ---: | ---: |');

    for (const r of rows) {
      console.log(`| ${r.kind} | ${r.scenario} | ${r.iterations} | ${r.totalMs} | ${r.msPerOp} | ${r.opsPerSec} |`);
    }

    console.log('');
    console.log('Notes:');
    console.log('- Micro-benchmark results vary by machine and Node.js version.');
    console.log('- kind=resolve: name resolution only (tplResolve) from a nested frame.');
    console.log('- kind=render: rendering only on pre-converted data.');
    console.log('- kind=convert+render: data conversion and rendering in the hot loop.');
    return;
  }

  console.log('Template benchmark');
  console.log(`Node: ${process.version}`);
  console.log(`iterations=${args.iterations} warmup=${args.warmup} mode=${args.mode}`);
  console.log('');

  console.table(rows);
}

main();

/* Deduction engine test runner
 * - Discovers *.spec.ts under test/engine, in name order
 * - Each spec exports its TestCase table as `default` or `cases`
 * - Optional arguments filter cases by name: `npm test -- mle "turn cap"`
 * - Prints results per spec file with timings; exits non-zero on failures
 */

import { readdirSync, statSync } from 'node:fs';
import { basename, join } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { TestCase, TestResult } from '../test/engine/harness.ts';
import { runAll } from '../test/engine/harness.ts';

type SpecRun = { file: string; results: TestResult[]; failed: number; ms: number };

function* walk(dir: string): Generator<string> {
  for (const name of readdirSync(dir).sort()) {
    const p = join(dir, name);
    if (statSync(p).isDirectory()) yield* walk(p);
    else if (name.endsWith('.spec.ts')) yield p;
  }
}

function isTestCase(x: unknown): x is TestCase {
  return typeof x === 'object' && x !== null && 'name' in x && ('check' in x || 'actions' in x);
}

async function loadCasesFrom(file: string): Promise<TestCase[]> {
  const mod: { default?: unknown; cases?: unknown } = await import(pathToFileURL(file).href);
  const arr = mod.default || mod.cases;
  return Array.isArray(arr) ? arr.filter(isTestCase) : [];
}

function matches(filters: string[], tc: TestCase): boolean {
  const name = tc.name.toLowerCase();
  return filters.length === 0 || filters.some((f) => name.includes(f.toLowerCase()));
}

function report(run: SpecRun) {
  const status = run.failed > 0 ? `${run.failed} failed` : 'ok';
  console.log(`\n${basename(run.file)} (${run.results.length} case(s), ${run.ms} ms): ${status}`);
  for (const r of run.results) {
    console.log(`  ${r.ok ? '✔' : '✖'} ${r.name}`);
    for (const e of r.errors) console.log('      - ' + e);
  }
}

async function main() {
  const filters = process.argv.slice(2);
  const runs: SpecRun[] = [];
  for (const file of walk(join(process.cwd(), 'test', 'engine'))) {
    const cases = (await loadCasesFrom(file)).filter((tc) => matches(filters, tc));
    if (cases.length === 0) continue;
    const started = Date.now();
    const { results, failed } = runAll(cases);
    const run: SpecRun = { file, results, failed, ms: Date.now() - started };
    report(run);
    runs.push(run);
  }
  if (runs.length === 0) {
    console.log(filters.length ? `No test cases match ${filters.join(', ')}.` : 'No engine test cases found.');
    process.exit(filters.length ? 1 : 0);
  }
  const total = runs.reduce((n, r) => n + r.results.length, 0);
  const failed = runs.reduce((n, r) => n + r.failed, 0);
  console.log(`\n${total} test(s) in ${runs.length} file(s), ${failed} failed.`);
  if (failed > 0) process.exit(1);
}

main().catch((e) => {
  console.error('Test runner error:', e instanceof Error ? e.stack || e.message : String(e));
  process.exit(1);
});

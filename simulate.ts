#!/usr/bin/env tsx
// Strategy benchmark: runs a batch of games from a sims/*.json file and prints a win/turn summary

import fs from 'node:fs';
import path from 'node:path';
import { runGames, type GameResult, type GameState } from './engine.ts';
import { CLUE_RULES } from './core-rules.ts';
import { factCount } from './knowledge.ts';
import { SimulationConfigZ, type SimulationConfig } from './schema.ts';

function readConfig(file: string): SimulationConfig {
  const p = path.resolve(file);
  const raw: unknown = JSON.parse(fs.readFileSync(p, 'utf8'));
  const parsed = SimulationConfigZ.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid simulation config ${file}\n- ${issues.join('\n- ')}`);
  }
  return parsed.data;
}

function summarize(cfg: SimulationConfig, results: GameResult[]) {
  const names = cfg.players.map((p, i) => p.name || `P${i + 1}`);
  const wins = names.map(() => 0);
  let unfinished = 0;
  for (const r of results) {
    if (r.winner != null) wins[r.winner]++;
    else unfinished++;
  }
  const mean = (xs: number[]) => xs.reduce((a, b) => a + b, 0) / Math.max(1, xs.length);
  const won = results.filter((r) => r.outcome === 'WIN');

  console.log(`\n=== ${cfg.name || 'Simulation'}: ${results.length} game(s) ===`);
  names.forEach((n, i) => {
    const pct = ((100 * wins[i]) / results.length).toFixed(1);
    console.log(`${n.padEnd(10)} ${results[0].strategies[i].padEnd(10)} wins=${wins[i]} (${pct}%)`);
  });
  console.log(`No winner: ${unfinished}`);
  console.log(`Mean turns to win: ${mean(won.map((r) => r.turnCount)).toFixed(1)}`);
  console.log(`Mean final posterior accuracy: ${mean(results.map((r) => r.finalPosteriorAccuracy)).toFixed(3)}`);
}

function printGame(s: GameState, r: GameResult) {
  console.log(`\n--- Game (seed ${r.seed}) ---`);
  for (const m of s.log) console.log('  ' + m);
  for (const p of s.players) {
    const f = factCount(p.knowledge);
    console.log(`  ${p.name}: ${f.positives} placed, ${f.negatives} ruled out, ${f.constraints} open constraints`);
  }
}

function runSimulation() {
  const file = process.argv[2] || 'sims/default.json';
  const verbose = process.env.VERBOSE === '1';
  const cfg = readConfig(file);
  summarize(cfg, runGames(cfg, CLUE_RULES, verbose ? printGame : undefined));
}

try {
  runSimulation();
} catch (e) {
  console.error('Simulation error:', e instanceof Error ? e.stack || e.message : String(e));
  process.exit(1);
}

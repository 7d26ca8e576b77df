// Checker for core game rules completeness & consistency

import type { GameRules } from './core-rules.ts';
import { CategoryZ } from './schema.ts';

export type RuleIssue = { level: 'error' | 'warning'; code: string; message: string; path?: string[] };
export type RuleAnalysis = { ok: boolean; issues: RuleIssue[] };

const EXPECTED_DECK = { PERSON: 6, WEAPON: 6, ROOM: 9 } as const;

export function analyzeRules(r: GameRules): RuleAnalysis {
  const issues: RuleIssue[] = [];
  const err = (code: string, message: string, path?: string[]) => issues.push({ level: 'error', code, message, path });
  const warn = (code: string, message: string, path?: string[]) => issues.push({ level: 'warning', code, message, path });

  // Deck
  const seen = new Set<string>();
  for (const cat of CategoryZ.options) {
    const cards = r.deck[cat];
    if (cards.length !== EXPECTED_DECK[cat]) {
      err('DECK_CATEGORY_SIZE', `${cat} has ${cards.length} cards, expected ${EXPECTED_DECK[cat]}`, ['deck', cat]);
    }
    for (const c of cards) {
      if (seen.has(c)) err('DECK_DUPLICATE', `Card ${c} appears twice`, ['deck', cat]);
      seen.add(c);
    }
  }

  // Table
  if (r.table.minPlayers < 2) err('TABLE_MIN_LT_2', 'At least two players are required', ['table', 'minPlayers']);
  if (r.table.maxPlayers < r.table.minPlayers) err('TABLE_MAX_LT_MIN', 'maxPlayers is below minPlayers', ['table', 'maxPlayers']);
  if (r.table.maxPlayers > 6) warn('TABLE_MAX_GT_6', 'More than six players leaves some hands with two cards', ['table', 'maxPlayers']);

  // Estimator
  const e = r.estimator;
  if (e.exactConstraintLimit > 30) err('EST_CONSTRAINT_LIMIT', 'Exact search tracks constraints in a 30-bit mask', ['estimator', 'exactConstraintLimit']);
  if (e.exactStateBudget <= 0) warn('EST_NO_EXACT', 'Exact search disabled; every posterior is sampled', ['estimator', 'exactStateBudget']);
  if (e.minSamples > e.maxSamples) err('EST_SAMPLES_ORDER', 'minSamples exceeds maxSamples', ['estimator', 'minSamples']);
  if (e.timeBudgetMs <= 0) err('EST_TIME_BUDGET', 'Sampling needs a positive time budget', ['estimator', 'timeBudgetMs']);

  // Loop & accusation
  if (r.loop.maxTurns <= 0) err('LOOP_MAX_TURNS', 'Turn cap must be positive', ['loop', 'maxTurns']);
  if (r.accusation.threshold <= 0 || r.accusation.threshold > 1) {
    err('ACCUSE_THRESHOLD_RANGE', 'Accusation threshold must be in (0, 1]', ['accusation', 'threshold']);
  } else if (r.accusation.threshold < 1) {
    warn('ACCUSE_RISKY', 'Threshold below 1 allows incorrect accusations', ['accusation', 'threshold']);
  }

  return { ok: issues.filter(i => i.level === 'error').length === 0, issues };
}

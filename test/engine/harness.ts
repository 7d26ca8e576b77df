// Minimal typed test harness for knowledge-store pre/post state testing
// ESM: keep extension-suffixed imports
import { CLUE_RULES } from '../../core-rules.ts';
import { CATEGORIES, cardsIn } from '../../deck.ts';
import { posterior } from '../../estimator.ts';
import {
  assertNegative,
  assertPositive,
  assertSetConstraint,
  createKnowledge,
  isExcluded,
  noOneDisproved,
  propagate,
  seedHand,
  type KnowledgeState,
  type Observer,
} from '../../knowledge.ts';
import { disproveOrder, foldOutcome, observe, resolve } from '../../resolver.ts';
import { ENVELOPE, type CardName, type Guess, type Holder, type PlayerIndex } from '../../schema.ts';

// Public harness types
export type PreSetup = {
  numPlayers: number;
  observer?: Observer; // defaults to player 0, with no hand seeded unless listed in `hands`
  hands?: { player: PlayerIndex; cards: CardName[] }[];
  envelope?: CardName[];
};

export type Action =
  | { kind: 'positive'; card: CardName; holder: Holder }
  | { kind: 'negative'; card: CardName; holder: Holder }
  | { kind: 'set'; holder: Holder; cards: CardName[] }
  | { kind: 'propagate' }
  | { kind: 'noOneDisproved'; guesser: PlayerIndex; guess: Guess }
  // resolves against the given hands, then folds what the store's observer sees
  | { kind: 'guess'; guesser: PlayerIndex; guess: Guess; hands: CardName[][] };

export type PostExpect = {
  positives?: [CardName, Holder][];
  unknown?: CardName[]; // no positive fact yet
  negatives?: [CardName, Holder][];
  notNegatives?: [CardName, Holder][];
  constraints?: { holder: Holder; cards: CardName[] }[]; // the exact open constraints, any order
  envelope?: [CardName, number][]; // posterior envelope probabilities
  categorySums?: boolean;
  method?: 'exact' | 'sampled';
  throws?: 'Contradiction' | 'InvalidInput' | 'InvalidPlayerCount';
  logIncludes?: string[];
};

export type KnowledgeCase = {
  name: string;
  pre: PreSetup;
  actions: Action[];
  expect: PostExpect;
};

// Free-form case: returns the list of failures
export type CheckCase = { name: string; check: () => string[] };

export type TestCase = KnowledgeCase | CheckCase;

export type TestResult = { name: string; ok: boolean; errors: string[] };

const TOLERANCE = 1e-9;

export function buildState(pre: PreSetup): KnowledgeState {
  const k = createKnowledge(pre.numPlayers, pre.observer ?? 0, CLUE_RULES);
  for (const h of pre.hands || []) seedHand(k, h.player, h.cards);
  for (const c of pre.envelope || []) assertPositive(k, c, ENVELOPE);
  return k;
}

export function execActions(k: KnowledgeState, actions: Action[]) {
  for (const a of actions) {
    switch (a.kind) {
      case 'positive': assertPositive(k, a.card, a.holder); break;
      case 'negative': assertNegative(k, a.card, a.holder); break;
      case 'set': assertSetConstraint(k, a.holder, a.cards); break;
      case 'propagate': propagate(k); break;
      case 'noOneDisproved': noOneDisproved(k, a.guesser, a.guess); break;
      case 'guess': {
        const outcome = resolve(a.guess, a.guesser, disproveOrder(a.guesser, k.numPlayers), a.hands);
        foldOutcome(k, observe(outcome, k.observer));
        break;
      }
      default: ((x: never) => { throw new Error(`Unreachable action: ${String(x)}`); })(a);
    }
  }
}

const sameSet = (a: readonly string[], b: readonly string[]) =>
  a.length === b.length && [...a].sort().join('|') === [...b].sort().join('|');

const showHolder = (h: Holder) => (h === ENVELOPE ? 'ENVELOPE' : `P${h}`);

export function verifyExpect(k: KnowledgeState, exp: PostExpect): string[] {
  const errors: string[] = [];
  for (const [card, h] of exp.positives || []) {
    const got = k.positives.get(card);
    if (got !== h) errors.push(`positive ${card}: expected ${showHolder(h)}, got ${got === undefined ? 'none' : showHolder(got)}`);
  }
  for (const card of exp.unknown || []) {
    const got = k.positives.get(card);
    if (got !== undefined) errors.push(`${card} expected unknown, got ${showHolder(got)}`);
  }
  for (const [card, h] of exp.negatives || []) {
    if (!isExcluded(k, card, h)) errors.push(`negative (${card}, ${showHolder(h)}) missing`);
  }
  for (const [card, h] of exp.notNegatives || []) {
    if (isExcluded(k, card, h)) errors.push(`unexpected negative (${card}, ${showHolder(h)})`);
  }
  if (exp.constraints) {
    const key = (c: { holder: Holder; cards: readonly CardName[] }) => `${showHolder(c.holder)}:{${[...c.cards].sort().join(',')}}`;
    const want = exp.constraints.map(key);
    const got = k.constraints.map(key);
    if (!sameSet(want, got)) errors.push(`constraints expected=[${want.join(' ')}] got=[${got.join(' ')}]`);
  }
  if (exp.envelope || exp.categorySums || exp.method) {
    const p = posterior(k);
    for (const [card, want] of exp.envelope || []) {
      const got = p.envelope.get(card) ?? 0;
      if (Math.abs(got - want) > TOLERANCE) errors.push(`P(${card} in envelope) expected=${want} got=${got}`);
    }
    if (exp.categorySums) {
      for (const cat of CATEGORIES) {
        const sum = cardsIn(cat).reduce((acc, c) => acc + (p.envelope.get(c) ?? 0), 0);
        if (Math.abs(sum - 1) > 1e-6) errors.push(`${cat} envelope mass sums to ${sum}`);
      }
    }
    if (exp.method && p.method !== exp.method) errors.push(`method expected=${exp.method} got=${p.method}`);
  }
  if (exp.logIncludes) {
    for (const needle of exp.logIncludes) {
      if (!k.log.some(l => l.includes(needle))) errors.push(`log missing: ${needle}`);
    }
  }
  return errors;
}

function errorName(e: unknown): string {
  return e instanceof Error ? e.name : typeof e;
}

export function runCase(tc: TestCase): TestResult {
  if ('check' in tc) {
    try {
      const errors = tc.check();
      return { name: tc.name, ok: errors.length === 0, errors };
    } catch (e) {
      return { name: tc.name, ok: false, errors: [`threw ${errorName(e)}: ${e instanceof Error ? e.message : String(e)}`] };
    }
  }
  let k: KnowledgeState;
  try {
    k = buildState(tc.pre);
    execActions(k, tc.actions);
  } catch (e) {
    if (tc.expect.throws && errorName(e) === tc.expect.throws) return { name: tc.name, ok: true, errors: [] };
    return { name: tc.name, ok: false, errors: [`threw ${errorName(e)}: ${e instanceof Error ? e.message : String(e)}`] };
  }
  if (tc.expect.throws) return { name: tc.name, ok: false, errors: [`expected ${tc.expect.throws} to be thrown`] };
  const errors = verifyExpect(k, tc.expect);
  return { name: tc.name, ok: errors.length === 0, errors };
}

export function runAll(cases: TestCase[]): { results: TestResult[]; failed: number } {
  const results = cases.map(runCase);
  const failed = results.filter(r => !r.ok).length;
  return { results, failed };
}

// Assertion helpers for check cases
export function eq<T>(label: string, got: T, want: T): string[] {
  const g = JSON.stringify(got);
  const w = JSON.stringify(want);
  return g === w ? [] : [`${label}: expected ${w}, got ${g}`];
}

export function near(label: string, got: number, want: number, tol = TOLERANCE): string[] {
  return Math.abs(got - want) <= tol ? [] : [`${label}: expected ${want}, got ${got}`];
}

export function throwsNamed(label: string, name: string, fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    return errorName(e) === name ? [] : [`${label}: expected ${name}, got ${errorName(e)}`];
  }
  return [`${label}: expected ${name} to be thrown`];
}

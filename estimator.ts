// Posterior estimator: envelope (and per-holder) probabilities from a knowledge store
// Counts consistent completions of the unknown cards jointly over all categories.
// Exact memoized counting when the residual state is small, weighted sampling otherwise.

import type { EstimatorRules } from './core-rules.ts';
import { CATEGORIES, allCards, categoryOf, cardsIn, makeRng, pick, type Rng } from './deck.ts';
import { Contradiction } from './errors.ts';
import {
  isExcluded,
  playersOf,
  remainingCapacity,
  type KnowledgeView,
} from './knowledge.ts';
import {
  ENVELOPE,
  type CardName,
  type Category,
  type Guess,
  type Holder,
  type Person,
  type Room,
  type Weapon,
} from './schema.ts';

export type Posterior = {
  envelope: Map<CardName, number>;
  holders: Map<CardName, Map<Holder, number>>;
  method: 'exact' | 'sampled';
  completions: number; // exact completion count, or accepted samples
  timedOut: boolean; // sampling stopped before minSamples were accepted
};

export type EstimatorOptions = Partial<EstimatorRules> & { force?: 'exact' | 'sampled' };

// Slots: one per player, then one envelope slot per category
type Slot = number;

type Problem = {
  cards: CardName[]; // unknown cards, deck order
  slotHolder: Holder[];
  caps: number[]; // remaining capacity per slot
  eligible: Slot[][]; // per card
  hits: number[][][]; // [card][slot] -> constraints that placement satisfies
  closing: number[][]; // [card] -> constraints whose last member is this card
  suffix: number[][]; // [i][slot] -> cards at index >= i that may go to slot
};

type Tally = { weights: number[][]; total: number };

const MAX_MASK_BITS = 30;

// ---------------- Problem setup ----------------
function buildProblem(k: KnowledgeView): Problem {
  const n = k.numPlayers;
  const players = playersOf(k);
  const slotHolder: Holder[] = [...players, ...CATEGORIES.map(() => ENVELOPE)];
  const caps = [
    ...players.map((p) => remainingCapacity(k, p)),
    ...CATEGORIES.map((c) => remainingCapacity(k, ENVELOPE, c)),
  ];
  const cards = allCards(k.rules).filter((c) => !k.positives.has(c));
  const slots = slotHolder.map((_, s) => s);

  const eligible = cards.map((card) => {
    const env = n + CATEGORIES.indexOf(categoryOf(card));
    return slots.filter((s) => (s < n || s === env) && !isExcluded(k, card, slotHolder[s]));
  });

  const hits: number[][][] = cards.map(() => slots.map(() => []));
  const closing: number[][] = cards.map(() => []);
  k.constraints.forEach((con, j) => {
    let last = -1;
    cards.forEach((card, i) => {
      if (!con.cards.includes(card)) return;
      last = i;
      for (const s of slots) if (slotHolder[s] === con.holder) hits[i][s].push(j);
    });
    if (last < 0) throw new Contradiction(`Open constraint on ${con.cards.join(', ')} has no unknown card`);
    closing[last].push(j);
  });

  const suffix: number[][] = Array.from({ length: cards.length + 1 }, () => slots.map(() => 0));
  for (let i = cards.length - 1; i >= 0; i--) {
    suffix[i] = suffix[i + 1].slice();
    for (const s of eligible[i]) suffix[i][s]++;
  }

  const free = caps.reduce((a, b) => a + b, 0);
  if (free !== cards.length) {
    throw new Contradiction(`${cards.length} unknown cards but ${free} free slots`);
  }
  return { cards, slotHolder, caps, eligible, hits, closing, suffix };
}

function feasible(p: Problem, i: number, caps: readonly number[]): boolean {
  for (let s = 0; s < caps.length; s++) if (caps[s] > p.suffix[i][s]) return false;
  return true;
}

const toMask = (ids: readonly number[]) => ids.reduce((m, j) => m | (1 << j), 0);

const stateKey = (i: number, caps: readonly number[], mask: number) => `${i}|${caps.join(',')}|${mask}`;

// ---------------- Exact counting ----------------
// Satisfied constraints travel as a bitmask. Returns undefined when the memo outgrows the budget.
function countExact(p: Problem, stateBudget: number): Tally | undefined {
  const hitMask = p.hits.map((row) => row.map(toMask));
  const closeMask = p.closing.map(toMask);
  // Every constraint ending at card i must be satisfied once card i is placed
  const closes = (i: number, mask: number) => (mask & closeMask[i]) === closeMask[i];
  const memo = new Map<string, number>();
  let over = false;

  const count = (i: number, caps: number[], mask: number): number => {
    if (over || !feasible(p, i, caps)) return 0;
    if (i === p.cards.length) return 1;
    const key = stateKey(i, caps, mask);
    const hit = memo.get(key);
    if (hit !== undefined) return hit;
    if (memo.size >= stateBudget) { over = true; return 0; }
    let total = 0;
    for (const s of p.eligible[i]) {
      if (caps[s] === 0) continue;
      const m = mask | hitMask[i][s];
      if (!closes(i, m)) continue;
      caps[s]--;
      total += count(i + 1, caps, m);
      caps[s]++;
    }
    memo.set(key, total);
    return total;
  };

  const total = count(0, p.caps.slice(), 0);
  if (over) return undefined;

  // Forward pass: prefix weights times suffix counts give exact marginals
  const weights = p.cards.map(() => p.slotHolder.map(() => 0));
  let level = new Map<string, { caps: number[]; mask: number; weight: number }>();
  if (total > 0) level.set(stateKey(0, p.caps, 0), { caps: p.caps.slice(), mask: 0, weight: 1 });
  for (let i = 0; i < p.cards.length; i++) {
    const next = new Map<string, { caps: number[]; mask: number; weight: number }>();
    for (const st of level.values()) {
      for (const s of p.eligible[i]) {
        if (st.caps[s] === 0) continue;
        const mask = st.mask | hitMask[i][s];
        if (!closes(i, mask)) continue;
        const caps = st.caps.slice();
        caps[s]--;
        const rest = count(i + 1, caps, mask);
        if (rest === 0) continue;
        weights[i][s] += st.weight * rest;
        const key = stateKey(i + 1, caps, mask);
        const seen = next.get(key);
        if (seen) seen.weight += st.weight;
        else next.set(key, { caps, mask, weight: st.weight });
      }
    }
    level = next;
  }
  return { weights, total };
}

// ---------------- Sampling ----------------
// Sequential importance sampling: each draw is weighted by the product of its branching factors,
// which makes the weighted draws uniform over consistent completions.
function countSampled(
  p: Problem,
  rules: EstimatorRules,
  rng: Rng,
): Tally & { accepted: number } {
  const weights = p.cards.map(() => p.slotHolder.map(() => 0));
  let total = 0;
  let accepted = 0;
  const start = Date.now();

  for (let drawn = 0; drawn < rules.maxSamples; drawn++) {
    if (drawn % 64 === 0 && Date.now() - start > rules.timeBudgetMs) break;
    const caps = p.caps.slice();
    const done = new Set<number>();
    const chosen: Slot[] = [];
    let w = 1;
    for (let i = 0; i < p.cards.length; i++) {
      const options = p.eligible[i].filter((s) => {
        if (caps[s] === 0) return false;
        if (!p.closing[i].every((j) => done.has(j) || p.hits[i][s].includes(j))) return false;
        caps[s]--;
        const ok = feasible(p, i + 1, caps);
        caps[s]++;
        return ok;
      });
      if (options.length === 0) break;
      const s = pick(options, rng);
      w *= options.length;
      caps[s]--;
      for (const j of p.hits[i][s]) done.add(j);
      chosen.push(s);
    }
    if (chosen.length !== p.cards.length) continue;
    accepted++;
    total += w;
    chosen.forEach((s, i) => { weights[i][s] += w; });
  }
  return { weights, total, accepted };
}

// ---------------- Public API ----------------
export function posterior(k: KnowledgeView, options: EstimatorOptions = {}): Posterior {
  const { force, ...overrides } = options;
  const rules: EstimatorRules = { ...k.rules.estimator, ...overrides };
  const p = buildProblem(k);
  const limit = Math.min(rules.exactConstraintLimit, MAX_MASK_BITS);

  if (force !== 'sampled' && k.constraints.length <= limit) {
    const budget = force === 'exact' ? Number.POSITIVE_INFINITY : rules.exactStateBudget;
    const exact = countExact(p, budget);
    if (exact) {
      if (exact.total === 0) throw new Contradiction('No deal is consistent with the known facts');
      return toPosterior(k, p, exact, { method: 'exact', completions: exact.total, timedOut: false });
    }
  }

  const sampled = countSampled(p, rules, makeRng(rules.samplingSeed));
  const timedOut = sampled.accepted < rules.minSamples;
  if (sampled.accepted === 0) {
    return toPosterior(k, p, uniformTally(p), { method: 'sampled', completions: 0, timedOut });
  }
  return toPosterior(k, p, sampled, { method: 'sampled', completions: sampled.accepted, timedOut });
}

// Best-effort spread when no sample survived: uniform over each card's eligible slots,
// envelope mass split evenly among the remaining candidates of each category
function uniformTally(p: Problem): Tally {
  const envCount = p.slotHolder.map((h, s) =>
    h === ENVELOPE ? p.eligible.filter((e) => e.includes(s)).length : 0);
  const weights = p.eligible.map((slots) => {
    const row = p.slotHolder.map(() => 0);
    const env = slots.find((s) => p.slotHolder[s] === ENVELOPE);
    const envShare = env === undefined || p.caps[env] === 0 ? 0 : 1 / envCount[env];
    const players = slots.filter((s) => s !== env);
    if (env !== undefined) row[env] = envShare;
    for (const s of players) row[s] = (1 - envShare) / players.length;
    return row;
  });
  return { weights, total: 1 };
}

function toPosterior(
  k: KnowledgeView,
  p: Problem,
  tally: Tally,
  meta: Pick<Posterior, 'method' | 'completions' | 'timedOut'>,
): Posterior {
  const envelope = new Map<CardName, number>();
  const holders = new Map<CardName, Map<Holder, number>>();
  for (const [card, h] of k.positives) {
    envelope.set(card, h === ENVELOPE ? 1 : 0);
    holders.set(card, new Map([[h, 1]]));
  }
  p.cards.forEach((card, i) => {
    const dist = new Map<Holder, number>();
    for (const s of p.eligible[i]) {
      const prob = tally.weights[i][s] / tally.total;
      dist.set(p.slotHolder[s], (dist.get(p.slotHolder[s]) ?? 0) + prob);
    }
    envelope.set(card, dist.get(ENVELOPE) ?? 0);
    holders.set(card, dist);
  });
  return { envelope, holders, ...meta };
}

// ---------------- Read helpers ----------------
export function envelopeProbability(p: Posterior, card: CardName): number {
  return p.envelope.get(card) ?? 0;
}

export function holderProbability(p: Posterior, card: CardName, holder: Holder): number {
  return p.holders.get(card)?.get(holder) ?? 0;
}

export function categoryDistribution(p: Posterior, category: Category): { card: CardName; probability: number }[] {
  return cardsIn(category).map((card) => ({ card, probability: envelopeProbability(p, card) }));
}

// First card in deck order wins ties
export function mostLikely<T extends CardName>(p: Posterior, cards: readonly T[]): T {
  let best = cards[0];
  for (const c of cards) if (envelopeProbability(p, c) > envelopeProbability(p, best)) best = c;
  return best;
}

export function topProbability(p: Posterior, category: Category): number {
  return Math.max(...categoryDistribution(p, category).map((d) => d.probability));
}

export function mostLikelySolution(p: Posterior, k: KnowledgeView): Guess {
  const person: Person = mostLikely(p, k.rules.deck.PERSON);
  const weapon: Weapon = mostLikely(p, k.rules.deck.WEAPON);
  const room: Room = mostLikely(p, k.rules.deck.ROOM);
  return [person, weapon, room];
}

export function entropy(probs: readonly number[]): number {
  let h = 0;
  for (const q of probs) if (q > 0) h -= q * Math.log2(q);
  return h;
}

export function envelopeEntropy(p: Posterior): number {
  return CATEGORIES.reduce((acc, c) => acc + entropy(categoryDistribution(p, c).map((d) => d.probability)), 0);
}

export function isSolved(p: Posterior, threshold = 1): boolean {
  const eps = 1e-9;
  return CATEGORIES.every((c) => topProbability(p, c) >= threshold - eps);
}

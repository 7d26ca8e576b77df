// Guessing strategies: heuristic players and the entropy-driven MLE player
// Strategies read the store and posterior; they never mutate engine state.

import { CLUE_RULES, type GameRules } from './core-rules.ts';
import { CATEGORIES, cardsIn, pick, type Rng } from './deck.ts';
import {
  envelopeProbability,
  entropy,
  holderProbability,
  isSolved,
  mostLikely,
  mostLikelySolution,
  topProbability,
  type Posterior,
} from './estimator.ts';
import { holdersOf, type KnowledgeView } from './knowledge.ts';
import { disproveOrder, revealedCard } from './resolver.ts';
import {
  ENVELOPE,
  type CardName,
  type Category,
  type Guess,
  type Holder,
  type PlayerIndex,
  type StrategySpec,
} from './schema.ts';

export type StrategyView = {
  readonly me: PlayerIndex;
  readonly knowledge: KnowledgeView;
  readonly posterior: Posterior;
  readonly rng: Rng;
};

export interface Strategy {
  readonly name: string;
  chooseGuess(v: StrategyView): Guess;
  chooseAccusation(v: StrategyView): Guess | undefined;
}

const EPS = 1e-9;

function exhaustive(x: never): never {
  throw new Error(`Unhandled strategy: ${JSON.stringify(x)}`);
}

// ---------------- Shared helpers ----------------
// Random pick among the cards passing `keep`, or among all of them when none does
function pickWhere<T extends CardName>(cards: readonly T[], keep: (c: T) => boolean, rng: Rng): T {
  const ok = cards.filter(keep);
  return pick(ok.length ? ok : cards, rng);
}

function certainAccusation(v: StrategyView, threshold = 1): Guess | undefined {
  return isSolved(v.posterior, threshold) ? mostLikelySolution(v.posterior, v.knowledge) : undefined;
}

const solved = (p: Posterior, c: Category) => topProbability(p, c) >= 1 - EPS;

// ---------------- Heuristics ----------------
// Anything not in its own hand
export const randomStrategy: Strategy = {
  name: 'random',
  chooseGuess({ me, knowledge: k, rng }) {
    const notMine = (c: CardName) => k.positives.get(c) !== me;
    return [
      pickWhere(k.rules.deck.PERSON, notMine, rng),
      pickWhere(k.rules.deck.WEAPON, notMine, rng),
      pickWhere(k.rules.deck.ROOM, notMine, rng),
    ];
  },
  chooseAccusation: (v) => certainAccusation(v),
};

// Anything not yet seen in a player's hand
export const basicStrategy: Strategy = {
  name: 'basic',
  chooseGuess({ knowledge: k, rng }) {
    const unseen = (c: CardName) => {
      const h = k.positives.get(c);
      return h === undefined || h === ENVELOPE;
    };
    return [
      pickWhere(k.rules.deck.PERSON, unseen, rng),
      pickWhere(k.rules.deck.WEAPON, unseen, rng),
      pickWhere(k.rules.deck.ROOM, unseen, rng),
    ];
  },
  chooseAccusation: (v) => certainAccusation(v),
};

// The most likely envelope card of every category
export const greedyStrategy: Strategy = {
  name: 'greedy',
  chooseGuess: ({ posterior, knowledge }) => mostLikelySolution(posterior, knowledge),
  chooseAccusation: (v) => certainAccusation(v),
};

// Hunts one unsolved category at a time, person first, then weapon, then room.
// The other two slots hold cards nobody else can show: its own or already-solved ones.
export const goodStrategy: Strategy = {
  name: 'good',
  chooseGuess({ me, knowledge: k, posterior: p }) {
    const hunt = CATEGORIES.find((c) => !solved(p, c));
    const slot = <T extends CardName>(cat: Category, cards: readonly T[]): T => {
      if (cat === hunt) {
        const open = cards.filter((c) => envelopeProbability(p, c) > EPS && envelopeProbability(p, c) < 1 - EPS);
        return mostLikely(p, open.length ? open : cards);
      }
      if (solved(p, cat)) return mostLikely(p, cards);
      const mine = cards.find((c) => k.positives.get(c) === me);
      return mine ?? mostLikely(p, cards);
    };
    return [slot('PERSON', k.rules.deck.PERSON), slot('WEAPON', k.rules.deck.WEAPON), slot('ROOM', k.rules.deck.ROOM)];
  },
  chooseAccusation: (v) => certainAccusation(v),
};

// ---------------- MLE ----------------
type OutcomeMass = { mass: number; envelope: [number, number, number] };

// Expected envelope entropy after a guess. Holders of the three guessed cards are drawn
// independently from their marginals; each combination is resolved the way the table would.
export function expectedEntropy(v: StrategyView, guess: Guess): number {
  const { me, knowledge: k, posterior: p } = v;
  const order = disproveOrder(me, k.numPlayers);
  const dists = guess.map((card) =>
    holdersOf(k)
      .map((h) => ({ h, q: holderProbability(p, card, h) }))
      .filter((d) => d.q > 0));

  const outcomes = new Map<string, OutcomeMass>();
  for (const a of dists[0]) {
    for (const b of dists[1]) {
      for (const c of dists[2]) {
        const q = a.q * b.q * c.q;
        if (q === 0) continue;
        const holders: Holder[] = [a.h, b.h, c.h];
        const key = outcomeKey(guess, holders, order);
        const o: OutcomeMass = outcomes.get(key) ?? { mass: 0, envelope: [0, 0, 0] };
        outcomes.set(key, o);
        o.mass += q;
        holders.forEach((h, i) => { if (h === ENVELOPE) o.envelope[i] += q; });
      }
    }
  }

  // Entropy of a category once its guessed card's envelope probability moves to r;
  // the other cards keep their relative weights
  const rest = CATEGORIES.map((cat, i) => {
    const pg = envelopeProbability(p, guess[i]);
    const others = cardsIn(cat, k.rules).filter((c) => c !== guess[i]).map((c) => envelopeProbability(p, c));
    return pg >= 1 - EPS ? 0 : entropy(others.map((x) => x / (1 - pg)));
  });
  const categoryEntropy = (i: number, r: number) => entropy([r, 1 - r]) + (1 - r) * rest[i];

  let expected = 0;
  let total = 0;
  for (const o of outcomes.values()) total += o.mass;
  for (const o of outcomes.values()) {
    const w = o.mass / total;
    for (let i = 0; i < 3; i++) expected += w * categoryEntropy(i, o.envelope[i] / o.mass);
  }
  return expected;
}

function outcomeKey(guess: Guess, holders: readonly Holder[], order: readonly PlayerIndex[]): string {
  for (const p of order) {
    const hand = guess.filter((_, i) => holders[i] === p);
    const card = revealedCard(guess, hand);
    if (card !== undefined) return `${p}:${card}`;
  }
  return 'none';
}

export function allGuesses(v: StrategyView): Guess[] {
  const { deck } = v.knowledge.rules;
  return deck.PERSON.flatMap((person) =>
    deck.WEAPON.flatMap((weapon) => deck.ROOM.map((room): Guess => [person, weapon, room])));
}

export function mleStrategy(threshold = 1): Strategy {
  return {
    name: threshold < 1 ? `mle@${threshold}` : 'mle',
    chooseGuess(v) {
      // First guess in deck order wins ties
      let best = mostLikelySolution(v.posterior, v.knowledge);
      let bestH = Number.POSITIVE_INFINITY;
      for (const g of allGuesses(v)) {
        const h = expectedEntropy(v, g);
        if (h < bestH - EPS) { best = g; bestH = h; }
      }
      return best;
    },
    chooseAccusation: (v) => certainAccusation(v, threshold),
  };
}

// ---------------- Factory ----------------
// `mle` without its own threshold takes the ruleset's accusation threshold
export function createStrategy(spec: StrategySpec, rules: GameRules = CLUE_RULES): Strategy {
  switch (spec.kind) {
    case 'random': return randomStrategy;
    case 'basic': return basicStrategy;
    case 'greedy': return greedyStrategy;
    case 'good': return goodStrategy;
    case 'mle': return mleStrategy(spec.threshold ?? rules.accusation.threshold);
    default: return exhaustive(spec);
  }
}

// Deck & hand model: the fixed 21-card universe and seeded dealing

import { CLUE_RULES, type GameRules } from './core-rules.ts';
import { InvalidPlayerCount } from './errors.ts';
import {
  CategoryZ,
  ENVELOPE,
  type Card,
  type CardName,
  type Category,
  type Guess,
  type Holder,
} from './schema.ts';

export const CATEGORIES: readonly Category[] = CategoryZ.options;

export type Deal = {
  numPlayers: number;
  envelope: Guess;
  hands: CardName[][]; // indexed by player
  holderOf: Map<CardName, Holder>;
};

export type Rng = () => number;

// xorshift32; the same generator drives dealing, strategies and sampling
export function makeRng(seed: number): Rng {
  let state = (seed >>> 0) || 0x9e3779b9;
  return () => {
    state ^= state << 13; state >>>= 0;
    state ^= state >> 17; state >>>= 0;
    state ^= state << 5;  state >>>= 0;
    return (state >>> 0) / 0x100000000;
  };
}

export function shuffle<T>(arr: T[], rng: Rng) {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}

export function pick<T>(xs: readonly T[], rng: Rng): T {
  if (xs.length === 0) throw new Error('pick from empty list');
  return xs[Math.floor(rng() * xs.length)];
}

function deckByCategory(rules: GameRules): Record<Category, readonly CardName[]> {
  return rules.deck;
}

export function buildDeck(rules: GameRules = CLUE_RULES): Card[] {
  const byCategory = deckByCategory(rules);
  return CATEGORIES.flatMap((category) => byCategory[category].map((name) => ({ name, category })));
}

const CATEGORY_OF = new Map<CardName, Category>(buildDeck().map((c) => [c.name, c.category]));

export function categoryOf(card: CardName): Category {
  const cat = CATEGORY_OF.get(card);
  if (!cat) throw new Error(`Unknown card ${card}`);
  return cat;
}

export function cardsIn(category: Category, rules: GameRules = CLUE_RULES): readonly CardName[] {
  return deckByCategory(rules)[category];
}

export function allCards(rules: GameRules = CLUE_RULES): CardName[] {
  return buildDeck(rules).map((c) => c.name);
}

export function assertPlayerCount(numPlayers: number, rules: GameRules = CLUE_RULES) {
  const { minPlayers, maxPlayers } = rules.table;
  if (!Number.isInteger(numPlayers) || numPlayers < minPlayers || numPlayers > maxPlayers) {
    throw new InvalidPlayerCount(numPlayers, minPlayers, maxPlayers);
  }
}

// Cards are dealt round-robin from player 0, so the first (dealt % N) players hold one extra
export function handSizes(numPlayers: number, rules: GameRules = CLUE_RULES): number[] {
  assertPlayerCount(numPlayers, rules);
  const dealt = buildDeck(rules).length - CATEGORIES.length;
  const base = Math.floor(dealt / numPlayers);
  const extra = dealt % numPlayers;
  return Array.from({ length: numPlayers }, (_, i) => base + (i < extra ? 1 : 0));
}

export function deal(numPlayers: number, seed: number, rules: GameRules = CLUE_RULES): Deal {
  assertPlayerCount(numPlayers, rules);
  const rng = makeRng(seed);

  const person = pick(rules.deck.PERSON, rng);
  const weapon = pick(rules.deck.WEAPON, rng);
  const room = pick(rules.deck.ROOM, rng);
  const envelope: Guess = [person, weapon, room];

  const rest = allCards(rules).filter((c) => !envelope.includes(c));
  shuffle(rest, rng);

  const hands: CardName[][] = Array.from({ length: numPlayers }, () => []);
  const holderOf = new Map<CardName, Holder>();
  for (const c of envelope) holderOf.set(c, ENVELOPE);
  rest.forEach((card, ix) => {
    hands[ix % numPlayers].push(card);
    holderOf.set(card, ix % numPlayers);
  });

  return { numPlayers, envelope, hands, holderOf };
}

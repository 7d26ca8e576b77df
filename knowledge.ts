// Knowledge store: per-observer symbolic facts about who holds which card
// Positive facts, negative facts and "holds at least one of" set constraints,
// closed under a fixpoint of inference rules after every mutation.

import { CLUE_RULES, type GameRules } from './core-rules.ts';
import { CATEGORIES, allCards, cardsIn, categoryOf, handSizes, type Deal } from './deck.ts';
import { Contradiction, InvalidInput } from './errors.ts';
import {
  ENVELOPE,
  type CardName,
  type Category,
  type Guess,
  type Holder,
  type PlayerIndex,
} from './schema.ts';

// ---------------- Types ----------------
export type Observer = PlayerIndex | 'ORACLE';

export type SetConstraint = { holder: Holder; cards: CardName[] };

export type KnowledgeState = {
  rules: GameRules;
  observer: Observer;
  numPlayers: number;
  handSizes: number[];
  positives: Map<CardName, Holder>;
  negatives: Map<CardName, Set<Holder>>;
  constraints: SetConstraint[];
  log: string[];
};

// What strategies and the estimator get to see
export type KnowledgeView = {
  readonly rules: GameRules;
  readonly observer: Observer;
  readonly numPlayers: number;
  readonly handSizes: readonly number[];
  readonly positives: ReadonlyMap<CardName, Holder>;
  readonly negatives: ReadonlyMap<CardName, ReadonlySet<Holder>>;
  readonly constraints: readonly { readonly holder: Holder; readonly cards: readonly CardName[] }[];
  readonly log: readonly string[];
};

// ---------------- Construction ----------------
export function createKnowledge(numPlayers: number, observer: Observer, rules: GameRules = CLUE_RULES): KnowledgeState {
  const sizes = handSizes(numPlayers, rules);
  if (observer !== 'ORACLE' && (observer < 0 || observer >= numPlayers)) {
    throw new InvalidInput(`Observer ${observer} is not seated at a ${numPlayers}-player table`);
  }
  return {
    rules,
    observer,
    numPlayers,
    handSizes: sizes,
    positives: new Map(),
    negatives: new Map(),
    constraints: [],
    log: [],
  };
}

// A player's whole hand: positives for its cards, negatives for every other card
export function seedHand(k: KnowledgeState, player: PlayerIndex, cards: readonly CardName[]) {
  checkHolder(k, player);
  if (new Set(cards).size !== k.handSizes[player]) {
    throw new InvalidInput(`${holderName(player)} holds ${k.handSizes[player]} cards, got ${cards.length}`);
  }
  for (const c of cards) place(k, c, player, 'dealt');
  for (const c of allCards(k.rules)) {
    if (!cards.includes(c)) exclude(k, c, player);
  }
  propagate(k);
}

export function createOracle(d: Deal, rules: GameRules = CLUE_RULES): KnowledgeState {
  const k = createKnowledge(d.numPlayers, 'ORACLE', rules);
  d.hands.forEach((hand, p) => seedHand(k, p, hand));
  for (const c of d.envelope) place(k, c, ENVELOPE, 'solution');
  propagate(k);
  return k;
}

// ---------------- Read helpers ----------------
export function holderName(h: Holder): string {
  return h === ENVELOPE ? 'the envelope' : `player ${h}`;
}

export function playersOf(k: KnowledgeView): PlayerIndex[] {
  return Array.from({ length: k.numPlayers }, (_, i) => i);
}

export function holdersOf(k: KnowledgeView): Holder[] {
  return [...playersOf(k), ENVELOPE];
}

export function isExcluded(k: KnowledgeView, card: CardName, holder: Holder): boolean {
  return k.negatives.get(card)?.has(holder) ?? false;
}

// Cards a holder may still be dealt: not placed anywhere and not excluded for it
export function candidatesFor(k: KnowledgeView, holder: Holder, category?: Category): CardName[] {
  return scopeCards(k, category).filter((c) => !k.positives.has(c) && !isExcluded(k, c, holder));
}

export function positivesOf(k: KnowledgeView, holder: Holder, category?: Category): CardName[] {
  return scopeCards(k, category).filter((c) => k.positives.get(c) === holder);
}

// Envelope capacity is one card per category; a player's is its hand size
export function capacityOf(k: KnowledgeView, holder: Holder): number {
  return holder === ENVELOPE ? 1 : k.handSizes[holder];
}

export function remainingCapacity(k: KnowledgeView, holder: Holder, category?: Category): number {
  return capacityOf(k, holder) - positivesOf(k, holder, holder === ENVELOPE ? category : undefined).length;
}

export function factCount(k: KnowledgeView): { positives: number; negatives: number; constraints: number } {
  let negatives = 0;
  for (const s of k.negatives.values()) negatives += s.size;
  return { positives: k.positives.size, negatives, constraints: k.constraints.length };
}

function scopeCards(k: KnowledgeView, category?: Category): readonly CardName[] {
  return category ? cardsIn(category, k.rules) : allCards(k.rules);
}

// Capacity scopes: each player over the whole deck, the envelope once per category
function scopes(k: KnowledgeView): { holder: Holder; category?: Category }[] {
  return [
    ...playersOf(k).map((holder) => ({ holder })),
    ...CATEGORIES.map((category) => ({ holder: ENVELOPE, category })),
  ];
}

function pushLog(k: KnowledgeState, msg: string) { k.log.push(msg); }

function checkHolder(k: KnowledgeView, h: Holder) {
  if (h === ENVELOPE) return;
  if (!Number.isInteger(h) || h < 0 || h >= k.numPlayers) {
    throw new InvalidInput(`Unknown holder ${String(h)} at a ${k.numPlayers}-player table`);
  }
}

function checkCard(k: KnowledgeView, card: CardName) {
  if (!allCards(k.rules).includes(card)) throw new InvalidInput(`Unknown card ${card}`);
}

// ---------------- Primitive mutations (no propagation) ----------------
function place(k: KnowledgeState, card: CardName, holder: Holder, reason: string): boolean {
  const current = k.positives.get(card);
  if (current === holder) return false;
  if (current !== undefined) {
    throw new Contradiction(`${card} is held by ${holderName(current)}; it cannot also be held by ${holderName(holder)}`);
  }
  if (isExcluded(k, card, holder)) {
    throw new Contradiction(`${holderName(holder)} is known not to hold ${card}`);
  }
  const category = holder === ENVELOPE ? categoryOf(card) : undefined;
  if (remainingCapacity(k, holder, category) <= 0) {
    throw new Contradiction(`${holderName(holder)} has no room left for ${card}`);
  }
  k.positives.set(card, holder);
  for (const h of holdersOf(k)) {
    if (h !== holder) exclude(k, card, h);
  }
  pushLog(k, `${card} -> ${holderName(holder)} (${reason})`);
  return true;
}

function exclude(k: KnowledgeState, card: CardName, holder: Holder): boolean {
  if (k.positives.get(card) === holder) {
    throw new Contradiction(`${holderName(holder)} is known to hold ${card}`);
  }
  let set = k.negatives.get(card);
  if (!set) { set = new Set(); k.negatives.set(card, set); }
  if (set.has(holder)) return false;
  set.add(holder);
  return true;
}

// ---------------- Public mutations ----------------
export function assertPositive(k: KnowledgeState, card: CardName, holder: Holder) {
  checkCard(k, card);
  checkHolder(k, holder);
  place(k, card, holder, 'observed');
  propagate(k);
}

export function assertNegative(k: KnowledgeState, card: CardName, holder: Holder) {
  checkCard(k, card);
  checkHolder(k, holder);
  exclude(k, card, holder);
  propagate(k);
}

export function assertSetConstraint(k: KnowledgeState, holder: Holder, cards: readonly CardName[]) {
  checkHolder(k, holder);
  if (cards.length === 0) throw new InvalidInput('A set constraint needs at least one card');
  cards.forEach((c) => checkCard(k, c));
  const unique = Array.from(new Set(cards));
  if (unique.some((c) => k.positives.get(c) === holder)) return; // already satisfied
  k.constraints.push({ holder, cards: unique });
  propagate(k);
}

// An undisproved guess means the guesser holds one of its cards, unless the guess was right.
// When the guesser is already known to hold none of them, only the second reading is left.
export function noOneDisproved(k: KnowledgeState, guesser: PlayerIndex, guess: Guess) {
  checkHolder(k, guesser);
  if (guess.every((c) => isExcluded(k, c, guesser))) {
    pushLog(k, `No one disproved ${guess.join(' / ')} and ${holderName(guesser)} holds none of it`);
    propagate(k);
    return;
  }
  assertSetConstraint(k, guesser, guess);
}

// ---------------- Propagation ----------------
// Runs the inference rules until none of them adds a fact. Returns the number of firings.
export function propagate(k: KnowledgeState): number {
  let fired = 0;
  for (;;) {
    const n = reduceConstraints(k) + inferFromExclusions(k) + saturateCapacity(k) + exhaustCapacity(k);
    if (n === 0) return fired;
    fired += n;
  }
}

// (a) set reduction
function reduceConstraints(k: KnowledgeState): number {
  let n = 0;
  const open: SetConstraint[] = [];
  for (const c of k.constraints) {
    if (c.cards.some((card) => k.positives.get(card) === c.holder)) { n++; continue; }
    const left = c.cards.filter((card) => !isExcluded(k, card, c.holder));
    if (left.length === 0) {
      throw new Contradiction(`${holderName(c.holder)} must hold one of ${c.cards.join(', ')} but can hold none of them`);
    }
    if (left.length === 1) {
      place(k, left[0], c.holder, `only remaining card of {${c.cards.join(', ')}}`);
      n++;
      continue;
    }
    if (left.length < c.cards.length) n++;
    open.push({ holder: c.holder, cards: left });
  }
  k.constraints = open;
  return n;
}

// (b) exhaustive-negative inference: a card every holder but one is excluded from
function inferFromExclusions(k: KnowledgeState): number {
  let n = 0;
  for (const card of allCards(k.rules)) {
    if (k.positives.has(card)) continue;
    const possible = holdersOf(k).filter((h) => !isExcluded(k, card, h));
    if (possible.length === 0) throw new Contradiction(`No holder can hold ${card}`);
    if (possible.length === 1 && place(k, card, possible[0], 'no other holder possible')) n++;
  }
  return n;
}

// (c) capacity saturation: a full holder holds nothing else in its scope
function saturateCapacity(k: KnowledgeState): number {
  let n = 0;
  for (const { holder, category } of scopes(k)) {
    if (remainingCapacity(k, holder, category) > 0) continue;
    for (const c of scopeCards(k, category)) {
      if (k.positives.get(c) !== holder && exclude(k, c, holder)) n++;
    }
  }
  return n;
}

// (d) capacity exhaustion: exactly as many possible cards as free slots means all of them
function exhaustCapacity(k: KnowledgeState): number {
  let n = 0;
  for (const { holder, category } of scopes(k)) {
    const free = remainingCapacity(k, holder, category);
    if (free === 0) continue;
    const cands = candidatesFor(k, holder, category);
    if (cands.length < free) {
      throw new Contradiction(`${holderName(holder)} needs ${free} more card(s) but only ${cands.length} remain possible`);
    }
    if (cands.length === free) {
      for (const c of cands) if (place(k, c, holder, 'fills the last free slots')) n++;
    }
  }
  return n;
}

// Guess/disprove resolution and folding outcomes back into each observer's store

import { Contradiction, InvalidInput } from './errors.ts';
import {
  assertNegative,
  assertPositive,
  assertSetConstraint,
  noOneDisproved,
  type KnowledgeState,
  type Observer,
} from './knowledge.ts';
import { ENVELOPE, GuessZ, type CardName, type Guess, type PlayerIndex } from './schema.ts';

// ---------------- Outcomes ----------------
export type Disproved = {
  kind: 'DISPROVED';
  guesser: PlayerIndex;
  guess: Guess;
  by: PlayerIndex;
  revealed: CardName;
  passed: PlayerIndex[]; // asked before the disprover, held none of the guess
};

export type NotDisproved = {
  kind: 'NOT_DISPROVED';
  guesser: PlayerIndex;
  guess: Guess;
  passed: PlayerIndex[];
};

export type Outcome = Disproved | NotDisproved;

// What a single observer is entitled to learn from an outcome
export type Observation =
  | { kind: 'CARD_REVEALED'; guesser: PlayerIndex; guess: Guess; by: PlayerIndex; card: CardName; passed: PlayerIndex[] }
  | { kind: 'SET_CONSTRAINT_REVEALED'; guesser: PlayerIndex; guess: Guess; by: PlayerIndex; passed: PlayerIndex[] }
  | { kind: 'NOT_DISPROVED'; guesser: PlayerIndex; guess: Guess; passed: PlayerIndex[] };

function exhaustive(x: never): never {
  throw new Error(`Unhandled observation: ${JSON.stringify(x)}`);
}

// ---------------- Resolution ----------------
// Everyone but the guesser, starting with the player to the guesser's left
export function disproveOrder(guesser: PlayerIndex, numPlayers: number): PlayerIndex[] {
  if (!Number.isInteger(guesser) || guesser < 0 || guesser >= numPlayers) {
    throw new InvalidInput(`Guesser ${guesser} is not seated at a ${numPlayers}-player table`);
  }
  return Array.from({ length: numPlayers - 1 }, (_, i) => (guesser + 1 + i) % numPlayers);
}

// A disprover holding several guessed cards shows the first one in person, weapon, room order
export function revealedCard(guess: Guess, hand: readonly CardName[]): CardName | undefined {
  return guess.find((c) => hand.includes(c));
}

export function resolve(
  guess: Guess,
  guesser: PlayerIndex,
  order: readonly PlayerIndex[],
  hands: readonly (readonly CardName[])[],
): Outcome {
  const parsed = GuessZ.safeParse(guess);
  if (!parsed.success) throw new InvalidInput(`Malformed guess: ${JSON.stringify(guess)}`);
  const passed: PlayerIndex[] = [];
  for (const p of order) {
    if (p === guesser) continue;
    const hand = hands[p];
    if (!hand) throw new InvalidInput(`No hand for player ${p}`);
    const card = revealedCard(parsed.data, hand);
    if (card !== undefined) return { kind: 'DISPROVED', guesser, guess: parsed.data, by: p, revealed: card, passed };
    passed.push(p);
  }
  return { kind: 'NOT_DISPROVED', guesser, guess: parsed.data, passed };
}

// The guesser and the oracle see the card; everyone else only sees that one was shown
export function observe(outcome: Outcome, observer: Observer): Observation {
  const { guesser, guess, passed } = outcome;
  if (outcome.kind === 'NOT_DISPROVED') return { kind: 'NOT_DISPROVED', guesser, guess, passed };
  if (observer === 'ORACLE' || observer === guesser) {
    return { kind: 'CARD_REVEALED', guesser, guess, by: outcome.by, card: outcome.revealed, passed };
  }
  return { kind: 'SET_CONSTRAINT_REVEALED', guesser, guess, by: outcome.by, passed };
}

// ---------------- Folding ----------------
export function foldOutcome(k: KnowledgeState, obs: Observation) {
  for (const p of obs.passed) {
    for (const c of obs.guess) assertNegative(k, c, p);
  }
  switch (obs.kind) {
    case 'CARD_REVEALED':
      assertPositive(k, obs.card, obs.by);
      // The disprover shows its first held card in guess order, so it holds none before it
      for (const c of obs.guess.slice(0, obs.guess.indexOf(obs.card))) assertNegative(k, c, obs.by);
      return;
    case 'SET_CONSTRAINT_REVEALED':
      assertSetConstraint(k, obs.by, obs.guess);
      return;
    case 'NOT_DISPROVED':
      if (k.observer === obs.guesser) noOneDisproved(k, obs.guesser, obs.guess);
      return;
    default:
      return exhaustive(obs);
  }
}

// Once an undisproved guess did not win, the other players may read it as self-possession
export function foldUnansweredGuess(k: KnowledgeState, guesser: PlayerIndex, guess: Guess) {
  if (k.observer === guesser || k.observer === 'ORACLE') return;
  noOneDisproved(k, guesser, guess);
}

// A wrong accusation rules out its last unconfirmed card once the other two are known to be in the envelope
export function foldFailedAccusation(k: KnowledgeState, accusation: Guess) {
  const open = accusation.filter((c) => k.positives.get(c) !== ENVELOPE);
  if (open.length === 0) {
    throw new Contradiction(`Accusation ${accusation.join(' / ')} failed but all three cards are known to be in the envelope`);
  }
  if (open.length === 1) assertNegative(k, open[0], ENVELOPE);
}

// Core game rules encoded as typed constants
// Deck contents, table limits, and the estimator/loop budgets the simulator runs under.

import {
  PersonZ,
  WeaponZ,
  RoomZ,
  MIN_PLAYERS,
  MAX_PLAYERS,
  type Person,
  type Weapon,
  type Room,
} from './schema.ts';

// Deck: card names per category, in deck order
export type DeckRules = {
  PERSON: readonly Person[];
  WEAPON: readonly Weapon[];
  ROOM: readonly Room[];
};

export type TableRules = {
  minPlayers: number;
  maxPlayers: number;
};

// Posterior estimator budgets
export type EstimatorRules = {
  exactConstraintLimit: number; // more open set constraints than this => sampling
  exactStateBudget: number; // memo states allowed before the exact search gives up
  minSamples: number; // fewer accepted samples than this => timedOut
  maxSamples: number;
  timeBudgetMs: number;
  samplingSeed: number;
};

export type GameLoopRules = {
  maxTurns: number; // forced termination => ALL_ELIMINATED
};

export type AccusationRules = {
  threshold: number; // top candidate probability needed per category; 1 means certainty
};

export type GameRules = {
  deck: DeckRules;
  table: TableRules;
  estimator: EstimatorRules;
  loop: GameLoopRules;
  accusation: AccusationRules;
};

// Export a single, typed ruleset instance. Adjust here to tweak the simulator.
export const CLUE_RULES: GameRules = {
  deck: {
    PERSON: PersonZ.options,
    WEAPON: WeaponZ.options,
    ROOM: RoomZ.options,
  },
  table: {
    minPlayers: MIN_PLAYERS,
    maxPlayers: MAX_PLAYERS,
  },
  estimator: {
    exactConstraintLimit: 24,
    exactStateBudget: 250_000,
    minSamples: 500,
    maxSamples: 20_000,
    timeBudgetMs: 2_000,
    samplingSeed: 7,
  },
  loop: {
    maxTurns: 300,
  },
  accusation: {
    threshold: 1,
  },
};

// Schema and types for the Clue deduction lab
// Pure type/Zod module: no Node dependencies

import { z } from 'zod';

// ----------------------------- Cards -----------------------------
export const PersonZ = z.enum([
  'Colonel Mustard', 'Ms. Scarlet', 'Professor Plum', 'Mr. Green', 'Mrs. White', 'Mrs. Peacock',
]);
export type Person = z.infer<typeof PersonZ>;

export const WeaponZ = z.enum(['Rope', 'Lead Pipe', 'Knife', 'Wrench', 'Candlestick', 'Revolver']);
export type Weapon = z.infer<typeof WeaponZ>;

export const RoomZ = z.enum([
  'Kitchen', 'Study', 'Conservatory', 'Hall', 'Dining Room', 'Billiard Room', 'Lounge', 'Library', 'Ballroom',
]);
export type Room = z.infer<typeof RoomZ>;

export const CardNameZ = z.union([PersonZ, WeaponZ, RoomZ]);
export type CardName = z.infer<typeof CardNameZ>;

export const CategoryZ = z.enum(['PERSON', 'WEAPON', 'ROOM']);
export type Category = z.infer<typeof CategoryZ>;

export type Card = { name: CardName; category: Category };

// ----------------------------- Holders -----------------------------
export const ENVELOPE = 'ENVELOPE' as const;
export type PlayerIndex = number; // 0..N-1, turn order
export type Holder = PlayerIndex | typeof ENVELOPE;

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 6;

// A guess (and an accusation) is one card per category, in category order
export const GuessZ = z.tuple([PersonZ, WeaponZ, RoomZ]);
export type Guess = z.infer<typeof GuessZ>;

// ----------------------------- Strategies -----------------------------
export const StrategySpecZ = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('random') }),
  z.object({ kind: z.literal('basic') }),
  z.object({ kind: z.literal('greedy') }),
  z.object({ kind: z.literal('good') }),
  z.object({ kind: z.literal('mle'), threshold: z.number().gt(0).max(1).optional() }),
]);
export type StrategySpec = z.infer<typeof StrategySpecZ>;

// ----------------------------- Simulation config -----------------------------
export const SimulationConfigZ = z.object({
  name: z.string().min(1).max(64).optional(),
  seed: z.number().int().min(0),
  games: z.number().int().min(1).max(100_000),
  maxTurns: z.number().int().min(1).max(10_000).optional(),
  players: z.array(z.object({
    name: z.string().min(1).max(32).optional(),
    strategy: StrategySpecZ,
  })).min(MIN_PLAYERS).max(MAX_PLAYERS),
});
export type SimulationConfig = z.infer<typeof SimulationConfigZ>;

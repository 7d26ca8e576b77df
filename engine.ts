// Game loop: turn phases, knowledge folding and terminal results
// One GameState per game; nothing is shared between games.

import { CLUE_RULES, type GameRules } from './core-rules.ts';
import { CATEGORIES, cardsIn, deal, makeRng, type Deal, type Rng } from './deck.ts';
import { posterior } from './estimator.ts';
import {
  createKnowledge,
  createOracle,
  seedHand,
  type KnowledgeState,
} from './knowledge.ts';
import {
  disproveOrder,
  foldFailedAccusation,
  foldOutcome,
  foldUnansweredGuess,
  observe,
  resolve,
  type Outcome,
} from './resolver.ts';
import { analyzeRules } from './rules-verifier.ts';
import { GuessZ, type Guess, type PlayerIndex, type SimulationConfig, type StrategySpec } from './schema.ts';
import { createStrategy, type Strategy, type StrategyView } from './strategies.ts';

// ---------------- Types for runtime ----------------
export type Phase = 'TURN_START' | 'GUESS' | 'RESOLVE' | 'MAYBE_ACCUSE' | 'TURN_END' | 'WIN' | 'ELIMINATED';
export type Terminal = 'WIN' | 'ALL_ELIMINATED';

export type PlayerState = {
  idx: PlayerIndex;
  name: string;
  strategy: Strategy;
  knowledge: KnowledgeState;
  eliminated: boolean;
  rng: Rng;
};

export type TurnRecord = {
  turn: number;
  player: PlayerIndex;
  guess?: Guess; // absent when the guess was rejected
  outcome?: Outcome;
  accusation?: Guess;
  correct?: boolean;
};

export type GameState = {
  rules: GameRules;
  seed: number;
  deal: Deal;
  players: PlayerState[];
  oracle: KnowledgeState;
  turn: { number: number; active: PlayerIndex; phase: Phase };
  pending?: { guess: Guess; outcome?: Outcome };
  history: TurnRecord[];
  result?: Terminal;
  winner?: PlayerIndex;
  log: string[];
};

export type GameSetup = {
  seed: number;
  players: { name?: string; strategy: StrategySpec }[];
};

export type GameResult = {
  seed: number;
  outcome: Terminal;
  winner?: PlayerIndex;
  turnCount: number;
  finalPosteriorAccuracy: number;
  strategies: string[];
};

// ---------------- Utilities ----------------
function pushLog(s: GameState, msg: string) { s.log.push(msg); }

const exhaustive = (x: never): never => { throw new Error(`Unreachable: ${String(x)}`); };

const fmt = (g: readonly string[]) => g.join(' / ');

export function validateGuess(raw: unknown): { ok: true; guess: Guess } | { ok: false; reason: string } {
  const parsed = GuessZ.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((i) => `${i.path.join('.') || 'guess'}: ${i.message}`).join('; ') };
  }
  return { ok: true, guess: parsed.data };
}

export function viewFor(s: GameState, pid: PlayerIndex): StrategyView {
  const p = s.players[pid];
  return { me: pid, knowledge: p.knowledge, posterior: posterior(p.knowledge), rng: p.rng };
}

// ---------------- Setup ----------------
export function initGame(setup: GameSetup, rules: GameRules = CLUE_RULES): GameState {
  const d = deal(setup.players.length, setup.seed, rules);
  const players: PlayerState[] = setup.players.map((cfg, idx) => {
    const knowledge = createKnowledge(d.numPlayers, idx, rules);
    seedHand(knowledge, idx, d.hands[idx]);
    return {
      idx,
      name: cfg.name || `P${idx + 1}`,
      strategy: createStrategy(cfg.strategy, rules),
      knowledge,
      eliminated: false,
      rng: makeRng(setup.seed ^ ((idx + 1) * 0x9e3779b9)),
    };
  });

  const s: GameState = {
    rules,
    seed: setup.seed,
    deal: d,
    players,
    oracle: createOracle(d, rules),
    turn: { number: 1, active: 0, phase: 'TURN_START' },
    history: [],
    log: [],
  };

  // Verify ruleset consistency at startup and log results
  const analysis = analyzeRules(rules);
  if (!analysis.ok) {
    const errs = analysis.issues.filter(i => i.level === 'error');
    pushLog(s, `[RulesVerifier] Errors: ${errs.map(e => e.code).join(', ')}`);
  }
  const warns = analysis.issues.filter(i => i.level === 'warning');
  if (warns.length) {
    pushLog(s, `[RulesVerifier] Warnings: ${warns.map(w => w.code).join(', ')}`);
  }

  pushLog(s, `Dealt ${d.numPlayers} hands (seed ${setup.seed}): ${players.map(p => `${p.name}=${p.strategy.name}`).join(', ')}`);
  return s;
}

// ---------------- Operations ----------------
type Operation =
  | { kind: 'Log'; msg: string }
  | { kind: 'SetPhase'; phase: Phase }
  | { kind: 'FoldOutcome'; outcome: Outcome }
  | { kind: 'FoldUnansweredGuess'; guesser: PlayerIndex; guess: Guess }
  | { kind: 'FoldFailedAccusation'; accuser: PlayerIndex; accusation: Guess }
  | { kind: 'Eliminate'; pid: PlayerIndex }
  | { kind: 'Win'; pid: PlayerIndex }
  | { kind: 'EndTurn' }
  | { kind: 'Finish'; result: Terminal; msg: string };

function applyOperation(s: GameState, op: Operation) {
  switch (op.kind) {
    case 'Log': { pushLog(s, op.msg); return; }
    case 'SetPhase': { s.turn.phase = op.phase; return; }
    case 'FoldOutcome': {
      for (const p of s.players) foldOutcome(p.knowledge, observe(op.outcome, p.idx));
      foldOutcome(s.oracle, observe(op.outcome, 'ORACLE'));
      return;
    }
    case 'FoldUnansweredGuess': {
      for (const p of s.players) foldUnansweredGuess(p.knowledge, op.guesser, op.guess);
      return;
    }
    case 'FoldFailedAccusation': {
      for (const p of s.players) {
        if (p.idx !== op.accuser) foldFailedAccusation(p.knowledge, op.accusation);
      }
      foldFailedAccusation(s.oracle, op.accusation);
      return;
    }
    case 'Eliminate': {
      s.players[op.pid].eliminated = true;
      s.turn.phase = 'ELIMINATED';
      pushLog(s, `${s.players[op.pid].name} is eliminated.`);
      return;
    }
    case 'Win': {
      s.winner = op.pid;
      s.result = 'WIN';
      s.turn.phase = 'WIN';
      pushLog(s, `${s.players[op.pid].name} wins on turn ${s.turn.number}.`);
      return;
    }
    case 'EndTurn': {
      const n = s.players.length;
      for (let i = 1; i <= n; i++) {
        const next = (s.turn.active + i) % n;
        if (!s.players[next].eliminated) { s.turn.active = next; break; }
      }
      s.turn.number++;
      s.turn.phase = 'TURN_START';
      s.pending = undefined;
      return;
    }
    case 'Finish': {
      s.result = op.result;
      pushLog(s, op.msg);
      return;
    }
    default: return exhaustive(op);
  }
}

// ---------------- Turn/Phase flow ----------------
export function gameOver(s: GameState): boolean { return s.result != null; }

export function currentPlayer(s: GameState): PlayerState { return s.players[s.turn.active]; }

// Advances the state machine by one phase
export function step(s: GameState) {
  if (gameOver(s)) return;
  for (const op of planStep(s)) applyOperation(s, op);
}

function planStep(s: GameState): Operation[] {
  const p = currentPlayer(s);
  const phase = s.turn.phase;
  switch (phase) {
    case 'TURN_START': {
      if (s.turn.number > s.rules.loop.maxTurns) {
        return [{ kind: 'Finish', result: 'ALL_ELIMINATED', msg: `Turn cap of ${s.rules.loop.maxTurns} reached.` }];
      }
      return [{ kind: 'SetPhase', phase: 'GUESS' }];
    }
    case 'GUESS': {
      const v = validateGuess(p.strategy.chooseGuess(viewFor(s, p.idx)));
      if (!v.ok) {
        s.history.push({ turn: s.turn.number, player: p.idx });
        return [
          { kind: 'Log', msg: `${p.name} made an invalid guess (${v.reason}). Skipping their turn.` },
          { kind: 'SetPhase', phase: 'TURN_END' },
        ];
      }
      s.pending = { guess: v.guess };
      return [
        { kind: 'Log', msg: `Turn ${s.turn.number}: ${p.name} guesses ${fmt(v.guess)}` },
        { kind: 'SetPhase', phase: 'RESOLVE' },
      ];
    }
    case 'RESOLVE': {
      if (!s.pending) throw new Error('RESOLVE without a pending guess');
      const outcome = resolve(s.pending.guess, p.idx, disproveOrder(p.idx, s.players.length), s.deal.hands);
      s.pending.outcome = outcome;
      s.history.push({ turn: s.turn.number, player: p.idx, guess: s.pending.guess, outcome });
      const msg = outcome.kind === 'DISPROVED'
        ? `${s.players[outcome.by].name} shows a card`
        : 'No one can disprove';
      return [
        { kind: 'FoldOutcome', outcome },
        { kind: 'Log', msg },
        { kind: 'SetPhase', phase: 'MAYBE_ACCUSE' },
      ];
    }
    case 'MAYBE_ACCUSE': {
      const outcome = s.pending?.outcome;
      if (!outcome) throw new Error('MAYBE_ACCUSE without a resolved guess');
      const unanswered: Operation[] = outcome.kind === 'NOT_DISPROVED'
        ? [{ kind: 'FoldUnansweredGuess', guesser: p.idx, guess: outcome.guess }]
        : [];
      const raw = p.strategy.chooseAccusation(viewFor(s, p.idx));
      if (raw === undefined) return [...unanswered, { kind: 'SetPhase', phase: 'TURN_END' }];

      const v = validateGuess(raw);
      if (!v.ok) {
        return [
          { kind: 'Log', msg: `${p.name} made an invalid accusation (${v.reason}). Ignoring accusation.` },
          ...unanswered,
          { kind: 'SetPhase', phase: 'TURN_END' },
        ];
      }
      const correct = v.guess.every((c, i) => c === s.deal.envelope[i]);
      const record = s.history[s.history.length - 1];
      record.accusation = v.guess;
      record.correct = correct;
      const said: Operation = { kind: 'Log', msg: `${p.name} accuses ${fmt(v.guess)}` };
      if (correct) return [said, { kind: 'Win', pid: p.idx }];
      return [
        said,
        ...unanswered,
        { kind: 'FoldFailedAccusation', accuser: p.idx, accusation: v.guess },
        { kind: 'Eliminate', pid: p.idx },
      ];
    }
    case 'ELIMINATED': {
      if (s.players.every((q) => q.eliminated)) {
        return [{ kind: 'Finish', result: 'ALL_ELIMINATED', msg: 'Every player has been eliminated.' }];
      }
      return [{ kind: 'SetPhase', phase: 'TURN_END' }];
    }
    case 'TURN_END': return [{ kind: 'EndTurn' }];
    case 'WIN': return [];
    default: return exhaustive(phase);
  }
}

// ---------------- Results ----------------
// Mean over players of the average probability each gives the true envelope card per category
export function posteriorAccuracy(s: GameState): number {
  const perPlayer = s.players.map((p) => {
    const post = posterior(p.knowledge);
    const hits = CATEGORIES.map((cat) => {
      const truth = s.deal.envelope.find((c) => cardsIn(cat, s.rules).includes(c));
      return truth === undefined ? 0 : post.envelope.get(truth) ?? 0;
    });
    return hits.reduce((a, b) => a + b, 0) / hits.length;
  });
  return perPlayer.reduce((a, b) => a + b, 0) / perPlayer.length;
}

export function gameResult(s: GameState): GameResult {
  if (!s.result) throw new Error('Game is still running');
  return {
    seed: s.seed,
    outcome: s.result,
    winner: s.winner,
    turnCount: s.history.length,
    finalPosteriorAccuracy: posteriorAccuracy(s),
    strategies: s.players.map((p) => p.strategy.name),
  };
}

export function playGame(s: GameState): GameResult {
  while (!gameOver(s)) step(s);
  return gameResult(s);
}

export type GameObserver = (s: GameState, r: GameResult) => void;

// Independent games, seeded seed, seed + 1, ...; onGame sees each finished state
export function runGames(config: SimulationConfig, rules: GameRules = CLUE_RULES, onGame?: GameObserver): GameResult[] {
  const r: GameRules = config.maxTurns ? { ...rules, loop: { ...rules.loop, maxTurns: config.maxTurns } } : rules;
  return Array.from({ length: config.games }, (_, i) => {
    const s = initGame({ seed: config.seed + i, players: config.players }, r);
    const result = playGame(s);
    onGame?.(s, result);
    return result;
  });
}

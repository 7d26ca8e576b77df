// Aggregator module: re-exports schema, knowledge, estimator and game loop APIs
export * from './schema.ts';
export { CLUE_RULES, type GameRules } from './core-rules.ts';
export { analyzeRules, type RuleAnalysis, type RuleIssue } from './rules-verifier.ts';
export { Contradiction, InvalidInput, InvalidPlayerCount } from './errors.ts';
export { buildDeck, deal, handSizes, makeRng, type Deal } from './deck.ts';
export {
  assertNegative,
  assertPositive,
  assertSetConstraint,
  createKnowledge,
  createOracle,
  noOneDisproved,
  propagate,
  seedHand,
  type KnowledgeState,
  type KnowledgeView,
} from './knowledge.ts';
export { posterior, type Posterior, type EstimatorOptions } from './estimator.ts';
export { disproveOrder, foldOutcome, observe, resolve, type Observation, type Outcome } from './resolver.ts';
export { createStrategy, type Strategy, type StrategyView } from './strategies.ts';
export { initGame, playGame, runGames, step, validateGuess, type GameObserver, type GameResult, type GameState } from './engine.ts';

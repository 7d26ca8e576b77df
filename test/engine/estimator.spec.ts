import type { CheckCase, KnowledgeCase, TestCase } from './harness.ts';
import { buildState, eq, execActions, near, throwsNamed } from './harness.ts';
import {
  entropy,
  envelopeEntropy,
  holderProbability,
  isSolved,
  mostLikelySolution,
  posterior,
} from '../../estimator.ts';
import { ENVELOPE } from '../../schema.ts';
import { HANDS } from './knowledge.spec.ts';

const seeded = { numPlayers: 3, hands: [{ player: 0, cards: HANDS[0] }] };

const exact: KnowledgeCase[] = [
  {
    name: 'Empty store gives uniform envelope priors per category',
    pre: { numPlayers: 3 },
    actions: [],
    expect: {
      envelope: [['Colonel Mustard', 1 / 6], ['Revolver', 1 / 6], ['Kitchen', 1 / 9], ['Ballroom', 1 / 9]],
      categorySums: true,
      method: 'exact',
    },
  },
  {
    name: 'Own hand drops out of the envelope and the rest share it',
    pre: seeded,
    actions: [],
    expect: {
      envelope: [
        ['Mr. Green', 0], ['Rope', 0], ['Study', 0],
        ['Colonel Mustard', 0.25], ['Mrs. Peacock', 0.25],
        ['Knife', 0.2], ['Kitchen', 1 / 6],
      ],
      categorySums: true,
    },
  },
  {
    name: 'A shown card pushes envelope mass toward the persons outside the constraint',
    pre: seeded,
    actions: [{ kind: 'set', holder: 1, cards: ['Colonel Mustard', 'Ms. Scarlet'] }],
    expect: {
      envelope: [
        ['Colonel Mustard', 11 / 56], ['Ms. Scarlet', 11 / 56],
        ['Professor Plum', 17 / 56], ['Mrs. Peacock', 17 / 56],
        ['Knife', 0.2], ['Kitchen', 1 / 6],
      ],
      categorySums: true,
      method: 'exact',
    },
  },
  {
    name: 'Oracle store is certain about the solution',
    pre: {
      numPlayers: 3,
      observer: 'ORACLE',
      hands: [
        { player: 0, cards: ['Colonel Mustard', 'Professor Plum', 'Rope', 'Lead Pipe', 'Kitchen', 'Study'] },
        { player: 1, cards: ['Mr. Green', 'Mrs. White', 'Knife', 'Wrench', 'Conservatory', 'Hall'] },
        { player: 2, cards: ['Mrs. Peacock', 'Revolver', 'Dining Room', 'Billiard Room', 'Lounge', 'Ballroom'] },
      ],
      envelope: ['Ms. Scarlet', 'Candlestick', 'Library'],
    },
    actions: [],
    expect: {
      envelope: [
        ['Ms. Scarlet', 1], ['Candlestick', 1], ['Library', 1],
        ['Colonel Mustard', 0], ['Revolver', 0], ['Kitchen', 0],
      ],
      method: 'exact',
    },
  },
];

const checks: CheckCase[] = [
  {
    name: 'Holder marginals split the non-envelope mass evenly on an empty store',
    check: () => {
      const p = posterior(buildState({ numPlayers: 3 }));
      return [
        ...near('Mustard with P1', holderProbability(p, 'Colonel Mustard', 1), 5 / 18),
        ...near('Kitchen with P2', holderProbability(p, 'Kitchen', 2), 8 / 27),
        ...near('Kitchen in envelope', holderProbability(p, 'Kitchen', ENVELOPE), 1 / 9),
      ];
    },
  },
  {
    name: 'Sampling agrees with exact counting within tolerance',
    check: () => {
      const k = buildState(seeded);
      execActions(k, [{ kind: 'set', holder: 1, cards: ['Colonel Mustard', 'Ms. Scarlet'] }]);
      const p = posterior(k, { force: 'sampled', maxSamples: 10_000, timeBudgetMs: 60_000 });
      return [
        ...eq('method', p.method, 'sampled'),
        ...eq('timedOut', p.timedOut, false),
        ...near('Mustard', p.envelope.get('Colonel Mustard') ?? 0, 11 / 56, 0.04),
        ...near('Plum', p.envelope.get('Professor Plum') ?? 0, 17 / 56, 0.04),
        ...near('Knife', p.envelope.get('Knife') ?? 0, 0.2, 0.04),
        ...near('Mr. Green', p.envelope.get('Mr. Green') ?? 0, 0),
      ];
    },
  },
  {
    name: 'Exhausted state budget or constraint limit falls back to sampling',
    check: () => {
      const k = buildState(seeded);
      execActions(k, [{ kind: 'set', holder: 1, cards: ['Colonel Mustard', 'Ms. Scarlet'] }]);
      return [
        ...eq('state budget', posterior(k, { exactStateBudget: 0, maxSamples: 200 }).method, 'sampled'),
        ...eq('constraint limit', posterior(k, { exactConstraintLimit: 0, maxSamples: 200 }).method, 'sampled'),
        ...eq('forced exact', posterior(k, { exactStateBudget: 0, force: 'exact' }).method, 'exact'),
      ];
    },
  },
  {
    name: 'Too few accepted samples is flagged as timed out',
    check: () => {
      const p = posterior(buildState({ numPlayers: 3 }), { force: 'sampled', maxSamples: 10 });
      return [...eq('timedOut', p.timedOut, true), ...eq('at most ten', p.completions <= 10, true)];
    },
  },
  {
    name: 'No accepted sample falls back to a uniform spread',
    check: () => {
      const p = posterior(buildState({ numPlayers: 3 }), { force: 'sampled', maxSamples: 0 });
      return [
        ...eq('completions', p.completions, 0),
        ...eq('timedOut', p.timedOut, true),
        ...near('Mustard', p.envelope.get('Colonel Mustard') ?? 0, 1 / 6),
        ...near('Kitchen', p.envelope.get('Kitchen') ?? 0, 1 / 9),
      ];
    },
  },
  {
    name: 'Facts admitting no deal are a contradiction',
    check: () => throwsNamed('seven disjoint pairs for a six-card hand', 'Contradiction', () => {
      const k = buildState(seeded);
      execActions(k, [
        { kind: 'set', holder: 1, cards: ['Colonel Mustard', 'Ms. Scarlet'] },
        { kind: 'set', holder: 1, cards: ['Professor Plum', 'Mrs. Peacock'] },
        { kind: 'set', holder: 1, cards: ['Lead Pipe', 'Knife'] },
        { kind: 'set', holder: 1, cards: ['Wrench', 'Candlestick'] },
        { kind: 'set', holder: 1, cards: ['Kitchen', 'Conservatory'] },
        { kind: 'set', holder: 1, cards: ['Dining Room', 'Billiard Room'] },
        { kind: 'set', holder: 1, cards: ['Library', 'Ballroom'] },
      ]);
      return posterior(k);
    }),
  },
  {
    name: 'Entropy helpers',
    check: () => {
      const p = posterior(buildState({ numPlayers: 3 }));
      return [
        ...near('fair coin', entropy([0.5, 0.5]), 1),
        ...near('certain', entropy([1, 0, 0]), 0),
        ...near('empty store', envelopeEntropy(p), 2 * Math.log2(6) + Math.log2(9)),
      ];
    },
  },
  {
    name: 'Solved only once every category is certain',
    check: () => {
      const k = buildState({ numPlayers: 3, hands: [{ player: 0, cards: HANDS[0] }] });
      execActions(k, [{ kind: 'guess', guesser: 0, guess: ['Professor Plum', 'Revolver', 'Kitchen'], hands: HANDS }]);
      const open = posterior(buildState(seeded));
      const p = posterior(k);
      return [
        ...eq('solved', isSolved(p), true),
        ...eq('solution', mostLikelySolution(p, k), ['Professor Plum', 'Revolver', 'Kitchen']),
        ...eq('unsolved', isSolved(open), false),
        ...eq('threshold 0.25', isSolved(open, 0.25), false),
        ...eq('threshold 0.15', isSolved(open, 0.15), true),
      ];
    },
  },
];

export const cases: TestCase[] = [...exact, ...checks];

export default cases;

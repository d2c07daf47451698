import { buildCatalog } from './catalog';
import { defaultRandom, pickOne, type RandomSource } from './rng';
import type { Body, BodyId, GameConfig, GuessResult, Round } from './types';

export const isTerminal = (round: Round) => round.status !== 'in_progress';

export const isSpecial = (round: Round, bodyId: BodyId) => round.specialId === bodyId;

export const findBody = (round: Round, bodyId: BodyId): Body | undefined => round.bodies.find((b) => b.id === bodyId);

function assertGuessBudget(budget: number) {
  if (!Number.isInteger(budget) || budget < 1) {
    throw new Error(`Guess budget must be a positive integer (got ${budget})`);
  }
}

/**
 * Builds a fresh round: the whole catalog in play, the full guess budget, and
 * a special body drawn uniformly from every body in the catalog.
 */
export function startRound(config: GameConfig, random: RandomSource = defaultRandom): Round {
  assertGuessBudget(config.guessBudget);
  const bodies = buildCatalog(config, random);
  if (bodies.length === 0) throw new Error('Cannot start a round with an empty catalog');

  return {
    bodies,
    specialId: pickOne(random, bodies).id,
    guessBudget: config.guessBudget,
    remainingGuesses: config.guessBudget,
    guessed: [],
    status: 'in_progress'
  };
}

// Nothing survives a reset: no score, no history, never a reduced budget.
export const reset = (config: GameConfig, random: RandomSource = defaultRandom): Round => startRound(config, random);

export function evaluateGuess(round: Round, bodyId: BodyId): GuessResult {
  if (isTerminal(round)) return { outcome: 'rejected', reason: 'round_over', round };
  if (!findBody(round, bodyId)) return { outcome: 'rejected', reason: 'unknown_body', round };

  if (isSpecial(round, bodyId)) {
    return { outcome: 'won', round: { ...round, status: 'won' } };
  }

  const remainingGuesses = round.remainingGuesses - 1;
  const lost = remainingGuesses <= 0;
  return {
    outcome: lost ? 'lost' : 'continue',
    round: {
      ...round,
      bodies: round.bodies.filter((b) => b.id !== bodyId),
      guessed: [...round.guessed, bodyId],
      remainingGuesses,
      status: lost ? 'lost' : 'in_progress'
    }
  };
}

// Rejected guesses hand back the same round object.
export const guess = (round: Round, bodyId: BodyId): Round => evaluateGuess(round, bodyId).round;

import type { Round, RoundStatus } from './types';

export interface OutcomeAlert {
  tone: 'victory' | 'defeat';
  title: string;
  message: string;
  action: string;
}

const VICTORY: OutcomeAlert = {
  tone: 'victory',
  title: 'Victory!',
  message: 'You found the missing heart!',
  action: 'Play Again'
};

const DEFEAT: OutcomeAlert = {
  tone: 'defeat',
  title: 'Try Again',
  message: "You'll do better next time.",
  action: 'Try Again'
};

export function alertForStatus(status: RoundStatus): OutcomeAlert | null {
  if (status === 'won') return VICTORY;
  if (status === 'lost') return DEFEAT;
  return null;
}

export const guessesLabel = (round: Round) =>
  `${round.remainingGuesses} of ${round.guessBudget} ${round.remainingGuesses === 1 ? 'guess' : 'guesses'} left`;

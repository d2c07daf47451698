import { describe, expect, it } from 'vitest';
import { alertForStatus, guessesLabel } from '../lib/feedback';
import type { Round } from '../lib/types';

const mkRound = (remainingGuesses: number, guessBudget = 10): Round => ({
  bodies: [],
  specialId: 'sun',
  guessBudget,
  remainingGuesses,
  guessed: [],
  status: 'in_progress'
});

describe('outcome alerts', () => {
  it('shows nothing while the round is running', () => {
    expect(alertForStatus('in_progress')).toBeNull();
  });

  it('celebrates a win', () => {
    expect(alertForStatus('won')).toEqual({
      tone: 'victory',
      title: 'Victory!',
      message: 'You found the missing heart!',
      action: 'Play Again'
    });
  });

  it('encourages after a loss', () => {
    expect(alertForStatus('lost')).toEqual({
      tone: 'defeat',
      title: 'Try Again',
      message: "You'll do better next time.",
      action: 'Try Again'
    });
  });
});

describe('guess counter', () => {
  it('pluralises the remaining guesses', () => {
    expect(guessesLabel(mkRound(10))).toBe('10 of 10 guesses left');
    expect(guessesLabel(mkRound(1))).toBe('1 of 10 guess left');
    expect(guessesLabel(mkRound(0, 5))).toBe('0 of 5 guesses left');
  });
});

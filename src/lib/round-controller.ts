import { alertForStatus, type OutcomeAlert } from './feedback';
import { createLogger, type Logger } from './logger';
import { defaultRandom, type RandomSource } from './rng';
import { evaluateGuess, findBody, reset, startRound } from './round';
import type { BodyId, GameConfig, GuessResult, Round } from './types';

type Listener = (round: Round) => void;

export interface RoundControllerOptions {
  random?: RandomSource;
  logger?: Logger;
}

/**
 * Sole owner of the live round. The renderer reads snapshots, subscribes to
 * changes and forwards taps; every change replaces the round object.
 */
export class RoundController {
  private round: Round;
  private listeners = new Set<Listener>();
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(private readonly config: GameConfig, options: RoundControllerOptions = {}) {
    this.random = options.random ?? defaultRandom;
    this.logger = options.logger ?? createLogger('round');
    this.round = startRound(config, this.random);
    this.logStart();
  }

  getSnapshot = (): Round => this.round;

  getAlert = (): OutcomeAlert | null => alertForStatus(this.round.status);

  subscribe = (listener: Listener) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  tap = (bodyId: BodyId): GuessResult => {
    const result = evaluateGuess(this.round, bodyId);

    if (result.outcome === 'rejected') {
      if (result.reason === 'round_over') {
        this.logger.warn(`Ignored tap on ${bodyId}: round is already ${this.round.status}`);
      } else {
        this.logger.warn(`Ignored tap on ${bodyId}: not in play`);
      }
      return result;
    }

    const name = findBody(this.round, bodyId)?.name ?? bodyId;
    if (result.outcome === 'won') this.logger.info(`Found the heart in ${name}`);
    else if (result.outcome === 'lost') this.logger.info(`Missed ${name}; out of guesses`);
    else this.logger.info(`Missed ${name}; ${result.round.remainingGuesses} guesses left`);

    this.publish(result.round);
    return result;
  };

  reset = (): Round => {
    this.publish(reset(this.config, this.random));
    this.logStart();
    return this.round;
  };

  private logStart() {
    this.logger.info(`New round: ${this.round.bodies.length} bodies, ${this.round.guessBudget} guesses`);
  }

  private publish(next: Round) {
    this.round = next;
    for (const fn of this.listeners) fn(next);
  }
}

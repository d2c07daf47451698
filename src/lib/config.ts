import { SOLAR_BODIES, STAR_COLORS } from './catalog';
import type { GameConfig } from './types';

// Wrong guesses allowed per round. Earlier builds of the game shipped 5.
export const GUESS_BUDGET = 10;
export const STAR_COUNT = 10;
export const FIELD_SIZE = 800;
export const STAR_MARGIN = 50;
export const ORBIT_TICK_MS = 16;

export type EnvSource = Record<string, string | boolean | undefined>;

const toSafeInt = (value: unknown, fallback: number) => {
  if (typeof value !== 'string' || value.trim() === '') return fallback;
  const numeric = Number(value);
  if (!Number.isInteger(numeric) || numeric < 0) return fallback;
  return numeric;
};

export function resolveGameConfig(env: EnvSource = {}): GameConfig {
  const guessBudget = toSafeInt(env.VITE_GUESS_BUDGET, GUESS_BUDGET);
  return {
    bodies: SOLAR_BODIES,
    starCount: toSafeInt(env.VITE_STAR_COUNT, STAR_COUNT),
    starColors: STAR_COLORS,
    guessBudget: guessBudget > 0 ? guessBudget : GUESS_BUDGET,
    field: { size: FIELD_SIZE, starMargin: STAR_MARGIN }
  };
}

export const DEFAULT_GAME_CONFIG: GameConfig = resolveGameConfig();

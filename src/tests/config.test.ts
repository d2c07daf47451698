import { describe, expect, it } from 'vitest';
import { DEFAULT_GAME_CONFIG, GUESS_BUDGET, STAR_COUNT, resolveGameConfig } from '../lib/config';

describe('game config', () => {
  it('defaults to the named constants', () => {
    expect(DEFAULT_GAME_CONFIG.guessBudget).toBe(GUESS_BUDGET);
    expect(DEFAULT_GAME_CONFIG.starCount).toBe(STAR_COUNT);
    expect(DEFAULT_GAME_CONFIG.bodies).toHaveLength(9);
    expect(DEFAULT_GAME_CONFIG.field).toEqual({ size: 800, starMargin: 50 });
  });

  it('reads overrides from the environment', () => {
    const config = resolveGameConfig({ VITE_GUESS_BUDGET: '5', VITE_STAR_COUNT: '0' });
    expect(config.guessBudget).toBe(5);
    expect(config.starCount).toBe(0);
  });

  it('falls back on values that cannot drive a round', () => {
    for (const value of ['0', '-3', '2.5', 'ten', '', undefined]) {
      expect(resolveGameConfig({ VITE_GUESS_BUDGET: value }).guessBudget).toBe(10);
    }
    expect(resolveGameConfig({ VITE_STAR_COUNT: '-1' }).starCount).toBe(10);
    expect(resolveGameConfig({ VITE_STAR_COUNT: true }).starCount).toBe(10);
  });
});

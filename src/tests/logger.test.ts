import { describe, expect, it, vi } from 'vitest';
import { createLogger } from '../lib/logger';

describe('logger', () => {
  it('prefixes lines with the scope', () => {
    const sink = vi.fn();
    const log = createLogger('orbit', sink);
    log.info('tick');
    log.warn('late tap');
    expect(sink.mock.calls).toEqual([
      ['info', '[orbit] tick'],
      ['warn', '[orbit] late tap']
    ]);
  });

  it('writes warnings to console.warn by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    createLogger('round').warn('not in play');
    expect(warn).toHaveBeenCalledWith('[round] not in play');
    warn.mockRestore();
  });
});

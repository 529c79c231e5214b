import { describe, expect, it, vi } from 'vitest';
import type { ExtractionStrategy } from '../core/types';
import { FakeSession, FakeSite } from '../test/fakeSite';
import { runStrategyChain } from './strategyChain';

const CONTEXT = { platform: 'Stays', pageUrl: 'https://stays.test/' };

function strategy(
  name: string,
  extract: ExtractionStrategy<string>['extract']
): ExtractionStrategy<string> {
  return { name, extract: vi.fn(extract) };
}

describe('runStrategyChain', () => {
  const session = new FakeSession(new FakeSite());

  it('should stop at the first strategy that finds something', async () => {
    const empty = strategy('empty', async () => []);
    const hit = strategy('hit', async () => ['a', 'b']);
    const later = strategy('later', async () => ['c']);

    const result = await runStrategyChain([empty, hit, later], session, CONTEXT);

    expect(result).toEqual({ strategy: 'hit', items: ['a', 'b'] });
    expect(later.extract).not.toHaveBeenCalled();
  });

  it('should report no strategy when every one comes back empty', async () => {
    const result = await runStrategyChain(
      [strategy('a', async () => []), strategy('b', async () => [])],
      session,
      CONTEXT
    );

    expect(result).toEqual({ strategy: null, items: [] });
  });

  it('should propagate a strategy error without trying the rest', async () => {
    const broken = strategy('broken', async () => {
      throw new Error('detached frame');
    });
    const later = strategy('later', async () => ['c']);

    await expect(
      runStrategyChain([broken, later], session, CONTEXT)
    ).rejects.toThrow('detached frame');
    expect(later.extract).not.toHaveBeenCalled();
  });
});

import { describe, expect, it } from 'vitest';
import { getCrawlerDefinition, getRegisteredPlatforms } from '..';
import { AIRBNB_FALLBACK_SECTIONS, airbnbDefinition } from './config';

describe('airbnb definition', () => {
  it('should be registered under its platform id', () => {
    expect(getRegisteredPlatforms()).toContain('airbnb');
    expect(getCrawlerDefinition('airbnb')).toBe(airbnbDefinition);
  });

  it('should seed ten destination searches as fallback sections', () => {
    expect(AIRBNB_FALLBACK_SECTIONS).toHaveLength(10);
    expect(AIRBNB_FALLBACK_SECTIONS[0]).toEqual({
      name: 'Bangkok',
      seedUrl: 'https://www.airbnb.com/s/Bangkok--Thailand/homes',
    });
    expect(AIRBNB_FALLBACK_SECTIONS[7]).toEqual({
      name: 'New York',
      seedUrl: 'https://www.airbnb.com/s/New-York--NY--United-States/homes',
    });
  });

  it('should order every strategy chain', () => {
    const { strategies } = airbnbDefinition;
    const names = (chain: { name: string }[]) => chain.map((s) => s.name);

    expect(names(strategies.sections)).toEqual([
      'section-container',
      'heading-proximity',
      'generic-link',
    ]);
    expect(names(strategies.cards)).toEqual([
      'card-test-id',
      'card-item-prop',
      'card-link-ancestor',
    ]);
    expect(names(strategies.nextPage)).toEqual([
      'next-page-1',
      'next-page-2',
      'next-page-3',
    ]);
    expect(names(strategies.description)).toEqual([
      'description-1',
      'description-2',
      'description-3',
    ]);
  });
});

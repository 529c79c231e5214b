export const AVAILABLE_PLATFORMS = {
  airbnb: {
    name: 'Airbnb',
    slug: 'airbnb',
  },
} as const;

export type PlatformSlug = keyof typeof AVAILABLE_PLATFORMS;

export const DEFAULT_PLATFORM: PlatformSlug = 'airbnb';

export const DEFAULT_OUTPUT_DIR = 'actors/crawler/crawler-outputs';

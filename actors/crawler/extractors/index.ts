export {
  type CardContainerLookup,
  type CardFieldSelectors,
  type CardSelectors,
  createCardStrategies,
  createCardStrategy,
} from './cardStrategies';
export {
  createDescriptionStrategies,
  createHrefStrategy,
  createNextPageStrategies,
  createTextStrategy,
} from './linkStrategies';
export {
  createGenericLinkStrategy,
  createHeadingProximityStrategy,
  createSectionContainerStrategy,
  createSectionStrategies,
  type SectionSelectors,
} from './sectionStrategies';
export { type ChainResult, runStrategyChain } from './strategyChain';

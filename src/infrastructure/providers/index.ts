export { BaseProvider } from './BaseProvider.js';
export type { ProviderError } from './BaseProvider.js';
export { ListingExtractor, PAKWHEELS_SELECTORS } from './ListingExtractor.js';
export { PakWheelsProvider, DEFAULT_HEADERS } from './PakWheelsProvider.js';
export type { OnPageFailedCallback, PakWheelsProviderOptions } from './PakWheelsProvider.js';
export { ProviderFactory } from './ProviderFactory.js';

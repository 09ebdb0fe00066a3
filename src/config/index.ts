export type { AppConfig } from './app.config.js';
export { loadAppConfig, envInt } from './app.config.js';
export { KNOWN_CITIES } from './cities.config.js';

export { ConfigLoader, configEnvFor } from './loader.js';
export { Sections, Keys } from './constants.js';
export { resolveSettings, type RelaySettings } from './settings.js';

export { DEFAULT_RUNTIME_SETTINGS, getRuntimeSettings, type RuntimeSettings } from './settings.js';

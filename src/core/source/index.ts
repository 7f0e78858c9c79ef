export { type EggSource, githubBlobToRaw, isUrl, type LoadEggOptions, loadEggJson } from './egg-source.js';

export { coerceBoolean, EGG_FIELD_KEYS, readFirst, VARIABLE_FIELD_KEYS } from './fields.js';
export { descriptorToJson } from './json.js';
export { parseEgg } from './parser.js';

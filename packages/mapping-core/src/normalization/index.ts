export { Normalizer, KEY_SEPARATOR } from './normalizer.js';

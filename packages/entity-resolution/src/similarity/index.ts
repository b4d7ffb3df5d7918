export {
  levenshtein,
  jaro,
  jaroWinkler,
  diceSorensen,
  jaccard,
  tokenSet,
  getNgrams,
  calculateSimilarity,
} from './string-similarity.js';
export { soundex, soundexSimilarity } from './phonetic.js';

export type {
  SimilarityResult,
  SimilarityAlgorithm,
  SimilarityOptions,
} from './similarity.js';

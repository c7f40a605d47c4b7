/**
 * Ranking Module
 *
 * @module ranking
 */

export { rankByConfidence, selectTop, countByTier } from './ranker.js';

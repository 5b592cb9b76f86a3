export * from './statistics.js';
export * from './targets.js';
export * from './errorCodes.js';
export * from './sloEvaluator.js';
export * from './degradationDetector.js';
export * from './trendPredictor.js';
export * from './aggregateRanker.js';

import type { Config } from './config/types.js';
import { MetricStore } from './store/metricStore.js';
import {
  AggregateRanker,
  DegradationDetector,
  SloEvaluator,
  TrendPredictor
} from './analytics/index.js';
import type { AnalyticsContext } from './tools/base/tool.js';
import { OperationDispatcher, DispatcherOptions } from './tools/dispatcher.js';
import { logger } from './utils/logger.js';

export interface AnalyticsEngine extends AnalyticsContext {
  dispatcher: OperationDispatcher;
}

/**
 * Wire the store, the analytics components and the dispatcher for one configuration
 */
export function createAnalyticsEngine(config: Config, options: DispatcherOptions = {}): AnalyticsEngine {
  const context: AnalyticsContext = {
    config,
    store: new MetricStore({
      parseChunkSize: config.ingestion.parseChunkSize,
      errorRateTolerance: config.ingestion.errorRateTolerance
    }),
    evaluator: new SloEvaluator(config.slo),
    detector: new DegradationDetector(config.degradation),
    predictor: new TrendPredictor(config.trend, config.slo),
    ranker: new AggregateRanker()
  };

  const dispatcher = new OperationDispatcher(context, options);
  logger.debug('Analytics engine created', { operations: dispatcher.list().length });

  return { ...context, dispatcher };
}

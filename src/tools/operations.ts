import { ToolFactories, ToolRegistry } from './base/registry.js';
import {
  CalculateErrorBudgetTool,
  GetCurrentSliTool,
  GetServiceSummaryTool,
  GetSloViolationsTool
} from './slo/index.js';
import {
  GetDegradingServicesTool,
  GetErrorCodeDistributionTool,
  GetVolumeTrendsTool
} from './degradation/index.js';
import { GetHistoricalPatternsTool, PredictIssuesTodayTool } from './trends/index.js';
import {
  ErrorProneServicesTool,
  ServiceHealthOverviewTool,
  SlowestServicesTool,
  TopErrorsTool,
  TopServicesByVolumeTool
} from './ranking/index.js';

export const OPERATION_FACTORIES: ToolFactories = {
  get_degrading_services: context => new GetDegradingServicesTool(context),
  get_error_code_distribution: context => new GetErrorCodeDistributionTool(context),
  get_current_sli: context => new GetCurrentSliTool(context),
  predict_issues_today: context => new PredictIssuesTodayTool(context),
  get_service_summary: context => new GetServiceSummaryTool(context),
  get_slo_violations: context => new GetSloViolationsTool(context),
  calculate_error_budget: context => new CalculateErrorBudgetTool(context),
  get_volume_trends: context => new GetVolumeTrendsTool(context),
  get_service_health_overview: context => new ServiceHealthOverviewTool(context),
  get_top_services_by_volume: context => new TopServicesByVolumeTool(context),
  get_slowest_services: context => new SlowestServicesTool(context),
  get_error_prone_services: context => new ErrorProneServicesTool(context),
  get_top_errors: context => new TopErrorsTool(context),
  get_historical_patterns: context => new GetHistoricalPatternsTool(context)
};

export const defaultToolRegistry = new ToolRegistry(OPERATION_FACTORIES);

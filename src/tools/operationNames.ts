/**
 * Every operation the dispatcher answers to
 */
export const OPERATION_NAMES = [
  'get_degrading_services',
  'get_error_code_distribution',
  'get_current_sli',
  'predict_issues_today',
  'get_service_summary',
  'get_slo_violations',
  'calculate_error_budget',
  'get_volume_trends',
  'get_service_health_overview',
  'get_top_services_by_volume',
  'get_slowest_services',
  'get_error_prone_services',
  'get_top_errors',
  'get_historical_patterns'
] as const;

export type OperationName = typeof OPERATION_NAMES[number];

export function isOperationName(name: string): name is OperationName {
  return OPERATION_NAMES.some(operation => operation === name);
}

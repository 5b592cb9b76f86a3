export { GetCurrentSliTool } from './getCurrentSli.js';
export { GetSloViolationsTool } from './getSloViolations.js';
export { CalculateErrorBudgetTool } from './calculateErrorBudget.js';
export { GetServiceSummaryTool } from './getServiceSummary.js';

export { GetDegradingServicesTool } from './getDegradingServices.js';
export { GetErrorCodeDistributionTool } from './getErrorCodeDistribution.js';
export { GetVolumeTrendsTool } from './getVolumeTrends.js';

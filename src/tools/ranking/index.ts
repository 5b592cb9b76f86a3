export { TopServicesByVolumeTool } from './topServicesByVolume.js';
export { SlowestServicesTool } from './slowestServices.js';
export { ErrorProneServicesTool } from './errorProneServices.js';
export { TopErrorsTool } from './topErrors.js';
export { ServiceHealthOverviewTool } from './serviceHealthOverview.js';

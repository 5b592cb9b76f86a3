export { PredictIssuesTodayTool } from './predictIssuesToday.js';
export { GetHistoricalPatternsTool } from './getHistoricalPatterns.js';

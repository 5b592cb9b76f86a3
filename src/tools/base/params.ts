import { z } from 'zod';
import type { RankingConfig } from '../../config/types.js';

export const MAX_WINDOW_MINUTES = 10080; // 7 days
export const MAX_WINDOW_HOURS = 720; // 30 days

export const serviceNameParam = z.string().trim().min(1).describe('Service name as it appears in the service metrics');

export function windowMinutesParam(defaultMinutes: number) {
  return z.number().int().min(1).max(MAX_WINDOW_MINUTES).default(defaultMinutes)
    .describe(`Time window in minutes (default: ${defaultMinutes}, max: ${MAX_WINDOW_MINUTES})`);
}

export const windowHoursParam = z.number().int().min(1).max(MAX_WINDOW_HOURS);

/**
 * Result-count limit; values above the maximum are rejected, never clamped
 */
export function limitParam(ranking: RankingConfig) {
  return z.number().int().min(1).max(ranking.maxLimit).default(ranking.defaultLimit)
    .describe(`Number of results to return (default: ${ranking.defaultLimit}, max: ${ranking.maxLimit})`);
}

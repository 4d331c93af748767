/**
 * JSON formatter for machine-readable output
 */
import type { ConversionSummary } from '../types/index.js';

/**
 * Format a conversion summary as JSON
 */
export function formatJSON(summary: ConversionSummary): string {
  return JSON.stringify(summary, null, 2);
}

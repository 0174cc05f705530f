/**
 * @module @asset-session/contracts/logger
 * Logging capability consumed by the session and handed to managers
 */

/**
 * Severities, least to most severe.
 *
 * `debugApi` traces calls across the host/manager boundary.
 */
export const SEVERITY_NAMES = [
  'debugApi',
  'debug',
  'info',
  'progress',
  'warning',
  'error',
  'critical',
] as const;

export type Severity = (typeof SEVERITY_NAMES)[number];

/**
 * Logging capability supplied by the host
 */
export interface LoggerInterface {
  log(severity: Severity, message: string): void;
}

/**
 * Position of a severity in SEVERITY_NAMES
 */
export function severityRank(severity: Severity): number {
  return SEVERITY_NAMES.indexOf(severity);
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITY_NAMES as readonly string[]).includes(value);
}

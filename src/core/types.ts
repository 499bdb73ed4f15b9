/**
 * Common types for the swap check plugin
 */

/**
 * Plugin exit statuses, following the monitoring-plugin exit convention
 */
export const ExitStatus = {
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
  UNKNOWN: 3,
} as const;

export type ExitStatus = typeof ExitStatus[keyof typeof ExitStatus];

export type StatusName = keyof typeof ExitStatus;

const statusNames: Record<ExitStatus, StatusName> = {
  0: "OK",
  1: "WARNING",
  2: "CRITICAL",
  3: "UNKNOWN",
};

export function statusName(status: ExitStatus): StatusName {
  return statusNames[status];
}

/**
 * Terminal outcome of one check run
 */
export interface CheckResult {
  readonly status: ExitStatus;
  readonly message: string;
  // Empty when the check could not produce a measurement
  readonly perfData: string;
}

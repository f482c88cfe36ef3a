/**
 * Monitoring type definitions
 */

import type { JobStats } from "./job";

/**
 * Identity of one job on one machine, as seen by monitoring services
 */
export interface MonitorKey {
  hostname: string;
  jobName: string;
}

export interface Monitor {
  readonly name: string;
  notifyStart(key: MonitorKey): Promise<void>;
  notifySuccess(key: MonitorKey, stats: JobStats): Promise<void>;
  notifyFailure(key: MonitorKey, stats: JobStats): Promise<void>;
}

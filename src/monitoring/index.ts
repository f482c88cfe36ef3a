/**
 * Monitoring module exports
 */

import type { HyperbakConfig, Monitor } from "../types";
import { logger } from "../utils/logger";
import type { CheckDefinition, HealthchecksMonitorOptions } from "./healthchecks";
import { HealthchecksMonitor } from "./healthchecks";
import type { MailMonitorOptions } from "./mail";
import { MailMonitor } from "./mail";

export { type CheckDefinition, HealthchecksMonitor } from "./healthchecks";
export { failureSubject, MailMonitor, successSubject } from "./mail";
export { assertDistinctSlugs, renderMonitorSlug } from "./slug";

export interface CreateMonitorsOptions {
  healthchecks?: HealthchecksMonitorOptions;
  mail?: MailMonitorOptions;
}

/**
 * Build and initialize the enabled monitors. One that cannot initialize
 * is left out with a warning; the jobs still run without it.
 */
export async function createMonitors(
  config: HyperbakConfig,
  checks: CheckDefinition[],
  options: CreateMonitorsOptions = {},
): Promise<Monitor[]> {
  const monitors: Monitor[] = [];
  const { healthchecks, mail } = config.monitoring ?? {};

  if (healthchecks?.enabled) {
    try {
      const monitor = new HealthchecksMonitor(healthchecks, options.healthchecks);
      await monitor.initialize(checks);
      monitors.push(monitor);
      logger.info("Healthchecks monitoring enabled");
    } catch (err) {
      logger.warn("Healthchecks monitoring disabled: initialization failed", err);
    }
  }

  if (mail?.enabled) {
    try {
      const monitor = new MailMonitor(mail, options.mail);
      await monitor.initialize();
      monitors.push(monitor);
      logger.info("Mail monitoring enabled");
    } catch (err) {
      logger.warn("Mail monitoring disabled: initialization failed", err);
    }
  }

  return monitors;
}

/**
 * Healthchecks monitoring via its management and ping APIs
 */

import ky, { type KyInstance } from "ky";
import { DEFAULT_HEALTHCHECKS } from "../config/defaults";
import type { HealthchecksConfig, JobStats, Monitor, MonitorKey } from "../types";
import { logger } from "../utils/logger";
import { assertDistinctSlugs, renderMonitorSlug } from "./slug";

/** Seconds a started run may take before the check is flagged */
const RUN_TIMEOUT_SECONDS = 86400;

export interface CheckDefinition {
  key: MonitorKey;
  schedule: string;
  timezone?: string;
}

export interface HealthchecksMonitorOptions {
  /** Replaces the global fetch, used by tests */
  fetch?: typeof fetch;
}

interface CreateCheckRequest {
  name: string;
  slug: string;
  tags: string;
  schedule: string;
  tz?: string;
  grace: number;
  timeout: number;
  unique: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class HealthchecksMonitor implements Monitor {
  readonly name = "healthchecks";
  private readonly http: KyInstance;
  private readonly server: string;
  private readonly pingUrls = new Map<string, string>();

  constructor(
    private readonly config: HealthchecksConfig,
    options: HealthchecksMonitorOptions = {},
  ) {
    this.server = config.server.replace(/\/+$/, "");
    this.http = ky.create({
      timeout: 30_000,
      retry: {
        limit: config.maxRetries ?? DEFAULT_HEALTHCHECKS.maxRetries,
        methods: ["get", "post"],
      },
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });
  }

  /**
   * Create or update one check per job and remember its ping URL
   */
  async initialize(checks: CheckDefinition[]): Promise<void> {
    assertDistinctSlugs(checks.map((check) => check.key));

    for (const check of checks) {
      const slug = renderMonitorSlug(check.key);
      const request: CreateCheckRequest = {
        name: slug,
        slug,
        tags: check.key.hostname,
        schedule: check.schedule,
        grace: this.config.grace ?? DEFAULT_HEALTHCHECKS.grace,
        timeout: RUN_TIMEOUT_SECONDS,
        unique: ["name"],
      };
      if (check.timezone) {
        request.tz = check.timezone;
      }

      const response: unknown = await this.http
        .post(`${this.server}/api/v3/checks/`, {
          headers: { "X-Api-Key": this.config.apiKey },
          json: request,
        })
        .json();

      if (!isRecord(response) || typeof response.ping_url !== "string") {
        throw new Error(`Healthchecks returned no ping_url for check "${slug}"`);
      }

      this.pingUrls.set(slug, response.ping_url);
      logger.debug(`Healthchecks check ready: ${slug}`);
    }
  }

  private pingUrl(key: MonitorKey): string {
    const slug = renderMonitorSlug(key);
    const url = this.pingUrls.get(slug);
    if (!url) {
      throw new Error(`No healthchecks check registered for "${slug}"`);
    }
    return url;
  }

  async notifyStart(key: MonitorKey): Promise<void> {
    await this.http.post(`${this.pingUrl(key)}/start`);
  }

  async notifySuccess(key: MonitorKey, stats: JobStats): Promise<void> {
    await this.http.post(this.pingUrl(key), { json: stats });
  }

  async notifyFailure(key: MonitorKey, stats: JobStats): Promise<void> {
    await this.http.post(`${this.pingUrl(key)}/fail`, { json: stats });
  }
}

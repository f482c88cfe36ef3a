/**
 * Mail notifications over SMTP
 */

import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import { DEFAULT_SMTP_PORT } from "../config/defaults";
import type { JobStats, MailConfig, Monitor, MonitorKey } from "../types";

export interface MailMonitorOptions {
  /** Pre-built transport, used by tests */
  transporter?: Transporter;
}

export function successSubject(key: MonitorKey): string {
  return `Success: Backup Job '${key.jobName}' on host '${key.hostname}'`;
}

export function failureSubject(key: MonitorKey): string {
  return `Failure: Backup Job '${key.jobName}' on host '${key.hostname}'`;
}

function renderStats(stats: JobStats): string {
  return JSON.stringify(stats, null, 2);
}

export class MailMonitor implements Monitor {
  readonly name = "mail";
  private readonly transporter: Transporter;
  private readonly ownsTransport: boolean;

  constructor(
    private readonly config: MailConfig,
    options: MailMonitorOptions = {},
  ) {
    if (options.transporter) {
      this.transporter = options.transporter;
      this.ownsTransport = false;
    } else {
      this.transporter = nodemailer.createTransport({
        host: config.smtpServer,
        port: config.smtpPort ?? DEFAULT_SMTP_PORT,
        secure: false,
        ...(config.smtpUser
          ? { auth: { user: config.smtpUser, pass: config.smtpPassword ?? "" } }
          : {}),
      });
      this.ownsTransport = true;
    }
  }

  /**
   * Check the SMTP connection
   */
  async initialize(): Promise<void> {
    if (this.ownsTransport) {
      await this.transporter.verify();
    }
  }

  private async send(subject: string, text: string): Promise<void> {
    await this.transporter.sendMail({
      from: this.config.smtpFrom,
      to: this.config.smtpTo.join(", "),
      subject,
      text,
    });
  }

  async notifyStart(): Promise<void> {
    // nothing is mailed when a job starts
  }

  async notifySuccess(key: MonitorKey, stats: JobStats): Promise<void> {
    await this.send(
      successSubject(key),
      `Backup Job '${key.jobName}' on host '${key.hostname}' succeeded.\n\nStats: ${renderStats(stats)}`,
    );
  }

  async notifyFailure(key: MonitorKey, stats: JobStats): Promise<void> {
    await this.send(
      failureSubject(key),
      `Backup Job '${key.jobName}' on host '${key.hostname}' has failed\n\nStats: ${renderStats(stats)}`,
    );
  }
}

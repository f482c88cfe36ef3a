import { parseArgs } from "node:util";
import { getEnabledJobNames, getJob } from "../../config/resolver";
import { type ScheduledJob, Scheduler } from "../../core/scheduler";
import { createMonitors } from "../../monitoring";
import { checkDefinitions, loadCommandConfig, runJobWithMonitors } from "../context";
import { color, ui } from "../ui";

export async function daemonCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values.config, values.verbose);

    ui.banner("daemon");

    const jobNames = getEnabledJobNames(config);
    if (jobNames.length === 0) {
      ui.error("No enabled jobs configured");
      ui.info("Add jobs to your config file to use the daemon");
      return 1;
    }

    const monitors = await createMonitors(config, checkDefinitions(config, jobNames));

    const jobs: ScheduledJob[] = jobNames.map((name) => {
      const job = getJob(config, name);
      return {
        name,
        schedule: job.schedule,
        timezone: job.timezone,
        run: () => runJobWithMonitors(config, name, monitors),
      };
    });

    const scheduler = new Scheduler(jobs);

    ui.step("Configured jobs:");
    for (const s of scheduler.getStatus()) {
      const nextRun = s.nextRun ? s.nextRun.toLocaleString() : "unknown";
      ui.message(
        `  ${color.cyan(s.name.padEnd(16))} ${color.dim(s.cron.padEnd(15))} ${color.dim("next:")} ${nextRun}`,
      );
    }
    if (monitors.length > 0) {
      ui.info(`Monitoring: ${monitors.map((m) => m.name).join(", ")}`);
    }

    scheduler.start();
    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop");

    await new Promise<void>((resolve) => {
      const shutdown = (): void => {
        ui.cancel("Shutting down, waiting for running jobs...");
        resolve();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

    await scheduler.stop();
    return 0;
  } catch (error) {
    ui.error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("hyperbak daemon")} - Start the scheduler daemon

${color.dim("USAGE:")}
  hyperbak daemon [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./hyperbak.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Runs hyperbak as a long-running daemon that executes every enabled job
  according to its cron schedule. A job that is still running when its next
  trigger arrives is skipped for that trigger. Each run reports start,
  success and failure to the configured monitoring services.

${color.dim("SCHEDULE FORMAT:")}
  Schedules use standard cron format: minute hour day-of-month month day-of-week
  with an optional per-job timezone.

  Examples:
    "0 2 * * *"     - Every day at 2:00 AM
    "30 1 * * 6"    - Every Saturday at 1:30 AM

${color.dim("EXAMPLES:")}
  hyperbak daemon                                # Start with default config
  hyperbak daemon -c /etc/hyperbak/hyperbak.config.yaml
  hyperbak daemon -v                             # Start with verbose logging
`);
}

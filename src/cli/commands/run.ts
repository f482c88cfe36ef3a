import { parseArgs } from "node:util";
import { getEnabledJobNames, getJob } from "../../config/resolver";
import { planVmBackupJob } from "../../core/backup";
import { createMonitors } from "../../monitoring";
import type { HyperbakConfig, JobOutcome } from "../../types";
import { formatDuration } from "../../utils/format";
import { checkDefinitions, loadCommandConfig, prepareJob, runJobWithMonitors } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function runCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      job: { type: "string", short: "j", multiple: true },
      "dry-run": { type: "boolean", default: false },
      "no-monitoring": { type: "boolean", default: false },
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

    ui.banner("run");

    const jobNames = await selectJobs(config, values.job ?? []);
    if (jobNames === null) {
      ui.cancel("Run cancelled");
      return 1;
    }
    if (jobNames.length === 0) {
      ui.error("No enabled jobs configured");
      return 1;
    }

    if (values["dry-run"]) {
      return await dryRun(config, jobNames);
    }

    const monitors = values["no-monitoring"]
      ? []
      : await createMonitors(config, checkDefinitions(config, jobNames));

    let failed = 0;
    for (const name of jobNames) {
      const s = ui.spinner();
      s.start(`Running job ${name}...`);

      const outcome = await runJobWithMonitors(config, name, monitors);
      s.stop(outcome.ok ? `Job ${name} complete` : color.red(`Job ${name} failed`));

      printOutcome(outcome);
      if (!outcome.ok) failed++;
    }

    if (failed > 0) {
      ui.outro(`${failed} of ${jobNames.length} job(s) failed`);
      return 1;
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

/**
 * Jobs named on the command line, a prompt on a terminal, or every
 * enabled job. `null` means the prompt was cancelled.
 */
async function selectJobs(config: HyperbakConfig, requested: string[]): Promise<string[] | null> {
  if (requested.length > 0) {
    for (const name of requested) {
      getJob(config, name);
    }
    return requested;
  }

  const enabled = getEnabledJobNames(config);
  if (!process.stdin.isTTY || enabled.length <= 1) {
    return enabled;
  }

  const selected = await ui.multiselect({
    message: "Select jobs to run",
    options: enabled.map((name) => ({
      value: name,
      label: name,
      hint: getJob(config, name).schedule,
    })),
    initialValues: enabled,
    required: true,
  });

  if (ui.isCancel(selected)) {
    return null;
  }
  return selected;
}

async function dryRun(config: HyperbakConfig, jobNames: string[]): Promise<number> {
  for (const name of jobNames) {
    const { definition, dependencies } = prepareJob(config, name);
    const targets = await planVmBackupJob(definition, dependencies);

    ui.step(`Job ${color.cyan(name)}: ${targets.length} VM(s)`);
    for (const target of targets) {
      ui.message(`  ${color.dim("•")} ${target.vm.nameLabel} ${color.dim(`[${target.vm.uuid}] on ${target.hostId}`)}`);
    }
    ui.message(`  ${color.dim("storages:")} ${definition.job.storages.join(", ")}`);
  }

  ui.warn("[DRY RUN] No changes were made.");
  ui.outro("Done");
  return 0;
}

function printOutcome(outcome: JobOutcome): void {
  const { stats } = outcome;

  ui.note(
    formatSummary([
      { label: "Job", value: stats.jobName },
      { label: "VMs", value: stats.totalObjects },
      { label: "Succeeded", value: stats.successfulObjects },
      { label: "Failed", value: stats.failedObjects },
      { label: "Duration", value: formatDuration(stats.durationSeconds * 1000) },
    ]),
    "Backup Summary",
  );

  for (const message of stats.errors) {
    ui.error(message);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("hyperbak run")} - Run backup jobs now

${color.dim("USAGE:")}
  hyperbak run [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./hyperbak.config.yaml)
  -j, --job <name>        Job to run (can be repeated). If not provided, you'll
                          be prompted on a terminal; otherwise all enabled jobs run.
      --dry-run           List the VMs each job would back up without doing it
      --no-monitoring     Do not notify the monitoring services
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  hyperbak run                             # Interactive job selection
  hyperbak run -j nightly                  # Run one job
  hyperbak run -j nightly -j weekly        # Run two jobs in order
  hyperbak run -j nightly --dry-run        # Preview the VMs to back up
`);
}

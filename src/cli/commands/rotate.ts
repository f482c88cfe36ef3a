import { parseArgs } from "node:util";
import { resolveStorageNames } from "../../config/resolver";
import { runRotation } from "../../core/cleanup";
import { createStorageBackends } from "../../storage";
import { encodeArtifactName } from "../../utils/naming";
import { loadCommandConfig } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function rotateCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      storage: { type: "string", short: "s", multiple: true },
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
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

    ui.banner("rotate");

    const names = resolveStorageNames(config, values.storage);
    const backends = createStorageBackends(config, names);
    const now = new Date();

    // Preview what will be deleted first
    const preview = await runRotation(backends, { dryRun: true, now });

    for (const result of preview.results) {
      if (result.error) {
        ui.error(`${result.storage}: ${result.error}`);
      }
    }

    if (preview.totalDeleted === 0) {
      ui.success("No backups need to be rotated");
      ui.outro("Nothing to do");
      return preview.results.some((r) => r.error) ? 1 : 0;
    }

    ui.step(`Found ${preview.totalDeleted} backup(s) to delete:`);
    for (const result of preview.results) {
      for (const artifact of result.deleted) {
        ui.message(
          `  ${color.dim("•")} ${encodeArtifactName(artifact, true)} ${color.dim(`(${result.storage})`)}`,
        );
      }
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Done");
      return 0;
    }

    if (!values.force) {
      const confirmed = await ui.confirm({
        message: `Delete ${preview.totalDeleted} backup(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Rotation cancelled");
        return 1;
      }
    }

    const s = ui.spinner();
    s.start("Rotating backups...");
    const summary = await runRotation(backends, { now });
    s.stop("Rotation complete");

    const failed = summary.results.filter((r) => r.error);
    for (const result of failed) {
      ui.error(`${result.storage}: ${result.error}`);
    }

    ui.note(
      formatSummary([
        { label: "Storages", value: summary.results.length },
        { label: "Kept", value: summary.totalKept },
        { label: "Deleted", value: summary.totalDeleted },
        { label: "Failed", value: failed.length > 0 ? failed.length : null },
      ]),
      "Rotation Summary",
    );

    if (failed.length > 0) {
      ui.outro("Rotation finished with errors");
      return 1;
    }

    ui.outro("Rotation complete!");
    return 0;
  } catch (error) {
    ui.error(`Rotation failed: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("hyperbak rotate")} - Apply retention policies to stored backups

${color.dim("USAGE:")}
  hyperbak rotate [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./hyperbak.config.yaml)
  -s, --storage <name>    Only rotate this storage (can be repeated)
      --dry-run           Show what would be deleted without doing it
      --force             Skip confirmation prompts
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("RETENTION:")}
  flat      Keep the newest <count> backups of each VM
  tiered    Keep up to <daily>, <weekly>, <monthly> and <yearly> backups of
            each VM, by age. Backups older than a year are always kept.

  Only files and archives whose names hyperbak can decode are considered.

${color.dim("EXAMPLES:")}
  hyperbak rotate                          # Rotate every storage (with confirmation)
  hyperbak rotate -s local                 # Rotate one storage
  hyperbak rotate --dry-run                # Preview what would be deleted
  hyperbak rotate --force                  # Skip confirmation
`);
}

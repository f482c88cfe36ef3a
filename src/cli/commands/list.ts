import { parseArgs } from "node:util";
import { resolveStorageNames } from "../../config/resolver";
import { createStorageBackends } from "../../storage";
import type { ArtifactFilter, BackupArtifact } from "../../types";
import { formatArtifactTimestamp } from "../../utils/naming";
import { loadCommandConfig } from "../context";
import {
  artifactColumns,
  color,
  formatCsvRow,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
  ui,
} from "../ui";

interface ListedArtifact {
  storage: string;
  artifact: BackupArtifact;
}

const FORMATS = ["table", "json", "csv"] as const;
type OutputFormat = (typeof FORMATS)[number];

function isFormat(value: string): value is OutputFormat {
  return FORMATS.some((format) => format === value);
}

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      storage: { type: "string", short: "s", multiple: true },
      vm: { type: "string", multiple: true },
      host: { type: "string", multiple: true },
      format: { type: "string", default: "table" },
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
    const format = values.format;
    if (!isFormat(format)) {
      ui.error(`Unknown format: ${format}`);
      ui.info(`Available formats: ${FORMATS.join(", ")}`);
      return 1;
    }

    const config = await loadCommandConfig(values.config, values.verbose);
    const names = resolveStorageNames(config, values.storage);
    const backends = createStorageBackends(config, names);

    const filter: ArtifactFilter = {};
    if (values.vm) filter.objectNames = values.vm;
    if (values.host) filter.hostIds = values.host;

    const listed: ListedArtifact[] = [];
    for (const backend of backends) {
      for (const artifact of await backend.list(filter)) {
        listed.push({ storage: backend.name, artifact });
      }
    }
    listed.sort((a, b) => b.artifact.timestamp.getTime() - a.artifact.timestamp.getTime());

    // No intro for scripting formats
    switch (format) {
      case "json":
        console.log(JSON.stringify(listed.map(toJson), null, 2));
        return 0;
      case "csv":
        printCsv(listed);
        return 0;
      case "table":
        ui.banner("list");

        if (listed.length === 0) {
          ui.info("No backups found");
          ui.outro("Done");
          return 0;
        }

        printTable(listed);

        ui.outro(`${listed.length} backup(s) total`);
        return 0;
    }
  } catch (error) {
    ui.error(`List failed: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function toJson({ storage, artifact }: ListedArtifact): Record<string, unknown> {
  return {
    storage,
    hostId: artifact.hostId,
    jobKind: artifact.jobKind,
    vm: artifact.objectName,
    timestamp: artifact.timestamp.toISOString(),
    compression: artifact.compression ?? null,
    size: artifact.size ?? null,
  };
}

function printTable(listed: ListedArtifact[]): void {
  const widths = Object.values(TABLE_WIDTHS);
  const headers = ["Storage", "Host", "VM", "Timestamp", "Size", "Comp"];

  ui.step("Backups:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const { storage, artifact } of listed) {
    console.log(formatTableRow(artifactColumns(storage, artifact), widths));
  }

  console.log(formatTableSeparator(widths));
}

function printCsv(listed: ListedArtifact[]): void {
  console.log("storage,host_id,job_kind,vm,timestamp,compression,size_bytes");

  for (const { storage, artifact } of listed) {
    console.log(
      formatCsvRow([
        storage,
        artifact.hostId,
        artifact.jobKind,
        artifact.objectName,
        formatArtifactTimestamp(artifact.timestamp),
        artifact.compression ?? "",
        artifact.size ?? "",
      ]),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("hyperbak list")} - List stored backups

${color.dim("USAGE:")}
  hyperbak list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./hyperbak.config.yaml)
  -s, --storage <name>    Only list this storage (can be repeated)
      --vm <name>         Only list backups of this VM (can be repeated)
      --host <name>       Only list backups from this host (can be repeated)
      --format <format>   Output format: table, json, csv (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  hyperbak list                            # List backups in every storage
  hyperbak list -s local                   # List one storage only
  hyperbak list --vm web01                 # List backups of one VM
  hyperbak list --format json              # Output as JSON (for scripting)
  hyperbak list --format csv               # Output as CSV (for scripting)
`);
}

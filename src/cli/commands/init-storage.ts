import { parseArgs } from "node:util";
import { resolveStorageNames } from "../../config/resolver";
import { createStorageBackends } from "../../storage";
import { loadCommandConfig } from "../context";
import { color, ui } from "../ui";

export async function initStorageCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      storage: { type: "string", short: "s", multiple: true },
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

    ui.banner("init-storage");

    const names = resolveStorageNames(config, values.storage);
    const backends = createStorageBackends(config, names);

    let failed = 0;
    for (const backend of backends) {
      try {
        await backend.initialize();
        ui.success(`${backend.name} ${color.dim(`(${backend.type})`)} ready`);
      } catch (error) {
        failed++;
        ui.error(error instanceof Error ? error.message : String(error));
      }
    }

    if (failed > 0) {
      ui.outro(`${failed} storage(s) could not be initialized`);
      return 1;
    }

    ui.outro("Storage ready!");
    return 0;
  } catch (error) {
    ui.error(`Init failed: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("hyperbak init-storage")} - Prepare storage backends

${color.dim("USAGE:")}
  hyperbak init-storage [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./hyperbak.config.yaml)
  -s, --storage <name>    Only initialize this storage (can be repeated)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Creates local backup directories and initializes borg repositories.
  Running it again on a prepared storage is harmless.

${color.dim("EXAMPLES:")}
  hyperbak init-storage                    # Prepare every storage
  hyperbak init-storage -s offsite         # Prepare one storage
`);
}

#!/usr/bin/env tsx

import * as p from "@clack/prompts";
import color from "picocolors";
import { daemonCommand } from "./cli/commands/daemon";
import { initStorageCommand } from "./cli/commands/init-storage";
import { listCommand } from "./cli/commands/list";
import { rotateCommand } from "./cli/commands/rotate";
import { runCommand } from "./cli/commands/run";
import { PRODUCT, VERSION } from "./cli/ui";

function printHelp(): void {
  p.intro(`${color.cyan(PRODUCT)} ${color.dim(`v${VERSION}`)} - Scheduled Xen VM backups`);

  p.note(
    `${color.cyan("daemon")}        Start the scheduler daemon
${color.cyan("run")}           Run backup jobs now
${color.cyan("list")}          List stored backups
${color.cyan("rotate")}        Apply retention policies to stored backups
${color.cyan("init-storage")}  Prepare storage backends`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `hyperbak daemon                   ${color.dim("# Start scheduler daemon")}
hyperbak run -j nightly           ${color.dim("# Run one job now")}
hyperbak run                      ${color.dim("# Interactive job selection")}
hyperbak rotate --dry-run         ${color.dim("# Preview rotation")}
hyperbak list                     ${color.dim("# List all backups")}
hyperbak init-storage             ${color.dim("# Create directories and repositories")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("hyperbak <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`${PRODUCT} v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "daemon":
      return daemonCommand(commandArgs);

    case "run":
      return runCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "rotate":
      return rotateCommand(commandArgs);

    case "init-storage":
      return initStorageCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("hyperbak --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });

/**
 * Styled output helpers
 */

import { readFileSync } from "node:fs";
import * as p from "@clack/prompts";
import color from "picocolors";

export { color };

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(new URL("../../../package.json", import.meta.url), "utf8"),
  );
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const VERSION = readVersion();

export const PRODUCT = "hyperbak";

/**
 * Display the header line with version and the command being run
 */
export function banner(command: string): void {
  p.intro(`${color.cyan(PRODUCT)} ${color.dim(`v${VERSION}`)} ${color.dim("·")} ${color.white(command)}`);
}

export const outro = (message: string) => p.outro(color.green(message));
export const cancel = (message: string) => p.cancel(message);
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const success = (message: string) => p.log.success(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const step = (message: string) => p.log.step(message);
export const message = (message: string) => p.log.message(message);

export const spinner = p.spinner;

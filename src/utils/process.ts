/**
 * External command execution
 */

import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export interface ExitStatus {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all */
  error?: Error;
}

export interface CommandOptions {
  env?: NodeJS.ProcessEnv;
}

export interface SpawnedCommand {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  /** Resolves when the process has exited; never rejects */
  exited: Promise<ExitStatus>;
  /** Ask the process to stop (SIGTERM); `exited` still settles afterwards */
  kill(): void;
}

/**
 * Seam between the hypervisor/storage adapters and real processes
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
  spawn(command: string, args: string[], options?: CommandOptions): SpawnedCommand;
}

function spawnCommand(command: string, args: string[], options?: CommandOptions): SpawnedCommand {
  const child = spawn(command, args, {
    env: options?.env ?? process.env,
    stdio: ["pipe", "pipe", "pipe"],
  });

  const exited = new Promise<ExitStatus>((resolve) => {
    child.once("error", (error) => {
      // the streams would otherwise never end
      child.stdout.destroy(error);
      child.stderr.destroy();
      resolve({ exitCode: null, signal: null, error });
    });
    child.once("close", (exitCode, signal) => {
      resolve({ exitCode, signal });
    });
  });

  return {
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    exited,
    kill: () => {
      child.kill("SIGTERM");
    },
  };
}

async function collect(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function runCommand(
  command: string,
  args: string[],
  options?: CommandOptions,
): Promise<CommandResult> {
  const child = spawnCommand(command, args, options);
  child.stdin.end();

  const [stdout, stderr, status] = await Promise.all([
    collect(child.stdout).catch((): string => ""),
    collect(child.stderr).catch((): string => ""),
    child.exited,
  ]);

  if (status.error) {
    throw status.error;
  }

  return {
    success: status.exitCode === 0,
    stdout: stdout.trim(),
    stderr: stderr.trim(),
    exitCode: status.exitCode,
  };
}

/**
 * Read a whole stream as UTF-8 text
 */
export const readStreamText = collect;

export const defaultRunner: CommandRunner = {
  run: runCommand,
  spawn: spawnCommand,
};

/**
 * Mask values following password-style flags before logging a command line
 */
export function describeCommand(command: string, args: string[]): string {
  const masked = args.map((arg, index) => (args[index - 1] === "-pw" ? "********" : arg));
  return [command, ...masked].join(" ");
}

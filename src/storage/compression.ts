/**
 * Stream compressors for file-based storage
 */

import { Duplex, PassThrough } from "node:stream";
import { createGzip } from "node:zlib";
import type { Compression } from "../types";
import type { CommandRunner } from "../utils/process";
import { defaultRunner } from "../utils/process";

/** Buffer size used between the export stream and the destination file */
export const STREAM_BUFFER_SIZE = 1024 * 1024;

export interface Compressor {
  stream: Duplex;
  /** Settles once the compressor has fully finished, rejecting on failure */
  done: Promise<void>;
}

function zstdCompressor(runner: CommandRunner): Compressor {
  const child = runner.spawn("zstd", ["-q", "-c"]);
  const stream = Duplex.from({ writable: child.stdin, readable: child.stdout });

  const done = child.exited.then((status) => {
    if (status.error) {
      throw new Error(`Failed to start zstd: ${status.error.message}`, { cause: status.error });
    }
    if (status.exitCode !== 0) {
      throw new Error(`zstd exited with code ${status.exitCode ?? status.signal ?? "unknown"}`);
    }
  });

  return { stream, done };
}

/**
 * Build the transform for a backend's compression setting. No
 * compression is a pass-through.
 */
export function createCompressor(
  compression: Compression | undefined,
  runner: CommandRunner = defaultRunner,
): Compressor {
  switch (compression) {
    case "gzip":
      return { stream: createGzip({ chunkSize: 64 * 1024 }), done: Promise.resolve() };
    case "zstd":
      return zstdCompressor(runner);
    case undefined:
      return {
        stream: new PassThrough({ highWaterMark: STREAM_BUFFER_SIZE }),
        done: Promise.resolve(),
      };
  }
}

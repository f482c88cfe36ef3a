/**
 * Retention sweep across storages
 */

import type { BackupArtifact, IStorageBackend } from "../../types";
import { describeError } from "../../utils/errors";
import { logger } from "../../utils/logger";

export interface RotationOptions {
  dryRun?: boolean;
  now?: Date;
}

export interface StorageRotationResult {
  storage: string;
  kept: BackupArtifact[];
  deleted: BackupArtifact[];
  error?: string;
}

export interface RotationSummary {
  totalKept: number;
  totalDeleted: number;
  results: StorageRotationResult[];
}

/**
 * Apply each storage's retention policy to everything it holds. A failing
 * storage is recorded and the sweep moves on to the next.
 */
export async function runRotation(
  backends: IStorageBackend[],
  options: RotationOptions = {},
): Promise<RotationSummary> {
  const summary: RotationSummary = { totalKept: 0, totalDeleted: 0, results: [] };

  for (const backend of backends) {
    logger.info(`Rotating storage: ${backend.name}${options.dryRun ? " (dry run)" : ""}`);

    try {
      const { kept, deleted } = await backend.rotate({}, options);
      summary.totalKept += kept.length;
      summary.totalDeleted += deleted.length;
      summary.results.push({ storage: backend.name, kept, deleted });
    } catch (err) {
      logger.error(`Rotation failed for storage ${backend.name}`, err);
      summary.results.push({ storage: backend.name, kept: [], deleted: [], error: describeError(err) });
    }
  }

  return summary;
}

/**
 * Artifact filter evaluation
 */

import type { ArtifactFilter, BackupArtifact, TimestampBound } from "../types";

function inList<T>(values: readonly T[] | undefined, value: T | undefined): boolean {
  if (!values || values.length === 0) return true;
  return value !== undefined && values.includes(value);
}

function afterStart(bound: TimestampBound | undefined, at: number): boolean {
  if (!bound) return true;
  const start = bound.at.getTime();
  return bound.inclusive ? at >= start : at > start;
}

function beforeEnd(bound: TimestampBound | undefined, at: number): boolean {
  if (!bound) return true;
  const end = bound.at.getTime();
  return bound.inclusive ? at <= end : at < end;
}

/**
 * Every non-empty filter field must match. An artifact stored without
 * compression never matches a non-empty compression set.
 */
export function matchesFilter(artifact: BackupArtifact, filter: ArtifactFilter = {}): boolean {
  const at = artifact.timestamp.getTime();
  return (
    inList(filter.hostIds, artifact.hostId) &&
    inList(filter.jobKinds, artifact.jobKind) &&
    inList(filter.objectNames, artifact.objectName) &&
    inList(filter.compressions, artifact.compression) &&
    afterStart(filter.timestamp?.start, at) &&
    beforeEnd(filter.timestamp?.end, at)
  );
}

export function applyFilter(
  artifacts: BackupArtifact[],
  filter: ArtifactFilter = {},
): BackupArtifact[] {
  return artifacts.filter((artifact) => matchesFilter(artifact, filter));
}

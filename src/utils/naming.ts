/**
 * Artifact naming codec
 *
 * An artifact's identity is encoded into one flat name:
 *
 *   <host>__<kind>__<object>__<rfc3339>[.<base_ext>[.<compression_ext>]]
 *
 * e.g. `xen01__vm__mail-server__2024-02-09T10:19:02+00:00.xva.zst`. The host
 * field is left out in single-host layouts (empty host id). Rotation relies
 * on this being the exact inverse of decoding.
 */

import type { ArtifactFilter, BackupArtifact, Compression, JobKind } from "../types";
import { ArtifactNameError, DecodeError } from "./errors";

export const FIELD_SEPARATOR = "__";

const JOB_KIND_TOKENS: Record<JobKind, string> = {
  "vm-backup": "vm",
};

const BASE_EXTENSIONS: Record<JobKind, string> = {
  "vm-backup": "xva",
};

export const COMPRESSION_EXTENSIONS: Record<Compression, string> = {
  gzip: "gz",
  zstd: "zst",
};

const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2}))(.*)$/;

export function jobKindToken(kind: JobKind): string {
  return JOB_KIND_TOKENS[kind];
}

export function parseJobKindToken(token: string): JobKind | null {
  for (const [kind, value] of Object.entries(JOB_KIND_TOKENS)) {
    if (value === token && isJobKind(kind)) {
      return kind;
    }
  }
  return null;
}

function isJobKind(value: string): value is JobKind {
  return Object.hasOwn(JOB_KIND_TOKENS, value);
}

export function baseExtension(kind: JobKind): string {
  return BASE_EXTENSIONS[kind];
}

export function compressionFromExtension(extension: string): Compression | undefined {
  for (const [compression, value] of Object.entries(COMPRESSION_EXTENSIONS)) {
    if (value === extension && (compression === "gzip" || compression === "zstd")) {
      return compression;
    }
  }
  return undefined;
}

/**
 * RFC 3339 in UTC with a numeric offset. Milliseconds are kept only when
 * non-zero so that hypervisor snapshot times stay second-granular.
 */
export function formatArtifactTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new ArtifactNameError("Artifact timestamp is not a valid date");
  }
  const iso = date.toISOString();
  const seconds = iso.slice(0, 19);
  const millis = iso.slice(20, 23);
  return millis === "000" ? `${seconds}+00:00` : `${seconds}.${millis}+00:00`;
}

export interface ArtifactInput {
  hostId: string;
  jobKind: JobKind;
  objectName: string;
  timestamp: Date;
  compression?: Compression;
}

/**
 * Build an artifact, trimming the object name so that stray whitespace
 * from configuration or VM labels never reaches a stored name.
 */
export function createArtifact(input: ArtifactInput): BackupArtifact {
  const artifact: BackupArtifact = {
    hostId: input.hostId.trim(),
    jobKind: input.jobKind,
    objectName: input.objectName.trim(),
    timestamp: input.timestamp,
  };
  if (input.compression) {
    artifact.compression = input.compression;
  }
  return artifact;
}

function assertEncodable(field: string, value: string, allowEmpty: boolean): void {
  if (value.length === 0) {
    if (allowEmpty) return;
    throw new ArtifactNameError(`Artifact ${field} must not be empty`);
  }
  if (value.includes(FIELD_SEPARATOR) || value.startsWith("_") || value.endsWith("_")) {
    throw new ArtifactNameError(
      `Artifact ${field} "${value}" collides with the "${FIELD_SEPARATOR}" separator`,
    );
  }
  if (value.includes("/") || value.includes("\0")) {
    throw new ArtifactNameError(`Artifact ${field} "${value}" contains a path character`);
  }
}

export function encodeArtifactName(artifact: BackupArtifact, includeExtension: boolean): string {
  const hostId = artifact.hostId.trim();
  const objectName = artifact.objectName.trim();

  assertEncodable("host id", hostId, true);
  assertEncodable("object name", objectName, false);

  const fields = [
    jobKindToken(artifact.jobKind),
    objectName,
    formatArtifactTimestamp(artifact.timestamp),
  ];
  if (hostId.length > 0) {
    fields.unshift(hostId);
  }

  let name = fields.join(FIELD_SEPARATOR);

  if (includeExtension) {
    name += `.${baseExtension(artifact.jobKind)}`;
    if (artifact.compression) {
      name += `.${COMPRESSION_EXTENSIONS[artifact.compression]}`;
    }
  }

  return name;
}

export function decodeArtifactName(name: string): BackupArtifact {
  const fields = name.split(FIELD_SEPARATOR);

  if (fields.length !== 3 && fields.length !== 4) {
    throw new DecodeError(name, `expected 3 or 4 fields, found ${fields.length}`);
  }

  const [hostId, kindToken, objectName, rest] =
    fields.length === 4 ? fields : ["", ...fields];

  if (hostId === undefined || kindToken === undefined || objectName === undefined || rest === undefined) {
    throw new DecodeError(name, "missing fields");
  }
  if (fields.length === 4 && hostId.length === 0) {
    throw new DecodeError(name, "empty host field");
  }

  const jobKind = parseJobKindToken(kindToken);
  if (!jobKind) {
    throw new DecodeError(name, `unknown job kind "${kindToken}"`);
  }

  if (objectName.length === 0) {
    throw new DecodeError(name, "empty object name");
  }

  const match = rest.match(TIMESTAMP_PATTERN);
  if (!match) {
    throw new DecodeError(name, "timestamp is not RFC 3339");
  }

  const timestamp = new Date(match[1] ?? "");
  if (Number.isNaN(timestamp.getTime())) {
    throw new DecodeError(name, `invalid timestamp "${match[1]}"`);
  }

  const suffix = match[2] ?? "";
  if (suffix.length > 0 && !suffix.startsWith(".")) {
    throw new DecodeError(name, `unexpected text after timestamp "${suffix}"`);
  }

  const extensions = suffix.length > 0 ? suffix.slice(1).split(".") : [];
  if (extensions[0] === baseExtension(jobKind)) {
    extensions.shift();
  }

  let compression: Compression | undefined;
  for (const extension of extensions) {
    compression = compressionFromExtension(extension);
    if (compression) break;
  }

  return createArtifact({ hostId, jobKind, objectName, timestamp, compression });
}

/**
 * Decode, or null for names that are not ours
 */
export function tryDecodeArtifactName(name: string): BackupArtifact | null {
  try {
    return decodeArtifactName(name);
  } catch (error) {
    if (error instanceof DecodeError) {
      return null;
    }
    throw error;
  }
}

/**
 * Key shared by every artifact of one logical object (host, kind, name)
 */
export function artifactIdentityKey(artifact: BackupArtifact): string {
  return [artifact.hostId, jobKindToken(artifact.jobKind), artifact.objectName].join(
    FIELD_SEPARATOR,
  );
}

/**
 * Filter scoping a listing to the logical object an artifact belongs to
 */
export function filterForArtifact(artifact: BackupArtifact): ArtifactFilter {
  return {
    hostIds: [artifact.hostId],
    jobKinds: [artifact.jobKind],
    objectNames: [artifact.objectName],
  };
}

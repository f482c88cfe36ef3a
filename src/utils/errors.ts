/**
 * Error taxonomy
 */

/**
 * An external command (xe, borg) could not be run or reported failure
 */
export class CollaboratorError extends Error {
  constructor(
    message: string,
    readonly stderr?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "CollaboratorError";
  }
}

/**
 * The VM has no snapshots at all. Distinct from other collaborator
 * failures because it drives the "create a fresh snapshot" branch.
 */
export class NoSnapshotsError extends CollaboratorError {
  constructor(readonly vmUuid: string) {
    super(`VM ${vmUuid} has no snapshots`);
    this.name = "NoSnapshotsError";
  }
}

export class BackendInitError extends Error {
  constructor(
    readonly storageName: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to initialize storage "${storageName}": ${message}`, options);
    this.name = "BackendInitError";
  }
}

export class StreamConsumptionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StreamConsumptionError";
  }
}

export type DecodeErrorKind = "MalformedName";

export class DecodeError extends Error {
  readonly kind: DecodeErrorKind = "MalformedName";

  constructor(
    readonly input: string,
    reason: string,
  ) {
    super(`Malformed artifact name "${input}": ${reason}`);
    this.name = "DecodeError";
  }
}

/**
 * An artifact field would not survive encoding
 */
export class ArtifactNameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArtifactNameError";
  }
}

export class RotationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RotationError";
  }
}

export class VmBackupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "VmBackupError";
  }
}

export class JobFailedError extends Error {
  constructor(
    readonly jobName: string,
    readonly failedObjects: number,
    options?: ErrorOptions,
  ) {
    super(`Backup job "${jobName}" failed (${failedObjects} failed object(s))`, options);
    this.name = "JobFailedError";
  }
}

/**
 * Render an error with its cause chain, "outer: inner: innermost"
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;

  while (current !== undefined && parts.length < 10) {
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }

  return parts.join(": ");
}
